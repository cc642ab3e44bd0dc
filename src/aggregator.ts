import type { Dayjs } from 'dayjs';
import { Activity, ActivityType, Weekday, WorkedTime } from './types.js';
import { getDayStart, getWeekStart, overlapMs } from './date-utils.js';

export function assertNever(value: never): never {
  throw new Error(`Unhandled activity type: ${String(value)}`);
}

export function countsAsWorkedTime(type: ActivityType): boolean {
  switch (type) {
    case 'work':
      return true;
    case 'break':
    case 'ignored':
      return false;
    default:
      return assertNever(type);
  }
}

/**
 * Sums the work time that falls inside today's window and inside the current week's window,
 * both of which end at `now`. Break and ignored activities never count, and nothing past
 * `now` counts either, so an ongoing activity contributes up to `now` only.
 *
 * Activities need not be sorted. Overlapping work activities are counted independently.
 */
export function aggregate(
  activities: readonly Activity[],
  now: Dayjs,
  weekStartDay: Weekday
): WorkedTime {
  const nowMs = now.valueOf();
  const todayStartMs = getDayStart(now).valueOf();
  const weekStartMs = getWeekStart(now, weekStartDay).valueOf();

  let todayMs = 0;
  let weekMs = 0;

  for (const activity of activities) {
    if (!countsAsWorkedTime(activity.type)) continue;

    const startMs = activity.start.valueOf();
    const endMs = Math.min(activity.end ? activity.end.valueOf() : nowMs, nowMs);

    todayMs += overlapMs(startMs, endMs, todayStartMs, nowMs);
    weekMs += overlapMs(startMs, endMs, weekStartMs, nowMs);
  }

  return { todayMs, weekMs };
}
