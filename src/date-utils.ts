import dayjs, { type Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import duration from 'dayjs/plugin/duration.js';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

import { Weekday } from './types.js';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(duration);
dayjs.extend(customParseFormat);

export const FORMAT_DATE = 'YYYY-MM-DD';
export const FORMAT_DATE_TIME = 'YYYY-MM-DD HH:mm';

// Ordered to match Dayjs#day(), which counts from Sunday = 0.
export const WEEKDAYS: readonly Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
];

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((day) => day === value);
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// Wall-clock layouts accepted without an offset. Checked strictly so 2025-02-30 does not roll over.
const LOCAL_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm',
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss.SSS',
];

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

export function hasExplicitOffset(value: string): boolean {
  return OFFSET_SUFFIX.test(value.trim());
}

export function isValidDateString(dateString?: string): boolean {
  if (!dateString) return false;
  if (/^\d{4}-\d{2}-\d{2}/.test(dateString) && !hasExplicitOffset(dateString)) {
    return dayjs(dateString, LOCAL_FORMATS, true).isValid();
  }
  return dayjs(dateString).isValid();
}

export function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/**
 * Parses a log timestamp. A string with its own offset keeps that instant and is only
 * moved into `tz` for display. A wall-clock string is read in `tz`, or in the host zone.
 */
export function parseTimestamp(value: string, tz?: string): Dayjs {
  if (!tz) return dayjs(value);
  return hasExplicitOffset(value) ? dayjs(value).tz(tz) : dayjs.tz(value, tz);
}

export function hoursToMs(hours: number): number {
  return Math.round(dayjs.duration(hours, 'hours').asMilliseconds());
}

export function getDayStart(date: Dayjs): Dayjs {
  return date.startOf('day');
}

/**
 * Midnight of the latest day on or before `date` that falls on `weekStartDay`.
 * When `date` itself is that weekday this is the same instant as getDayStart(date).
 */
export function getWeekStart(date: Dayjs, weekStartDay: Weekday): Dayjs {
  const dayStart = getDayStart(date);
  const daysSinceWeekStart = (dayStart.day() - WEEKDAYS.indexOf(weekStartDay) + 7) % 7;
  if (daysSinceWeekStart === 0) return dayStart;
  // startOf again so a zoned instant re-resolves its offset across DST changes
  return dayStart.subtract(daysSinceWeekStart, 'day').startOf('day');
}

/** Length in ms of the intersection of [start, end] with [windowStart, windowEnd], never negative. */
export function overlapMs(start: number, end: number, windowStart: number, windowEnd: number): number {
  return Math.max(0, Math.min(end, windowEnd) - Math.max(start, windowStart));
}

/**
 * Formats a duration as hours and zero-padded minutes, e.g. `6h30` or `-1h15`.
 * Seconds are dropped, truncating toward zero.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.trunc(ms / 1000);
  const absSeconds = Math.abs(totalSeconds);
  const hours = Math.floor(absSeconds / 3600);
  const minutes = Math.floor((absSeconds % 3600) / 60);

  const result = `${hours}h${String(minutes).padStart(2, '0')}`;
  return totalSeconds < 0 ? `-${result}` : result;
}

export { dayjs };
