import { BalanceEntry, BalanceResult, BalanceStatus, BalanceTargets, Period, WorkedTime } from './types.js';

export function classifyBalance(remainingMs: number): BalanceStatus {
  if (remainingMs === 0) return 'at';
  return remainingMs < 0 ? 'over' : 'under';
}

function evaluatePeriod(period: Period, workedMs: number, targetMs: number): BalanceEntry {
  const remainingMs = targetMs - workedMs;
  return {
    period,
    workedMs,
    targetMs,
    remainingMs,
    status: classifyBalance(remainingMs),
  };
}

/**
 * Compares worked time with the daily and weekly targets. Remaining time is not clamped:
 * overtime shows up as a negative remainder with status `over`.
 */
export function evaluate(worked: WorkedTime, targets: BalanceTargets): BalanceResult {
  return [
    evaluatePeriod('daily', worked.todayMs, targets.dailyMs),
    evaluatePeriod('weekly', worked.weekMs, targets.weeklyMs),
  ];
}
