import type { Dayjs } from 'dayjs';

export type Weekday =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

export interface BalanceConfig {
  dailyHours: number;
  weeklyHours: number;
  weekStart: Weekday;
  timezone?: string; // IANA zone, host zone when unset
  dataDirectory: string;
}

export type ActivityType = 'work' | 'break' | 'ignored';

export interface Activity {
  readonly name: string;
  readonly start: Dayjs;
  readonly end: Dayjs | null; // null while ongoing
  readonly type: ActivityType;
}

export interface LogEntry {
  timestamp: Dayjs;
  name: string;
}

export type Period = 'daily' | 'weekly';

export type BalanceStatus = 'under' | 'at' | 'over';

export interface WorkedTime {
  todayMs: number;
  weekMs: number;
}

export interface BalanceTargets {
  dailyMs: number;
  weeklyMs: number;
}

export interface BalanceEntry {
  period: Period;
  workedMs: number;
  targetMs: number;
  remainingMs: number; // signed, negative means overtime
  status: BalanceStatus;
}

export type BalanceResult = readonly [daily: BalanceEntry, weekly: BalanceEntry];
