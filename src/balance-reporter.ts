import chalk, { type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import type { Dayjs } from 'dayjs';
import { BalanceConfig, BalanceEntry, BalanceResult, BalanceStatus, Period, Weekday } from './types.js';
import { ActivityLog, entriesToActivities } from './activity-log.js';
import { aggregate } from './aggregator.js';
import { evaluate } from './balance-evaluator.js';
import {
  capitalize,
  dayjs,
  formatDuration,
  getDayStart,
  getWeekStart,
  hoursToMs,
  FORMAT_DATE,
} from './date-utils.js';

// Exported interfaces for testability (JSON mode)
export interface BalanceReportRow {
  period: Period;
  label: string;
  workedFormatted: string;
  remainingFormatted: string;
  status: BalanceStatus;
}

export interface BalanceReport {
  generatedAt: string;
  todayStart: string;
  weekStart: string;
  weekStartDay: Weekday;
  result: BalanceResult;
  rows: BalanceReportRow[];
}

export interface ShowBalanceOptions {
  format?: 'table' | 'json';
  now?: Dayjs;
  currentActivity?: string;
}

export const STATUS_COLORS: Record<BalanceStatus, 'green' | 'yellow' | 'red'> = {
  under: 'green',
  at: 'yellow',
  over: 'red',
};

export function periodLabel(period: Period, weekStartDay: Weekday): string {
  switch (period) {
    case 'daily':
      return 'Today';
    case 'weekly':
      return `Since ${capitalize(weekStartDay)}`;
  }
}

function toRow(entry: BalanceEntry, weekStartDay: Weekday): BalanceReportRow {
  return {
    period: entry.period,
    label: periodLabel(entry.period, weekStartDay),
    workedFormatted: formatDuration(entry.workedMs),
    remainingFormatted: formatDuration(entry.remainingMs),
    status: entry.status,
  };
}

export class BalanceReporter {
  private config: BalanceConfig;
  private activityLog: ActivityLog;

  constructor(config: BalanceConfig) {
    this.config = config;
    this.activityLog = new ActivityLog(config);
  }

  async showBalance(options: ShowBalanceOptions = {}): Promise<void | BalanceReport> {
    const outputFormat = options.format || 'table';
    const report = await this.buildReport(options.now ?? dayjs(), options.currentActivity);

    if (outputFormat === 'json') {
      return report;
    }

    const table = new Table({
      head: ['', chalk.cyan('Worked'), chalk.cyan('Remaining')],
      colAligns: ['left', 'right', 'right'],
      style: { head: [], border: [] },
    });

    report.rows.forEach((r) => {
      const color: ChalkInstance = chalk[STATUS_COLORS[r.status]];
      table.push([r.label, color(r.workedFormatted), color(r.remainingFormatted)]);
    });

    console.log(table.toString());
  }

  private async buildReport(reference: Dayjs, currentActivity?: string): Promise<BalanceReport> {
    const now = this.config.timezone ? reference.tz(this.config.timezone) : reference;
    const weekStartDay = this.config.weekStart;

    const entries = await this.activityLog.loadEntries();
    const activities = entriesToActivities(entries, { currentActivity });
    const worked = aggregate(activities, now, weekStartDay);
    const result = evaluate(worked, {
      dailyMs: hoursToMs(this.config.dailyHours),
      weeklyMs: hoursToMs(this.config.weeklyHours),
    });

    return {
      generatedAt: now.format(),
      todayStart: getDayStart(now).format(FORMAT_DATE),
      weekStart: getWeekStart(now, weekStartDay).format(FORMAT_DATE),
      weekStartDay,
      result,
      rows: result.map((entry) => toRow(entry, weekStartDay)),
    };
  }
}
