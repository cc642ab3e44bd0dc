import { BalanceConfig, Weekday } from './types.js';
import { WEEKDAYS, isValidTimezone, isWeekday } from './date-utils.js';
import { getDataDirectory } from './helper/getDataDirectory.js';

export const DEFAULT_DAILY_HOURS = 8;
export const DEFAULT_WEEKLY_HOURS = 40;
export const DEFAULT_WEEK_START: Weekday = 'sunday';

// Values given on the command line. They win over the environment.
export interface ConfigOverrides {
  dailyHrs?: string | number;
  weeklyHrs?: string | number;
  weekStart?: string;
  timezone?: string;
  dataDir?: string;
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function parseHours(value: string | number, label: string): number {
  const hours = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(hours)) {
    throw new Error(`Invalid ${label}: "${value}". Please enter a number of hours.`);
  }
  return hours;
}

export function parseWeekday(value: string): Weekday {
  const day = value.trim().toLowerCase();
  if (!isWeekday(day)) {
    throw new Error(`Invalid week start: "${value}". Expected one of ${WEEKDAYS.join(', ')}.`);
  }
  return day;
}

export function parseTimezone(value: string): string {
  if (!isValidTimezone(value)) {
    throw new Error(`Invalid timezone: "${value}". Use an IANA name such as Europe/Berlin.`);
  }
  return value;
}

export class ConfigManager {
  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  getDefaultConfig(): BalanceConfig {
    return {
      dailyHours: DEFAULT_DAILY_HOURS,
      weeklyHours: DEFAULT_WEEKLY_HOURS,
      weekStart: DEFAULT_WEEK_START,
      dataDirectory: getDataDirectory(),
    };
  }

  /**
   * Builds the effective configuration: defaults, then WORKBALANCE_* environment variables,
   * then command line overrides. Throws on values that cannot be interpreted.
   */
  resolveConfig(overrides: ConfigOverrides = {}): BalanceConfig {
    const defaults = this.getDefaultConfig();

    const dailyHrs = overrides.dailyHrs ?? present(this.env.WORKBALANCE_DAILY_HRS);
    const weeklyHrs = overrides.weeklyHrs ?? present(this.env.WORKBALANCE_WEEKLY_HRS);
    const weekStart = overrides.weekStart ?? present(this.env.WORKBALANCE_WEEK_START);
    const timezone = overrides.timezone ?? present(this.env.WORKBALANCE_TIMEZONE);
    const dataDir = overrides.dataDir ?? present(this.env.WORKBALANCE_DATA_DIR);

    const config: BalanceConfig = {
      dailyHours: dailyHrs === undefined ? defaults.dailyHours : parseHours(dailyHrs, 'daily hours'),
      weeklyHours:
        weeklyHrs === undefined ? defaults.weeklyHours : parseHours(weeklyHrs, 'weekly hours'),
      weekStart: weekStart === undefined ? defaults.weekStart : parseWeekday(weekStart),
      dataDirectory: getDataDirectory(dataDir),
    };

    if (timezone !== undefined) {
      config.timezone = parseTimezone(timezone);
    }

    return config;
  }
}
