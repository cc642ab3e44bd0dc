import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import { ConfigManager, parseHours, parseWeekday } from '../config-manager.js';

describe('ConfigManager', () => {
  beforeEach(() => {
    vi.spyOn(os, 'homedir').mockReturnValue('/mock/home');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the defaults when nothing is configured', () => {
    const config = new ConfigManager({}).resolveConfig();

    expect(config).toEqual({
      dailyHours: 8,
      weeklyHours: 40,
      weekStart: 'sunday',
      dataDirectory: '/mock/home/workbalance-data',
    });
  });

  it('reads WORKBALANCE_* environment variables', () => {
    const config = new ConfigManager({
      WORKBALANCE_DAILY_HRS: '7.5',
      WORKBALANCE_WEEKLY_HRS: '37.5',
      WORKBALANCE_WEEK_START: 'Monday',
      WORKBALANCE_TIMEZONE: 'Europe/Berlin',
      WORKBALANCE_DATA_DIR: '/srv/timesheets',
    }).resolveConfig();

    expect(config).toEqual({
      dailyHours: 7.5,
      weeklyHours: 37.5,
      weekStart: 'monday',
      timezone: 'Europe/Berlin',
      dataDirectory: '/srv/timesheets/workbalance-data',
    });
  });

  it('lets command line values win over the environment', () => {
    const config = new ConfigManager({
      WORKBALANCE_DAILY_HRS: '7.5',
      WORKBALANCE_WEEK_START: 'monday',
    }).resolveConfig({ dailyHrs: '6', weekStart: 'friday' });

    expect(config.dailyHours).toBe(6);
    expect(config.weekStart).toBe('friday');
  });

  it('treats empty environment values as unset', () => {
    const config = new ConfigManager({ WORKBALANCE_DAILY_HRS: '  ', WORKBALANCE_TIMEZONE: '' }).resolveConfig();

    expect(config.dailyHours).toBe(8);
    expect(config.timezone).toBeUndefined();
  });

  it('accepts negative and zero targets', () => {
    const config = new ConfigManager({}).resolveConfig({ dailyHrs: '-2', weeklyHrs: 0 });

    expect(config.dailyHours).toBe(-2);
    expect(config.weeklyHours).toBe(0);
  });

  it('rejects an unknown timezone', () => {
    expect(() => new ConfigManager({}).resolveConfig({ timezone: 'Mars/Olympus' })).toThrow(
      'Invalid timezone: "Mars/Olympus". Use an IANA name such as Europe/Berlin.'
    );
  });

  it('builds defaults with getDefaultConfig', () => {
    expect(new ConfigManager({}).getDefaultConfig().weekStart).toBe('sunday');
  });
});

describe('parseHours', () => {
  it('parses decimal hours', () => {
    expect(parseHours('6.25', 'daily hours')).toBe(6.25);
    expect(parseHours(40, 'weekly hours')).toBe(40);
  });

  it('rejects values that are not numbers', () => {
    expect(() => parseHours('eight', 'daily hours')).toThrow(
      'Invalid daily hours: "eight". Please enter a number of hours.'
    );
    expect(() => parseHours('Infinity', 'weekly hours')).toThrow('Invalid weekly hours');
  });
});

describe('parseWeekday', () => {
  it('is case-insensitive', () => {
    expect(parseWeekday(' Sunday ')).toBe('sunday');
    expect(parseWeekday('WEDNESDAY')).toBe('wednesday');
  });

  it('rejects unknown days', () => {
    expect(() => parseWeekday('someday')).toThrow(
      'Invalid week start: "someday". Expected one of sunday, monday, tuesday, wednesday, thursday, friday, saturday.'
    );
  });
});
