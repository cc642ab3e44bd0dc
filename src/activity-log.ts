import fs from 'fs/promises';
import path from 'path';
import csv from 'csv-parser';
import { createReadStream } from 'fs';
import type { Dayjs } from 'dayjs';
import { Activity, ActivityType, BalanceConfig, LogEntry } from './types.js';
import { isValidDateString, parseTimestamp } from './date-utils.js';

export const ENTRIES_FILE_NAME = 'entries.csv';

// The entry that opens a working day. The span ending on it is the time since the previous day.
export const HELLO_ENTRY_NAME = 'hello';

export function classifyActivityName(name: string): ActivityType {
  const trimmed = name.trim();
  if (trimmed === HELLO_ENTRY_NAME) return 'ignored';
  if (trimmed.endsWith('***')) return 'ignored';
  if (trimmed.endsWith('**')) return 'break';
  return 'work';
}

export interface ActivityOptions {
  /** Name for the still-running span after the last entry; omitted means it is not reported. */
  currentActivity?: string;
}

/**
 * Turns a log of timestamped entries into activities. Each entry closes the activity that
 * started at the previous entry and gives it its name.
 */
export function entriesToActivities(
  entries: readonly LogEntry[],
  options: ActivityOptions = {}
): Activity[] {
  const sorted = [...entries].sort((a, b) => a.timestamp.valueOf() - b.timestamp.valueOf());
  const activities: Activity[] = [];

  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const next = sorted[i];
    activities.push({
      name: next.name,
      start: previous.timestamp,
      end: next.timestamp,
      type: classifyActivityName(next.name),
    });
  }

  const last = sorted.at(-1);
  if (options.currentActivity !== undefined && last) {
    activities.push({
      name: options.currentActivity,
      start: last.timestamp,
      end: null,
      type: classifyActivityName(options.currentActivity),
    });
  }

  return activities;
}

export class ActivityLog {
  private config: BalanceConfig;
  private readonly entriesPath: string;

  constructor(config: BalanceConfig) {
    this.config = config;
    this.entriesPath = path.join(config.dataDirectory, ENTRIES_FILE_NAME);
  }

  getEntriesPath(): string {
    return this.entriesPath;
  }

  async loadEntries(): Promise<LogEntry[]> {
    try {
      await fs.access(this.entriesPath);
    } catch {
      return [];
    }

    return new Promise((resolve, reject) => {
      const entries: LogEntry[] = [];
      let row = 0;
      const stream = createReadStream(this.entriesPath);

      // pipe() does not forward source errors
      stream.on('error', reject);
      stream
        .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim() }))
        .on('data', (data: Record<string, string | undefined>) => {
          row += 1;
          try {
            // Support both field ids and header titles
            const rawTimestamp = (data.timestamp ?? data.Timestamp ?? '').trim();
            const name = (data.name ?? data.Name ?? '').trim();
            if (!name) {
              throw new Error(`Entry ${row} in ${this.entriesPath} has no name`);
            }
            entries.push({ timestamp: this.parseRowTimestamp(rawTimestamp, row), name });
          } catch (e) {
            stream.destroy();
            reject(e);
          }
        })
        .on('end', () => resolve(entries))
        .on('error', reject);
    });
  }

  private parseRowTimestamp(value: string, row: number): Dayjs {
    if (!isValidDateString(value)) {
      throw new Error(`Entry ${row} in ${this.entriesPath} has an invalid timestamp: "${value}"`);
    }
    return parseTimestamp(value, this.config.timezone);
  }
}
