#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import Table from 'cli-table3';
import type { Dayjs } from 'dayjs';
import { loadEnv } from '../loadEnv.js';
import { ConfigManager } from '../config-manager.js';
import { BalanceReporter } from '../balance-reporter.js';
import { ENTRIES_FILE_NAME } from '../activity-log.js';
import { WEEKDAYS, capitalize, isValidDateString, parseTimestamp } from '../date-utils.js';

const CURRENT_ACTIVITY_NAME = '-- Current Activity --';

interface BalanceCommandOptions {
  dailyHrs?: string;
  weeklyHrs?: string;
  weekStart?: string;
  timezone?: string;
  dataDir?: string;
  now?: string;
  currentActivity?: string | boolean;
  json?: boolean;
}

loadEnv();

const program = new Command();

program
  .name('workbalance')
  .description('Show worked time against daily and weekly targets')
  .version('0.1.0');

program
  .command('balance')
  .description('Show worked time balance against daily/weekly targets')
  .option('--daily-hrs <hours>', 'Target working hours per day (default: 8)')
  .option('--weekly-hrs <hours>', 'Target working hours per week (default: 40)')
  .option('--week-start <day>', `Day the work week starts: ${WEEKDAYS.join(', ')} (default: sunday)`)
  .option('--timezone <tz>', 'IANA timezone used for day and week boundaries')
  .option('--data-dir <path>', 'Directory containing the workbalance-data folder')
  .option('--now <datetime>', 'Reference time instead of the current time (YYYY-MM-DD HH:mm)')
  .option('--current-activity [name]', 'Count the time since the last entry as an activity')
  .option('--json', 'Print the balance as JSON')
  .action(async (options: BalanceCommandOptions) => {
    try {
      const config = new ConfigManager().resolveConfig(options);

      let now: Dayjs | undefined;
      if (options.now !== undefined) {
        if (!isValidDateString(options.now)) {
          throw new Error(`Invalid reference time: "${options.now}"`);
        }
        now = parseTimestamp(options.now, config.timezone);
      }

      const currentActivity =
        options.currentActivity === true ? CURRENT_ACTIVITY_NAME : options.currentActivity || undefined;

      const reporter = new BalanceReporter(config);
      if (options.json) {
        const report = await reporter.showBalance({ format: 'json', now, currentActivity });
        console.log(JSON.stringify(report, null, 2));
      } else {
        await reporter.showBalance({ now, currentActivity });
      }
    } catch (error) {
      console.log(chalk.red('❌ Error showing balance:'), error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program
  .command('config')
  .description('Show the effective configuration')
  .action(() => {
    try {
      const config = new ConfigManager().resolveConfig();

      console.log(chalk.blue.bold('\n⚙️  Current Configuration\n'));

      const table = new Table({
        head: [chalk.cyan('Setting'), chalk.cyan('Value')],
        colWidths: [25, 50],
      });

      table.push(
        ['Daily target', `${config.dailyHours}h`],
        ['Weekly target', `${config.weeklyHours}h`],
        ['Week starts on', capitalize(config.weekStart)],
        ['Timezone', config.timezone ?? Intl.DateTimeFormat().resolvedOptions().timeZone],
        ['Data directory', config.dataDirectory],
        ['Entries file', path.join(config.dataDirectory, ENTRIES_FILE_NAME)]
      );

      console.log(table.toString());
      console.log();
    } catch (error) {
      console.log(chalk.red('❌ Error showing configuration:'), error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

// Handle unknown commands
program.on('command:*', () => {
  console.log(chalk.red('❌ Unknown command. Use "workbalance --help" to see available commands.'));
  process.exit(1);
});

// Show help if no command is provided
if (process.argv.length <= 2) {
  program.help();
}

program.parse(process.argv);
