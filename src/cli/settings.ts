/**
 * Settings Command
 * Show the settings a merge would run with, after file and environment
 * overrides are applied.
 */

import type { Command } from 'commander';
import { getSettingsPath, loadSettings } from '../config/settings.js';
import { logger } from '../logging/logger.js';
import { reportFailure } from './report.js';

const log = logger.child('cli:settings');

export function registerSettingsCommand(program: Command): void {
  program
    .command('settings')
    .description('Print the resolved settings')
    .option('--settings <path>', 'Settings file (default: ~/.strata/settings.json5)')
    .action((options: { settings?: string }) => {
      try {
        const settings = loadSettings({ path: options.settings });
        const output = { path: getSettingsPath({ path: options.settings }), ...settings };
        process.stdout.write(JSON.stringify(output, null, 2) + '\n');
      } catch (err) {
        reportFailure(log, 'Could not load settings', err);
      }
    });
}
