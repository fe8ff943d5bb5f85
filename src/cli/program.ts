import { Command } from 'commander';
import { registerMergeCommand } from './merge.js';
import { registerSettingsCommand } from './settings.js';

export const VERSION = '0.3.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('strata')
    .description('Deep-merge layered configuration files with knockout and array policies')
    .version(VERSION);

  registerMergeCommand(program);
  registerSettingsCommand(program);
  return program;
}
