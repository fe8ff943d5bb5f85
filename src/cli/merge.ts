/**
 * Merge Command
 * Merge configuration layer files and print the resolved document.
 *
 * Usage:
 *   merge base.json5 env.json5 local.json5          - plain merge, later files win
 *   merge --mode role base.json5 role.json5         - honour "!merge" knockouts
 *   merge --mode custom --unpack , --sort a.json b.json
 */

import { Option, type Command } from 'commander';
import JSON5 from 'json5';
import { isLayerMergeMode, LAYER_MERGE_MODES, resolveLayers, type LayerMergeMode } from '../config/layers.js';
import type { MergeDefaults } from '../config/schema.js';
import { loadSettings } from '../config/settings.js';
import { logger } from '../logging/logger.js';
import { createLoggerTrace } from '../merge/trace.js';
import type { MergeMap } from '../merge/value.js';
import { reportFailure } from './report.js';

const log = logger.child('cli:merge');

export interface MergeCommandOptions {
  mode?: LayerMergeMode;
  knockoutPrefix?: string;
  preserveUnmergeables?: boolean;
  horizontal?: boolean;
  sort?: boolean;
  unpack?: string;
  legacyArrayConcat?: boolean;
  settings?: string;
  json5?: boolean;
  debug?: boolean;
}

function policyOverrides(options: MergeCommandOptions): MergeDefaults & { horizontalPrecedence?: boolean } {
  const overrides: MergeDefaults & { horizontalPrecedence?: boolean } = {};
  if (options.knockoutPrefix !== undefined) overrides.knockoutPrefix = options.knockoutPrefix;
  if (options.preserveUnmergeables) overrides.preserveUnmergeables = true;
  if (options.horizontal) overrides.horizontalPrecedence = true;
  if (options.sort) overrides.sortMergedArrays = true;
  if (options.unpack !== undefined) overrides.unpackArrays = options.unpack;
  return overrides;
}

export function renderDocument(document: MergeMap, json5 = false): string {
  return json5 ? JSON5.stringify(document, null, 2) : JSON.stringify(document, null, 2);
}

/** Load settings and layers, merge them and return the rendered document. */
export function runMerge(files: string[], options: MergeCommandOptions = {}): string {
  const settings = loadSettings({ path: options.settings });
  if (options.legacyArrayConcat) {
    settings.legacyArrayConcat = true;
  }
  logger.setLevel(options.debug ? 'debug' : settings.logLevel);

  const mode = options.mode ?? 'plain';
  const overrides = policyOverrides(options);
  if (mode !== 'custom' && Object.keys(overrides).length > 0) {
    log.warn('Policy flags only apply with --mode custom; ignoring them', { mode, flags: Object.keys(overrides) });
  }

  const trace = options.debug ? createLoggerTrace(logger.child('merge:trace')) : undefined;
  const merged = resolveLayers(files, { mode, settings, overrides, trace });
  return renderDocument(merged, options.json5);
}

export function registerMergeCommand(program: Command): void {
  program
    .command('merge <files...>')
    .description('Merge configuration layers; later files take precedence')
    .addOption(new Option('-m, --mode <mode>', 'Merge preset').choices([...LAYER_MERGE_MODES]).default('plain'))
    .option('-k, --knockout-prefix <prefix>', 'custom mode: prefix marking deletions')
    .option('--preserve-unmergeables', 'custom mode: keep destination values on type conflicts')
    .option('--horizontal', 'custom mode: treat layers as one precedence level')
    .option('--sort', 'custom mode: sort merged arrays')
    .option('--unpack <delimiter>', 'custom mode: split array entries on a delimiter')
    .option('--legacy-array-concat', 'Concatenate or replace arrays instead of set-union')
    .option('--settings <path>', 'Settings file (default: ~/.strata/settings.json5)')
    .option('--json5', 'Print JSON5 instead of JSON')
    .option('--debug', 'Trace every merge step to stderr')
    .action((files: string[], raw: Omit<MergeCommandOptions, 'mode'> & { mode: string }) => {
      const mode = isLayerMergeMode(raw.mode) ? raw.mode : 'plain';
      try {
        process.stdout.write(runMerge(files, { ...raw, mode }) + '\n');
      } catch (err) {
        reportFailure(log, 'Merge failed', err);
      }
    });
}
