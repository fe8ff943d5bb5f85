/**
 * Settings loader: process-level knobs that callers inject into merges.
 *
 * Sources, lowest precedence first: built-in defaults, the JSON5 settings
 * file, environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import JSON5 from 'json5';
import { isLogLevel } from '../logging/logger.js';
import type { MergeRuntime } from '../merge/presets.js';
import { ConfigLoadError } from './errors.js';
import { settingsSchema, type Settings } from './schema.js';

export const DEFAULT_SETTINGS_DIR = join(homedir(), '.strata');
export const DEFAULT_SETTINGS_FILE = 'settings.json5';

export interface LoadSettingsOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export function getSettingsPath(options?: LoadSettingsOptions): string {
  const env = options?.env ?? process.env;
  return options?.path ?? env['STRATA_SETTINGS'] ?? join(DEFAULT_SETTINGS_DIR, DEFAULT_SETTINGS_FILE);
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigLoadError('CONFIG_VALIDATION_ERROR', name, `expected true, false, 1 or 0, got "${raw}"`);
  }
}

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigLoadError('CONFIG_VALIDATION_ERROR', name, `expected a positive integer, got "${raw}"`);
  }
  return value;
}

function readSettingsFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError('CONFIG_READ_ERROR', path, 'could not read settings file', { cause: err });
  }

  try {
    return JSON5.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError('CONFIG_PARSE_ERROR', path, reason, { cause: err });
  }
}

function applyEnv(fileSettings: Settings, env: NodeJS.ProcessEnv): Settings {
  const settings: Settings = { ...fileSettings, defaults: { ...fileSettings.defaults } };

  const concat = env['STRATA_ARRAY_CONCAT'];
  if (concat !== undefined && concat !== '') {
    settings.legacyArrayConcat = parseBoolean('STRATA_ARRAY_CONCAT', concat);
  }

  const depth = env['STRATA_MAX_DEPTH'];
  if (depth !== undefined && depth !== '') {
    settings.maxDepth = parsePositiveInt('STRATA_MAX_DEPTH', depth);
  }

  const level = env['LOG_LEVEL'];
  if (level !== undefined && isLogLevel(level)) {
    settings.logLevel = level;
  }

  return settings;
}

/**
 * Resolve settings once. A missing settings file is not an error; an
 * unreadable, malformed or invalid one throws ConfigLoadError.
 */
export function loadSettings(options?: LoadSettingsOptions): Settings {
  const env = options?.env ?? process.env;
  const path = getSettingsPath(options);

  const result = settingsSchema.safeParse(readSettingsFile(path));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigLoadError('CONFIG_VALIDATION_ERROR', path, issues.join('; '));
  }

  return applyEnv(result.data, env);
}

/** The process-level knobs every merge receives. */
export function settingsToRuntime(settings: Settings): MergeRuntime {
  return {
    legacyArrayConcat: settings.legacyArrayConcat,
    maxDepth: settings.maxDepth,
  };
}
