/**
 * Configuration layers: JSON5 documents merged in precedence order.
 */

import { readFileSync } from 'node:fs';
import JSON5 from 'json5';
import { logger } from '../logging/logger.js';
import type { MergeOptions } from '../merge/options.js';
import { deepMerge, horizontalMerge, merge, roleMerge } from '../merge/presets.js';
import { isMergeMap, type MergeMap, type MergeValue } from '../merge/value.js';
import { ConfigLoadError } from './errors.js';
import { layerDocumentSchema, type MergeDefaults, type Settings } from './schema.js';
import { settingsToRuntime } from './settings.js';

const log = logger.child('layers');

export type LayerMergeMode = 'plain' | 'horizontal' | 'role' | 'custom';

export const LAYER_MERGE_MODES: readonly LayerMergeMode[] = ['plain', 'horizontal', 'role', 'custom'];

export function isLayerMergeMode(value: string): value is LayerMergeMode {
  return LAYER_MERGE_MODES.some((mode) => mode === value);
}

// ── Environment expansion ─────────────────────────────────────────────────

/** Replace ${VAR} and ${VAR:-default} references. */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)(?::-(.*?))?\}/g, (_, key: string, fallback: string | undefined) => {
    return env[key] ?? fallback ?? '';
  });
}

export function expandEnvDeep(value: MergeValue, env: NodeJS.ProcessEnv = process.env): MergeValue {
  if (typeof value === 'string') return expandEnvVars(value, env);
  if (Array.isArray(value)) return value.map((item) => expandEnvDeep(item, env));
  if (isMergeMap(value)) {
    const result: MergeMap = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvDeep(item, env);
    }
    return result;
  }
  return value;
}

// ── Loading ───────────────────────────────────────────────────────────────

export function parseLayer(content: string, path: string): MergeMap {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError('CONFIG_PARSE_ERROR', path, reason, { cause: err });
  }

  const result = layerDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigLoadError('CONFIG_VALIDATION_ERROR', path, 'layer must be an object of strings, numbers, booleans, nulls, arrays and objects');
  }
  return result.data;
}

export function loadLayer(path: string, env: NodeJS.ProcessEnv = process.env): MergeMap {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError('CONFIG_READ_ERROR', path, 'could not read layer file', { cause: err });
  }

  const expanded = expandEnvDeep(parseLayer(content, path), env);
  if (!isMergeMap(expanded)) {
    throw new ConfigLoadError('CONFIG_VALIDATION_ERROR', path, 'layer must be an object');
  }
  log.debug('Loaded layer', { path, keys: Object.keys(expanded).length });
  return expanded;
}

// ── Folding ───────────────────────────────────────────────────────────────

export interface ResolveLayersOptions {
  mode?: LayerMergeMode;
  settings: Settings;
  /** Policy for 'custom' mode, applied over settings.defaults */
  overrides?: MergeDefaults & { horizontalPrecedence?: boolean };
  trace?: MergeOptions['trace'];
  env?: NodeJS.ProcessEnv;
}

function customOptions(options: ResolveLayersOptions): MergeOptions {
  const defaults = options.settings.defaults;
  const overrides: NonNullable<ResolveLayersOptions['overrides']> = options.overrides ?? {};
  return {
    ...settingsToRuntime(options.settings),
    trace: options.trace,
    preserveUnmergeables: overrides.preserveUnmergeables ?? defaults.preserveUnmergeables,
    knockoutPrefix: overrides.knockoutPrefix ?? defaults.knockoutPrefix,
    horizontalPrecedence: overrides.horizontalPrecedence,
    sortMergedArrays: overrides.sortMergedArrays ?? defaults.sortMergedArrays,
    unpackArrays: overrides.unpackArrays ?? defaults.unpackArrays,
  };
}

/**
 * Merge already-loaded layers, lowest precedence first: each later layer
 * is the overlay for everything before it.
 */
export function mergeLayers(layers: MergeMap[], options: ResolveLayersOptions): MergeMap {
  const mode = options.mode ?? 'plain';
  const runtime = { ...settingsToRuntime(options.settings), trace: options.trace };

  let result: MergeMap = {};
  for (const layer of layers) {
    switch (mode) {
      case 'plain':
        result = merge(layer, result, runtime);
        break;
      case 'horizontal':
        result = horizontalMerge(layer, result, runtime);
        break;
      case 'role':
        result = roleMerge(layer, result, runtime);
        break;
      case 'custom': {
        const merged = deepMerge(layer, result, customOptions(options));
        result = isMergeMap(merged) ? merged : {};
        break;
      }
    }
  }
  return result;
}

/** Load every file and merge them; later files take precedence. */
export function resolveLayers(paths: string[], options: ResolveLayersOptions): MergeMap {
  const layers = paths.map((path) => loadLayer(path, options.env));
  log.info('Merging layers', { count: layers.length, mode: options.mode ?? 'plain' });
  return mergeLayers(layers, options);
}
