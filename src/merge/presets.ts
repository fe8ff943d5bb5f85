/**
 * Public merge entry points. Each one validates its options up front and
 * then hands off to the engine; the named presets only pick a policy.
 */

import { mergeMaps, mergeValues } from './engine.js';
import { resolveMergeOptions, type MergeOptions } from './options.js';
import type { MergeMap, MergeValue } from './value.js';

/** Knockout marker used by inheritance-chain (role) merges */
export const ROLE_KNOCKOUT_PREFIX = '!merge';

/** Settings a caller supplies to the presets; the policy itself is fixed. */
export type MergeRuntime = Pick<MergeOptions, 'legacyArrayConcat' | 'maxDepth' | 'trace'>;

/**
 * Destructive merge: destination maps are updated in place and may end up
 * sharing nodes with the source. Always use the return value, since a
 * scalar or sequence result cannot be written back into the argument.
 */
export function deepMergeInPlace(
  source: MergeValue,
  destination: MergeValue,
  options?: MergeOptions,
): MergeValue {
  const resolved = resolveMergeOptions(options);
  return mergeValues(source, destination, resolved);
}

/** Non-destructive merge; neither input is modified. */
export function deepMerge(source: MergeValue, destination: MergeValue, options?: MergeOptions): MergeValue {
  const resolved = resolveMergeOptions(options);
  return mergeValues(structuredClone(source), structuredClone(destination), resolved);
}

function mergeMapPreset(overlay: MergeMap, base: MergeMap, options: MergeOptions): MergeMap {
  const resolved = resolveMergeOptions(options);
  return mergeMaps(structuredClone(overlay), structuredClone(base), resolved);
}

/** Overlay wins over base; sequences follow the cross-level rule. */
export function merge(overlay: MergeMap, base: MergeMap, runtime: MergeRuntime = {}): MergeMap {
  return mergeMapPreset(overlay, base, { ...runtime, preserveUnmergeables: false });
}

/** Combine two sources from the same precedence level. */
export function horizontalMerge(overlay: MergeMap, base: MergeMap, runtime: MergeRuntime = {}): MergeMap {
  return mergeMapPreset(overlay, base, {
    ...runtime,
    preserveUnmergeables: false,
    horizontalPrecedence: true,
  });
}

/** Horizontal merge that honours "!merge" knockout directives. */
export function roleMerge(overlay: MergeMap, base: MergeMap, runtime: MergeRuntime = {}): MergeMap {
  return mergeMapPreset(overlay, base, {
    ...runtime,
    preserveUnmergeables: false,
    horizontalPrecedence: true,
    knockoutPrefix: ROLE_KNOCKOUT_PREFIX,
  });
}
