/**
 * Recursive deep merge of a source value into a destination value.
 *
 * The source takes precedence. Maps merge key by key, sequences combine
 * according to the array policy, and every other pairing goes through
 * overwriteUnmergeables. Destination maps are updated in place; callers
 * wanting the inputs untouched clone them first (see presets.ts).
 */

import { sortValues, unionValues } from './compare.js';
import { applyKnockouts, clearOrNull, isBareKnockout } from './knockout.js';
import { checkDepth, descend, DEFAULT_DEPTH_LIMIT, type DepthLimit, type ResolvedMergeOptions } from './options.js';
import { overwriteUnmergeables } from './overwrite.js';
import type { MergeTraceEvent } from './trace.js';
import { unpackSequence } from './unpack.js';
import {
  classify,
  hasEntry,
  isAbsent,
  setEntry,
  type MergeMap,
  type MergeSequence,
  type MergeValue,
} from './value.js';

/** Sinks get a copy of each event, never the nodes being merged. */
function emit(options: ResolvedMergeOptions, event: Omit<MergeTraceEvent, 'depth'>): void {
  if (options.trace === null) return;
  options.trace(structuredClone({ ...event, depth: options.depth }));
}

export function mergeValues(
  source: MergeValue,
  destination: MergeValue,
  options: ResolvedMergeOptions,
): MergeValue {
  checkDepth(options);

  const classified = classify(source);
  if (classified.kind === 'absent') {
    return destination;
  }
  if (isAbsent(destination) && !options.preserveUnmergeables) {
    return source;
  }

  emit(options, { stage: 'enter', source, destination });

  let result: MergeValue;
  switch (classified.kind) {
    case 'map': {
      const target = classify(destination);
      if (target.kind === 'map') {
        result = mergeMaps(classified.value, target.value, options);
      } else {
        emit(options, { stage: 'overwrite', source, destination });
        result = overwriteUnmergeables(source, destination, options);
      }
      break;
    }
    case 'sequence':
      result = mergeSequence(classified.value, destination, options);
      break;
    default:
      emit(options, { stage: 'overwrite', source, destination });
      result = overwriteUnmergeables(source, destination, options);
      break;
  }

  emit(options, { stage: 'return', destination: result });
  return result;
}

/**
 * Merge every source entry into the destination map, in source order.
 * Keys the destination lacks are merged against an empty map rather than
 * copied, so knockout directives inside a new branch still apply.
 */
export function mergeMaps(source: MergeMap, destination: MergeMap, options: ResolvedMergeOptions): MergeMap {
  checkDepth(options);

  const next = descend(options);

  for (const key of Object.keys(source)) {
    const value = source[key];

    if (hasEntry(destination, key) && !isAbsent(destination[key])) {
      emit(options, { stage: 'map-key', key, source: value, destination: destination[key] });
      setEntry(destination, key, mergeValues(value, destination[key], next));
    } else if (isAbsent(value)) {
      setEntry(destination, key, value);
    } else {
      emit(options, { stage: 'map-new-key', key, source: value });
      setEntry(destination, key, mergeValues(value, {}, next));
    }
  }

  return destination;
}

function mergeSequence(
  source: MergeSequence,
  destination: MergeValue,
  options: ResolvedMergeOptions,
): MergeValue {
  // Items of this sequence sit one level below it.
  const inner = descend(options);
  let items: MergeSequence = [...source];
  let target = destination;

  if (options.unpackArrays !== null) {
    const delimiter = options.unpackArrays;
    items = unpackSequence(items, delimiter, inner);
    if (Array.isArray(target)) {
      target = unpackSequence(target, delimiter, inner);
    }
    emit(options, { stage: 'unpack', source: items, destination: target });
  }

  const prefix = options.knockoutPrefix;
  if (prefix !== null && items.some((item) => isBareKnockout(item, prefix))) {
    emit(options, { stage: 'knockout-clear', destination: target });
    target = clearOrNull(target);
    items = items.filter((item) => !isBareKnockout(item, prefix));
  }

  const classified = classify(target);
  if (classified.kind !== 'sequence') {
    emit(options, { stage: 'overwrite', source: items, destination: target });
    return overwriteUnmergeables(items, target, options);
  }

  let existing = classified.value;
  if (prefix !== null) {
    const knocked = applyKnockouts(items, existing, prefix);
    for (const item of knocked.applied) {
      emit(options, { stage: 'knockout-item', source: item });
    }
    items = knocked.source;
    existing = knocked.destination;
  }

  emit(options, { stage: 'combine-sequences', source: items, destination: existing });
  const combined = combineSequences(items, existing, options, inner);
  return options.sortMergedArrays ? sortValues(combined, inner) : combined;
}

/**
 * Without legacyArrayConcat sequences merge as a set union. With it,
 * horizontal merges (same precedence level) concatenate and cross-level
 * merges let the source replace the destination.
 */
export function combineSequences(
  source: MergeSequence,
  destination: MergeSequence,
  options: Pick<ResolvedMergeOptions, 'legacyArrayConcat' | 'horizontalPrecedence'>,
  limit: DepthLimit = DEFAULT_DEPTH_LIMIT,
): MergeSequence {
  if (!options.legacyArrayConcat) {
    return unionValues(destination, source, limit);
  }
  return options.horizontalPrecedence ? [...destination, ...source] : [...source];
}
