/**
 * Structural equality (for set-union and knockout removal) and a total
 * ordering (for sortMergedArrays) over merge values.
 *
 * Every walk into a nested sequence or map counts against the caller's
 * DepthLimit and throws MergeDepthError past it.
 */

import { checkDepth, DEFAULT_DEPTH_LIMIT, nested, type DepthLimit } from './options.js';
import { classify, hasEntry, type MergeValue, type ValueKind } from './value.js';

/** Walk a value only to check that it stays within the limit. */
export function checkNesting(value: MergeValue, limit: DepthLimit): void {
  const classified = classify(value);
  if (classified.kind !== 'sequence' && classified.kind !== 'map') return;
  checkDepth(limit);
  const children = classified.kind === 'map' ? Object.values(classified.value) : classified.value;
  const inner = nested(limit);
  for (const child of children) {
    checkNesting(child, inner);
  }
}

export function valuesEqual(a: MergeValue, b: MergeValue, limit: DepthLimit = DEFAULT_DEPTH_LIMIT): boolean {
  const left = classify(a);
  const right = classify(b);

  switch (left.kind) {
    case 'absent':
      return right.kind === 'absent';
    case 'scalar':
      return right.kind === 'scalar' && left.value === right.value;
    case 'sequence': {
      if (right.kind !== 'sequence' || left.value.length !== right.value.length) return false;
      checkDepth(limit);
      const inner = nested(limit);
      const mine = left.value;
      const other = right.value;
      return mine.every((item, i) => valuesEqual(item, other[i], inner));
    }
    case 'map': {
      if (right.kind !== 'map') return false;
      checkDepth(limit);
      const inner = nested(limit);
      const mine = left.value;
      const other = right.value;
      const keys = Object.keys(mine);
      if (keys.length !== Object.keys(other).length) return false;
      return keys.every((key) => hasEntry(other, key) && valuesEqual(mine[key], other[key], inner));
    }
  }
}

/** Append items not already present, keeping first occurrences in order. */
export function unionValues(
  destination: MergeValue[],
  source: MergeValue[],
  limit: DepthLimit = DEFAULT_DEPTH_LIMIT,
): MergeValue[] {
  const result: MergeValue[] = [];
  for (const item of [...destination, ...source]) {
    if (!result.some((seen) => valuesEqual(seen, item, limit))) {
      result.push(item);
    }
  }
  return result;
}

// ── Ordering ──────────────────────────────────────────────────────────────

type RankedKind = ValueKind | 'boolean' | 'number' | 'string';

const KIND_RANK: Record<Exclude<RankedKind, 'scalar'>, number> = {
  absent: 0,
  boolean: 1,
  number: 2,
  string: 3,
  sequence: 4,
  map: 5,
};

function rank(value: MergeValue): number {
  const classified = classify(value);
  if (classified.kind !== 'scalar') return KIND_RANK[classified.kind];
  switch (typeof classified.value) {
    case 'boolean':
      return KIND_RANK.boolean;
    case 'number':
      return KIND_RANK.number;
    default:
      return KIND_RANK.string;
  }
}

function compareRaw<T extends string | number>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Mixed kinds sort by kind first: absent, booleans, numbers, strings,
 * sequences, maps. Within a kind numbers compare numerically, strings by
 * UTF-16 code unit, sequences element by element and maps by JSON text.
 */
export function compareValues(a: MergeValue, b: MergeValue, limit: DepthLimit = DEFAULT_DEPTH_LIMIT): number {
  const byKind = rank(a) - rank(b);
  if (byKind !== 0) return byKind;

  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'number' && typeof b === 'number') return compareRaw(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareRaw(a, b);

  if (Array.isArray(a) && Array.isArray(b)) {
    checkDepth(limit);
    const inner = nested(limit);
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      const cmp = compareValues(a[i], b[i], inner);
      if (cmp !== 0) return cmp;
    }
    return a.length - b.length;
  }

  const left = classify(a);
  const right = classify(b);
  if (left.kind === 'map' && right.kind === 'map') {
    checkNesting(left.value, limit);
    checkNesting(right.value, limit);
    return compareRaw(JSON.stringify(left.value), JSON.stringify(right.value));
  }
  return 0;
}

export function sortValues(items: MergeValue[], limit: DepthLimit = DEFAULT_DEPTH_LIMIT): MergeValue[] {
  return [...items].sort((a, b) => compareValues(a, b, limit));
}
