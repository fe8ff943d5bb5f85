/**
 * Knockout directives.
 *
 * With prefix "!merge": the bare marker "!merge" (or "!merge:") inside a
 * sequence clears the destination; "!merge:value" removes "value" from a
 * destination sequence; a scalar "!merge" erases the destination.
 */

import { valuesEqual } from './compare.js';
import { classify, type MergeSequence, type MergeValue } from './value.js';

export function isBareKnockout(item: MergeValue, prefix: string): boolean {
  return item === prefix || item === `${prefix}:`;
}

export function isKnockoutItem(item: MergeValue, prefix: string): item is string {
  return typeof item === 'string' && item.startsWith(`${prefix}:`);
}

export function stripKnockout(item: string, prefix: string): string {
  return item.slice(prefix.length + 1);
}

/**
 * Empty a destination in place where it has something to empty. Strings
 * become "", any other scalar becomes absent.
 */
export function clearOrNull(destination: MergeValue): MergeValue {
  const classified = classify(destination);
  switch (classified.kind) {
    case 'sequence':
      classified.value.length = 0;
      return classified.value;
    case 'map':
      for (const key of Object.keys(classified.value)) {
        delete classified.value[key];
      }
      return classified.value;
    case 'scalar':
      return typeof classified.value === 'string' ? '' : null;
    case 'absent':
      return null;
  }
}

export interface KnockoutResult {
  /** Source items left to merge */
  source: MergeSequence;
  destination: MergeSequence;
  /** The prefixed items that were applied */
  applied: string[];
}

/**
 * Apply "prefix:value" items from the source against the destination:
 * both the stripped value and the prefixed item itself leave the
 * destination, and the directive leaves the source.
 */
export function applyKnockouts(
  source: MergeSequence,
  destination: MergeSequence,
  prefix: string,
): KnockoutResult {
  let remaining = destination;
  const kept: MergeSequence = [];
  const applied: string[] = [];

  for (const item of source) {
    if (!isKnockoutItem(item, prefix)) {
      kept.push(item);
      continue;
    }
    const target = stripKnockout(item, prefix);
    remaining = remaining.filter((existing) => !valuesEqual(existing, target) && existing !== item);
    applied.push(item);
  }

  return { source: kept, destination: remaining, applied };
}
