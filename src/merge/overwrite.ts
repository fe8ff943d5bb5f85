import { isKnockoutItem, stripKnockout } from './knockout.js';
import type { ResolvedMergeOptions } from './options.js';
import { classify, type MergeValue } from './value.js';

/**
 * Resolve a source/destination pair that cannot be merged structurally.
 *
 * preserveUnmergeables keeps the destination. Otherwise the source wins,
 * after knockout directives in it are honoured: the bare prefix erases the
 * destination to "", "prefix:rest" becomes "rest", and a sequence that
 * carried any "prefix:" item erases the destination to "".
 */
export function overwriteUnmergeables(
  source: MergeValue,
  destination: MergeValue,
  options: ResolvedMergeOptions,
): MergeValue {
  if (options.preserveUnmergeables) {
    return destination;
  }

  const prefix = options.knockoutPrefix;
  if (prefix === null) {
    return source;
  }

  const classified = classify(source);
  switch (classified.kind) {
    case 'scalar': {
      const value = classified.value;
      if (value === prefix) return '';
      if (isKnockoutItem(value, prefix)) return stripKnockout(value, prefix);
      return value;
    }
    case 'sequence': {
      const filtered = classified.value.filter((item) => !isKnockoutItem(item, prefix));
      return filtered.length === classified.value.length ? classified.value : '';
    }
    default:
      return source;
  }
}
