/**
 * Array unpacking: join a sequence on a delimiter and split it again, so
 * compound entries such as "a,b" become discrete elements.
 */

import { checkNesting } from './compare.js';
import { checkDepth, DEFAULT_DEPTH_LIMIT, nested, type DepthLimit } from './options.js';
import { classify, type MergeSequence, type MergeValue } from './value.js';

function joinItem(item: MergeValue, delimiter: string, limit: DepthLimit): string {
  const classified = classify(item);
  switch (classified.kind) {
    case 'absent':
      return '';
    case 'scalar':
      return String(classified.value);
    case 'sequence': {
      checkDepth(limit);
      const inner = nested(limit);
      return classified.value.map((child) => joinItem(child, delimiter, inner)).join(delimiter);
    }
    case 'map':
      checkNesting(classified.value, limit);
      return JSON.stringify(classified.value);
  }
}

/**
 * Nested sequences flatten into the join. Trailing empty fields are
 * dropped, so an empty or all-empty sequence unpacks to []. An empty
 * delimiter splits the joined text into single characters.
 */
export function unpackSequence(
  items: MergeSequence,
  delimiter: string,
  limit: DepthLimit = DEFAULT_DEPTH_LIMIT,
): string[] {
  const joined = items.map((item) => joinItem(item, delimiter, limit)).join(delimiter);
  const fields = delimiter === '' ? Array.from(joined) : joined.split(delimiter);
  while (fields.length > 0 && fields[fields.length - 1] === '') {
    fields.pop();
  }
  return fields;
}
