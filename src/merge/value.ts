/**
 * Merge value model: the shapes configuration data can take.
 *
 * Plain objects act as the map container: they keep insertion order for
 * non-integer keys and keys are unique. `null` and `undefined` both count
 * as "absent" for every merge rule.
 */

export type Scalar = string | number | boolean;

export type Absent = null | undefined;

export interface MergeMap {
  [key: string]: MergeValue;
}

export type MergeSequence = MergeValue[];

export type MergeValue = Scalar | Absent | MergeSequence | MergeMap;

export type ClassifiedValue =
  | { kind: 'absent'; value: Absent }
  | { kind: 'map'; value: MergeMap }
  | { kind: 'sequence'; value: MergeSequence }
  | { kind: 'scalar'; value: Scalar };

export type ValueKind = ClassifiedValue['kind'];

export function classify(value: MergeValue): ClassifiedValue {
  if (value === null || value === undefined) return { kind: 'absent', value };
  if (Array.isArray(value)) return { kind: 'sequence', value };
  if (typeof value === 'object') return { kind: 'map', value };
  return { kind: 'scalar', value };
}

export function isMergeMap(value: MergeValue): value is MergeMap {
  return classify(value).kind === 'map';
}

export function isAbsent(value: MergeValue): value is Absent {
  return value === null || value === undefined;
}

/** Own-key lookup; ignores anything inherited from Object.prototype. */
export function hasEntry(map: MergeMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * Assign an entry. `__proto__` is defined as an own property so a parsed
 * document carrying that key never rewires the container's prototype.
 */
export function setEntry(map: MergeMap, key: string, value: MergeValue): void {
  if (key === '__proto__') {
    Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
    return;
  }
  map[key] = value;
}
