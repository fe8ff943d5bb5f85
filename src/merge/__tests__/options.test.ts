import { describe, it, expect } from 'vitest';
import { DeepMergeError, InvalidConfigurationError } from '../errors.js';
import { deepMerge } from '../presets.js';
import { descend, DEFAULT_MAX_DEPTH, resolveMergeOptions } from '../options.js';

describe('resolveMergeOptions', () => {
  it('fills in defaults', () => {
    expect(resolveMergeOptions()).toEqual({
      preserveUnmergeables: false,
      knockoutPrefix: null,
      horizontalPrecedence: false,
      sortMergedArrays: false,
      unpackArrays: null,
      legacyArrayConcat: false,
      maxDepth: DEFAULT_MAX_DEPTH,
      trace: null,
      depth: 0,
    });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveMergeOptions({ sortMergedArrays: true }))).toBe(true);
  });

  it('keeps the trace sink', () => {
    const trace = () => {};
    expect(resolveMergeOptions({ trace }).trace).toBe(trace);
  });

  it('rejects an empty knockout prefix', () => {
    expect(() => resolveMergeOptions({ knockoutPrefix: '' })).toThrow(
      'Invalid merge options: knockoutPrefix: cannot be an empty string',
    );
  });

  it('rejects a knockout prefix combined with preserveUnmergeables', () => {
    expect(() => resolveMergeOptions({ knockoutPrefix: '!merge', preserveUnmergeables: true })).toThrow(
      'Invalid merge options: knockoutPrefix: requires preserveUnmergeables to be false',
    );
  });

  it('rejects an empty knockout prefix whatever the inputs', () => {
    expect(() => deepMerge(null, null, { knockoutPrefix: '' })).toThrow(InvalidConfigurationError);
    expect(() => deepMerge({ a: 1 }, { a: 2 }, { knockoutPrefix: '', preserveUnmergeables: true })).toThrow(
      InvalidConfigurationError,
    );
  });

  it('accepts an empty unpack delimiter', () => {
    expect(resolveMergeOptions({ unpackArrays: '' }).unpackArrays).toBe('');
  });

  it('rejects a non-positive maxDepth', () => {
    expect(() => resolveMergeOptions({ maxDepth: 0 })).toThrow(InvalidConfigurationError);
  });

  it('carries a stable code and the individual issues', () => {
    try {
      resolveMergeOptions({ knockoutPrefix: '' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DeepMergeError);
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (err instanceof InvalidConfigurationError) {
        expect(err.code).toBe('INVALID_CONFIGURATION');
        expect(err.issues).toEqual(['knockoutPrefix: cannot be an empty string']);
        expect(err.name).toBe('InvalidConfigurationError');
      }
    }
  });
});

describe('descend', () => {
  it('changes only the depth', () => {
    const top = resolveMergeOptions({ knockoutPrefix: '!merge' });
    const next = descend(top);
    expect(next).toEqual({ ...top, depth: 1 });
    expect(top.depth).toBe(0);
    expect(Object.isFrozen(next)).toBe(true);
  });
});
