import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoadError } from '../errors.js';
import { expandEnvDeep, expandEnvVars, isLayerMergeMode, loadLayer, mergeLayers, resolveLayers } from '../layers.js';
import { settingsSchema, type Settings } from '../schema.js';

function settings(input: Partial<Settings> = {}): Settings {
  return settingsSchema.parse(input);
}

describe('expandEnvVars', () => {
  it('substitutes variables and defaults', () => {
    expect(expandEnvVars('${HOST}:${PORT:-80}', { HOST: 'db' })).toBe('db:80');
  });

  it('replaces unknown variables without a default by an empty string', () => {
    expect(expandEnvVars('[${MISSING}]', {})).toBe('[]');
  });

  it('walks nested documents and leaves non-strings alone', () => {
    expect(expandEnvDeep({ a: ['${X}', 1], b: { c: '${X}-y', d: null } }, { X: 'x' })).toEqual({
      a: ['x', 1],
      b: { c: 'x-y', d: null },
    });
  });
});

describe('isLayerMergeMode', () => {
  it('accepts the preset names only', () => {
    expect(isLayerMergeMode('role')).toBe(true);
    expect(isLayerMergeMode('deep')).toBe(false);
  });
});

describe('mergeLayers', () => {
  const base = { a: 1, list: ['x'], nested: { k: 'v' } };
  const overlay = { a: 2, list: ['y'], nested: { j: 'w' } };

  it('folds layers with later ones taking precedence', () => {
    expect(mergeLayers([base, overlay], { settings: settings() })).toEqual({
      a: 2,
      list: ['x', 'y'],
      nested: { k: 'v', j: 'w' },
    });
  });

  it('does not modify the layers', () => {
    mergeLayers([base, overlay], { settings: settings() });
    expect(base).toEqual({ a: 1, list: ['x'], nested: { k: 'v' } });
  });

  it('lets the overlay sequence replace under legacy concatenation', () => {
    const result = mergeLayers([base, overlay], { settings: settings({ legacyArrayConcat: true }) });
    expect(result['list']).toEqual(['y']);
  });

  it('concatenates horizontal layers under legacy concatenation', () => {
    const result = mergeLayers([base, overlay], {
      mode: 'horizontal',
      settings: settings({ legacyArrayConcat: true }),
    });
    expect(result['list']).toEqual(['x', 'y']);
  });

  it('honours knockout directives in role mode', () => {
    const result = mergeLayers(
      [
        { features: ['a', 'b'], db: { host: 'x' } },
        { features: ['!merge:a', 'c'], db: '!merge' },
      ],
      { mode: 'role', settings: settings() },
    );
    expect(result).toEqual({ features: ['b', 'c'], db: '' });
  });

  it('applies settings defaults in custom mode', () => {
    const result = mergeLayers([{ tags: ['c,a'] }, { tags: ['b'] }], {
      mode: 'custom',
      settings: settings({ defaults: { unpackArrays: ',', sortMergedArrays: true } }),
    });
    expect(result).toEqual({ tags: ['a', 'b', 'c'] });
  });

  it('lets overrides win over settings defaults in custom mode', () => {
    const result = mergeLayers([{ a: { x: 1 } }, { a: 'flat' }], {
      mode: 'custom',
      settings: settings({ defaults: { preserveUnmergeables: false } }),
      overrides: { preserveUnmergeables: true },
    });
    expect(result).toEqual({ a: { x: 1 } });
  });

  it('starts from an empty document', () => {
    expect(mergeLayers([], { settings: settings() })).toEqual({});
  });
});

describe('loading layer files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'strata-layers-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  function loadError(path: string): ConfigLoadError {
    try {
      loadLayer(path, {});
    } catch (err) {
      if (err instanceof ConfigLoadError) return err;
      throw err;
    }
    throw new Error('expected a ConfigLoadError');
  }

  it('resolves files in order and expands environment references', () => {
    const first = write('base.json5', "{ host: '${DB_HOST:-localhost}', port: 5432, // primary\n }");
    const second = write('local.json', '{ "port": 6432 }');
    expect(resolveLayers([first, second], { settings: settings(), env: {} })).toEqual({
      host: 'localhost',
      port: 6432,
    });
  });

  it('reports a missing file', () => {
    const err = loadError(join(dir, 'missing.json5'));
    expect(err.code).toBe('CONFIG_READ_ERROR');
    expect(err.message).toBe(`${join(dir, 'missing.json5')}: could not read layer file`);
  });

  it('reports malformed JSON5', () => {
    expect(loadError(write('bad.json5', '{ a: ')).code).toBe('CONFIG_PARSE_ERROR');
  });

  it('requires an object at the top level', () => {
    const err = loadError(write('list.json', '[1, 2]'));
    expect(err.code).toBe('CONFIG_VALIDATION_ERROR');
    expect(err.message).toBe(
      `${join(dir, 'list.json')}: layer must be an object of strings, numbers, booleans, nulls, arrays and objects`,
    );
  });
});
