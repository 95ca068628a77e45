import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CacheRecord } from '../../types.js';
import { CacheError, CacheNotFoundError } from '../../errors.js';
import { FileCacheStore, MemoryCacheStore, NullCacheStore } from '../cache.js';

function record(overrides: Partial<CacheRecord> = {}): CacheRecord {
  return {
    name: 'res_a',
    variableValues: [400, 402],
    outputValues: [2.1e9, 2.09e9],
    ledger: [
      { batchNo: 1, artifactName: 'res_a_v1', artifactPath: 'inputs', outputPath: 'outputs' },
      {
        batchNo: 2,
        artifactName: 'batch_2__res_a_length_402',
        artifactPath: 'batch_2_son_files',
        outputPath: 'batch_2_outputs',
      },
    ],
    nextVariableValue: 402,
    strategy: 'LinFit',
    stopped: false,
    ...overrides,
  };
}

describe('MemoryCacheStore', () => {
  it('returns what was written', async () => {
    const store = new MemoryCacheStore();
    await store.write(record());

    expect(await store.read('res_a')).toEqual(record());
  });

  it('copies records in and out', async () => {
    const store = new MemoryCacheStore();
    const written = record();
    await store.write(written);
    written.variableValues.push(404);

    const read = await store.read('res_a');
    read.outputValues.push(1);

    expect(await store.read('res_a')).toEqual(record());
  });

  it('throws CacheNotFoundError for unknown names', async () => {
    await expect(new MemoryCacheStore().read('res_b')).rejects.toThrow(CacheNotFoundError);
  });
});

describe('NullCacheStore', () => {
  it('stores nothing', async () => {
    const store = new NullCacheStore();
    await store.write(record());

    await expect(store.read('res_a')).rejects.toThrow(
      "No cached state for optimizer 'res_a' at 'null store'."
    );
  });
});

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'emtune-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names files after the optimizer', () => {
    expect(new FileCacheStore(dir).pathFor('res_a')).toBe(join(dir, 'OPT_res_a.json'));
  });

  it('round-trips a record through a versioned JSON file', async () => {
    const store = new FileCacheStore(join(dir, 'nested'));
    await store.write(record());

    const raw: unknown = JSON.parse(await readFile(store.pathFor('res_a'), 'utf-8'));
    expect(raw).toMatchObject({ version: 1, name: 'res_a', strategy: 'LinFit' });
    expect(await store.read('res_a')).toEqual(record());
  });

  it('throws CacheNotFoundError when no file exists', async () => {
    const store = new FileCacheStore(dir);

    await expect(store.read('res_a')).rejects.toThrow(CacheNotFoundError);
    await expect(store.read('res_a')).rejects.toThrow(
      `No cached state for optimizer 'res_a' at '${join(dir, 'OPT_res_a.json')}'.`
    );
  });

  it('rejects a file that is not JSON', async () => {
    const store = new FileCacheStore(dir);
    await writeFile(store.pathFor('res_a'), 'variableValues: 400', 'utf-8');

    await expect(store.read('res_a')).rejects.toThrow(CacheError);
    await expect(store.read('res_a')).rejects.toThrow('is not valid JSON');
  });

  it('rejects histories of different lengths', async () => {
    const store = new FileCacheStore(dir);
    const { outputValues: _outputValues, ...rest } = record();
    await writeFile(
      store.pathFor('res_a'),
      JSON.stringify({ version: 1, ...rest, outputValues: [2.1e9] }),
      'utf-8'
    );

    await expect(store.read('res_a')).rejects.toThrow(
      'variableValues and outputValues must have the same length'
    );
  });

  it('rejects an unknown version', async () => {
    const store = new FileCacheStore(dir);
    await writeFile(store.pathFor('res_a'), JSON.stringify({ version: 2, ...record() }), 'utf-8');

    await expect(store.read('res_a')).rejects.toThrow(CacheError);
  });

  it('rejects a file written by another optimizer', async () => {
    const store = new FileCacheStore(dir);
    await writeFile(
      store.pathFor('res_a'),
      JSON.stringify({ version: 1, ...record({ name: 'res_b' }) }),
      'utf-8'
    );

    await expect(store.read('res_a')).rejects.toThrow(
      "belongs to optimizer 'res_b', not 'res_a'"
    );
  });
});
