/**
 * Persistence of in-flight optimizer state.
 *
 * Each optimizer owns one record, keyed by its unique name. Records are
 * written after every analysis and every batch generation so that a run can
 * resume after a restart without re-analysing or regenerating batches.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { CacheRecord, CacheStore } from '../types.js';
import {
  CACHE_FILE_PREFIX,
  CACHE_VERSION,
  DEFAULT_CACHE_DIR,
} from '../constants.js';
import { CacheError, CacheNotFoundError, toError } from '../errors.js';

const batchSchema = z.object({
  batchNo: z.number().int().positive(),
  artifactName: z.string(),
  artifactPath: z.string(),
  outputPath: z.string(),
});

const cacheFileSchema = z
  .object({
    version: z.literal(CACHE_VERSION),
    name: z.string().min(1),
    variableValues: z.array(z.number()),
    outputValues: z.array(z.number()),
    ledger: z.array(batchSchema).min(1),
    nextVariableValue: z.number(),
    strategy: z.string(),
    stopped: z.boolean(),
  })
  .refine((data) => data.variableValues.length === data.outputValues.length, {
    message: 'variableValues and outputValues must have the same length',
  });

type CacheFile = z.infer<typeof cacheFileSchema>;

/**
 * Stores one JSON file per optimizer: `<cacheDir>/OPT_<name>.json`.
 *
 * @example
 * ```ts
 * const store = new FileCacheStore('.optimizer-cache');
 * const optimizer = await ResonatorOptimizer.restore({ name: 'res_a', cache: store, ... });
 * ```
 */
export class FileCacheStore implements CacheStore {
  constructor(private readonly cacheDir = DEFAULT_CACHE_DIR) {}

  pathFor(name: string): string {
    return join(this.cacheDir, `${CACHE_FILE_PREFIX}${name}.json`);
  }

  async write(record: CacheRecord): Promise<void> {
    const file: CacheFile = { version: CACHE_VERSION, ...record };
    const path = this.pathFor(record.name);
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(path, JSON.stringify(file, null, 2), 'utf-8');
    } catch (error) {
      throw new CacheError(`Failed to write cache file '${path}'`, toError(error));
    }
  }

  async read(name: string): Promise<CacheRecord> {
    const path = this.pathFor(name);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new CacheNotFoundError(name, path);
      }
      throw new CacheError(`Failed to read cache file '${path}'`, toError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CacheError(`Cache file '${path}' is not valid JSON`, toError(error));
    }

    const result = cacheFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheError(
        `Cache file '${path}' is malformed: ${result.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`
      );
    }
    if (result.data.name !== name) {
      throw new CacheError(
        `Cache file '${path}' belongs to optimizer '${result.data.name}', not '${name}'`
      );
    }

    const { version: _version, ...record } = result.data;
    return record;
  }
}

/**
 * Keeps records in memory. Records are copied in and out so callers cannot
 * mutate stored state.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly records = new Map<string, CacheRecord>();

  async write(record: CacheRecord): Promise<void> {
    this.records.set(record.name, structuredClone(record));
  }

  async read(name: string): Promise<CacheRecord> {
    const record = this.records.get(name);
    if (!record) {
      throw new CacheNotFoundError(name, 'memory');
    }
    return structuredClone(record);
  }
}

/** Disables persistence. */
export class NullCacheStore implements CacheStore {
  async write(_record: CacheRecord): Promise<void> {}

  async read(name: string): Promise<CacheRecord> {
    throw new CacheNotFoundError(name, 'null store');
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
