import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { IndexStamp } from '../types/index.js';
import type { Bm25Config } from '../types/config.types.js';
import type { Logger } from '../logging/logger.js';
import { IndexCorruptError, StoreUnavailableError } from '../errors/store.js';
import { Bm25Index } from './bm25Index.js';
import { sameStamp } from './stamp.js';
import type { VectorStore } from './vectorStore.js';

interface CacheFile {
  stamp: IndexStamp;
  index: unknown;
}

function isStamp(value: unknown): value is IndexStamp {
  if (typeof value !== 'object' || value === null) return false;
  const s = value as Record<string, unknown>;
  return typeof s['count'] === 'number' && typeof s['maxTimestamp'] === 'number' && typeof s['digest'] === 'string';
}

/**
 * On-disk BM25 cache at `<indexRoot>/bm25/index.json`, a materialized view
 * of the chunk store. Every read is checked against a stamp of the store.
 */
export class SparseIndexCache {
  readonly filePath: string;

  constructor(
    readonly directory: string,
    private readonly logger?: Logger,
  ) {
    this.filePath = join(directory, 'index.json');
  }

  /**
   * Read the cached index and its stamp. Returns null when the file does not
   * exist; throws IndexCorruptError when it cannot be decoded.
   */
  async read(): Promise<{ stamp: IndexStamp; index: Bm25Index } | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new IndexCorruptError(`BM25 cache at ${this.filePath} is not valid JSON`, err);
    }
    if (typeof parsed !== 'object' || parsed === null) {
      throw new IndexCorruptError(`BM25 cache at ${this.filePath} is not an object`);
    }
    const file = parsed as Partial<CacheFile>;
    if (!isStamp(file.stamp)) {
      throw new IndexCorruptError(`BM25 cache at ${this.filePath} has no validity stamp`);
    }
    const index = Bm25Index.fromJSON(file.index);
    if (index.size !== file.stamp.count) {
      throw new IndexCorruptError(
        `BM25 cache holds ${index.size} chunks but its stamp says ${file.stamp.count}`,
      );
    }
    return { stamp: file.stamp, index };
  }

  /** Cached index if its stamp and BM25 parameters match, else null. Corruption is logged, not thrown. */
  async load(expected: IndexStamp, params: Bm25Config): Promise<Bm25Index | null> {
    let cached: Awaited<ReturnType<SparseIndexCache['read']>>;
    try {
      cached = await this.read();
    } catch (err) {
      if (!(err instanceof IndexCorruptError)) throw err;
      this.logger?.warn({ err }, 'BM25 cache corrupt, rebuilding');
      return null;
    }
    if (!cached) return null;
    if (!sameStamp(cached.stamp, expected)) {
      this.logger?.debug({ cached: cached.stamp, expected }, 'BM25 cache stale');
      return null;
    }
    if (cached.index.params.k1 !== params.k1 || cached.index.params.b !== params.b) {
      this.logger?.debug('BM25 parameters changed, rebuilding');
      return null;
    }
    return cached.index;
  }

  /** Atomic replace: readers see either the old file or the new one. */
  async save(index: Bm25Index, stamp: IndexStamp): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const payload: CacheFile = { stamp, index: index.toJSON() };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(payload));
    await rename(tmp, this.filePath);
  }

  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
  }
}

/**
 * Hands out a BM25 index that is consistent with the chunk store, rebuilding
 * and re-caching it when the cache is missing, corrupt or stale.
 */
export class SparseIndexProvider {
  private current: { stamp: IndexStamp; index: Bm25Index } | null = null;

  constructor(
    private readonly store: VectorStore,
    private readonly cache: SparseIndexCache,
    private readonly params: Bm25Config,
    private readonly logger?: Logger,
  ) {}

  async get(): Promise<Bm25Index> {
    const stamp = await this.store.stamp();
    if (this.current && sameStamp(this.current.stamp, stamp)) {
      return this.current.index;
    }

    const cached = await this.cache.load(stamp, this.params);
    if (cached) {
      this.current = { stamp, index: cached };
      return cached;
    }

    this.logger?.info({ chunks: stamp.count }, 'building BM25 index');
    const index = Bm25Index.build(await this.store.all(), this.params);
    await this.cache.save(index, stamp);
    this.current = { stamp, index };
    return index;
  }

  /**
   * Index for read-only sparse queries. Falls back to the cached copy,
   * unvalidated, when the chunk store cannot be reached.
   */
  async getForQuery(): Promise<Bm25Index> {
    try {
      return await this.get();
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      const cached = await this.cache.read().catch((readErr: unknown) => {
        this.logger?.warn({ err: readErr }, 'BM25 cache unusable');
        return null;
      });
      if (!cached) throw err;
      this.logger?.warn({ err }, 'chunk store unavailable, using cached BM25 index as-is');
      return cached.index;
    }
  }

  /** Record the index produced by an incremental update and persist it. */
  async commit(index: Bm25Index): Promise<void> {
    const stamp = await this.store.stamp();
    if (stamp.count !== index.size) {
      this.logger?.warn({ store: stamp.count, index: index.size }, 'BM25 index drifted from chunk store, rebuilding');
      this.current = null;
      await this.get();
      return;
    }
    await this.cache.save(index, stamp);
    this.current = { stamp, index };
  }

  async clear(): Promise<void> {
    this.current = null;
    await this.cache.clear();
  }
}
