import type {
  BenchmarkResult,
  Chunk,
  FusionConfig,
  SearchFilters,
  SearchMode,
  SearchOptions,
  SearchResult,
} from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { InvalidConfigError } from '../errors/config.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import { chunkFilter } from './filters.js';
import { DEFAULT_FUSION, fuse, type ScoredCandidate } from './fusion.js';
import type { SparseIndexProvider } from './sparseIndexCache.js';
import type { VectorStore } from './vectorStore.js';

export const DEFAULT_K = 5;

export interface QueryEngineDeps {
  store: VectorStore;
  embedder: EmbeddingProvider;
  sparse: SparseIndexProvider;
  fusion?: FusionConfig;
  logger?: Logger;
}

function toResult(
  chunk: Chunk,
  rank: number,
  score: number,
  source: SearchMode,
  extra: { denseScore?: number; sparseScore?: number } = {},
): SearchResult {
  return {
    chunkId: chunk.id,
    rank,
    score,
    source,
    path: chunk.path,
    start: chunk.start,
    end: chunk.end,
    text: chunk.text,
    metadata: chunk.metadata,
    ...extra,
  };
}

/** Candidate pool size per path in hybrid mode. */
export function hybridPoolSize(k: number): number {
  return Math.max(k * 4, 20);
}

/**
 * Read-only retrieval over the dense store and the sparse index. Filters are
 * applied inside each path, before any ranking or fusion.
 */
export class QueryEngine {
  private readonly fusion: FusionConfig;

  constructor(private readonly deps: QueryEngineDeps) {
    this.fusion = deps.fusion ?? DEFAULT_FUSION;
  }

  get denseEnabled(): boolean {
    return this.deps.embedder.dimensions > 0;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const k = options.k ?? DEFAULT_K;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidConfigError(`k must be a positive integer, got ${k}`);
    }
    const mode = options.mode ?? 'hybrid';
    if (query.trim() === '') return [];

    switch (mode) {
      case 'dense':
        return (await this.dense(query, k, options.filters)).map((hit, i) =>
          toResult(hit.chunk, i + 1, hit.score, 'dense'),
        );
      case 'sparse':
        return (await this.sparse(query, k, options.filters)).map((hit, i) =>
          toResult(hit.chunk, i + 1, hit.score, 'sparse'),
        );
      case 'hybrid':
        return this.hybrid(query, k, options.filters);
    }
  }

  /** Dense and sparse rankings side by side, unfused. */
  async benchmark(query: string, options: Omit<SearchOptions, 'mode'> = {}): Promise<BenchmarkResult> {
    const dense = this.denseEnabled ? await this.search(query, { ...options, mode: 'dense' }) : [];
    const sparse = await this.search(query, { ...options, mode: 'sparse' });
    return { query, dense, sparse };
  }

  // ── private ──────────────────────────────────────────────────────────────

  private async dense(query: string, limit: number, filters?: SearchFilters): Promise<ScoredCandidate[]> {
    if (!this.denseEnabled) {
      throw new InvalidConfigError('Dense search needs an embedder; set "embedder" to "ollama"');
    }
    const vector = await this.deps.embedder.embed(query);
    const hits = await this.deps.store.query(vector, limit, chunkFilter(filters));
    return hits.map((hit) => ({ chunk: hit.chunk, score: hit.similarity }));
  }

  private async sparse(query: string, limit: number, filters?: SearchFilters): Promise<ScoredCandidate[]> {
    const index = await this.deps.sparse.getForQuery();
    return index.search(query, limit, chunkFilter(filters));
  }

  private async hybrid(query: string, k: number, filters?: SearchFilters): Promise<SearchResult[]> {
    const pool = hybridPoolSize(k);
    if (!this.denseEnabled) {
      this.deps.logger?.warn('no embedder configured, hybrid search falls back to sparse only');
      return (await this.sparse(query, k, filters)).map((hit, i) => toResult(hit.chunk, i + 1, hit.score, 'sparse'));
    }
    const [dense, sparse] = await Promise.all([this.dense(query, pool, filters), this.sparse(query, pool, filters)]);
    return fuse(dense, sparse, k, this.fusion).map((hit, i) =>
      toResult(hit.chunk, i + 1, hit.score, 'hybrid', {
        ...(hit.denseScore !== undefined ? { denseScore: hit.denseScore } : {}),
        ...(hit.sparseScore !== undefined ? { sparseScore: hit.sparseScore } : {}),
      }),
    );
  }
}
