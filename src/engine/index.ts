import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  AppConfig,
  BenchmarkResult,
  IndexFilters,
  IndexReport,
  IndexRunOptions,
  IndexStatus,
  PruneResult,
  SearchOptions,
  SearchResult,
} from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import { NoopEmbeddingProvider } from './embedders/embeddingProvider.js';
import { OllamaEmbedder } from './embedders/ollamaEmbedder.js';
import { IndexingPipeline } from './indexingPipeline.js';
import { MemoryVectorStore } from './memoryVectorStore.js';
import { QueryEngine } from './queryEngine.js';
import type { SearchEngine } from './searchEngine.js';
import { SparseIndexCache, SparseIndexProvider } from './sparseIndexCache.js';
import { SqliteVectorStore } from './sqliteVectorStore.js';
import type { VectorStore } from './vectorStore.js';
import { WatchList } from './watchList.js';

export type { SearchEngine } from './searchEngine.js';

export interface IndexPaths {
  chunks: string;
  fingerprints: string;
  bm25: string;
}

export function indexPaths(indexRoot: string): IndexPaths {
  return {
    chunks: join(indexRoot, 'chunks.db'),
    fingerprints: join(indexRoot, 'fingerprints.json'),
    bm25: join(indexRoot, 'bm25'),
  };
}

/** Collaborators that tests or embedding applications may supply themselves. */
export interface EngineOverrides {
  store?: VectorStore;
  embedder?: EmbeddingProvider;
  extract?: (filePath: string) => Promise<string>;
}

export function createEmbedder(config: AppConfig): EmbeddingProvider {
  return config.embedder === 'ollama'
    ? new OllamaEmbedder(config.ollamaBaseUrl, config.ollamaEmbedModel)
    : new NoopEmbeddingProvider();
}

class LocalSearchEngine implements SearchEngine {
  constructor(
    private readonly config: AppConfig,
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    private readonly pipeline: IndexingPipeline,
    private readonly queries: QueryEngine,
  ) {}

  index(directories: string[], filters?: IndexFilters, options?: IndexRunOptions): Promise<IndexReport> {
    return this.pipeline.run(directories, filters, options);
  }

  search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.queries.search(query, options);
  }

  benchmark(query: string, options?: Omit<SearchOptions, 'mode'>): Promise<BenchmarkResult> {
    return this.queries.benchmark(query, options);
  }

  removeDirectory(directory: string): Promise<number> {
    return this.pipeline.removeDirectory(directory);
  }

  prune(options?: { dryRun?: boolean }): Promise<PruneResult> {
    return this.pipeline.prune(options);
  }

  reset(): Promise<void> {
    return this.pipeline.reset();
  }

  async status(): Promise<IndexStatus> {
    const watchList = await WatchList.load(this.config.dirsFile);
    const lastRun = await stat(indexPaths(this.config.indexRoot).fingerprints).then(
      (s) => s.mtime.toISOString(),
      () => null,
    );
    return {
      chunks: await this.store.count(),
      directories: watchList.list(),
      lastIndexedAt: lastRun,
      dense: this.embedder.dimensions > 0,
    };
  }

  async dispose(): Promise<void> {
    await this.store.close();
  }
}

/**
 * Wire the stores, embedder, pipeline and query engine for one index root.
 */
export async function createSearchEngine(
  config: AppConfig,
  logger: Logger,
  overrides: EngineOverrides = {},
): Promise<SearchEngine> {
  const paths = indexPaths(config.indexRoot);
  const store =
    overrides.store ??
    (config.vectorStore === 'memory' ? new MemoryVectorStore() : await SqliteVectorStore.open(paths.chunks));
  const embedder = overrides.embedder ?? createEmbedder(config);

  const sparse = new SparseIndexProvider(
    store,
    new SparseIndexCache(paths.bm25, logger.child({ component: 'bm25-cache' })),
    config.bm25,
    logger.child({ component: 'bm25' }),
  );

  const pipeline = new IndexingPipeline({
    store,
    embedder,
    sparse,
    fingerprintsPath: paths.fingerprints,
    chunking: config.chunking,
    embedConcurrency: config.indexing.embedConcurrency,
    recursive: config.indexing.recursive,
    ...(overrides.extract ? { extract: overrides.extract } : {}),
    logger: logger.child({ component: 'indexer' }),
  });

  const queries = new QueryEngine({
    store,
    embedder,
    sparse,
    fusion: config.fusion,
    logger: logger.child({ component: 'query' }),
  });

  logger.debug({ indexRoot: config.indexRoot, embedder: config.embedder, store: config.vectorStore }, 'engine ready');
  return new LocalSearchEngine(config, store, embedder, pipeline, queries);
}
