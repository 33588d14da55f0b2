// Public API: explicit named exports only (no re-export *)

export type { SearchEngine } from './engine/searchEngine.js';
export type { VectorStore, DenseHit } from './engine/vectorStore.js';
export type { EmbeddingProvider } from './engine/embedders/embeddingProvider.js';
export type {
  Chunk,
  ChunkMetadata,
  SearchMode,
  SearchFilters,
  SearchOptions,
  SearchResult,
  BenchmarkResult,
  IndexFilters,
  IndexRunOptions,
  IndexReport,
  IndexStatus,
  PruneResult,
  AppConfig,
} from './types/index.js';

export { createSearchEngine, createEmbedder, indexPaths } from './engine/index.js';
export { IndexingPipeline } from './engine/indexingPipeline.js';
export { QueryEngine } from './engine/queryEngine.js';
export { Bm25Index } from './engine/bm25Index.js';
export { FingerprintStore } from './engine/fingerprintStore.js';
export { chunkText } from './engine/chunker.js';
export { MemoryVectorStore } from './engine/memoryVectorStore.js';
export { SqliteVectorStore } from './engine/sqliteVectorStore.js';
export { NoopEmbeddingProvider } from './engine/embedders/embeddingProvider.js';
export { OllamaEmbedder } from './engine/embedders/ollamaEmbedder.js';
export { WatchList } from './engine/watchList.js';
export { loadConfig } from './config/loader.js';
export { validateConfig } from './config/validator.js';
export { createLogger } from './logging/logger.js';
export { SiftError, type SiftErrorCode } from './errors/base.js';
export { InvalidConfigError } from './errors/config.js';
export { ExtractionError, EmbeddingError } from './errors/indexing.js';
export { IndexCorruptError, StoreUnavailableError } from './errors/store.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
export { createApiServer } from './api/server.js';
