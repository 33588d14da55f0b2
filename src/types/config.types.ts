export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

export interface Bm25Config {
  k1: number;
  b: number;
}

export interface FusionConfig {
  denseWeight: number;
  sparseWeight: number;
}

export interface IndexingConfig {
  embedConcurrency: number;
  recursive: boolean;
}

export interface ApiConfig {
  port: number;
  host: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  indexRoot: string;
  dirsFile: string;
  embedder: 'noop' | 'ollama';
  ollamaBaseUrl: string;
  ollamaEmbedModel: string;
  vectorStore: 'sqlite' | 'memory';
  chunking: ChunkingConfig;
  bm25: Bm25Config;
  fusion: FusionConfig;
  indexing: IndexingConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}
