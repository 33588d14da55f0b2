import type { AppConfig } from '../types/config.types.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const DEFAULT_CONFIG: AppConfig = {
  indexRoot: join(homedir(), '.sift', 'index'),
  dirsFile: join(homedir(), '.sift_dirs'),
  embedder: 'ollama',
  ollamaBaseUrl: 'http://localhost:11434',
  ollamaEmbedModel: 'nomic-embed-text',
  vectorStore: 'sqlite',
  chunking: {
    chunkSize: 512,
    overlap: 50,
  },
  bm25: {
    k1: 1.2,
    b: 0.75,
  },
  fusion: {
    denseWeight: 0.5,
    sparseWeight: 0.5,
  },
  indexing: {
    embedConcurrency: 4,
    recursive: true,
  },
  api: {
    port: 3777,
    host: '127.0.0.1',
  },
  logLevel: 'info',
};
