import type { AppConfig, ChunkingConfig } from '../types/config.types.js';
import { InvalidConfigError } from '../errors/config.js';

const LOG_LEVELS = new Set(['debug', 'info', 'warn', 'error', 'silent']);

export function validateChunking({ chunkSize, overlap }: ChunkingConfig): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InvalidConfigError(`chunkSize must be a positive integer, got ${chunkSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidConfigError(
      `overlap must be an integer with 0 <= overlap < chunkSize (${chunkSize}), got ${overlap}.`,
    );
  }
}

export function validateConfig(config: AppConfig): void {
  validateChunking(config.chunking);

  if (config.embedder !== 'noop' && config.embedder !== 'ollama') {
    throw new InvalidConfigError(`Unknown embedder "${String(config.embedder)}".`);
  }
  if (config.embedder === 'ollama' && config.ollamaBaseUrl.trim() === '') {
    throw new InvalidConfigError('Embedder "ollama" requires ollamaBaseUrl.');
  }

  if (config.vectorStore !== 'sqlite' && config.vectorStore !== 'memory') {
    throw new InvalidConfigError(`Unknown vectorStore "${String(config.vectorStore)}".`);
  }

  if (!(config.bm25.k1 > 0)) {
    throw new InvalidConfigError(`bm25.k1 must be > 0, got ${config.bm25.k1}.`);
  }
  if (!(config.bm25.b >= 0 && config.bm25.b <= 1)) {
    throw new InvalidConfigError(`bm25.b must be within [0, 1], got ${config.bm25.b}.`);
  }

  const { denseWeight, sparseWeight } = config.fusion;
  if (denseWeight < 0 || sparseWeight < 0 || denseWeight + sparseWeight === 0) {
    throw new InvalidConfigError('fusion weights must be non-negative and not both zero.');
  }

  if (!Number.isInteger(config.indexing.embedConcurrency) || config.indexing.embedConcurrency < 1) {
    throw new InvalidConfigError('indexing.embedConcurrency must be an integer >= 1.');
  }

  if (config.api.port < 1 || config.api.port > 65535) {
    throw new InvalidConfigError(`API port must be between 1 and 65535, got ${config.api.port}.`);
  }

  if (!LOG_LEVELS.has(config.logLevel)) {
    throw new InvalidConfigError(`Unknown logLevel "${config.logLevel}".`);
  }
}
