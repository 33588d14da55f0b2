import type { Chunk, IndexStamp } from '../types/index.js';
import type { ChunkPredicate } from './filters.js';

export interface DenseHit {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1]. */
  similarity: number;
}

/**
 * Dense index adapter and authoritative chunk store.
 *
 * Every indexed chunk has a row here, with or without an embedding; a chunk
 * stored with a zero-length vector is invisible to `query` but counts for
 * `all`, `count` and `stamp`.
 */
export interface VectorStore {
  upsert(chunk: Chunk, embedding: Float32Array): Promise<void>;
  delete(id: string): Promise<void>;
  /** Nearest neighbours by cosine similarity, best first; ties by chunk id. */
  query(embedding: Float32Array, k: number, filter?: ChunkPredicate): Promise<DenseHit[]>;
  get(ids: string[]): Promise<Chunk[]>;
  /** Stored vector of a chunk: empty when it has none, undefined when the chunk is unknown. */
  embeddingOf(id: string): Promise<Float32Array | undefined>;
  /** Forget every vector and the recorded width; chunk rows stay. */
  dropEmbeddings(): Promise<void>;
  chunksFor(path: string): Promise<Chunk[]>;
  all(): Promise<Chunk[]>;
  count(): Promise<number>;
  stamp(): Promise<IndexStamp>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

export function rankDense(hits: DenseHit[], k: number): DenseHit[] {
  hits.sort((a, b) => b.similarity - a.similarity || (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0));
  return hits.slice(0, k);
}
