import type { Chunk, IndexStamp } from '../types/index.js';
import type { ChunkPredicate } from './filters.js';
import { computeStamp } from './stamp.js';
import { cosineSimilarity, rankDense, type DenseHit, type VectorStore } from './vectorStore.js';

interface Entry {
  chunk: Chunk;
  vector: Float32Array;
}

export class MemoryVectorStore implements VectorStore {
  private entries = new Map<string, Entry>();

  async upsert(chunk: Chunk, embedding: Float32Array): Promise<void> {
    this.entries.set(chunk.id, { chunk, vector: embedding });
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async query(embedding: Float32Array, k: number, filter?: ChunkPredicate): Promise<DenseHit[]> {
    if (embedding.length === 0) return [];

    const hits: DenseHit[] = [];
    for (const { chunk, vector } of this.entries.values()) {
      if (vector.length === 0) continue;
      if (filter && !filter(chunk)) continue;
      hits.push({ chunk, similarity: cosineSimilarity(embedding, vector) });
    }
    return rankDense(hits, k);
  }

  async get(ids: string[]): Promise<Chunk[]> {
    return ids.flatMap((id) => {
      const entry = this.entries.get(id);
      return entry ? [entry.chunk] : [];
    });
  }

  async embeddingOf(id: string): Promise<Float32Array | undefined> {
    return this.entries.get(id)?.vector;
  }

  async dropEmbeddings(): Promise<void> {
    for (const entry of this.entries.values()) entry.vector = new Float32Array(0);
  }

  async chunksFor(path: string): Promise<Chunk[]> {
    return [...this.entries.values()]
      .filter((e) => e.chunk.path === path)
      .map((e) => e.chunk)
      .sort((a, b) => a.start - b.start);
  }

  async all(): Promise<Chunk[]> {
    return [...this.entries.values()].map((e) => e.chunk);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async stamp(): Promise<IndexStamp> {
    return computeStamp([...this.entries.values()].map((e) => e.chunk));
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    // Nothing to close for in-memory store
  }
}
