import type { Chunk } from '../types/index.js';
import type { Bm25Config } from '../types/config.types.js';
import { IndexCorruptError } from '../errors/store.js';
import { tokenize } from './tokenizer.js';
import type { ChunkPredicate } from './filters.js';

const FORMAT_VERSION = 1;

export const DEFAULT_BM25: Bm25Config = { k1: 1.2, b: 0.75 };

interface DocEntry {
  chunk: Chunk;
  length: number;
  tf: Map<string, number>;
}

export interface SparseHit {
  chunk: Chunk;
  score: number;
}

export interface Bm25Json {
  version: number;
  params: Bm25Config;
  docs: Array<{ chunk: Chunk; tf: Array<[string, number]> }>;
}

function termFrequencies(text: string): Map<string, number> {
  const tf = new Map<string, number>();
  for (const token of tokenize(text)) {
    tf.set(token, (tf.get(token) ?? 0) + 1);
  }
  return tf;
}

/**
 * In-memory BM25 index over chunk texts.
 *
 * Only integer statistics are stored (term frequencies, document frequencies,
 * lengths, corpus totals); scores are derived at query time. An index reached
 * through any sequence of `update` calls therefore scores exactly like one
 * produced by `build` over the same chunk set.
 */
export class Bm25Index {
  private readonly docs = new Map<string, DocEntry>();
  private readonly postings = new Map<string, Map<string, number>>();
  private totalLength = 0;

  constructor(readonly params: Bm25Config = DEFAULT_BM25) {}

  static build(chunks: Iterable<Chunk>, params: Bm25Config = DEFAULT_BM25): Bm25Index {
    const index = new Bm25Index(params);
    for (const chunk of chunks) index.addDoc(chunk, termFrequencies(chunk.text));
    return index;
  }

  get size(): number {
    return this.docs.size;
  }

  get averageLength(): number {
    return this.docs.size === 0 ? 0 : this.totalLength / this.docs.size;
  }

  has(id: string): boolean {
    return this.docs.has(id);
  }

  documentFrequency(term: string): number {
    return this.postings.get(term)?.size ?? 0;
  }

  chunks(): IterableIterator<Chunk> {
    const entries = this.docs.values();
    return (function* () {
      for (const entry of entries) yield entry.chunk;
    })();
  }

  /** Apply removals, then additions. Re-adding an existing id replaces it. */
  update(added: Iterable<Chunk>, removedIds: Iterable<string>): void {
    for (const id of removedIds) this.removeDoc(id);
    for (const chunk of added) {
      this.removeDoc(chunk.id);
      this.addDoc(chunk, termFrequencies(chunk.text));
    }
  }

  score(query: string): Map<string, number> {
    const scores = new Map<string, number>();
    const n = this.docs.size;
    if (n === 0) return scores;

    const { k1, b } = this.params;
    const avgdl = this.totalLength / n;
    const terms = [...new Set(tokenize(query))];

    for (const term of terms) {
      const posting = this.postings.get(term);
      if (!posting) continue;
      const df = posting.size;
      const idf = Math.log(1 + (n - df + 0.5) / (df + 0.5));
      for (const [id, tf] of posting) {
        const length = this.docs.get(id)?.length ?? 0;
        const norm = avgdl === 0 ? 1 : 1 - b + (b * length) / avgdl;
        const contribution = (idf * tf * (k1 + 1)) / (tf + k1 * norm);
        scores.set(id, (scores.get(id) ?? 0) + contribution);
      }
    }

    for (const [id, value] of scores) {
      if (!(value > 0)) scores.delete(id);
    }
    return scores;
  }

  /** Ranked hits, best first; ties broken by chunk id. */
  search(query: string, limit: number, predicate?: ChunkPredicate): SparseHit[] {
    const hits: SparseHit[] = [];
    for (const [id, score] of this.score(query)) {
      const entry = this.docs.get(id);
      if (!entry) continue;
      if (predicate && !predicate(entry.chunk)) continue;
      hits.push({ chunk: entry.chunk, score });
    }
    hits.sort((a, b) => b.score - a.score || compareIds(a.chunk.id, b.chunk.id));
    return hits.slice(0, limit);
  }

  toJSON(): Bm25Json {
    const ids = [...this.docs.keys()].sort(compareIds);
    return {
      version: FORMAT_VERSION,
      params: { ...this.params },
      docs: ids.flatMap((id) => {
        const entry = this.docs.get(id);
        return entry ? [{ chunk: entry.chunk, tf: [...entry.tf.entries()] }] : [];
      }),
    };
  }

  static fromJSON(data: unknown): Bm25Index {
    if (!isBm25Json(data)) {
      throw new IndexCorruptError('BM25 index payload has an unexpected shape');
    }
    if (data.version !== FORMAT_VERSION) {
      throw new IndexCorruptError(`Unsupported BM25 index version ${data.version}`);
    }
    const index = new Bm25Index(data.params);
    for (const doc of data.docs) {
      index.addDoc(doc.chunk, new Map(doc.tf));
    }
    return index;
  }

  // ── private ──────────────────────────────────────────────────────────────

  private addDoc(chunk: Chunk, tf: Map<string, number>): void {
    let length = 0;
    for (const [term, count] of tf) {
      length += count;
      let posting = this.postings.get(term);
      if (!posting) {
        posting = new Map();
        this.postings.set(term, posting);
      }
      posting.set(chunk.id, count);
    }
    this.docs.set(chunk.id, { chunk, length, tf });
    this.totalLength += length;
  }

  private removeDoc(id: string): void {
    const entry = this.docs.get(id);
    if (!entry) return;
    for (const term of entry.tf.keys()) {
      const posting = this.postings.get(term);
      posting?.delete(id);
      if (posting?.size === 0) this.postings.delete(term);
    }
    this.totalLength -= entry.length;
    this.docs.delete(id);
  }
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isBm25Json(value: unknown): value is Bm25Json {
  if (typeof value !== 'object' || value === null) return false;
  const data = value as Record<string, unknown>;
  const params = data['params'];
  if (typeof data['version'] !== 'number' || !Array.isArray(data['docs'])) return false;
  if (typeof params !== 'object' || params === null) return false;
  const { k1, b } = params as Record<string, unknown>;
  if (typeof k1 !== 'number' || typeof b !== 'number') return false;
  return data['docs'].every((doc: unknown) => {
    if (typeof doc !== 'object' || doc === null) return false;
    const { chunk, tf } = doc as Record<string, unknown>;
    return isChunk(chunk) && Array.isArray(tf) && tf.every(isTermCount);
  });
}

function isTermCount(value: unknown): value is [string, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'number' &&
    Number.isInteger(value[1]) &&
    value[1] > 0
  );
}

export function isChunk(value: unknown): value is Chunk {
  if (typeof value !== 'object' || value === null) return false;
  const c = value as Record<string, unknown>;
  return (
    typeof c['id'] === 'string' &&
    typeof c['path'] === 'string' &&
    typeof c['start'] === 'number' &&
    typeof c['end'] === 'number' &&
    typeof c['text'] === 'string' &&
    typeof c['fingerprint'] === 'string' &&
    typeof c['mtime'] === 'number' &&
    typeof c['metadata'] === 'object' &&
    c['metadata'] !== null
  );
}
