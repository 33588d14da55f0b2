import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Chunk, ChunkMetadata, IndexStamp } from '../types/index.js';
import { StoreUnavailableError } from '../errors/store.js';
import type { ChunkPredicate } from './filters.js';
import { computeStamp, type StampEntry } from './stamp.js';
import { cosineSimilarity, rankDense, type DenseHit, type VectorStore } from './vectorStore.js';

interface ChunkRow {
  id: string;
  path: string;
  start_offset: number;
  end_offset: number;
  text: string;
  fingerprint: string;
  mtime: number;
  metadata: string;
}

interface VectorRow extends ChunkRow {
  embedding: Buffer;
}

function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    path: row.path,
    start: row.start_offset,
    end: row.end_offset,
    text: row.text,
    fingerprint: row.fingerprint,
    mtime: row.mtime,
    metadata: JSON.parse(row.metadata) as ChunkMetadata,
  };
}

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function fromBlob(blob: Buffer): Float32Array {
  // Copy: the Buffer may not be 4-byte aligned within its pool
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}

const CHUNK_COLUMNS = 'id, path, start_offset, end_offset, text, fingerprint, mtime, metadata';

/**
 * SQLite-backed chunk store with brute-force cosine search over stored
 * embeddings. One row per chunk; `embedding` is NULL when no embedder is
 * configured.
 */
export class SqliteVectorStore implements VectorStore {
  private dimensions: number;

  private constructor(private readonly db: Database.Database) {
    const row = db
      .prepare<[string], { value: string }>('SELECT value FROM _meta WHERE key = ?')
      .get('dimensions');
    this.dimensions = row ? parseInt(row.value, 10) : 0;
  }

  static async open(dbPath = ':memory:'): Promise<SqliteVectorStore> {
    try {
      if (dbPath !== ':memory:') {
        await mkdir(dirname(dbPath), { recursive: true });
      }
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS chunks (
          id           TEXT PRIMARY KEY,
          path         TEXT NOT NULL,
          start_offset INTEGER NOT NULL,
          end_offset   INTEGER NOT NULL,
          text         TEXT NOT NULL,
          fingerprint  TEXT NOT NULL,
          mtime        REAL NOT NULL,
          metadata     TEXT NOT NULL DEFAULT '{}',
          embedding    BLOB
        );
        CREATE INDEX IF NOT EXISTS chunks_path ON chunks(path);
        CREATE TABLE IF NOT EXISTS _meta (
          key   TEXT PRIMARY KEY,
          value TEXT
        );
      `);
      return new SqliteVectorStore(db);
    } catch (err) {
      throw new StoreUnavailableError(`Cannot open chunk store at ${dbPath}`, err);
    }
  }

  async upsert(chunk: Chunk, embedding: Float32Array): Promise<void> {
    this.guard(() => {
      if (embedding.length > 0) this.ensureDimensions(embedding.length);
      this.db
        .prepare(
          `INSERT OR REPLACE INTO chunks(${CHUNK_COLUMNS}, embedding)
           VALUES (@id, @path, @start, @end, @text, @fingerprint, @mtime, @metadata, @embedding)`,
        )
        .run({
          id: chunk.id,
          path: chunk.path,
          start: chunk.start,
          end: chunk.end,
          text: chunk.text,
          fingerprint: chunk.fingerprint,
          mtime: chunk.mtime,
          metadata: JSON.stringify(chunk.metadata),
          embedding: embedding.length > 0 ? toBlob(embedding) : null,
        });
    });
  }

  async delete(id: string): Promise<void> {
    this.guard(() => this.db.prepare('DELETE FROM chunks WHERE id = ?').run(id));
  }

  async query(embedding: Float32Array, k: number, filter?: ChunkPredicate): Promise<DenseHit[]> {
    if (embedding.length === 0 || this.dimensions === 0) return [];

    const rows = this.guard(() =>
      this.db
        .prepare<[], VectorRow>(`SELECT ${CHUNK_COLUMNS}, embedding FROM chunks WHERE embedding IS NOT NULL`)
        .all(),
    );

    const hits: DenseHit[] = [];
    for (const row of rows) {
      const chunk = toChunk(row);
      if (filter && !filter(chunk)) continue;
      hits.push({ chunk, similarity: cosineSimilarity(embedding, fromBlob(row.embedding)) });
    }
    return rankDense(hits, k);
  }

  async get(ids: string[]): Promise<Chunk[]> {
    if (ids.length === 0) return [];
    return this.guard(() => {
      const stmt = this.db.prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE id = ?`);
      return ids.flatMap((id) => {
        const row = stmt.get(id);
        return row ? [toChunk(row)] : [];
      });
    });
  }

  async embeddingOf(id: string): Promise<Float32Array | undefined> {
    const row = this.guard(() =>
      this.db.prepare<[string], { embedding: Buffer | null }>('SELECT embedding FROM chunks WHERE id = ?').get(id),
    );
    if (!row) return undefined;
    return row.embedding ? fromBlob(row.embedding) : new Float32Array(0);
  }

  async dropEmbeddings(): Promise<void> {
    this.guard(() => {
      this.db.exec('UPDATE chunks SET embedding = NULL');
      this.db.prepare('DELETE FROM _meta WHERE key = ?').run('dimensions');
    });
    this.dimensions = 0;
  }

  async chunksFor(path: string): Promise<Chunk[]> {
    const rows = this.guard(() =>
      this.db
        .prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE path = ? ORDER BY start_offset`)
        .all(path),
    );
    return rows.map(toChunk);
  }

  async all(): Promise<Chunk[]> {
    const rows = this.guard(() =>
      this.db.prepare<[], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks ORDER BY id`).all(),
    );
    return rows.map(toChunk);
  }

  async count(): Promise<number> {
    const row = this.guard(() => this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM chunks').get());
    return row?.n ?? 0;
  }

  async stamp(): Promise<IndexStamp> {
    const rows = this.guard(() =>
      this.db.prepare<[], StampEntry>('SELECT id, fingerprint, mtime FROM chunks').all(),
    );
    return computeStamp(rows);
  }

  async clear(): Promise<void> {
    this.guard(() => {
      this.db.exec('DELETE FROM chunks');
      this.db.prepare('DELETE FROM _meta WHERE key = ?').run('dimensions');
    });
    this.dimensions = 0;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  // ── private ──────────────────────────────────────────────────────────────

  private ensureDimensions(dims: number): void {
    if (this.dimensions === 0) {
      this.dimensions = dims;
      this.db.prepare('INSERT OR REPLACE INTO _meta(key, value) VALUES (?, ?)').run('dimensions', String(dims));
    } else if (this.dimensions !== dims) {
      throw new StoreUnavailableError(
        `Vector dimension mismatch: expected ${this.dimensions}, got ${dims}. Run "sift reset" after switching embedders.`,
      );
    }
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(`Chunk store operation failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }
}
