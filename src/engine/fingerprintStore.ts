import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, sep } from 'node:path';
import type { Chunk, ChunkClassification, ChunkingConfig } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { normalizeWhitespace } from './tokenizer.js';

const FORMAT_VERSION = 2;

export interface FingerprintRecord {
  fingerprint: string;
  timestamp: number;
  path: string;
}

/** Size and modification time of a document whose chunks all committed. */
export interface FileStat {
  mtime: number;
  size: number;
}

/** What the records were produced with; a mismatch makes them worthless. */
export interface IndexSettings {
  chunking: ChunkingConfig;
  /** Embedding provider id. */
  embedder: string;
}

interface FingerprintFile extends IndexSettings {
  version: number;
  records: Record<string, FingerprintRecord>;
  files: Record<string, FileStat>;
}

export interface LoadedFingerprints {
  store: FingerprintStore;
  /** Set when a file existed but was written with other settings. */
  discarded?: 'chunking' | 'embedder';
}

/** SHA-256 of the whitespace-collapsed text; formatting-only edits keep the same value. */
export function fingerprint(text: string): string {
  return createHash('sha256').update(normalizeWhitespace(text)).digest('hex');
}

/** Stable chunk identifier: the same path and start offset always give the same id. */
export function chunkId(path: string, start: number): string {
  return createHash('sha256').update(`${path}\0${start}`).digest('hex').slice(0, 32);
}

export function isUnder(path: string, directory: string): boolean {
  const prefix = directory.endsWith(sep) ? directory : directory + sep;
  return path === directory || path.startsWith(prefix);
}

/**
 * Content identity per chunk id, with a reverse index from fingerprint to the
 * ids holding it. Decides whether a chunk is new, unchanged, changed, or a
 * copy of content already indexed under another id.
 */
export class FingerprintStore {
  private readonly records = new Map<string, FingerprintRecord>();
  private readonly byFingerprint = new Map<string, Set<string>>();
  private readonly byPath = new Map<string, Set<string>>();
  private readonly files = new Map<string, FileStat>();

  get size(): number {
    return this.records.size;
  }

  lookup(id: string): string | undefined {
    return this.records.get(id)?.fingerprint;
  }

  get(id: string): FingerprintRecord | undefined {
    return this.records.get(id);
  }

  record(id: string, fp: string, timestamp: number, path: string): void {
    this.remove(id);
    this.records.set(id, { fingerprint: fp, timestamp, path });
    addTo(this.byFingerprint, fp, id);
    addTo(this.byPath, path, id);
  }

  /** Number of records belonging to `path`. */
  countFor(path: string): number {
    return this.byPath.get(path)?.size ?? 0;
  }

  fileStat(path: string): FileStat | undefined {
    return this.files.get(path);
  }

  recordFile(path: string, stat: FileStat): void {
    this.files.set(path, stat);
  }

  classify(chunk: Pick<Chunk, 'id' | 'fingerprint'>): ChunkClassification {
    const previous = this.lookup(chunk.id);
    if (previous === chunk.fingerprint) return { kind: 'unchanged' };

    const holders = this.byFingerprint.get(chunk.fingerprint);
    if (holders) {
      const others = [...holders].filter((id) => id !== chunk.id).sort();
      const first = others[0];
      if (first !== undefined) return { kind: 'duplicate', of: first };
    }

    return previous === undefined ? { kind: 'new' } : { kind: 'changed', previous };
  }

  remove(id: string): boolean {
    const existing = this.records.get(id);
    if (!existing) return false;
    this.records.delete(id);
    deleteFrom(this.byFingerprint, existing.fingerprint, id);
    deleteFrom(this.byPath, existing.path, id);
    // A document missing a chunk record must be read again.
    this.files.delete(existing.path);
    return true;
  }

  /** Remove every record matching the predicate; returns the removed ids. */
  removeWhere(predicate: (id: string, record: FingerprintRecord) => boolean): string[] {
    const removed: string[] = [];
    for (const [id, rec] of this.records) {
      if (predicate(id, rec)) removed.push(id);
    }
    for (const id of removed) this.remove(id);
    return removed;
  }

  /** Forget every record and file stat whose path matches. */
  removePaths(predicate: (path: string) => boolean): void {
    this.removeWhere((_id, rec) => predicate(rec.path));
    for (const path of [...this.files.keys()]) {
      if (predicate(path)) this.files.delete(path);
    }
  }

  clear(): void {
    this.records.clear();
    this.byFingerprint.clear();
    this.byPath.clear();
    this.files.clear();
  }

  entries(): IterableIterator<[string, FingerprintRecord]> {
    return this.records.entries();
  }

  toJSON(settings: IndexSettings): FingerprintFile {
    return {
      version: FORMAT_VERSION,
      chunking: settings.chunking,
      embedder: settings.embedder,
      records: Object.fromEntries(this.records),
      files: Object.fromEntries(this.files),
    };
  }

  /**
   * Read a fingerprint file whatever settings wrote it.
   * Returns null for a missing, unreadable or malformed file.
   */
  static async read(
    filePath: string,
    logger?: Logger,
  ): Promise<{ store: FingerprintStore; settings: IndexSettings } | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger?.warn({ err, filePath }, 'fingerprint file unreadable, starting empty');
      return null;
    }
    if (!isFingerprintFile(parsed) || parsed.version !== FORMAT_VERSION) {
      logger?.warn({ filePath }, 'fingerprint file has an unexpected format, starting empty');
      return null;
    }

    const store = new FingerprintStore();
    for (const [id, rec] of Object.entries(parsed.records)) {
      store.record(id, rec.fingerprint, rec.timestamp, rec.path);
    }
    for (const [path, stat] of Object.entries(parsed.files)) {
      store.recordFile(path, stat);
    }
    return { store, settings: { chunking: parsed.chunking, embedder: parsed.embedder } };
  }

  /**
   * Load records written under the same settings; anything else yields an
   * empty store and says which setting differed.
   */
  static async load(filePath: string, settings: IndexSettings, logger?: Logger): Promise<LoadedFingerprints> {
    const existing = await FingerprintStore.read(filePath, logger);
    if (!existing) return { store: new FingerprintStore() };
    if (existing.settings.embedder !== settings.embedder) {
      logger?.info(
        { filePath, was: existing.settings.embedder, now: settings.embedder },
        'embedder changed, fingerprints discarded',
      );
      return { store: new FingerprintStore(), discarded: 'embedder' };
    }
    const { chunkSize, overlap } = existing.settings.chunking;
    if (chunkSize !== settings.chunking.chunkSize || overlap !== settings.chunking.overlap) {
      logger?.info({ filePath }, 'chunking configuration changed, fingerprints discarded');
      return { store: new FingerprintStore(), discarded: 'chunking' };
    }
    return { store: existing.store };
  }

  async save(filePath: string, settings: IndexSettings): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    const tmp = `${filePath}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(this.toJSON(settings)));
    await rename(tmp, filePath);
  }
}

function addTo(index: Map<string, Set<string>>, key: string, id: string): void {
  let ids = index.get(key);
  if (!ids) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(id);
}

function deleteFrom(index: Map<string, Set<string>>, key: string, id: string): void {
  const ids = index.get(key);
  ids?.delete(id);
  if (ids?.size === 0) index.delete(key);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecord(value: unknown): value is FingerprintRecord {
  return (
    isObject(value) &&
    typeof value['fingerprint'] === 'string' &&
    typeof value['timestamp'] === 'number' &&
    typeof value['path'] === 'string'
  );
}

function isFileStat(value: unknown): value is FileStat {
  return isObject(value) && typeof value['mtime'] === 'number' && typeof value['size'] === 'number';
}

function isFingerprintFile(value: unknown): value is FingerprintFile {
  if (!isObject(value)) return false;
  const { version, chunking, embedder, records, files } = value;
  if (typeof version !== 'number' || typeof embedder !== 'string') return false;
  if (!isObject(chunking) || typeof chunking['chunkSize'] !== 'number' || typeof chunking['overlap'] !== 'number') {
    return false;
  }
  if (!isObject(records) || !Object.values(records).every(isRecord)) return false;
  return isObject(files) && Object.values(files).every(isFileStat);
}
