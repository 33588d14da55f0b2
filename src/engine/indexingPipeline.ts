import { access, rm, writeFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import type {
  Chunk,
  ChunkingConfig,
  IndexFilters,
  IndexReport,
  IndexRunOptions,
  PruneResult,
} from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { validateChunking } from '../config/validator.js';
import { StoreUnavailableError } from '../errors/store.js';
import { chunkText } from './chunker.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import { extract as defaultExtract, SUPPORTED_EXTENSIONS } from './extractors.js';
import { FileIndexer, type FileCandidate } from './fileIndexer.js';
import { normalizeExtensions } from './filters.js';
import {
  chunkId,
  fingerprint,
  FingerprintStore,
  isUnder,
  type FingerprintRecord,
  type IndexSettings,
} from './fingerprintStore.js';
import type { Bm25Index } from './bm25Index.js';
import type { SparseIndexProvider } from './sparseIndexCache.js';
import type { VectorStore } from './vectorStore.js';

export interface IndexingPipelineDeps {
  store: VectorStore;
  embedder: EmbeddingProvider;
  sparse: SparseIndexProvider;
  fingerprintsPath: string;
  chunking: ChunkingConfig;
  embedConcurrency?: number;
  recursive?: boolean;
  fileIndexer?: FileIndexer;
  extract?: (filePath: string) => Promise<string>;
  logger?: Logger;
}

interface Pending {
  chunk: Chunk;
  kind: 'new' | 'changed' | 'duplicate';
  previous: FingerprintRecord | undefined;
  /** Chunk already holding this content; its vector is reused. */
  of?: string;
}

/** Mutable state of one run; discarded afterwards. */
interface RunState {
  report: IndexReport;
  fingerprints: FingerprintStore;
  added: Map<string, Chunk>;
  removed: Set<string>;
  dryRun: boolean;
  force: boolean;
}

function emptyReport(dryRun: boolean): IndexReport {
  return {
    documents: 0,
    skippedDocuments: 0,
    unchangedDocuments: 0,
    counts: { new: 0, changed: 0, unchanged: 0, duplicate: 0, error: 0, removed: 0 },
    duplicates: [],
    errors: [],
    dryRun,
    startedAt: new Date().toISOString(),
    finishedAt: '',
  };
}

/** Text handed to the embedder: the filename gives the vector document-level context. */
function embeddingInput(chunk: Chunk): string {
  return `${chunk.metadata.filename}\n\n${chunk.text}`;
}

/** Run `fn` over `items` with at most `limit` calls in flight. */
async function runWithLimit<T>(items: T[], limit: number, fn: (item: T) => Promise<void>): Promise<void> {
  const queue = items.values();
  const worker = async (): Promise<void> => {
    for (const item of queue) await fn(item);
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
}

/**
 * Extraction → chunking → change/duplicate classification → dense upsert,
 * with one batched sparse-index update per run.
 *
 * The pipeline is the only writer of chunks and fingerprint records. Each
 * chunk commits on its own (dense upsert, then fingerprint), so an
 * interrupted run leaves a consistent state that the next run completes.
 * Documents whose size and mtime match the last complete read are not
 * opened at all.
 */
export class IndexingPipeline {
  private readonly fileIndexer: FileIndexer;
  private readonly extract: (filePath: string) => Promise<string>;
  private readonly embedConcurrency: number;

  constructor(private readonly deps: IndexingPipelineDeps) {
    this.fileIndexer = deps.fileIndexer ?? new FileIndexer(deps.logger);
    this.extract = deps.extract ?? defaultExtract;
    this.embedConcurrency = Math.max(1, deps.embedConcurrency ?? 4);
  }

  async run(directories: string[], filters: IndexFilters = {}, options: IndexRunOptions = {}): Promise<IndexReport> {
    const chunking: ChunkingConfig = {
      chunkSize: options.chunkSize ?? this.deps.chunking.chunkSize,
      overlap: options.overlap ?? this.deps.chunking.overlap,
    };
    validateChunking(chunking);
    const settings: IndexSettings = { chunking, embedder: this.deps.embedder.id };
    const requested = normalizeExtensions(filters.extensions);
    const extensions = requested.length > 0 ? requested : [...SUPPORTED_EXTENSIONS];
    const dryRun = options.dryRun === true;
    const force = options.force === true;
    const logger = this.deps.logger;

    const state: RunState = {
      report: emptyReport(dryRun),
      fingerprints: new FingerprintStore(),
      added: new Map(),
      removed: new Set(),
      dryRun,
      force,
    };
    let sparseIndex: Bm25Index | null = null;

    if (!dryRun && this.deps.embedder.dimensions > 0 && !(await this.deps.embedder.isAvailable())) {
      logger?.warn('embedder unreachable, new chunks will be reported as embedding errors');
    }

    try {
      if (force && !dryRun) {
        logger?.info('force: clearing chunks, fingerprints and sparse index');
        await this.reset();
      }
      if (!force) {
        const loaded = await FingerprintStore.load(this.deps.fingerprintsPath, settings, logger);
        state.fingerprints = loaded.store;
        if (loaded.discarded === 'embedder' && !dryRun) {
          logger?.warn({ embedder: settings.embedder }, 'embedder changed, stored vectors dropped');
          await this.deps.store.dropEmbeddings();
        }
      }
      sparseIndex = dryRun ? null : await this.deps.sparse.get();

      for (const directory of directories) {
        const root = resolve(directory);
        logger?.debug({ directory: root, extensions }, 'scanning');
        for await (const entry of this.fileIndexer.walk(root, {
          extensions,
          ...(filters.globs && filters.globs.length > 0 ? { globs: filters.globs } : {}),
          ...(filters.since !== undefined ? { since: filters.since } : {}),
          recursive: options.recursive ?? this.deps.recursive ?? true,
        })) {
          if (entry.skipped) {
            state.report.skippedDocuments++;
            continue;
          }
          state.report.documents++;
          await this.processDocument(entry.file, state, chunking);
        }
      }
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      logger?.error({ err }, 'chunk store unavailable, stopping run');
      state.report.aborted = err.message;
      state.report.errors.push({ path: '', kind: 'store', message: err.message });
      state.report.counts.error++;
    }

    if (sparseIndex) {
      // One batched update per run, covering everything committed so far.
      sparseIndex.update(state.added.values(), state.removed);
      try {
        await this.deps.sparse.commit(sparseIndex);
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        logger?.warn({ err }, 'BM25 cache not saved, it is rebuilt on next use');
      }
      await state.fingerprints.save(this.deps.fingerprintsPath, settings);
    }

    const report = state.report;
    report.finishedAt = new Date().toISOString();
    if (options.reportPath) {
      await writeFile(options.reportPath, JSON.stringify(report, null, 2));
    }
    logger?.info(
      { counts: report.counts, documents: report.documents, notModified: report.unchangedDocuments, dryRun },
      'index run finished',
    );
    return report;
  }

  /** Drop every chunk and fingerprint under `directory`. Returns the number of chunks removed. */
  async removeDirectory(directory: string): Promise<number> {
    const root = resolve(directory);
    const doomed = (await this.deps.store.all()).filter((chunk) => isUnder(chunk.path, root));
    return this.removeChunks(
      doomed.map((c) => c.id),
      (path) => isUnder(path, root),
    );
  }

  /** Remove chunks whose source file no longer exists. */
  async prune(options: { dryRun?: boolean } = {}): Promise<PruneResult> {
    const chunks = await this.deps.store.all();
    const exists = new Map<string, boolean>();
    for (const chunk of chunks) {
      if (exists.has(chunk.path)) continue;
      exists.set(
        chunk.path,
        await access(chunk.path).then(
          () => true,
          () => false,
        ),
      );
    }
    const missingFiles = [...exists].filter(([, present]) => !present).map(([path]) => path).sort();
    const missing = new Set(missingFiles);
    const orphanIds = chunks.filter((c) => missing.has(c.path)).map((c) => c.id);

    if (!options.dryRun && orphanIds.length > 0) {
      await this.removeChunks(orphanIds, (path) => missing.has(path));
    }
    return { removed: orphanIds.length, remaining: chunks.length - orphanIds.length, missingFiles };
  }

  /** Clear chunks, fingerprints and the sparse cache. */
  async reset(): Promise<void> {
    await this.deps.store.clear();
    await rm(this.deps.fingerprintsPath, { force: true });
    await this.deps.sparse.clear();
  }

  // ── private ──────────────────────────────────────────────────────────────

  private async removeChunks(ids: string[], pathPredicate: (path: string) => boolean): Promise<number> {
    const sparseIndex = await this.deps.sparse.get();
    for (const id of ids) await this.deps.store.delete(id);
    sparseIndex.update([], ids);
    await this.deps.sparse.commit(sparseIndex);

    const existing = await FingerprintStore.read(this.deps.fingerprintsPath, this.deps.logger);
    if (existing) {
      existing.store.removePaths(pathPredicate);
      await existing.store.save(this.deps.fingerprintsPath, existing.settings);
    }
    this.deps.logger?.info({ removed: ids.length }, 'chunks removed');
    return ids.length;
  }

  private async processDocument(file: FileCandidate, state: RunState, chunking: ChunkingConfig): Promise<void> {
    const { report, fingerprints } = state;
    const logger = this.deps.logger;

    const known = state.force ? undefined : fingerprints.fileStat(file.path);
    if (known && known.mtime === file.mtime && known.size === file.sizeBytes) {
      report.unchangedDocuments++;
      report.counts.unchanged += fingerprints.countFor(file.path);
      return;
    }
    const errorsBefore = report.counts.error;

    let text: string;
    try {
      text = await this.extract(file.path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger?.warn({ err, path: file.path }, 'extraction failed');
      report.errors.push({ path: file.path, kind: 'extraction', message });
      report.counts.error++;
      return;
    }

    const chunks: Chunk[] = [];
    let chunkIndex = 0;
    for (const span of chunkText(text, chunking.chunkSize, chunking.overlap)) {
      chunks.push({
        id: chunkId(file.path, span.start),
        path: file.path,
        start: span.start,
        end: span.end,
        text: span.text,
        fingerprint: fingerprint(span.text),
        mtime: file.mtime,
        metadata: {
          filename: basename(file.path),
          extension: extname(file.path).toLowerCase(),
          sizeBytes: file.sizeBytes,
          chunkIndex: chunkIndex++,
        },
      });
    }

    // Stored chunks at offsets the document no longer produces are superseded.
    const currentIds = new Set(chunks.map((c) => c.id));
    const stored = state.force && state.dryRun ? [] : await this.deps.store.chunksFor(file.path);
    for (const old of stored) {
      if (!currentIds.has(old.id)) await this.supersede(old.id, state);
    }

    const pending: Pending[] = [];
    for (const chunk of chunks) {
      const verdict = fingerprints.classify(chunk);
      switch (verdict.kind) {
        case 'unchanged':
          report.counts.unchanged++;
          break;
        case 'duplicate': {
          const duplicatePath = fingerprints.get(verdict.of)?.path;
          report.duplicates.push({
            path: chunk.path,
            chunkIndex: chunk.metadata.chunkIndex,
            chunkId: chunk.id,
            duplicateOf: verdict.of,
            ...(duplicatePath !== undefined ? { duplicatePath } : {}),
          });
          // Stored under its own id and path too, so path filters and renames keep working.
          const previous = fingerprints.get(chunk.id);
          fingerprints.record(chunk.id, chunk.fingerprint, chunk.mtime, chunk.path);
          pending.push({ chunk, kind: 'duplicate', previous, of: verdict.of });
          break;
        }
        case 'new':
        case 'changed': {
          // Reserve the fingerprint now so later chunks in this run see it.
          const previous = fingerprints.get(chunk.id);
          fingerprints.record(chunk.id, chunk.fingerprint, chunk.mtime, chunk.path);
          pending.push({ chunk, kind: verdict.kind, previous });
          break;
        }
      }
    }

    if (state.dryRun) {
      for (const { kind } of pending) report.counts[kind]++;
      return;
    }

    await this.commit(pending, state);
    if (report.counts.error === errorsBefore) {
      fingerprints.recordFile(file.path, { mtime: file.mtime, size: file.sizeBytes });
    }
  }

  private async commit(pending: Pending[], state: RunState): Promise<void> {
    const { report, fingerprints } = state;

    const batch = new Map<string, Float32Array | Error>();
    await runWithLimit(
      pending.filter((item) => item.of === undefined),
      this.embedConcurrency,
      async ({ chunk }) => {
        batch.set(chunk.id, await this.embedChunk(chunk));
      },
    );

    for (const [i, item] of pending.entries()) {
      let vector: Float32Array | Error;
      try {
        vector = await this.vectorFor(item, batch);
        if (vector instanceof Float32Array) await this.deps.store.upsert(item.chunk, vector);
      } catch (err) {
        for (const rest of pending.slice(i)) this.release(rest, fingerprints);
        throw err;
      }

      if (vector instanceof Error) {
        this.release(item, fingerprints);
        this.deps.logger?.warn({ err: vector, path: item.chunk.path }, 'embedding failed');
        report.errors.push({
          path: item.chunk.path,
          chunkIndex: item.chunk.metadata.chunkIndex,
          kind: 'embedding',
          message: vector.message,
        });
        report.counts.error++;
        continue;
      }

      state.added.set(item.chunk.id, item.chunk);
      report.counts[item.kind]++;
    }
  }

  /** Embedding failures come back as values; only the store throws. */
  private async embedChunk(chunk: Chunk): Promise<Float32Array | Error> {
    if (this.deps.embedder.dimensions === 0) return new Float32Array(0);
    try {
      return await this.deps.embedder.embed(embeddingInput(chunk));
    } catch (err) {
      return err instanceof Error ? err : new Error(String(err));
    }
  }

  private async vectorFor(item: Pending, batch: Map<string, Float32Array | Error>): Promise<Float32Array | Error> {
    const own = batch.get(item.chunk.id);
    if (own) return own;
    if (item.of !== undefined) {
      const source = batch.get(item.of) ?? (await this.deps.store.embeddingOf(item.of));
      if (source instanceof Float32Array && (source.length > 0 || this.deps.embedder.dimensions === 0)) return source;
    }
    // The original has no usable vector (failed, or stored before an embedder was set up).
    return this.embedChunk(item.chunk);
  }

  /** Undo a fingerprint reservation for a chunk that was not committed. */
  private release(item: Pending, fingerprints: FingerprintStore): void {
    if (item.previous) {
      const { fingerprint: fp, timestamp, path } = item.previous;
      fingerprints.record(item.chunk.id, fp, timestamp, path);
    } else {
      fingerprints.remove(item.chunk.id);
    }
  }

  private async supersede(id: string, state: RunState): Promise<void> {
    state.report.counts.removed++;
    state.fingerprints.remove(id);
    if (state.dryRun) return;
    await this.deps.store.delete(id);
    state.added.delete(id);
    state.removed.add(id);
  }
}
