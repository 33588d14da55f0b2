import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdir, mkdtemp, readFile, rm, unlink, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Bm25Index, DEFAULT_BM25 } from '../../../src/engine/bm25Index.js';
import { NoopEmbeddingProvider, type EmbeddingProvider } from '../../../src/engine/embedders/embeddingProvider.js';
import { extract } from '../../../src/engine/extractors.js';
import { chunkId, FingerprintStore } from '../../../src/engine/fingerprintStore.js';
import { IndexingPipeline } from '../../../src/engine/indexingPipeline.js';
import { MemoryVectorStore } from '../../../src/engine/memoryVectorStore.js';
import { SparseIndexCache, SparseIndexProvider } from '../../../src/engine/sparseIndexCache.js';
import { InvalidConfigError } from '../../../src/errors/config.js';
import { StoreUnavailableError } from '../../../src/errors/store.js';
import type { Chunk } from '../../../src/types/index.js';
import { FakeEmbedder } from '../../fixtures/fakeEmbedder.js';

class SlowEmbedder extends FakeEmbedder {
  active = 0;
  peak = 0;

  override async embed(text: string): Promise<Float32Array> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.active--;
    return super.embed(text);
  }
}

class FlakyStore extends MemoryVectorStore {
  upserts = 0;
  constructor(private readonly failFrom: number) {
    super();
  }

  override async upsert(chunk: Chunk, embedding: Float32Array): Promise<void> {
    if (this.upserts++ >= this.failFrom) throw new StoreUnavailableError('store went away');
    return super.upsert(chunk, embedding);
  }
}

describe('IndexingPipeline', () => {
  let root: string;
  let docs: string;
  let fingerprintsPath: string;
  let cache: SparseIndexCache;
  let store: MemoryVectorStore;
  let embedder: FakeEmbedder;
  let sparse: SparseIndexProvider;
  let pipeline: IndexingPipeline;

  function makePipeline(
    overrides: {
      store?: MemoryVectorStore;
      embedder?: EmbeddingProvider;
      chunkSize?: number;
      overlap?: number;
      embedConcurrency?: number;
      extract?: (filePath: string) => Promise<string>;
    } = {},
  ): IndexingPipeline {
    store = overrides.store ?? store;
    sparse = new SparseIndexProvider(store, cache, DEFAULT_BM25);
    return new IndexingPipeline({
      store,
      embedder: overrides.embedder ?? embedder,
      sparse,
      fingerprintsPath,
      chunking: { chunkSize: overrides.chunkSize ?? 512, overlap: overrides.overlap ?? 50 },
      ...(overrides.embedConcurrency !== undefined ? { embedConcurrency: overrides.embedConcurrency } : {}),
      ...(overrides.extract ? { extract: overrides.extract } : {}),
    });
  }

  async function write(name: string, text: string): Promise<string> {
    const file = join(docs, name);
    await writeFile(file, text);
    return file;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sift-pipeline-'));
    docs = join(root, 'docs');
    await mkdir(docs);
    fingerprintsPath = join(root, 'index', 'fingerprints.json');
    cache = new SparseIndexCache(join(root, 'index', 'bm25'));
    store = new MemoryVectorStore();
    embedder = new FakeEmbedder();
    pipeline = makePipeline();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  // ── chunking and classification ─────────────────────────────────────────

  it('indexes a 1000-character file as three chunks', async () => {
    const file = await write('a.txt', 'word '.repeat(200));
    const report = await pipeline.run([docs]);

    expect(report.documents).toBe(1);
    expect(report.counts).toEqual({ new: 3, changed: 0, unchanged: 0, duplicate: 0, error: 0, removed: 0 });
    const chunks = await store.chunksFor(file);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 512],
      [462, 974],
      [924, 1000],
    ]);
    expect(chunks.map((c) => c.metadata.chunkIndex)).toEqual([0, 1, 2]);
    expect(chunks[0].metadata).toEqual({ filename: 'a.txt', extension: '.txt', sizeBytes: 1000, chunkIndex: 0 });
  });

  it('embeds the filename together with the chunk text', async () => {
    await write('a.md', 'hello world');
    await pipeline.run([docs]);
    expect(embedder.calls).toEqual(['a.md\n\nhello world']);
  });

  it('is idempotent over an unchanged directory', async () => {
    await write('a.txt', 'word '.repeat(200));
    await write('b.md', 'A short note.');
    await pipeline.run([docs]);
    const before = await store.all();
    const cacheBefore = await readFile(cache.filePath, 'utf-8');
    const embedCalls = embedder.calls.length;

    const second = await makePipeline().run([docs]);
    expect(second.counts).toEqual({ new: 0, changed: 0, unchanged: 4, duplicate: 0, error: 0, removed: 0 });
    expect(embedder.calls).toHaveLength(embedCalls);
    expect(await store.all()).toEqual(before);
    expect(await readFile(cache.filePath, 'utf-8')).toBe(cacheBefore);
  });

  it('stores a duplicate under its own path with the original vector', async () => {
    const a = await write('a.md', 'Shared paragraph of text.');
    const b = await write('b.md', 'Shared   paragraph of\ntext.');
    const report = await pipeline.run([docs]);

    expect(report.counts.new).toBe(1);
    expect(report.counts.duplicate).toBe(1);
    expect(report.duplicates).toEqual([
      { path: b, chunkIndex: 0, chunkId: chunkId(b, 0), duplicateOf: chunkId(a, 0), duplicatePath: a },
    ]);
    expect(embedder.calls).toEqual(['a.md\n\nShared paragraph of text.']);
    expect((await store.all()).map((c) => c.path).sort()).toEqual([a, b]);
    expect(await store.embeddingOf(chunkId(b, 0))).toEqual(await store.embeddingOf(chunkId(a, 0)));

    const again = await makePipeline().run([docs]);
    expect(again.counts).toEqual({ new: 0, changed: 0, unchanged: 2, duplicate: 0, error: 0, removed: 0 });
  });

  it('keeps a copy when its original is rewritten in the same run', async () => {
    const z = await write('z.md', 'Zebra quokka narwhal.');
    await pipeline.run([docs]);
    const a = await write('a.md', 'Zebra quokka narwhal.');
    await writeFile(z, 'Entirely different words.');

    const second = await makePipeline().run([docs]);
    expect(second.counts).toMatchObject({ new: 0, changed: 1, duplicate: 1 });
    expect(second.duplicates.map((d) => [d.path, d.duplicatePath])).toEqual([[a, z]]);

    const third = await makePipeline().run([docs]);
    expect(third.counts).toEqual({ new: 0, changed: 0, unchanged: 2, duplicate: 0, error: 0, removed: 0 });
    expect((await store.chunksFor(a)).map((c) => c.text)).toEqual(['Zebra quokka narwhal.']);
    expect(embedder.calls).toEqual(['z.md\n\nZebra quokka narwhal.', 'z.md\n\nEntirely different words.']);
    expect((await cache.read())?.index.score('quokka').has(chunkId(a, 0))).toBe(true);
  });

  it('keeps a copy that sorts after its rewritten original', async () => {
    const a = await write('a.md', 'Zebra quokka narwhal.');
    await pipeline.run([docs]);
    const z = await write('z.md', 'Zebra quokka narwhal.');
    await writeFile(a, 'Entirely different words.');

    const second = await makePipeline().run([docs]);
    expect(second.counts).toMatchObject({ new: 1, changed: 1, duplicate: 0 });

    const third = await makePipeline().run([docs]);
    expect(third.counts).toEqual({ new: 0, changed: 0, unchanged: 2, duplicate: 0, error: 0, removed: 0 });
    expect((await store.chunksFor(z)).map((c) => c.text)).toEqual(['Zebra quokka narwhal.']);
  });

  it('indexes a renamed file under its new path', async () => {
    const z = await write('z.md', 'Zebra quokka narwhal.');
    await pipeline.run([docs]);
    await unlink(z);
    const a = await write('a.md', 'Zebra quokka narwhal.');

    const report = await makePipeline().run([docs]);
    expect(report.counts.duplicate).toBe(1);
    expect((await store.chunksFor(a)).map((c) => c.id)).toEqual([chunkId(a, 0)]);
    expect(embedder.calls).toHaveLength(1);
  });

  it('re-embeds changed chunks and keeps the sparse index in step', async () => {
    const file = await write('a.md', 'apples and pears');
    await pipeline.run([docs]);
    await writeFile(file, 'oranges and lemons');

    const report = await makePipeline().run([docs]);
    expect(report.counts).toEqual({ new: 0, changed: 1, unchanged: 0, duplicate: 0, error: 0, removed: 0 });
    expect((await store.get([chunkId(file, 0)]))[0].text).toBe('oranges and lemons');

    const cached = await cache.read();
    expect(cached?.index.toJSON()).toEqual(Bm25Index.build(await store.all()).toJSON());
    expect(cached?.index.score('apples').size).toBe(0);
  });

  it('supersedes chunks at offsets a shrunken file no longer produces', async () => {
    const file = await write('a.txt', 'word '.repeat(200));
    await pipeline.run([docs]);
    await writeFile(file, 'now a short file');

    const report = await makePipeline().run([docs]);
    expect(report.counts.changed).toBe(1);
    expect(report.counts.removed).toBe(2);
    expect((await store.chunksFor(file)).map((c) => c.start)).toEqual([0]);
    expect((await cache.read())?.index.size).toBe(1);
    expect((await FingerprintStore.read(fingerprintsPath))?.store.size).toBe(1);
  });

  it('does not read files whose size and mtime are unchanged', async () => {
    const a = await write('a.md', 'first note');
    const b = await write('b.md', 'second note');
    await pipeline.run([docs]);
    await writeFile(b, 'second note, revised');

    const reader = vi.fn(extract);
    const report = await makePipeline({ extract: reader }).run([docs]);
    expect(reader.mock.calls).toEqual([[b]]);
    expect(report.unchangedDocuments).toBe(1);
    expect(report.counts).toMatchObject({ unchanged: 1, changed: 1 });
    expect((await FingerprintStore.read(fingerprintsPath))?.store.fileStat(a)).toBeDefined();
  });

  it('re-reads a touched file and finds its chunks unchanged', async () => {
    const a = await write('a.md', 'stable text');
    await pipeline.run([docs]);
    const later = new Date(Date.now() + 60_000);
    await utimes(a, later, later);

    const reader = vi.fn(extract);
    const report = await makePipeline({ extract: reader }).run([docs]);
    expect(reader).toHaveBeenCalledTimes(1);
    expect(report.unchangedDocuments).toBe(0);
    expect(report.counts.unchanged).toBe(1);
  });

  it('re-embeds chunks stored without vectors once an embedder is configured', async () => {
    const a = await write('a.md', 'plain text');
    await makePipeline({ embedder: new NoopEmbeddingProvider() }).run([docs]);
    expect((await store.embeddingOf(chunkId(a, 0)))?.length).toBe(0);

    const report = await makePipeline().run([docs]);
    expect(report.counts).toMatchObject({ new: 1, unchanged: 0 });
    expect((await store.embeddingOf(chunkId(a, 0)))?.length).toBe(16);
    expect((await FingerprintStore.read(fingerprintsPath))?.settings.embedder).toBe('fake:16');
  });

  it('drops vectors of another embedder even for documents outside the run', async () => {
    const other = join(root, 'other');
    await mkdir(other);
    const outside = join(other, 'b.md');
    await writeFile(outside, 'elsewhere');
    await write('a.md', 'here');
    await makePipeline({ embedder: new FakeEmbedder(8) }).run([docs, other]);

    await makePipeline().run([docs]);
    expect((await store.embeddingOf(chunkId(outside, 0)))?.length).toBe(0);
    expect(await store.count()).toBe(2);
  });

  it('embeds with bounded concurrency', async () => {
    const words = Array.from({ length: 60 }, (_, i) => `w${i}`).join(' ');
    await write('a.txt', words);
    const slow = new SlowEmbedder();
    const report = await makePipeline({ embedder: slow, chunkSize: 50, overlap: 0, embedConcurrency: 2 }).run([docs]);

    expect(report.counts.new).toBeGreaterThan(2);
    expect(slow.calls).toHaveLength(report.counts.new);
    expect(slow.peak).toBe(2);
  });

  it('updates the sparse index once per run', async () => {
    await write('a.md', 'one');
    await write('b.md', 'two');
    await write('c.md', 'three');
    const update = vi.spyOn(Bm25Index.prototype, 'update');
    await pipeline.run([docs]);
    expect(update).toHaveBeenCalledTimes(1);
  });

  // ── options and filters ─────────────────────────────────────────────────

  it('force on ten indexed files reports ten new chunks and nothing unchanged', async () => {
    for (let i = 0; i < 10; i++) await write(`f${i}.md`, `Document number ${i} has its own content.`);
    await pipeline.run([docs]);

    const report = await makePipeline().run([docs], {}, { force: true });
    expect(report.documents).toBe(10);
    expect(report.counts.new).toBe(10);
    expect(report.counts.unchanged).toBe(0);
    expect(await store.count()).toBe(10);
  });

  it('dry-run classifies without touching any store', async () => {
    await write('a.txt', 'word '.repeat(200));
    const reportPath = join(root, 'report.json');
    const report = await pipeline.run([docs], {}, { dryRun: true, reportPath });

    expect(report.dryRun).toBe(true);
    expect(report.counts.new).toBe(3);
    expect(await store.count()).toBe(0);
    expect(embedder.calls).toEqual([]);
    await expect(access(fingerprintsPath)).rejects.toThrow();
    await expect(access(cache.filePath)).rejects.toThrow();
    expect(JSON.parse(await readFile(reportPath, 'utf-8'))).toEqual(report);
  });

  it('dry-run after a real run reports unchanged chunks', async () => {
    await write('a.md', 'stable text');
    await pipeline.run([docs]);
    const report = await makePipeline().run([docs], {}, { dryRun: true });
    expect(report.counts.unchanged).toBe(1);
    expect(report.counts.new).toBe(0);
  });

  it('counts files outside the glob or older than the cutoff as skipped', async () => {
    const old = await write('old.md', 'old text');
    await write('new.md', 'new text');
    await write('other.txt', 'other text');
    const past = new Date('2020-01-01T00:00:00Z');
    await utimes(old, past, past);

    const report = await pipeline.run([docs], { globs: ['*.md'], since: Date.parse('2021-01-01T00:00:00Z') });
    expect(report.documents).toBe(1);
    expect(report.skippedDocuments).toBe(2);
    expect(report.counts.new).toBe(1);
  });

  it('limits indexing to the requested extensions', async () => {
    await write('a.md', 'markdown');
    await write('b.txt', 'text');
    const report = await pipeline.run([docs], { extensions: ['txt'] });
    expect(report.documents).toBe(1);
    expect((await store.all()).map((c) => c.metadata.filename)).toEqual(['b.txt']);
  });

  it('rejects invalid chunking before any I/O', async () => {
    await write('a.md', 'text');
    await expect(pipeline.run([docs], {}, { chunkSize: 10, overlap: 10 })).rejects.toThrow(InvalidConfigError);
    await expect(access(join(root, 'index'))).rejects.toThrow();
  });

  it('stores chunks without vectors when no embedder is configured', async () => {
    await write('a.md', 'plain text');
    const report = await makePipeline({ embedder: new NoopEmbeddingProvider() }).run([docs]);
    expect(report.counts.new).toBe(1);
    expect(await store.count()).toBe(1);
    expect(await store.query(new Float32Array([1]), 5)).toEqual([]);
  });

  // ── failures ────────────────────────────────────────────────────────────

  it('records an extraction failure and carries on', async () => {
    const blob = await write('blob.txt', '\u0000\u0001binary');
    await write('ok.md', 'readable');
    const report = await pipeline.run([docs]);

    expect(report.documents).toBe(2);
    expect(report.errors).toEqual([{ path: blob, kind: 'extraction', message: 'File looks binary' }]);
    expect(report.counts.error).toBe(1);
    expect(report.counts.new).toBe(1);
  });

  it('records an embedding failure and retries the chunk on the next run', async () => {
    const bad = await write('bad.md', 'POISON content');
    await write('good.md', 'fine content');
    embedder.failMarker = 'POISON';

    const report = await pipeline.run([docs]);
    expect(report.errors).toEqual([
      { path: bad, chunkIndex: 0, kind: 'embedding', message: 'fake embedder failure' },
    ]);
    expect(report.counts.new).toBe(1);
    expect(await store.count()).toBe(1);

    embedder.failMarker = undefined;
    const retry = await makePipeline().run([docs]);
    expect(retry.counts.new).toBe(1);
    expect(retry.counts.unchanged).toBe(1);
  });

  it('stops on an unavailable store and keeps what was committed', async () => {
    const a = await write('a.md', 'first file');
    await write('b.md', 'second file');
    await write('c.md', 'third file');
    const flaky = new FlakyStore(1);

    const report = await makePipeline({ store: flaky }).run([docs]);
    expect(report.aborted).toBe('store went away');
    expect(report.counts.new).toBe(1);
    expect(report.errors).toEqual([{ path: '', kind: 'store', message: 'store went away' }]);

    const saved = await FingerprintStore.read(fingerprintsPath);
    expect([...(saved?.store.entries() ?? [])].map(([id]) => id)).toEqual([chunkId(a, 0)]);
    expect((await cache.read())?.index.size).toBe(1);
  });

  // ── maintenance ─────────────────────────────────────────────────────────

  it('removeDirectory drops chunks, fingerprints and sparse entries under a directory', async () => {
    const other = join(root, 'other');
    await mkdir(other);
    await write('a.md', 'in docs');
    await writeFile(join(other, 'b.md'), 'in other');
    await pipeline.run([docs, other]);

    expect(await pipeline.removeDirectory(docs)).toBe(1);
    expect((await store.all()).map((c) => c.path)).toEqual([join(other, 'b.md')]);
    expect((await FingerprintStore.read(fingerprintsPath))?.store.size).toBe(1);
    expect((await cache.read())?.index.size).toBe(1);
  });

  it('prune removes chunks of deleted files', async () => {
    const gone = await write('gone.md', 'temporary');
    await write('kept.md', 'permanent');
    await pipeline.run([docs]);
    await unlink(gone);

    expect(await pipeline.prune({ dryRun: true })).toEqual({ removed: 1, remaining: 1, missingFiles: [gone] });
    expect(await store.count()).toBe(2);

    expect(await pipeline.prune()).toEqual({ removed: 1, remaining: 1, missingFiles: [gone] });
    expect(await store.count()).toBe(1);
    expect((await cache.read())?.index.size).toBe(1);
  });

  it('reset clears chunks, fingerprints and the sparse cache', async () => {
    await write('a.md', 'text');
    await pipeline.run([docs]);
    await pipeline.reset();

    expect(await store.count()).toBe(0);
    await expect(access(fingerprintsPath)).rejects.toThrow();
    await expect(access(cache.directory)).rejects.toThrow();
  });
});
