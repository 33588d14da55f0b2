import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { extract, extractorFor, htmlToText, SUPPORTED_EXTENSIONS } from '../../../src/engine/extractors.js';
import { ExtractionError } from '../../../src/errors/indexing.js';

describe('htmlToText', () => {
  it('drops scripts, styles, comments and tags and decodes entities', () => {
    const html =
      '<html><head><style>p{}</style><script>x()</script></head><body>' +
      '<h1>Title</h1><p>Hello &amp; welcome&#33;</p><!-- c --><div>Bye</div></body></html>';
    expect(htmlToText(html)).toBe('Title\nHello & welcome!\nBye');
  });

  it('decodes hex entities and leaves unknown ones alone', () => {
    expect(htmlToText('&#x41;&bogus;')).toBe('A&bogus;');
  });

  it('leaves numeric entities beyond the Unicode range undecoded', () => {
    expect(htmlToText('a &#99999999; b &#x110000; c &#x10FFFF;')).toBe('a &#99999999; b &#x110000; c \u{10FFFF}');
  });
});

describe('extract', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sift-extract-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads plain text files as-is', async () => {
    const file = join(dir, 'notes.md');
    await writeFile(file, '# Notes\n\nSome text.');
    expect(await extract(file)).toBe('# Notes\n\nSome text.');
  });

  it('extracts visible text from HTML files', async () => {
    const file = join(dir, 'page.HTML');
    await writeFile(file, '<p>Hi</p>');
    expect(await extract(file)).toBe('Hi');
  });

  it('rejects binary content', async () => {
    const file = join(dir, 'blob.txt');
    await writeFile(file, Buffer.from([0x48, 0x00, 0x49]));
    await expect(extract(file)).rejects.toThrow(ExtractionError);
  });

  it('rejects unsupported extensions', async () => {
    const file = join(dir, 'image.png');
    await writeFile(file, 'x');
    await expect(extract(file)).rejects.toThrow('No extractor for .png');
  });

  it('wraps read failures in ExtractionError with the path', async () => {
    const file = join(dir, 'missing.md');
    const err: unknown = await extract(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExtractionError);
    expect(err instanceof ExtractionError && err.path).toBe(file);
  });

  it('has an extractor for every supported extension', () => {
    expect(SUPPORTED_EXTENSIONS).toContain('.md');
    expect(SUPPORTED_EXTENSIONS).toContain('.html');
    for (const ext of SUPPORTED_EXTENSIONS) {
      expect(extractorFor(`/x/file${ext}`)).toBeTypeOf('function');
    }
  });
});
