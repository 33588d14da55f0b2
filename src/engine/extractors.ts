import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { ExtractionError } from '../errors/indexing.js';

export type Extractor = (filePath: string) => Promise<string>;

const MAX_FILE_SIZE = 10 * 1_048_576; // 10 MB

/**
 * Detects if a buffer is likely binary by sampling bytes.
 * Returns true if >5% of sampled bytes are non-printable non-whitespace.
 */
function isBinary(buf: Buffer): boolean {
  const sampleSize = Math.min(buf.length, 8000);
  if (sampleSize === 0) return false;
  let nonPrintable = 0;
  for (let i = 0; i < sampleSize; i++) {
    const b = buf[i];
    if (b === undefined) continue;
    // Null byte is a strong binary indicator
    if (b === 0) return true;
    if (b < 9 || (b > 13 && b < 32 && b !== 27)) nonPrintable++;
  }
  return nonPrintable / sampleSize > 0.05;
}

async function readText(filePath: string): Promise<string> {
  let raw: Buffer;
  try {
    const info = await stat(filePath);
    if (info.size > MAX_FILE_SIZE) {
      throw new ExtractionError(`File exceeds ${MAX_FILE_SIZE} bytes`, filePath);
    }
    raw = await readFile(filePath);
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(`Cannot read ${filePath}`, filePath, err);
  }
  if (isBinary(raw)) {
    throw new ExtractionError('File looks binary', filePath);
  }
  return raw.toString('utf8');
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

// Numeric references past the last Unicode code point stay as written.
function fromCodePoint(codePoint: number, entity: string): string {
  return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
}

/** Visible text of an HTML document: scripts, styles and tags removed, block elements become line breaks. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(br|\/p|\/div|\/li|\/h[1-6]|\/tr)\b[^>]*>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (entity, body: string) => {
      if (body.startsWith('#x') || body.startsWith('#X')) return fromCodePoint(parseInt(body.slice(2), 16), entity);
      if (body.startsWith('#')) return fromCodePoint(parseInt(body.slice(1), 10), entity);
      return ENTITIES[body.toLowerCase()] ?? entity;
    })
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

const extractText: Extractor = readText;
const extractHtml: Extractor = async (filePath) => htmlToText(await readText(filePath));

const TEXT_EXTENSIONS = [
  // documents
  '.md',
  '.mdx',
  '.txt',
  '.rst',
  // code
  '.py',
  '.js',
  '.ts',
  '.jsx',
  '.tsx',
  '.go',
  '.rs',
  '.java',
  '.c',
  '.cpp',
  '.h',
  '.hpp',
  '.rb',
  '.sh',
  '.lua',
  '.swift',
];

const EXTRACTORS: ReadonlyMap<string, Extractor> = new Map<string, Extractor>([
  ...TEXT_EXTENSIONS.map((ext): [string, Extractor] => [ext, extractText]),
  ['.html', extractHtml],
  ['.htm', extractHtml],
]);

export const SUPPORTED_EXTENSIONS: readonly string[] = [...EXTRACTORS.keys()];

export function extractorFor(filePath: string): Extractor | undefined {
  return EXTRACTORS.get(extname(filePath).toLowerCase());
}

/** Extract the text of a document, dispatching on its extension. */
export async function extract(filePath: string): Promise<string> {
  const extractor = extractorFor(filePath);
  if (!extractor) {
    throw new ExtractionError(`No extractor for ${extname(filePath) || 'files without extension'}`, filePath);
  }
  return extractor(filePath);
}
