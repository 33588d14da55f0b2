import { validateChunking } from '../config/validator.js';

export interface TextSpan {
  start: number;
  end: number;
  text: string;
}

/** Position right after a sentence terminator that is followed by whitespace. */
const SENTENCE_END_RE = /[.!?](?=\s)/g;
/** Position right before a blank line. */
const PARAGRAPH_END_RE = /\n[ \t]*\n/g;

/**
 * First sentence boundary in `(from, limit]`, or -1.
 * Boundaries are offsets an exclusive window end can snap to.
 */
export function findSentenceBoundary(text: string, from: number, limit: number): number {
  const window = text.slice(from, limit);
  let best = -1;

  SENTENCE_END_RE.lastIndex = 0;
  const sentence = SENTENCE_END_RE.exec(window);
  if (sentence) best = from + sentence.index + 1;

  PARAGRAPH_END_RE.lastIndex = 0;
  const paragraph = PARAGRAPH_END_RE.exec(window);
  if (paragraph && paragraph.index > 0) {
    const candidate = from + paragraph.index;
    if (best === -1 || candidate < best) best = candidate;
  }

  return best;
}

/**
 * Overlapping character windows over a document.
 *
 * Each window nominally covers `chunkSize` characters; when that end falls
 * inside the text it is pushed forward to the nearest sentence boundary
 * reachable within `overlap` characters. The next window starts
 * `chunkSize - overlap` characters after the current one, so consecutive
 * windows always overlap or touch and the union covers the whole text.
 *
 * Iterating twice yields the same spans; nothing is computed until iteration.
 */
export class ChunkSequence implements Iterable<TextSpan> {
  constructor(
    private readonly text: string,
    private readonly chunkSize: number,
    private readonly overlap: number,
  ) {
    validateChunking({ chunkSize, overlap });
  }

  *[Symbol.iterator](): Iterator<TextSpan> {
    const { text, chunkSize, overlap } = this;
    const length = text.length;
    const step = chunkSize - overlap;

    for (let start = 0; start < length; start += step) {
      let end = start + chunkSize;
      if (end >= length) {
        yield { start, end: length, text: text.slice(start, length) };
        return;
      }
      if (overlap > 0) {
        // A boundary exactly at the nominal end needs no extension.
        const boundary = findSentenceBoundary(text, end - 1, Math.min(end + overlap, length));
        if (boundary > end) end = boundary;
      }
      yield { start, end, text: text.slice(start, end) };
      if (end >= length) return;
    }
  }
}

export function chunkText(text: string, chunkSize: number, overlap: number): ChunkSequence {
  return new ChunkSequence(text, chunkSize, overlap);
}
