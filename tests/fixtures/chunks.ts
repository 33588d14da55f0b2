import type { Chunk } from '../../src/types/index.js';
import { chunkId, fingerprint } from '../../src/engine/fingerprintStore.js';

export function makeChunk(path: string, start: number, text: string, mtime = 1_700_000_000_000): Chunk {
  const filename = path.split('/').pop() ?? path;
  const dot = filename.lastIndexOf('.');
  return {
    id: chunkId(path, start),
    path,
    start,
    end: start + text.length,
    text,
    fingerprint: fingerprint(text),
    mtime,
    metadata: {
      filename,
      extension: dot >= 0 ? filename.slice(dot) : '',
      sizeBytes: text.length,
      chunkIndex: 0,
    },
  };
}

/** Chunk with an explicit id, for ranking and tie-break tests. */
export function chunkWithId(id: string, text: string, path = `/docs/${id}.md`, mtime = 1_700_000_000_000): Chunk {
  return { ...makeChunk(path, 0, text, mtime), id };
}
