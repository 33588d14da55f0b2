import { createHash } from 'node:crypto';
import type { IndexStamp } from '../types/index.js';
import { compareIds } from './bm25Index.js';

export interface StampEntry {
  id: string;
  fingerprint: string;
  mtime: number;
}

/**
 * Validity stamp of a chunk set: count, newest source timestamp, and a digest
 * of every (id, fingerprint) pair that does not depend on iteration order.
 */
export function computeStamp(entries: Iterable<StampEntry>): IndexStamp {
  const pairs: string[] = [];
  let maxTimestamp = 0;
  for (const { id, fingerprint, mtime } of entries) {
    pairs.push(`${id}:${fingerprint}`);
    if (mtime > maxTimestamp) maxTimestamp = mtime;
  }
  pairs.sort(compareIds);
  const hash = createHash('sha256');
  for (const pair of pairs) hash.update(pair).update('\n');
  return { count: pairs.length, maxTimestamp, digest: hash.digest('hex') };
}

export function sameStamp(a: IndexStamp, b: IndexStamp): boolean {
  return a.count === b.count && a.maxTimestamp === b.maxTimestamp && a.digest === b.digest;
}
