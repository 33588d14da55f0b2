import type { Chunk, FusionConfig } from '../types/index.js';
import { compareIds } from './bm25Index.js';

export interface ScoredCandidate {
  chunk: Chunk;
  score: number;
}

export interface FusedCandidate {
  chunk: Chunk;
  score: number;
  denseScore?: number;
  sparseScore?: number;
}

export const DEFAULT_FUSION: FusionConfig = { denseWeight: 0.5, sparseWeight: 0.5 };

/**
 * Min-max normalize scores into [0, 1] within the candidate set.
 * A single candidate, or a set of equal scores, normalizes to 1.
 */
export function minMaxNormalize(candidates: ScoredCandidate[]): Map<string, number> {
  const normalized = new Map<string, number>();
  if (candidates.length === 0) return normalized;
  let min = Infinity;
  let max = -Infinity;
  for (const { score } of candidates) {
    if (score < min) min = score;
    if (score > max) max = score;
  }
  const range = max - min;
  for (const { chunk, score } of candidates) {
    normalized.set(chunk.id, range === 0 ? 1 : (score - min) / range);
  }
  return normalized;
}

/**
 * Weighted sum of the two normalized rankings. A chunk seen by only one path
 * keeps its normalized score there and gets 0 from the other.
 */
export function fuse(
  dense: ScoredCandidate[],
  sparse: ScoredCandidate[],
  k: number,
  weights: FusionConfig = DEFAULT_FUSION,
): FusedCandidate[] {
  const nDense = minMaxNormalize(dense);
  const nSparse = minMaxNormalize(sparse);

  const chunks = new Map<string, Chunk>();
  for (const { chunk } of dense) chunks.set(chunk.id, chunk);
  for (const { chunk } of sparse) if (!chunks.has(chunk.id)) chunks.set(chunk.id, chunk);

  const fused: FusedCandidate[] = [];
  for (const [id, chunk] of chunks) {
    const d = nDense.get(id);
    const s = nSparse.get(id);
    fused.push({
      chunk,
      score: weights.denseWeight * (d ?? 0) + weights.sparseWeight * (s ?? 0),
      ...(d !== undefined ? { denseScore: d } : {}),
      ...(s !== undefined ? { sparseScore: s } : {}),
    });
  }
  fused.sort((a, b) => b.score - a.score || compareIds(a.chunk.id, b.chunk.id));
  return fused.slice(0, k);
}
