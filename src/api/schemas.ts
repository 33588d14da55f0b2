import { z } from 'zod';
import type { IndexReport, IndexStatus, SearchResult } from '../types/index.js';
import type { SiftErrorCode } from '../errors/base.js';

// ── Request schemas ──────────────────────────────────────────────────────────

const filtersShape = {
  glob: z.array(z.string()).optional(),
  ext: z.array(z.string()).optional(),
  since: z.string().optional(),
};

export const searchBodySchema = z.object({
  query: z.string().min(1, 'query is required'),
  k: z.number().int().positive().optional(),
  mode: z.enum(['dense', 'sparse', 'hybrid']).optional(),
  ...filtersShape,
});

export const indexBodySchema = z.object({
  directories: z.array(z.string().min(1)).optional(),
  ...filtersShape,
  chunkSize: z.number().int().positive().optional(),
  overlap: z.number().int().nonnegative().optional(),
  recursive: z.boolean().optional(),
  force: z.boolean().optional(),
  dryRun: z.boolean().optional(),
});

export type SearchBody = z.infer<typeof searchBodySchema>;
export type IndexBody = z.infer<typeof indexBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface ErrorResponse {
  error: string;
  code?: SiftErrorCode;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
}

export interface IndexResponse {
  directories: string[];
  report: IndexReport;
}

export type StatusResponse = IndexStatus;
