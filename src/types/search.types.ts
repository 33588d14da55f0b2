export interface ChunkMetadata {
  filename: string;
  extension: string;
  sizeBytes: number;
  chunkIndex: number;
}

export interface Chunk {
  id: string;
  path: string;
  /** Inclusive start offset into the extracted document text. */
  start: number;
  /** Exclusive end offset. */
  end: number;
  text: string;
  fingerprint: string;
  /** Source file modification time, epoch ms. */
  mtime: number;
  metadata: ChunkMetadata;
}

export interface Document {
  path: string;
  mtime: number;
  sizeBytes: number;
  text: string;
}

export type SearchMode = 'dense' | 'sparse' | 'hybrid';

export interface SearchFilters {
  globs?: string[];
  extensions?: string[];
  /** Absolute cutoff, epoch ms. Chunks from files modified earlier are excluded. */
  since?: number;
}

export interface SearchResult {
  chunkId: string;
  rank: number;
  score: number;
  source: SearchMode;
  path: string;
  start: number;
  end: number;
  text: string;
  metadata: ChunkMetadata;
  denseScore?: number;
  sparseScore?: number;
}

export interface SearchOptions {
  k?: number;
  mode?: SearchMode;
  filters?: SearchFilters;
}

export interface BenchmarkResult {
  query: string;
  dense: SearchResult[];
  sparse: SearchResult[];
}

export interface IndexStamp {
  count: number;
  maxTimestamp: number;
  digest: string;
}

export type ChunkClassification =
  | { kind: 'new' }
  | { kind: 'unchanged' }
  | { kind: 'changed'; previous: string }
  | { kind: 'duplicate'; of: string };

export interface IndexFilters {
  extensions?: string[];
  globs?: string[];
  since?: number;
}

export interface IndexRunOptions {
  chunkSize?: number;
  overlap?: number;
  recursive?: boolean;
  force?: boolean;
  dryRun?: boolean;
  reportPath?: string;
}

export interface DuplicateEntry {
  path: string;
  chunkIndex: number;
  chunkId: string;
  duplicateOf: string;
  duplicatePath?: string;
}

export interface ErrorEntry {
  path: string;
  chunkIndex?: number;
  kind: 'extraction' | 'embedding' | 'store';
  message: string;
}

export interface ReportCounts {
  new: number;
  changed: number;
  unchanged: number;
  duplicate: number;
  error: number;
  removed: number;
}

export interface IndexReport {
  documents: number;
  skippedDocuments: number;
  /** Documents whose size and mtime matched the last run; their chunks count as unchanged. */
  unchangedDocuments: number;
  counts: ReportCounts;
  duplicates: DuplicateEntry[];
  errors: ErrorEntry[];
  dryRun: boolean;
  aborted?: string;
  startedAt: string;
  finishedAt: string;
}

export interface PruneResult {
  removed: number;
  remaining: number;
  missingFiles: string[];
}

export interface IndexStatus {
  chunks: number;
  directories: string[];
  lastIndexedAt: string | null;
  dense: boolean;
}
