import type {
  BenchmarkResult,
  IndexFilters,
  IndexReport,
  IndexRunOptions,
  IndexStatus,
  PruneResult,
  SearchOptions,
  SearchResult,
} from '../types/index.js';

/**
 * Everything the CLI, the REST API and the MCP server need from the index.
 * Implementations own their stores; callers release them with `dispose`.
 */
export interface SearchEngine {
  /** Run the indexing pipeline over `directories`. */
  index(directories: string[], filters?: IndexFilters, options?: IndexRunOptions): Promise<IndexReport>;

  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;

  /** Dense and sparse rankings for the same query, unfused. */
  benchmark(query: string, options?: Omit<SearchOptions, 'mode'>): Promise<BenchmarkResult>;

  /** Drop everything indexed under `directory`; returns the number of chunks removed. */
  removeDirectory(directory: string): Promise<number>;

  prune(options?: { dryRun?: boolean }): Promise<PruneResult>;

  reset(): Promise<void>;

  status(): Promise<IndexStatus>;

  dispose(): Promise<void>;
}
