import type { SearchEngine } from '../../src/engine/searchEngine.js';
import type {
  BenchmarkResult,
  IndexFilters,
  IndexReport,
  IndexRunOptions,
  IndexStatus,
  PruneResult,
  SearchOptions,
  SearchResult,
} from '../../src/types/index.js';

export function emptyReport(): IndexReport {
  return {
    documents: 0,
    skippedDocuments: 0,
    unchangedDocuments: 0,
    counts: { new: 0, changed: 0, unchanged: 0, duplicate: 0, error: 0, removed: 0 },
    duplicates: [],
    errors: [],
    dryRun: false,
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:01.000Z',
  };
}

export function makeResult(id: string, text = 'the quick brown fox', rank = 1): SearchResult {
  return {
    chunkId: id,
    rank,
    score: 0.9,
    source: 'hybrid',
    path: '/docs/notes.md',
    start: 0,
    end: text.length,
    text,
    metadata: { filename: 'notes.md', extension: '.md', sizeBytes: 120, chunkIndex: 0 },
  };
}

/**
 * Mock SearchEngine for tests.
 * Expose mutable properties to control return values per test.
 */
export class MockSearchEngine implements SearchEngine {
  searchResults: SearchResult[] = [];
  report: IndexReport = emptyReport();
  statusValue: IndexStatus = { chunks: 0, directories: [], lastIndexedAt: null, dense: true };
  shouldThrow: Error | undefined = undefined;
  lastSearch: { query: string; options: SearchOptions | undefined } | undefined = undefined;
  lastIndex: { directories: string[]; filters?: IndexFilters; options?: IndexRunOptions } | undefined = undefined;
  removedDirectories: string[] = [];
  resetCalled = false;
  disposed = false;

  async index(directories: string[], filters?: IndexFilters, options?: IndexRunOptions): Promise<IndexReport> {
    if (this.shouldThrow) throw this.shouldThrow;
    this.lastIndex = { directories, ...(filters ? { filters } : {}), ...(options ? { options } : {}) };
    return this.report;
  }

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    if (this.shouldThrow) throw this.shouldThrow;
    this.lastSearch = { query, options };
    return [...this.searchResults];
  }

  async benchmark(query: string): Promise<BenchmarkResult> {
    return { query, dense: [...this.searchResults], sparse: [...this.searchResults] };
  }

  async removeDirectory(directory: string): Promise<number> {
    this.removedDirectories.push(directory);
    return 0;
  }

  async prune(): Promise<PruneResult> {
    return { removed: 0, remaining: 0, missingFiles: [] };
  }

  async reset(): Promise<void> {
    this.resetCalled = true;
  }

  async status(): Promise<IndexStatus> {
    return { ...this.statusValue };
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}
