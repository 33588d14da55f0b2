import { homedir } from 'node:os';
import { relative, sep } from 'node:path';
import type { BenchmarkResult, IndexReport, PruneResult, SearchMode, SearchResult } from '../types/index.js';

export type OutputFormat = 'plain' | 'json';

const PREVIEW_CHARS = 200;
const TOP_PREVIEW_CHARS = 800;

const SCORE_LABEL: Record<SearchMode, string> = {
  dense: 'similarity',
  sparse: 'bm25',
  hybrid: 'fused',
};

const TITLE: Record<SearchMode, string> = {
  dense: 'Dense results',
  sparse: 'BM25 results',
  hybrid: 'Hybrid results',
};

export interface ResultSet {
  query: string;
  mode: SearchMode;
  results: SearchResult[];
}

export interface JsonResult {
  rank: number;
  score: string;
  filename: string;
  path: string;
  snippet: string;
  chunkIndex: number;
  sizeBytes: number;
}

export function previewText(text: string, limit: number): string {
  const cleaned = text.replace(/\n/g, ' ');
  return cleaned.length > limit ? cleaned.slice(0, limit) + '...' : cleaned;
}

export function shortenMiddle(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  const keep = maxLen - 3;
  const head = Math.floor(keep / 2);
  const tail = keep - head;
  return `${text.slice(0, head)}...${text.slice(text.length - tail)}`;
}

/** Home-relative, middle-shortened path for display. */
export function displayPath(path: string, maxLen = 60, home: string = homedir()): string {
  const display = path.startsWith(home + sep) ? `~/${relative(home, path).split(sep).join('/')}` : path;
  return shortenMiddle(display, maxLen);
}

export function toJsonResults(results: SearchResult[]): JsonResult[] {
  return results.map((r) => ({
    rank: r.rank,
    score: r.score.toFixed(4),
    filename: r.metadata.filename,
    path: r.path,
    snippet: previewText(r.text, PREVIEW_CHARS),
    chunkIndex: r.metadata.chunkIndex,
    sizeBytes: r.metadata.sizeBytes,
  }));
}

export function resultSetPayload(set: ResultSet): { query: string; mode: SearchMode; results: JsonResult[] } {
  return { query: set.query, mode: set.mode, results: toJsonResults(set.results) };
}

export function benchmarkPayload(result: BenchmarkResult): { query: string; dense: JsonResult[]; bm25: JsonResult[] } {
  return { query: result.query, dense: toJsonResults(result.dense), bm25: toJsonResults(result.sparse) };
}

export function renderPlain(set: ResultSet, home?: string): string {
  if (set.results.length === 0) return 'No results found';
  const label = SCORE_LABEL[set.mode];
  const lines = [TITLE[set.mode]];
  for (const r of set.results) {
    lines.push(`${r.rank}. ${label}=${r.score.toFixed(4)} | ${r.metadata.filename} | ${displayPath(r.path, 60, home)}`);
    lines.push(`    ${previewText(r.text, PREVIEW_CHARS)}`);
  }
  const [top] = set.results;
  if (top) {
    lines.push(
      `Top match: ${top.metadata.filename} | ${displayPath(top.path, 100, home)} | chunk ${top.metadata.chunkIndex} | ${top.metadata.sizeBytes} bytes`,
    );
    lines.push(previewText(top.text, TOP_PREVIEW_CHARS));
  }
  return lines.join('\n');
}

export function renderResults(set: ResultSet, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(resultSetPayload(set)) : renderPlain(set);
}

export function renderBenchmark(result: BenchmarkResult, format: OutputFormat): string {
  if (format === 'json') return JSON.stringify(benchmarkPayload(result));
  return [
    renderPlain({ query: result.query, mode: 'dense', results: result.dense }),
    renderPlain({ query: result.query, mode: 'sparse', results: result.sparse }),
  ].join('\n\n');
}

export function formatReport(report: IndexReport): string {
  const { counts } = report;
  const head = report.dryRun ? '[dry run] ' : '';
  const lines = [
    `${head}${report.documents} documents ` +
      `(${report.skippedDocuments} skipped, ${report.unchangedDocuments} not modified): ` +
      `${counts.new} new, ${counts.changed} changed, ${counts.unchanged} unchanged, ` +
      `${counts.duplicate} duplicate, ${counts.removed} removed, ${counts.error} errors`,
  ];
  for (const e of report.errors) {
    const where = e.chunkIndex !== undefined ? `${e.path}#${e.chunkIndex}` : e.path;
    lines.push(`  ${e.kind} error: ${where ? where + ': ' : ''}${e.message}`);
  }
  if (report.aborted) lines.push(`Aborted: ${report.aborted}`);
  return lines.join('\n');
}

export function formatPrune(result: PruneResult, dryRun: boolean): string {
  const verb = dryRun ? 'Would remove' : 'Removed';
  const lines = [`${verb} ${result.removed} chunks from ${result.missingFiles.length} missing files; ${result.remaining} remain`];
  for (const file of result.missingFiles) lines.push(`  ${file}`);
  return lines.join('\n');
}
