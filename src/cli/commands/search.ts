import type { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { parseSince } from '../../engine/filters.js';
import {
  benchmarkPayload,
  renderBenchmark,
  renderResults,
  resultSetPayload,
  type OutputFormat,
} from '../../output/formatter.js';
import type { SearchMode } from '../../types/index.js';
import { collect, parsePositiveInt } from '../argv.js';
import { openSession, withEngine } from '../session.js';

interface SearchCommandOptions {
  limit: string;
  glob?: string[];
  ext?: string[];
  since?: string;
  bm25?: boolean;
  dense?: boolean;
  hybrid?: boolean;
  benchmark?: boolean;
  json?: boolean;
  jsonOut?: string;
}

export function selectMode(opts: Pick<SearchCommandOptions, 'bm25' | 'dense' | 'hybrid'>): SearchMode {
  const picked = [opts.bm25 && 'sparse', opts.dense && 'dense', opts.hybrid && 'hybrid'].filter(
    (m): m is SearchMode => typeof m === 'string',
  );
  if (picked.length > 1) throw new Error('Choose one of --bm25, --dense, --hybrid');
  return picked[0] ?? 'hybrid';
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query...>')
    .description('Search indexed files')
    .option('-n, --limit <n>', 'Max results', '5')
    .option('--glob <pattern>', 'Only paths matching this glob (repeatable)', collect)
    .option('--ext <exts>', 'Only these extensions (repeatable or comma-separated)', collect)
    .option('--since <when>', 'Only files modified since, e.g. 7d or 2024-01-31')
    .option('--bm25', 'Keyword (BM25) retrieval only')
    .option('--dense', 'Embedding retrieval only')
    .option('--hybrid', 'Fuse dense and BM25 rankings (default)')
    .option('--benchmark', 'Show dense and BM25 rankings side by side')
    .option('--json', 'Print JSON')
    .option('--json-out <file>', 'Also write the JSON payload to a file')
    .action(async (words: string[], opts: SearchCommandOptions) => {
      const query = words.join(' ');
      const k = parsePositiveInt(opts.limit, '--limit');
      const since = parseSince(opts.since);
      const mode = selectMode(opts);
      const filters = {
        ...(opts.glob ? { globs: opts.glob } : {}),
        ...(opts.ext ? { extensions: opts.ext } : {}),
        ...(since !== undefined ? { since } : {}),
      };
      const format: OutputFormat = opts.json ? 'json' : 'plain';

      const session = await openSession();
      await withEngine(session, async (engine) => {
        if ((await engine.status()).chunks === 0) {
          process.stdout.write('No index found. To get started, run:\n  sift add <dir>\n  sift index\n');
          process.exitCode = 1;
          return;
        }
        if (opts.benchmark) {
          const result = await engine.benchmark(query, { k, filters });
          if (opts.jsonOut) await writeFile(opts.jsonOut, JSON.stringify(benchmarkPayload(result)));
          process.stdout.write(renderBenchmark(result, format) + '\n');
          return;
        }
        const results = await engine.search(query, { k, mode, filters });
        const set = { query, mode, results };
        if (opts.jsonOut) await writeFile(opts.jsonOut, JSON.stringify(resultSetPayload(set)));
        process.stdout.write(renderResults(set, format) + '\n');
      });
    });
}
