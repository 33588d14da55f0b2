import type { Command } from 'commander';
import { parseSince } from '../../engine/filters.js';
import { formatReport } from '../../output/formatter.js';
import { collect, parseNonNegativeInt, parsePositiveInt } from '../argv.js';
import { openSession, withEngine } from '../session.js';

interface IndexCommandOptions {
  ext?: string[];
  glob?: string[];
  since?: string;
  recursive: boolean;
  chunkSize?: string;
  overlap?: string;
  force?: boolean;
  dryRun?: boolean;
  report?: string;
}

export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Index every watched directory')
    .option('--ext <exts>', 'Only these extensions (repeatable or comma-separated)', collect)
    .option('--glob <pattern>', 'Only files matching this glob (repeatable)', collect)
    .option('--since <when>', 'Only files modified since, e.g. 7d, 12h or 2024-01-31')
    .option('--no-recursive', 'Do not descend into subdirectories')
    .option('--chunk-size <n>', 'Chunk size in characters')
    .option('--overlap <n>', 'Overlap between chunks in characters')
    .option('--force', 'Clear the index and rebuild from scratch')
    .option('--dry-run', 'Classify chunks without writing anything')
    .option('--report <file>', 'Write the run report as JSON')
    .action(async (opts: IndexCommandOptions) => {
      // Option errors surface before anything is opened.
      const since = parseSince(opts.since);
      const chunkSize = opts.chunkSize !== undefined ? parsePositiveInt(opts.chunkSize, '--chunk-size') : undefined;
      const overlap = opts.overlap !== undefined ? parseNonNegativeInt(opts.overlap, '--overlap') : undefined;

      const session = await openSession();
      const dirs = session.watchList.list();
      if (dirs.length === 0) {
        process.stdout.write('No directories to index. Add one with: sift add <dir>\n');
        process.exitCode = 1;
        return;
      }

      process.stderr.write(`Indexing ${dirs.length} directories\n`);
      const report = await withEngine(session, (engine) =>
        engine.index(
          dirs,
          {
            ...(opts.ext ? { extensions: opts.ext } : {}),
            ...(opts.glob ? { globs: opts.glob } : {}),
            ...(since !== undefined ? { since } : {}),
          },
          {
            recursive: opts.recursive,
            ...(chunkSize !== undefined ? { chunkSize } : {}),
            ...(overlap !== undefined ? { overlap } : {}),
            ...(opts.force ? { force: true } : {}),
            ...(opts.dryRun ? { dryRun: true } : {}),
            ...(opts.report ? { reportPath: opts.report } : {}),
          },
        ),
      );
      process.stdout.write(formatReport(report) + '\n');
      if (report.aborted) process.exitCode = 1;
    });
}
