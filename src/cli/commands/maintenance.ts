import type { Command } from 'commander';
import { formatPrune } from '../../output/formatter.js';
import { openSession, withEngine } from '../session.js';

export function registerMaintenanceCommands(program: Command): void {
  program
    .command('prune')
    .description('Remove chunks whose source files no longer exist')
    .option('--dry-run', 'Only list what would be removed')
    .action(async (opts: { dryRun?: boolean }) => {
      const session = await openSession();
      const dryRun = opts.dryRun === true;
      const result = await withEngine(session, (engine) => engine.prune({ dryRun }));
      process.stdout.write(formatPrune(result, dryRun) + '\n');
    });

  program
    .command('reset')
    .description('Delete all indexed chunks, fingerprints and the BM25 cache')
    .action(async () => {
      const session = await openSession();
      await withEngine(session, (engine) => engine.reset());
      process.stdout.write('Index cleared\n');
    });
}
