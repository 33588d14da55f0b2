import type { Command } from 'commander';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InvalidConfigError } from '../../errors/config.js';
import { openSession, withEngine } from '../session.js';

export function registerDirsCommands(program: Command): void {
  program
    .command('add <directory>')
    .description('Add a directory to the watch list')
    .action(async (directory: string) => {
      const dir = resolve(directory);
      const info = await stat(dir).catch(() => null);
      if (!info?.isDirectory()) {
        throw new InvalidConfigError(`Not a directory: ${dir}`);
      }
      const { watchList } = await openSession();
      if (watchList.add(dir)) {
        await watchList.save();
        process.stdout.write(`Added ${dir}\n`);
      } else {
        process.stdout.write(`Already watching ${dir}\n`);
      }
    });

  program
    .command('remove <directory>')
    .description('Remove a directory from the watch list and drop its chunks from the index')
    .action(async (directory: string) => {
      const session = await openSession();
      const dir = resolve(directory);
      if (!session.watchList.remove(dir)) {
        process.stdout.write(`Not watching ${dir}\n`);
        return;
      }
      await session.watchList.save();
      const removed = await withEngine(session, (engine) => engine.removeDirectory(dir));
      process.stdout.write(`Removed ${dir} (${removed} chunks)\n`);
    });

  program
    .command('dirs')
    .description('List watched directories')
    .action(async () => {
      const { watchList } = await openSession();
      const dirs = watchList.list();
      process.stdout.write(dirs.length > 0 ? dirs.join('\n') + '\n' : 'No directories. Add one with: sift add <dir>\n');
    });
}
