import type { Command } from 'commander';
import { createSearchEngine } from '../../engine/index.js';
import { WatchList } from '../../engine/watchList.js';
import { startMcpServer } from '../../mcp/server.js';
import { openSession } from '../session.js';

export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start the MCP server over stdio')
    .action(async () => {
      const { config, logger } = await openSession();
      const engine = await createSearchEngine(config, logger);
      await startMcpServer({
        engine,
        watchedDirectories: async () => (await WatchList.load(config.dirsFile)).list(),
        logger: logger.child({ component: 'mcp' }),
      });
    });
}
