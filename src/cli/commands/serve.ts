import type { Command } from 'commander';
import { createApiServer } from '../../api/server.js';
import { createSearchEngine } from '../../engine/index.js';
import { WatchList } from '../../engine/watchList.js';
import { parsePositiveInt } from '../argv.js';
import { openSession } from '../session.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the REST API server')
    .option('--port <n>', 'Port to listen on')
    .option('--host <h>', 'Host to bind to')
    .action(async (opts: { port?: string; host?: string }) => {
      const { config, logger } = await openSession();
      const engine = await createSearchEngine(config, logger);
      const app = createApiServer({
        engine,
        watchedDirectories: async () => (await WatchList.load(config.dirsFile)).list(),
        logger: logger.child({ component: 'api' }),
      });
      app.addHook('onClose', async () => {
        await engine.dispose();
      });

      const port = opts.port !== undefined ? parsePositiveInt(opts.port, '--port') : config.api.port;
      const host = opts.host ?? config.api.host;
      await app.listen({ port, host });
      logger.info(`REST API listening on http://${host}:${port}`);
    });
}
