import Fastify, { type FastifyInstance } from 'fastify';
import type { SearchEngine } from '../engine/searchEngine.js';
import { SiftError, type SiftErrorCode } from '../errors/base.js';
import type { Logger } from '../logging/logger.js';
import { registerSearchRoute } from './routes/search.js';
import { registerIndexRoute } from './routes/index.js';
import { registerStatusRoute } from './routes/status.js';
import type { ErrorResponse } from './schemas.js';

export interface ApiServerDeps {
  engine: SearchEngine;
  /** Watch-list directories, used when POST /index names none. */
  watchedDirectories?: () => Promise<string[]>;
  logger?: Logger;
}

const STATUS_BY_CODE: Partial<Record<SiftErrorCode, number>> = {
  INVALID_CONFIG: 400,
  STORE_UNAVAILABLE: 503,
};

export function errorStatus(err: unknown): number {
  return err instanceof SiftError ? (STATUS_BY_CODE[err.code] ?? 500) : 500;
}

/**
 * Creates a Fastify server with the search, index and status routes.
 * Does NOT call listen(); the caller does (or uses app.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = deps.logger;

  app.addHook('onResponse', async (req, reply) => {
    logger?.info({ method: req.method, url: req.url, status: reply.statusCode }, 'request');
  });

  app.setErrorHandler(async (err, _req, reply) => {
    const status = errorStatus(err);
    if (status >= 500) logger?.error({ err }, 'request failed');
    const body: ErrorResponse =
      err instanceof SiftError ? err.toJSON() : { error: err instanceof Error ? err.message : String(err) };
    return reply.status(status).send(body);
  });

  registerSearchRoute(app, deps.engine);
  registerIndexRoute(app, deps.engine, deps.watchedDirectories ?? (async () => []));
  registerStatusRoute(app, deps.engine);

  return app;
}
