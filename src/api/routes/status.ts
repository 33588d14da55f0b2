import type { FastifyInstance } from 'fastify';
import type { SearchEngine } from '../../engine/searchEngine.js';
import type { StatusResponse } from '../schemas.js';

export function registerStatusRoute(app: FastifyInstance, engine: SearchEngine): void {
  app.get<{ Reply: StatusResponse }>('/status', async (_req, reply) => {
    return reply.send(await engine.status());
  });
}
