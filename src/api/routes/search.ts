import type { FastifyInstance } from 'fastify';
import type { SearchEngine } from '../../engine/searchEngine.js';
import { parseSince } from '../../engine/filters.js';
import { searchBodySchema, type ErrorResponse, type SearchResponse } from '../schemas.js';

export function registerSearchRoute(app: FastifyInstance, engine: SearchEngine): void {
  app.post<{ Body: unknown; Reply: SearchResponse | ErrorResponse }>('/search', async (req, reply) => {
    const parsed = searchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.issues[0]?.message ?? 'invalid body' });
    }
    const { query, k, mode, glob, ext, since } = parsed.data;
    const cutoff = parseSince(since);
    const results = await engine.search(query, {
      ...(k !== undefined ? { k } : {}),
      ...(mode !== undefined ? { mode } : {}),
      filters: {
        ...(glob ? { globs: glob } : {}),
        ...(ext ? { extensions: ext } : {}),
        ...(cutoff !== undefined ? { since: cutoff } : {}),
      },
    });
    return reply.send({ query, results });
  });
}
