import type { FastifyInstance } from 'fastify';
import type { SearchEngine } from '../../engine/searchEngine.js';
import { parseSince } from '../../engine/filters.js';
import { indexBodySchema, type ErrorResponse, type IndexResponse } from '../schemas.js';

/**
 * `directories` defaults to the watch list resolved by the caller.
 */
export function registerIndexRoute(
  app: FastifyInstance,
  engine: SearchEngine,
  watchedDirectories: () => Promise<string[]>,
): void {
  app.post<{ Body: unknown; Reply: IndexResponse | ErrorResponse }>('/index', async (req, reply) => {
    const parsed = indexBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.issues[0]?.message ?? 'invalid body' });
    }
    const { directories, glob, ext, since, ...options } = parsed.data;
    const targets = directories ?? (await watchedDirectories());
    if (targets.length === 0) {
      return reply.status(400).send({ error: 'no directories to index' });
    }
    const cutoff = parseSince(since);
    const report = await engine.index(
      targets,
      {
        ...(glob ? { globs: glob } : {}),
        ...(ext ? { extensions: ext } : {}),
        ...(cutoff !== undefined ? { since: cutoff } : {}),
      },
      options,
    );
    return reply.send({ directories: targets, report });
  });
}
