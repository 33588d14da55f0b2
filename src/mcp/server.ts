import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { SearchEngine } from '../engine/searchEngine.js';
import { parseSince } from '../engine/filters.js';
import type { Logger } from '../logging/logger.js';
import { formatReport, renderResults } from '../output/formatter.js';

export interface McpServerDeps {
  engine: SearchEngine;
  /** Watch-list directories, used when index_directories names none. */
  watchedDirectories?: () => Promise<string[]>;
  logger?: Logger;
}

const STATUS_URI = 'sift://index/status';

function errorResult(prefix: string, err: unknown) {
  return {
    isError: true,
    content: [{ type: 'text' as const, text: `${prefix}: ${err instanceof Error ? err.message : String(err)}` }],
  };
}

/**
 * Creates and wires up a McpServer with the search and index tools and the
 * status resource. Caller must then call server.connect(transport).
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const { engine } = deps;
  const watched = deps.watchedDirectories ?? (async () => []);

  const server = new McpServer({
    name: 'sift',
    version: '0.1.0',
  });

  // ── Resources ───────────────────────────────────────────────────────────

  server.resource(
    'index-status',
    STATUS_URI,
    { description: 'Index health: chunk count, watched directories, last run, dense retrieval on/off.' },
    async () => ({
      contents: [
        {
          uri: STATUS_URI,
          mimeType: 'application/json',
          text: JSON.stringify(await engine.status()),
        },
      ],
    }),
  );

  // ── Tools ────────────────────────────────────────────────────────────────

  server.tool(
    'search_files',
    'Search indexed local files with dense, BM25 or hybrid retrieval.',
    {
      query: z.string().describe('Search query'),
      k: z.number().int().min(1).max(50).optional().describe('Max results (default 5)'),
      mode: z.enum(['dense', 'sparse', 'hybrid']).optional().describe('Retrieval mode (default hybrid)'),
      glob: z.array(z.string()).optional().describe('Only paths matching one of these globs'),
      ext: z.array(z.string()).optional().describe('Only these file extensions'),
      since: z.string().optional().describe('Only files modified since, e.g. "7d" or "2024-01-31"'),
    },
    async ({ query, k, mode, glob, ext, since }) => {
      try {
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
        return {
          content: [
            {
              type: 'text' as const,
              text: renderResults({ query, mode: mode ?? 'hybrid', results }, 'plain'),
            },
          ],
        };
      } catch (err) {
        return errorResult('Search failed', err);
      }
    },
  );

  server.tool(
    'index_directories',
    'Index directories (default: the watch list) into the local search index.',
    {
      directories: z.array(z.string()).optional().describe('Absolute directory paths'),
      force: z.boolean().optional().describe('Clear the index first'),
      dryRun: z.boolean().optional().describe('Classify chunks without writing anything'),
    },
    async ({ directories, force, dryRun }) => {
      try {
        const targets = directories ?? (await watched());
        if (targets.length === 0) {
          return errorResult('Index failed', new Error('no directories to index'));
        }
        const report = await engine.index(
          targets,
          {},
          { ...(force !== undefined ? { force } : {}), ...(dryRun !== undefined ? { dryRun } : {}) },
        );
        deps.logger?.info({ directories: targets, counts: report.counts }, 'indexed via MCP');
        return { content: [{ type: 'text' as const, text: formatReport(report) }] };
      } catch (err) {
        return errorResult('Index failed', err);
      }
    },
  );

  return server;
}

/**
 * Starts the MCP server over stdio. Logs only to stderr.
 */
export async function startMcpServer(deps: McpServerDeps): Promise<void> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  deps.logger?.info('MCP server starting on stdio');
  await server.connect(transport);
  deps.logger?.info('MCP server connected');
}
