import pino, { type Logger } from 'pino';
import type { LogLevel } from '../types/config.types.js';

export type { Logger } from 'pino';

/**
 * Root logger. Writes JSON lines to stderr so stdout stays reserved for
 * search results and MCP stdio traffic.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino(
    {
      name: 'sift',
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/** Logger that drops everything; the default for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
