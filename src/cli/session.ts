import { loadConfig } from '../config/loader.js';
import { validateConfig } from '../config/validator.js';
import { createSearchEngine, type SearchEngine } from '../engine/index.js';
import { WatchList } from '../engine/watchList.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { AppConfig } from '../types/index.js';

export interface Session {
  config: AppConfig;
  logger: Logger;
  watchList: WatchList;
}

/** Config, logger and watch list for one command invocation. */
export async function openSession(): Promise<Session> {
  const config = loadConfig();
  validateConfig(config);
  const logger = createLogger(config.logLevel);
  const watchList = await WatchList.load(config.dirsFile);
  return { config, logger, watchList };
}

/** Run `fn` against an engine and always release its stores afterwards. */
export async function withEngine<T>(session: Session, fn: (engine: SearchEngine) => Promise<T>): Promise<T> {
  const engine = await createSearchEngine(session.config, session.logger);
  try {
    return await fn(engine);
  } finally {
    await engine.dispose();
  }
}
