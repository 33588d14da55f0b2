import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../logging/logger.js';
import { matchesExtension, matchesGlobs } from './filters.js';

export interface FileCandidate {
  path: string;
  mtime: number;
  sizeBytes: number;
}

export interface WalkOptions {
  extensions: string[];
  globs?: string[];
  /** Epoch ms; files modified earlier are skipped. */
  since?: number;
  recursive?: boolean;
}

export interface WalkEntry {
  file: FileCandidate;
  /** Why the file is excluded, when it is. Extension misses are never reported. */
  skipped?: 'glob' | 'since';
}

const SKIP_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'build',
  '.next',
  'coverage',
  '.cache',
  '__pycache__',
  '.venv',
  'venv',
  'target',
  'vendor',
]);

export class FileIndexer {
  constructor(private readonly logger?: Logger) {}

  /**
   * Walk a directory, yielding every file with an allowed extension in
   * sorted order. Files failing the glob or modification-time filter are
   * yielded with `skipped` set so callers can count them.
   */
  async *walk(root: string, options: WalkOptions, dirPath: string = root): AsyncGenerator<WalkEntry> {
    let entries;
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      this.logger?.warn({ err, dirPath }, 'cannot read directory');
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (options.recursive !== false && !SKIP_DIRS.has(entry.name) && !entry.name.startsWith('.')) {
          yield* this.walk(root, options, fullPath);
        }
        continue;
      }

      if (!entry.isFile()) continue;
      if (!matchesExtension(fullPath, options.extensions)) continue;

      let info;
      try {
        info = await stat(fullPath);
      } catch (err) {
        this.logger?.warn({ err, path: fullPath }, 'cannot stat file');
        continue;
      }
      const file: FileCandidate = { path: fullPath, mtime: info.mtimeMs, sizeBytes: info.size };

      if (options.globs && !matchesGlobs(fullPath, options.globs, root)) {
        yield { file, skipped: 'glob' };
      } else if (options.since !== undefined && file.mtime < options.since) {
        yield { file, skipped: 'since' };
      } else {
        yield { file };
      }
    }
  }
}
