import { minimatch } from 'minimatch';
import { basename, extname, relative, isAbsolute, sep } from 'node:path';
import { InvalidConfigError } from '../errors/config.js';
import type { Chunk, SearchFilters } from '../types/index.js';

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const RELATIVE_RE = /^(\d+)([mhdw])$/i;
const DATE_ONLY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a modification-time cutoff into epoch ms.
 * Accepts relative spans (`30m`, `12h`, `7d`, `2w`), a local calendar date
 * (`2024-01-15`, midnight local time) or an ISO-8601 datetime.
 */
export function parseSince(value: string | undefined, now: number = Date.now()): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;

  const relativeMatch = RELATIVE_RE.exec(trimmed);
  if (relativeMatch) {
    const [, amount = '0', unit = 'd'] = relativeMatch;
    const unitMs = UNIT_MS[unit.toLowerCase()] ?? UNIT_MS['d'] ?? 0;
    return now - Number(amount) * unitMs;
  }

  const dateOnly = DATE_ONLY_RE.exec(trimmed);
  if (dateOnly) {
    const [, y = '', m = '', d = ''] = dateOnly;
    const date = new Date(Number(y), Number(m) - 1, Number(d));
    if (date.getMonth() !== Number(m) - 1 || date.getDate() !== Number(d)) {
      throw new InvalidConfigError(`Invalid date in --since: "${trimmed}"`);
    }
    return date.getTime();
  }

  if (trimmed.includes('T')) {
    const parsed = Date.parse(trimmed);
    if (!Number.isNaN(parsed)) return parsed;
  }

  throw new InvalidConfigError(`--since must be like 7d, 12h, 30m, 2w or 2024-01-15, got "${trimmed}"`);
}

/** Split comma-separated, possibly repeated, option values. */
export function splitList(values: string[] | string | undefined): string[] {
  if (values === undefined) return [];
  const list = Array.isArray(values) ? values : [values];
  return list
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v !== '');
}

export function normalizeExtensions(values: string[] | string | undefined): string[] {
  return splitList(values).map((e) => (e.startsWith('.') ? e : `.${e}`).toLowerCase());
}

function toPosix(p: string): string {
  return sep === '/' ? p : p.split(sep).join('/');
}

/**
 * A path matches when any pattern matches its absolute path, its basename or,
 * when `root` is given, its path relative to that root.
 */
export function matchesGlobs(filePath: string, patterns: string[], root?: string): boolean {
  if (patterns.length === 0) return true;
  const candidates = [toPosix(filePath), basename(filePath)];
  if (root !== undefined) {
    const rel = relative(root, filePath);
    if (rel !== '' && !rel.startsWith('..') && !isAbsolute(rel)) candidates.push(toPosix(rel));
  }
  return patterns.some((pattern) =>
    candidates.some((candidate) => minimatch(candidate, pattern, { dot: true })),
  );
}

export function matchesExtension(filePath: string, extensions: string[]): boolean {
  if (extensions.length === 0) return true;
  return extensions.includes(extname(filePath).toLowerCase());
}

export type ChunkPredicate = (chunk: Pick<Chunk, 'path' | 'mtime'>) => boolean;

/**
 * Predicate shared by every retrieval path, so a filter means the same thing
 * in dense, sparse and hybrid mode.
 */
export function chunkFilter(filters: SearchFilters | undefined): ChunkPredicate | undefined {
  if (!filters) return undefined;
  const globs = filters.globs ?? [];
  const extensions = normalizeExtensions(filters.extensions);
  const since = filters.since;
  if (globs.length === 0 && extensions.length === 0 && since === undefined) return undefined;

  return (chunk) =>
    (since === undefined || chunk.mtime >= since) &&
    matchesExtension(chunk.path, extensions) &&
    matchesGlobs(chunk.path, globs);
}
