import { describe, it, expect } from 'vitest';
import {
  chunkFilter,
  matchesExtension,
  matchesGlobs,
  normalizeExtensions,
  parseSince,
  splitList,
} from '../../../src/engine/filters.js';
import { InvalidConfigError } from '../../../src/errors/config.js';

const DAY = 86_400_000;

describe('parseSince', () => {
  const now = new Date(2024, 5, 15, 12, 0, 0).getTime();

  it('returns undefined for no value', () => {
    expect(parseSince(undefined, now)).toBeUndefined();
    expect(parseSince('  ', now)).toBeUndefined();
  });

  it('parses relative spans', () => {
    expect(parseSince('30m', now)).toBe(now - 30 * 60_000);
    expect(parseSince('12h', now)).toBe(now - 12 * 3_600_000);
    expect(parseSince('7d', now)).toBe(now - 7 * DAY);
    expect(parseSince('2w', now)).toBe(now - 14 * DAY);
  });

  it('parses a calendar date as local midnight', () => {
    expect(parseSince('2024-06-08', now)).toBe(new Date(2024, 5, 8).getTime());
  });

  it('parses an ISO datetime', () => {
    expect(parseSince('2024-06-08T00:00:00Z', now)).toBe(Date.UTC(2024, 5, 8));
  });

  it('rejects impossible dates and unknown syntax', () => {
    expect(() => parseSince('2024-02-30', now)).toThrow(InvalidConfigError);
    expect(() => parseSince('last week', now)).toThrow(InvalidConfigError);
    expect(() => parseSince('7y', now)).toThrow(InvalidConfigError);
  });

  it('gives the same cutoff for 7d and the equivalent absolute time', () => {
    const cutoff = now - 7 * DAY;
    expect(parseSince('7d', now)).toBe(parseSince(new Date(cutoff).toISOString(), now));

    const mtimes = [cutoff - 1, cutoff, cutoff + 1, now];
    const relative = chunkFilter({ since: parseSince('7d', now) });
    const absolute = chunkFilter({ since: parseSince(new Date(cutoff).toISOString(), now) });
    const kept = (f: typeof relative) => mtimes.filter((mtime) => f?.({ path: '/a.md', mtime }));
    expect(kept(relative)).toEqual([cutoff, cutoff + 1, now]);
    expect(kept(absolute)).toEqual(kept(relative));
  });
});

describe('splitList / normalizeExtensions', () => {
  it('splits comma-separated and repeated values', () => {
    expect(splitList(['a,b', ' c ', ''])).toEqual(['a', 'b', 'c']);
    expect(splitList(undefined)).toEqual([]);
  });

  it('adds a leading dot and lowercases', () => {
    expect(normalizeExtensions('MD,.txt')).toEqual(['.md', '.txt']);
  });
});

describe('matchesGlobs', () => {
  it('matches everything with no patterns', () => {
    expect(matchesGlobs('/x/y.md', [])).toBe(true);
  });

  it('matches against the basename', () => {
    expect(matchesGlobs('/notes/todo.md', ['*.md'])).toBe(true);
    expect(matchesGlobs('/notes/todo.txt', ['*.md'])).toBe(false);
  });

  it('matches against the absolute path', () => {
    expect(matchesGlobs('/notes/work/todo.md', ['/notes/work/**'])).toBe(true);
  });

  it('matches against the path relative to a root', () => {
    expect(matchesGlobs('/root/docs/a/b.md', ['a/*.md'], '/root/docs')).toBe(true);
    expect(matchesGlobs('/root/docs/c/b.md', ['a/*.md'], '/root/docs')).toBe(false);
  });

  it('matches dot files', () => {
    expect(matchesGlobs('/notes/.hidden.md', ['*.md'])).toBe(true);
  });
});

describe('matchesExtension', () => {
  it('compares case-insensitively', () => {
    expect(matchesExtension('/a/B.MD', ['.md'])).toBe(true);
    expect(matchesExtension('/a/b.txt', ['.md'])).toBe(false);
    expect(matchesExtension('/a/b.txt', [])).toBe(true);
  });
});

describe('chunkFilter', () => {
  it('returns undefined when nothing is filtered', () => {
    expect(chunkFilter(undefined)).toBeUndefined();
    expect(chunkFilter({})).toBeUndefined();
  });

  it('combines glob, extension and since', () => {
    const filter = chunkFilter({ globs: ['/n/work/**'], extensions: ['md'], since: 100 });
    expect(filter?.({ path: '/n/work/a.md', mtime: 100 })).toBe(true);
    expect(filter?.({ path: '/n/work/a.md', mtime: 99 })).toBe(false);
    expect(filter?.({ path: '/n/work/a.txt', mtime: 200 })).toBe(false);
    expect(filter?.({ path: '/n/home/a.md', mtime: 200 })).toBe(false);
  });
});
