/**
 * Treat `sift <query words>` as `sift search <query words>`. Leaves the
 * arguments alone when the first one is a known command or an option.
 */
export function rewriteBareQuery(argv: string[], commands: readonly string[]): string[] {
  const first = argv[2];
  if (first === undefined || first.startsWith('-') || commands.includes(first) || first === 'help') {
    return argv;
  }
  return [...argv.slice(0, 2), 'search', ...argv.slice(2)];
}

/** Commander option reducer for repeatable and comma-separated values. */
export function collect(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean),
  ];
}

export function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}
