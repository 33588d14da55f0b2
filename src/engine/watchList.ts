import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

/**
 * Ordered set of watched directories, one absolute path per line.
 * Loaded at command start, saved at command end.
 */
export class WatchList {
  private dirs: string[];

  private constructor(
    readonly filePath: string,
    dirs: string[],
  ) {
    this.dirs = dirs;
  }

  static async load(filePath: string): Promise<WatchList> {
    let raw = '';
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    const dirs: string[] = [];
    for (const line of raw.split('\n')) {
      const dir = line.trim();
      if (dir && !dirs.includes(dir)) dirs.push(dir);
    }
    return new WatchList(filePath, dirs);
  }

  list(): string[] {
    return [...this.dirs];
  }

  has(directory: string): boolean {
    return this.dirs.includes(resolve(directory));
  }

  /** Returns false when the directory was already watched. */
  add(directory: string): boolean {
    const dir = resolve(directory);
    if (this.dirs.includes(dir)) return false;
    this.dirs.push(dir);
    return true;
  }

  /** Returns false when the directory was not watched. */
  remove(directory: string): boolean {
    const dir = resolve(directory);
    const before = this.dirs.length;
    this.dirs = this.dirs.filter((d) => d !== dir);
    return this.dirs.length !== before;
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, this.dirs.length > 0 ? this.dirs.join('\n') + '\n' : '');
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
