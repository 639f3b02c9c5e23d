import path from 'node:path';
import fs from 'fs-extra';

/**
 * Persisted set of identifiers for items that were already downloaded and tagged.
 * One identifier per line, compatible with yt-dlp's `--download-archive` files.
 *
 * A store is loaded fresh for every pass so manual edits made between watchdog
 * cycles are honored. Appends are written and fsynced before `append` returns.
 */
export class ArchiveStore {
  readonly filePath: string;
  private readonly ids: Set<string>;
  private endsWithNewline: boolean;

  private constructor(filePath: string, ids: Set<string>, endsWithNewline: boolean) {
    this.filePath = filePath;
    this.ids = ids;
    this.endsWithNewline = endsWithNewline;
  }

  /**
   * Reads the whole archive file. A missing file is an empty archive.
   */
  static async load(filePath: string): Promise<ArchiveStore> {
    if (!(await fs.pathExists(filePath))) {
      return new ArchiveStore(filePath, new Set(), true);
    }
    const raw = await fs.readFile(filePath, 'utf-8');
    const ids = new Set(
      raw
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
    return new ArchiveStore(filePath, ids, raw.length === 0 || raw.endsWith('\n'));
  }

  get size(): number {
    return this.ids.size;
  }

  contains(id: string): boolean {
    return this.ids.has(id.trim());
  }

  /**
   * Records an identifier. Returns false when it was already present.
   */
  append(id: string): boolean {
    const entry = id.trim();
    if (!entry) {
      throw new Error('Archive identifiers must not be blank');
    }
    if (this.ids.has(entry)) {
      return false;
    }

    fs.ensureDirSync(path.dirname(this.filePath));
    const line = `${this.endsWithNewline ? '' : '\n'}${entry}\n`;
    const fd = fs.openSync(this.filePath, 'a');
    try {
      fs.writeSync(fd, line);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    this.ids.add(entry);
    this.endsWithNewline = true;
    return true;
  }

  entries(): string[] {
    return [...this.ids];
  }
}
