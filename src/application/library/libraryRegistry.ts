import path from 'node:path';
import { ConfigError, LibraryNotFoundError } from '@/domain/errors';
import type { StoragePort } from '@/ports/StoragePort';

const DB_SUFFIX = '.db';
const SIDE_FILES = ['-wal', '-shm'];
const NAME_PATTERN = /^[\w][\w .-]*$/;

/**
 * Named libraries stored as `<dataDir>/<name>.db`.
 */
export class LibraryRegistry {
  constructor(
    private readonly dataDir: string,
    private readonly storage: StoragePort,
  ) {}

  public databasePath(name: string): string {
    assertLibraryName(name);
    return path.join(this.dataDir, `${name}${DB_SUFFIX}`);
  }

  public async list(): Promise<string[]> {
    const entries = await this.storage.list(this.dataDir);
    return entries
      .filter((entry) => entry.endsWith(DB_SUFFIX) && entry.length > DB_SUFFIX.length)
      .map((entry) => entry.slice(0, -DB_SUFFIX.length))
      .sort((left, right) => left.localeCompare(right));
  }

  public async exists(name: string): Promise<boolean> {
    assertLibraryName(name);
    return (await this.list()).includes(name);
  }

  public async remove(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new LibraryNotFoundError(name);
    }
    const dbPath = this.databasePath(name);
    await this.storage.remove(dbPath);
    for (const suffix of SIDE_FILES) {
      await this.storage.remove(`${dbPath}${suffix}`);
    }
  }
}

export function assertLibraryName(name: string): void {
  if (!NAME_PATTERN.test(name) || name.includes('..')) {
    throw new ConfigError(`"${name}" is not a valid library name`);
  }
}
