import { promises as fs } from 'node:fs';
import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson<T>(
    filePath: string,
    fallback: T,
    options?: StorageReadOptions,
  ): Promise<T> {
    if (!(await exists(filePath))) {
      if (options?.writeIfMissing) {
        await writeJson(filePath, fallback);
      }
      return fallback;
    }
    const data = await readJson<T>(filePath);
    return data === undefined ? fallback : data;
  }

  public async list(dirPath: string): Promise<string[]> {
    try {
      return await fs.readdir(dirPath);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
  }

  public async remove(filePath: string): Promise<boolean> {
    if (!(await exists(filePath))) {
      return false;
    }
    await fs.rm(filePath, { force: true });
    return true;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
