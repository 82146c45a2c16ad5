import type { Dirent } from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { EmptyLibraryError } from '@/domain/errors';
import type { LibraryUpdateResult } from '@/domain/library/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import type { MetadataPort } from '@/ports/MetadataPort';
import { createLogger, type Log } from '@/shared/logging/logger';

/**
 * Indexes a music directory into a catalogue: files the player cannot
 * decode and files without a duration are left out.
 */
export class LibraryService {
  constructor(
    private readonly catalog: Pick<CatalogPort, 'upsertTrack' | 'deleteMissing'>,
    private readonly metadata: MetadataPort,
    private readonly log: Log = createLogger('Library', 'Update'),
  ) {}

  public async update(root: string): Promise<LibraryUpdateResult> {
    const formats = await this.metadata.supportedFormats();
    const files = await scanAudioFiles(path.resolve(root), formats);
    if (files.length === 0) {
      throw new EmptyLibraryError(root);
    }
    const removed = this.catalog.deleteMissing(files);
    let stored = 0;
    let skipped = 0;
    for (const filePath of files) {
      const tags = await this.metadata.probe(filePath);
      if (tags.duration === undefined || !(tags.duration > 0)) {
        skipped += 1;
        this.log.debug('skipping file without duration', { path: filePath });
      } else {
        this.catalog.upsertTrack({
          path: filePath,
          title: tags.title,
          genre: tags.genre,
          artist: tags.artist,
          album: tags.album,
          duration: tags.duration,
        });
        stored += 1;
      }
    }
    const result: LibraryUpdateResult = { found: files.length, stored, skipped, removed };
    this.log.info('library update complete', { root, ...result });
    return result;
  }
}

/**
 * Absolute paths of every file under `root` whose extension is in
 * `formats`, sorted.
 */
export async function scanAudioFiles(root: string, formats: Set<string>): Promise<string[]> {
  const found: string[] = [];
  await walk(path.resolve(root), formats, found);
  return found.sort();
}

async function walk(dir: string, formats: Set<string>, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, formats, found);
      continue;
    }
    if (entry.isFile() && formats.has(extensionOf(entry.name))) {
      found.push(fullPath);
    }
  }
}

function extensionOf(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}
