import path from 'node:path';
import type { TrackMetadata } from '../../src/domain/library/types';
import type { MetadataPort } from '../../src/ports/MetadataPort';

/**
 * Metadata keyed by file name; unknown files have no tags and no duration.
 */
export class FakeMetadata implements MetadataPort {
  constructor(
    private readonly byName: Record<string, TrackMetadata>,
    private readonly formats = ['mp3', 'flac', 'ogg'],
  ) {}

  public async probe(filePath: string): Promise<TrackMetadata> {
    return this.byName[path.basename(filePath)] ?? {};
  }

  public async supportedFormats(): Promise<Set<string>> {
    return new Set(this.formats);
  }
}
