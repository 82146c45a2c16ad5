import type { TrackMetadata } from '@/domain/library/types';

export interface MetadataPort {
  /** Never throws for unreadable or untagged files; missing fields stay absent. */
  probe(filePath: string): Promise<TrackMetadata>;
  /** Lower-cased extensions the player can decode. */
  supportedFormats(): Promise<Set<string>>;
}
