/**
 * Tag and duration data read from an audio file.
 */
export interface TrackMetadata {
  title?: string;
  genre?: string;
  artist?: string;
  album?: string;
  duration?: number;
}

/**
 * One catalogue row. `duration` is always present: files without a
 * determinable duration are never stored.
 */
export interface TrackRecord {
  path: string;
  title?: string;
  genre?: string;
  artist?: string;
  album?: string;
  duration: number;
  favourite: boolean;
  listenCount: number;
}

export type TrackUpsert = Omit<TrackRecord, 'favourite' | 'listenCount'>;

/**
 * Result of a selection: the row as it was before its listen count was
 * incremented.
 */
export interface TrackSelection {
  track: TrackRecord;
  favourite: boolean;
  listenCountBefore: number;
}

export interface CatalogueStats {
  tracks: number;
  favourites: number;
  minListenCount: number;
  maxListenCount: number;
}

export interface LibraryUpdateResult {
  found: number;
  stored: number;
  skipped: number;
  removed: number;
}
