import type {
  CatalogueStats,
  TrackSelection,
  TrackUpsert,
} from '@/domain/library/types';

/**
 * Persistence gateway for one library's catalogue.
 */
export interface CatalogPort {
  /**
   * Picks uniformly at random among the least-played tracks and increments
   * that track's listen count, atomically. Throws EmptyCatalogueError when
   * there is nothing to pick.
   */
  selectLeastPlayed(): TrackSelection;
  /** Same pick as selectLeastPlayed, without the increment. */
  peekLeastPlayed(): TrackSelection;
  setFavourite(path: string, value: boolean): boolean;
  upsertTrack(record: TrackUpsert): void;
  deleteMissing(knownPaths: Iterable<string>): number;
  getStats(): CatalogueStats;
  close(): void;
}
