import { EmptyCatalogueError } from '@/domain/errors';
import type { TrackSelection } from '@/domain/library/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import { createLogger, errorMessage, type Log } from '@/shared/logging/logger';

export interface SelectorResult extends TrackSelection {
  /** Set when the play could not be recorded in the catalogue. */
  notice?: string;
}

/**
 * Picks the next track, least-played first, and records that it started.
 */
export class TrackSelector {
  constructor(
    private readonly catalog: Pick<CatalogPort, 'selectLeastPlayed' | 'peekLeastPlayed'>,
    private readonly log: Log = createLogger('Playback', 'Selector'),
  ) {}

  public next(): SelectorResult {
    try {
      return this.catalog.selectLeastPlayed();
    } catch (error) {
      if (error instanceof EmptyCatalogueError) {
        throw error;
      }
      this.log.warn('listen count update failed; selecting without recording', {
        message: errorMessage(error),
      });
      return { ...this.catalog.peekLeastPlayed(), notice: 'play count not saved' };
    }
  }
}
