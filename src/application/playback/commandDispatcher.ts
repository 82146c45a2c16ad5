import type { Keymap, PlaybackAction } from '@/domain/playback/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import type { InputPort } from '@/ports/InputPort';
import { createLogger, errorMessage, type Log } from '@/shared/logging/logger';
import { markPaused, markResumed } from '@/application/playback/sessionState';
import type { SessionContext } from '@/application/playback/sessionContext';
import { resolveAction } from '@/application/playback/keymap';

/**
 * Turns key presses into session transitions, one command at a time.
 * Closed input is treated as quit.
 */
export class CommandDispatcher {
  constructor(
    private readonly ctx: SessionContext,
    private readonly input: InputPort,
    private readonly keymap: Keymap,
    private readonly favourites: Pick<CatalogPort, 'setFavourite'>,
    private readonly log: Log = createLogger('Playback', 'Commands'),
  ) {}

  public async run(): Promise<void> {
    while (true) {
      const key = await this.input.nextKey();
      const action = key === null ? 'quit' : resolveAction(this.keymap, key);
      if (!action) {
        continue;
      }
      const finished = await this.ctx.lock.run(() => this.apply(action));
      if (finished) {
        this.log.debug('command loop finished');
        return;
      }
    }
  }

  /**
   * Applies one action. Returns true when the command loop should end.
   */
  public apply(action: PlaybackAction): boolean {
    const { state } = this.ctx;
    if (state.stopped) {
      return true;
    }
    if (action === 'quit') {
      this.log.info('quit requested');
      this.ctx.stop();
      return true;
    }
    if (!state.currentTrack) {
      return false;
    }
    switch (action) {
      case 'play/pause':
        this.togglePause();
        break;
      case 'skip':
        this.ctx.advance('skip');
        break;
      case 'toggle favourite':
        this.toggleFavourite();
        break;
    }
    return false;
  }

  private togglePause(): void {
    const { state, clock } = this.ctx;
    const handle = state.handle;
    if (!handle) {
      return;
    }
    if (state.paused) {
      if (handle.resume()) {
        markResumed(state, clock.now());
        this.ctx.signal.notifyAll();
      }
    } else if (handle.pause()) {
      markPaused(state, clock.now());
    }
    this.ctx.render();
  }

  private toggleFavourite(): void {
    const { state } = this.ctx;
    const track = state.currentTrack;
    if (!track) {
      return;
    }
    const next = !state.currentFavourite;
    state.currentFavourite = next;
    try {
      if (this.favourites.setFavourite(track.path, next)) {
        state.message = undefined;
      } else {
        this.log.warn('favourite target missing from catalogue', { path: track.path });
        state.message = 'favourite not saved: track no longer in library';
      }
    } catch (error) {
      this.log.warn('favourite update failed', { path: track.path, message: errorMessage(error) });
      state.message = `favourite not saved: ${errorMessage(error)}`;
    }
    this.ctx.render();
  }
}
