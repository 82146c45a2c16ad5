import { setTimeout as delay } from 'node:timers/promises';
import { createLogger, type Log } from '@/shared/logging/logger';
import { elapsedSeconds, isActive } from '@/application/playback/sessionState';
import type { SessionContext } from '@/application/playback/sessionContext';

export const DEFAULT_PROGRESS_INTERVAL_MS = 1000;

/**
 * Refreshes elapsed time once per interval while a track is playing and
 * advances to the next track once the current one has run past its duration.
 */
export class ProgressClock {
  constructor(
    private readonly ctx: SessionContext,
    private readonly intervalMs = DEFAULT_PROGRESS_INTERVAL_MS,
    private readonly log: Log = createLogger('Playback', 'Progress'),
  ) {}

  public async run(): Promise<void> {
    const { state, signal } = this.ctx;
    while (true) {
      await signal.waitFor(() => state.stopped || isActive(state));
      const running = await this.ctx.lock.run(() => this.tick());
      if (!running) {
        this.log.debug('progress clock stopped');
        return;
      }
      await delay(this.intervalMs);
    }
  }

  /**
   * One refresh. Returns false once the session has stopped.
   */
  public tick(): boolean {
    const { state } = this.ctx;
    if (state.stopped) {
      return false;
    }
    const track = state.currentTrack;
    if (!track || !isActive(state)) {
      return true;
    }
    state.timeElapsed = elapsedSeconds(state, this.ctx.clock.now());
    this.ctx.render();
    if (state.timeElapsed > track.duration && !state.advanceRequested) {
      state.advanceRequested = true;
      this.log.info('track duration reached', {
        path: track.path,
        elapsed: Number(state.timeElapsed.toFixed(3)),
        duration: track.duration,
      });
      this.ctx.advance('auto');
    }
    return true;
  }
}
