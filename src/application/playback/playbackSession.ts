import type { Keymap } from '@/domain/playback/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { DisplayPort } from '@/ports/DisplayPort';
import type { InputPort } from '@/ports/InputPort';
import type { PlayerHandle, PlayerPort } from '@/ports/PlayerPort';
import { createLogger, errorMessage, type Log } from '@/shared/logging/logger';
import { CommandDispatcher } from '@/application/playback/commandDispatcher';
import { describeKeymap } from '@/application/playback/keymap';
import { withPlayback } from '@/application/playback/playbackScope';
import { ProgressClock, DEFAULT_PROGRESS_INTERVAL_MS } from '@/application/playback/progressClock';
import type { AdvanceReason, SessionContext } from '@/application/playback/sessionContext';
import {
  ActivitySignal,
  SessionLock,
  createSessionState,
  elapsedSeconds,
  resetForTrack,
  type SessionState,
} from '@/application/playback/sessionState';
import { buildSessionView } from '@/application/playback/sessionView';
import { TrackSelector } from '@/application/playback/trackSelector';

export interface PlaybackSessionDeps {
  /** Connection used for selection (listen-count increments). */
  catalog: Pick<CatalogPort, 'selectLeastPlayed' | 'peekLeastPlayed'>;
  /** Separate connection used by the command loop for favourite writes. */
  favourites: Pick<CatalogPort, 'setFavourite'>;
  player: PlayerPort;
  display: DisplayPort;
  input: InputPort;
  clock: ClockPort;
  keymap: Keymap;
  progressIntervalMs?: number;
  log?: Log;
}

export interface SessionSnapshot {
  path: string | null;
  favourite: boolean;
  listenCount: number;
  elapsed: number;
  paused: boolean;
  stopped: boolean;
}

/**
 * One continuous run of the player: select, play, wait, repeat until quit.
 * The command loop and the progress clock run alongside the main loop and
 * every transition goes through the same lock.
 */
export class PlaybackSession implements SessionContext {
  public readonly state: SessionState = createSessionState();
  public readonly lock = new SessionLock();
  public readonly signal = new ActivitySignal();
  public readonly clock: ClockPort;

  private readonly log: Log;
  private readonly selector: TrackSelector;
  private readonly dispatcher: CommandDispatcher;
  private readonly progress: ProgressClock;
  private readonly help: string;
  private running = false;
  private actorFailure: unknown = null;

  constructor(private readonly deps: PlaybackSessionDeps) {
    this.clock = deps.clock;
    this.log = deps.log ?? createLogger('Playback', 'Session');
    this.selector = new TrackSelector(deps.catalog);
    this.dispatcher = new CommandDispatcher(this, deps.input, deps.keymap, deps.favourites);
    this.progress = new ProgressClock(this, deps.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS);
    this.help = describeKeymap(deps.keymap);
  }

  /**
   * Runs until quit or a fatal error (empty catalogue, player launch
   * failure). Both actors have finished by the time this settles.
   */
  public async run(): Promise<void> {
    if (this.running) {
      throw new Error('playback session already running');
    }
    this.running = true;
    this.log.info('session started');
    const actors = [
      this.watchActor('commands', this.dispatcher.run()),
      this.watchActor('progress', this.progress.run()),
    ];
    try {
      while (!this.state.stopped) {
        const played = await withPlayback(
          () => this.lock.run(() => this.startNext()),
          (handle) => handle.waitForExit(),
        );
        if (!played) {
          break;
        }
      }
    } finally {
      await this.quit();
      this.deps.input.close();
      await Promise.all(actors);
      this.deps.display.clear();
      this.log.info('session ended');
    }
    if (this.actorFailure) {
      throw this.actorFailure;
    }
  }

  /**
   * Ends the session from outside the command loop (signal handlers).
   */
  public quit(): Promise<void> {
    return this.lock.run(() => this.stop());
  }

  public snapshot(): Promise<SessionSnapshot> {
    return this.lock.run(() => ({
      path: this.state.currentTrack?.path ?? null,
      favourite: this.state.currentFavourite,
      listenCount: this.state.currentListenCount,
      elapsed: this.state.paused
        ? this.state.timeElapsed
        : elapsedSeconds(this.state, this.clock.now()),
      paused: this.state.paused,
      stopped: this.state.stopped,
    }));
  }

  public render(): void {
    const view = buildSessionView(this.state, this.clock.now(), this.help);
    if (view) {
      this.deps.display.render(view);
    }
  }

  public advance(reason: AdvanceReason): void {
    const { handle, currentTrack } = this.state;
    if (!handle || handle.state === 'stopped') {
      return;
    }
    this.log.info(reason === 'auto' ? 'advancing to next track' : 'skipping track', {
      path: currentTrack?.path,
    });
    handle.stop();
  }

  public stop(): void {
    if (!this.state.stopped) {
      this.state.stopped = true;
      this.log.debug('session stopping');
    }
    this.state.handle?.stop();
    this.signal.notifyAll();
  }

  private async startNext(): Promise<PlayerHandle | null> {
    if (this.state.stopped) {
      return null;
    }
    const selection = this.selector.next();
    resetForTrack(this.state, selection);
    if (selection.notice) {
      this.state.message = selection.notice;
    }
    this.render();
    const handle = await this.deps.player.start(selection.track);
    this.state.handle = handle;
    this.state.resumedAt = this.clock.now();
    this.signal.notifyAll();
    this.log.info('now playing', {
      path: selection.track.path,
      listenCount: this.state.currentListenCount,
      favourite: this.state.currentFavourite,
    });
    return handle;
  }

  private watchActor(name: string, actor: Promise<void>): Promise<void> {
    return actor.catch((error: unknown) => {
      this.log.error('session actor failed', { actor: name, message: errorMessage(error) });
      this.actorFailure ??= error;
      return this.quit();
    });
  }
}
