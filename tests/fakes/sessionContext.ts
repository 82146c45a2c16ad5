import type { TrackSelection } from '../../src/domain/library/types';
import type { AdvanceReason, SessionContext } from '../../src/application/playback/sessionContext';
import {
  ActivitySignal,
  SessionLock,
  createSessionState,
  resetForTrack,
} from '../../src/application/playback/sessionState';
import { FakePlayerHandle } from './playerPort';
import { ManualClock } from './terminal';
import { makeTrack } from './catalogPort';

/**
 * Session context that records what the actors asked of it instead of
 * driving a player.
 */
export class RecordingContext implements SessionContext {
  public readonly state = createSessionState();
  public readonly lock = new SessionLock();
  public readonly signal = new ActivitySignal();
  public renders = 0;
  public stops = 0;
  public readonly advances: AdvanceReason[] = [];

  constructor(public readonly clock = new ManualClock()) {}

  public render(): void {
    this.renders += 1;
  }

  public advance(reason: AdvanceReason): void {
    this.advances.push(reason);
  }

  public stop(): void {
    this.stops += 1;
    this.state.stopped = true;
    this.state.handle?.stop();
    this.signal.notifyAll();
  }

  /** Makes `path` the current, playing track as of the clock's now. */
  public play(path: string, duration = 180, listenCountBefore = 0): FakePlayerHandle {
    const selection: TrackSelection = {
      track: makeTrack(path, { duration, listenCount: listenCountBefore }),
      favourite: false,
      listenCountBefore,
    };
    resetForTrack(this.state, selection);
    const handle = new FakePlayerHandle(path);
    this.state.handle = handle;
    this.state.resumedAt = this.clock.now();
    this.signal.notifyAll();
    return handle;
  }
}
