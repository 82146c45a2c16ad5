import { EventEmitter, once } from 'node:events';
import PQueue from 'p-queue';
import type { TrackRecord, TrackSelection } from '@/domain/library/types';
import type { PlayerHandle } from '@/ports/PlayerPort';

/**
 * Mutable state shared by the main loop, the command loop and the progress
 * clock. Only touched inside SessionLock.run().
 */
export interface SessionState {
  currentTrack: TrackRecord | null;
  currentFavourite: boolean;
  /** Listen count of the current track as stored after its selection. */
  currentListenCount: number;
  handle: PlayerHandle | null;
  /** Seconds played, as of the last recomputation. */
  timeElapsed: number;
  /** Seconds accumulated before the latest resume. */
  elapsedBeforeResume: number;
  /** Clock reading (ms) of the latest start or resume; null while paused. */
  resumedAt: number | null;
  paused: boolean;
  stopped: boolean;
  advanceRequested: boolean;
  message?: string;
}

export function createSessionState(): SessionState {
  return {
    currentTrack: null,
    currentFavourite: false,
    currentListenCount: 0,
    handle: null,
    timeElapsed: 0,
    elapsedBeforeResume: 0,
    resumedAt: null,
    paused: false,
    stopped: false,
    advanceRequested: false,
  };
}

export function resetForTrack(state: SessionState, selection: TrackSelection): void {
  state.currentTrack = selection.track;
  state.currentFavourite = selection.favourite;
  state.currentListenCount = selection.listenCountBefore + 1;
  state.handle = null;
  state.timeElapsed = 0;
  state.elapsedBeforeResume = 0;
  state.resumedAt = null;
  state.paused = false;
  state.advanceRequested = false;
  state.message = undefined;
}

/**
 * Wall-clock elapsed time: the accumulated seconds plus the time since the
 * last resume. Paused time never counts.
 */
export function elapsedSeconds(state: SessionState, now: number): number {
  if (state.resumedAt === null) {
    return state.elapsedBeforeResume;
  }
  return state.elapsedBeforeResume + Math.max(0, now - state.resumedAt) / 1000;
}

export function markResumed(state: SessionState, now: number): void {
  state.paused = false;
  state.resumedAt = now;
}

export function markPaused(state: SessionState, now: number): void {
  state.elapsedBeforeResume = elapsedSeconds(state, now);
  state.timeElapsed = state.elapsedBeforeResume;
  state.resumedAt = null;
  state.paused = true;
}

/**
 * A track is current, its player is running and it is not paused.
 */
export function isActive(state: SessionState): boolean {
  return (
    !state.stopped &&
    state.currentTrack !== null &&
    !state.paused &&
    state.handle !== null &&
    state.handle.state === 'playing'
  );
}

/**
 * Mutual exclusion for session transitions: tasks run one at a time in
 * submission order. Tasks must not call run() themselves.
 */
export class SessionLock {
  private readonly queue = new PQueue({ concurrency: 1 });

  public run<T>(task: () => T | Promise<T>): Promise<T> {
    return this.queue.add<T>(async (): Promise<T> => task());
  }

  public get pending(): number {
    return this.queue.size + this.queue.pending;
  }
}

/**
 * Condition signal paired with SessionLock. Waiters re-check their
 * predicate on every notification.
 */
export class ActivitySignal {
  private readonly emitter = new EventEmitter();

  public notifyAll(): void {
    this.emitter.emit('notify');
  }

  public async waitFor(predicate: () => boolean): Promise<void> {
    while (!predicate()) {
      await once(this.emitter, 'notify');
    }
  }

  public get waiters(): number {
    return this.emitter.listenerCount('notify');
  }
}
