import type { ClockPort } from '@/ports/ClockPort';
import type { ActivitySignal, SessionLock, SessionState } from '@/application/playback/sessionState';

export type AdvanceReason = 'skip' | 'auto';

/**
 * What the concurrent actors share with the session. The three operations
 * must only be called from inside `lock.run()`.
 */
export interface SessionContext {
  readonly state: SessionState;
  readonly lock: SessionLock;
  readonly signal: ActivitySignal;
  readonly clock: ClockPort;
  render(): void;
  /** Stops the current player so the main loop moves on to the next track. */
  advance(reason: AdvanceReason): void;
  /** Marks the session stopped, stops the player and wakes every waiter. */
  stop(): void;
}
