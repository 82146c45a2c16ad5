import type { TrackRecord } from '@/domain/library/types';

export type PlayerState = 'playing' | 'paused' | 'stopped';

/**
 * One running external player process, bound to a single track.
 */
export interface PlayerHandle {
  readonly path: string;
  readonly state: PlayerState;
  /** Returns false when the handle was not playing. */
  pause(): boolean;
  /** Returns false when the handle was not paused. */
  resume(): boolean;
  /** Terminates the process whatever its state. Idempotent. */
  stop(): void;
  /** Resolves once the process has exited, naturally or after stop(). */
  waitForExit(): Promise<void>;
}

export interface PlayerPort {
  /** Rejects with LaunchError when the player cannot be started. */
  start(track: TrackRecord): Promise<PlayerHandle>;
}
