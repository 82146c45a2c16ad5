export const PLAYBACK_ACTIONS = ['play/pause', 'skip', 'toggle favourite', 'quit'] as const;

export type PlaybackAction = (typeof PLAYBACK_ACTIONS)[number];

export type Keymap = Record<string, PlaybackAction>;

export type PlaybackStatus = 'playing' | 'paused';

/**
 * Everything a display needs to draw one frame of the player.
 */
export interface SessionView {
  status: PlaybackStatus;
  elapsed: number;
  duration: number;
  path: string;
  title?: string;
  genre?: string;
  artist?: string;
  album?: string;
  favourite: boolean;
  playCount: number;
  message?: string;
  /** One-line summary of the key bindings. */
  help?: string;
}
