import type { Keymap } from '@/domain/playback/types';

export interface BinariesConfig {
  ffplay: string;
  ffmpeg: string;
}

/**
 * Persisted player settings (`<dataDir>/config.json`).
 */
export interface PlayerConfig {
  controls: Keymap;
  binaries: BinariesConfig;
  progressIntervalMs: number;
}
