import type { Keymap, PlaybackAction } from '@/domain/playback/types';

export const DEFAULT_KEYMAP: Keymap = {
  space: 'play/pause',
  p: 'play/pause',
  n: 'skip',
  right: 'skip',
  f: 'toggle favourite',
  q: 'quit',
};

export function resolveAction(keymap: Keymap, key: string): PlaybackAction | undefined {
  return Object.prototype.hasOwnProperty.call(keymap, key) ? keymap[key] : undefined;
}

/**
 * Human-readable `key: action` pairs, grouped by action, for the help line.
 */
export function describeKeymap(keymap: Keymap): string {
  const byAction = new Map<PlaybackAction, string[]>();
  for (const [key, action] of Object.entries(keymap)) {
    byAction.set(action, [...(byAction.get(action) ?? []), key]);
  }
  return [...byAction.entries()].map(([action, keys]) => `${keys.join('/')}: ${action}`).join('  ');
}
