import type { SessionView } from '@/domain/playback/types';
import { formatTime } from '@/shared/time/formatTime';
import { elapsedSeconds, type SessionState } from '@/application/playback/sessionState';

export function buildSessionView(
  state: SessionState,
  now: number,
  help?: string,
): SessionView | null {
  const track = state.currentTrack;
  if (!track) {
    return null;
  }
  return {
    status: state.paused ? 'paused' : 'playing',
    elapsed: state.paused ? state.timeElapsed : elapsedSeconds(state, now),
    duration: track.duration,
    path: track.path,
    title: track.title,
    genre: track.genre,
    artist: track.artist,
    album: track.album,
    favourite: state.currentFavourite,
    playCount: state.currentListenCount,
    message: state.message,
    help,
  };
}

/**
 * `|====>    |` sized to the terminal: `width - 4` cells between the bars.
 */
export function progressBar(elapsed: number, duration: number, width: number): string {
  const barLen = Math.max(1, width - 4);
  const ratio = duration > 0 ? elapsed / duration : 0;
  const prog = Math.min(barLen - 1, Math.max(0, Math.floor(barLen * ratio) - 1));
  return `|${'='.repeat(prog)}>${' '.repeat(barLen - prog - 1)}|`;
}

export function metadataLines(view: SessionView): string[] {
  const fields: Array<[string, string | undefined]> = [
    ['Title', view.title ?? view.path],
    ['Genre', view.genre],
    ['Artist', view.artist],
    ['Album', view.album],
    ['Length', formatTime(view.duration)],
  ];
  return fields.filter(([, value]) => value).map(([label, value]) => `${label}: ${value}`);
}

export function renderLines(view: SessionView, width: number): string[] {
  const lines = [
    view.status === 'paused' ? '[paused]' : '[playing]',
    `${formatTime(view.elapsed)}/${formatTime(view.duration)}`,
    progressBar(view.elapsed, view.duration, width),
    ...metadataLines(view),
    `Favourite: ${view.favourite ? 'yes' : 'no'}`,
    `Play count: ${view.playCount}`,
  ];
  if (view.message) {
    lines.push(`! ${view.message}`);
  }
  if (view.help) {
    lines.push('', view.help);
  }
  return lines;
}
