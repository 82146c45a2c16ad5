/**
 * Extracts the duration in seconds from `ffmpeg -i` diagnostics, e.g.
 * `  Duration: 00:03:25.51, start: 0.025057, bitrate: 320 kb/s`.
 * Only the first duration line is considered; `N/A` or a malformed value
 * yields undefined.
 */
export function parseDurationFromDiagnostics(stderr: string): number | undefined {
  for (const raw of stderr.split(/\r?\n/)) {
    const line = raw.trim().toLowerCase();
    if (!line.startsWith('duration')) {
      continue;
    }
    const token = line.split(/\s+/)[1]?.replace(/,$/, '');
    return token ? parseClockTime(token) : undefined;
  }
  return undefined;
}

/**
 * Parses `HH:MM:SS[.fraction]` into seconds.
 */
export function parseClockTime(value: string): number | undefined {
  const match = /^(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/.exec(value);
  if (!match) {
    return undefined;
  }
  const [, hours, minutes, seconds] = match;
  return 60 * 60 * Number(hours) + 60 * Number(minutes) + Number(seconds);
}

/**
 * Collects demuxer names from `ffplay -formats`. Lines look like
 * ` D  flac            raw FLAC` or ` D  mov,mp4,m4a,3gp,3g2,mj2 QuickTime / MOV`.
 */
export function parseDemuxerFormats(stdout: string): Set<string> {
  const formats = new Set<string>();
  for (const raw of stdout.split(/\r?\n/)) {
    const parts = raw.trim().split(/\s+/);
    if (parts.length < 3 || !parts[0].startsWith('D')) {
      continue;
    }
    for (const name of parts[1].split(',')) {
      if (/^[a-z0-9_]+$/i.test(name)) {
        formats.add(name.toLowerCase());
      }
    }
  }
  return formats;
}
