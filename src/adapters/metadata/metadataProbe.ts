import * as mm from 'music-metadata';
import type { TrackMetadata } from '@/domain/library/types';
import type { BinariesConfig } from '@/domain/config/types';
import type { MetadataPort } from '@/ports/MetadataPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { runCapture } from '@/shared/utils/process';
import {
  parseDemuxerFormats,
  parseDurationFromDiagnostics,
} from '@/adapters/metadata/ffmpegOutput';

/** Used when `ffplay -formats` cannot be run. */
export const FALLBACK_FORMATS: readonly string[] = [
  'aac', 'aiff', 'ape', 'flac', 'm4a', 'mp3', 'mp4', 'oga', 'ogg', 'opus', 'wav', 'wv',
];

type TagReader = (filePath: string) => Promise<TrackMetadata>;
type DiagnosticsReader = (filePath: string) => Promise<string>;

/**
 * Reads tags with music-metadata and, when the container does not report a
 * duration, falls back to parsing ffmpeg's diagnostic output.
 */
export class FfmpegMetadataProbe implements MetadataPort {
  private readonly log = createLogger('Library', 'Probe');
  private formats: Set<string> | null = null;

  constructor(
    private readonly binaries: BinariesConfig,
    private readonly readTags: TagReader = readTagsWithMusicMetadata,
    private readonly readDiagnostics: DiagnosticsReader = (filePath) =>
      runCapture(binaries.ffmpeg, ['-hide_banner', '-i', filePath]).then((out) => out.stderr),
  ) {}

  public async probe(filePath: string): Promise<TrackMetadata> {
    const tags = await bestEffort(() => this.readTags(filePath), {
      fallback: {},
      onError: 'debug',
      log: this.log,
      label: 'tag read failed',
      context: { filePath },
    });
    if (tags.duration !== undefined && tags.duration > 0) {
      return tags;
    }
    const stderr = await bestEffort(() => this.readDiagnostics(filePath), {
      fallback: '',
      onError: 'warn',
      log: this.log,
      label: 'ffmpeg duration probe failed',
      context: { filePath, ffmpeg: this.binaries.ffmpeg },
    });
    const duration = parseDurationFromDiagnostics(stderr);
    return { ...tags, duration: duration !== undefined && duration > 0 ? duration : undefined };
  }

  public async supportedFormats(): Promise<Set<string>> {
    if (this.formats) {
      return this.formats;
    }
    const output = await bestEffort(
      () => runCapture(this.binaries.ffplay, ['-hide_banner', '-formats']).then((out) => out.stdout),
      {
        fallback: '',
        onError: 'warn',
        log: this.log,
        label: 'ffplay format listing failed',
        context: { ffplay: this.binaries.ffplay },
      },
    );
    const parsed = parseDemuxerFormats(output);
    this.formats = parsed.size > 0 ? parsed : new Set(FALLBACK_FORMATS);
    this.log.debug('supported formats resolved', { count: this.formats.size });
    return this.formats;
  }
}

export async function readTagsWithMusicMetadata(filePath: string): Promise<TrackMetadata> {
  const metadata = await mm.parseFile(filePath);
  return {
    title: tagToString(metadata.common.title),
    genre: tagToString(metadata.common.genre),
    artist: tagToString(metadata.common.artist),
    album: tagToString(metadata.common.album),
    duration: metadata.format.duration,
  };
}

/**
 * Single tags are trimmed, multi-valued tags joined with commas; blank
 * values become absent.
 */
export function tagToString(tag: string | string[] | undefined): string | undefined {
  if (tag === undefined) {
    return undefined;
  }
  const value = (Array.isArray(tag) ? tag.join(',') : tag).trim();
  return value || undefined;
}
