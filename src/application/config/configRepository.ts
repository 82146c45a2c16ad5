import path from 'node:path';
import { z } from 'zod';
import type { PlayerConfig } from '@/domain/config/types';
import { ConfigError } from '@/domain/errors';
import { PLAYBACK_ACTIONS } from '@/domain/playback/types';
import type { StoragePort } from '@/ports/StoragePort';
import { DEFAULT_KEYMAP } from '@/application/playback/keymap';

export const CONFIG_FILE = 'config.json';

const playerConfigSchema = z.object({
  controls: z
    .record(z.string().min(1), z.enum(PLAYBACK_ACTIONS))
    .default(() => ({ ...DEFAULT_KEYMAP }))
    .refine((controls) => Object.values(controls).includes('quit'), {
      message: 'at least one key must be bound to "quit"',
    }),
  binaries: z
    .object({
      ffplay: z.string().min(1).default('ffplay'),
      ffmpeg: z.string().min(1).default('ffmpeg'),
    })
    .default({}),
  progressIntervalMs: z.number().int().min(50).max(10_000).default(1000),
});

export function defaultPlayerConfig(): PlayerConfig {
  return {
    controls: { ...DEFAULT_KEYMAP },
    binaries: { ffplay: 'ffplay', ffmpeg: 'ffmpeg' },
    progressIntervalMs: 1000,
  };
}

/**
 * Player settings stored as JSON in the data directory. A missing file is
 * created with the defaults; an unparsable one is ignored in favour of them.
 */
export class ConfigRepository {
  private readonly configPath: string;

  constructor(
    private readonly storage: StoragePort,
    dataDir: string,
  ) {
    this.configPath = path.join(dataDir, CONFIG_FILE);
  }

  public async load(): Promise<PlayerConfig> {
    const raw = await this.storage.readJson<unknown>(this.configPath, defaultPlayerConfig(), {
      writeIfMissing: true,
    });
    return parsePlayerConfig(raw, this.configPath);
  }
}

export function parsePlayerConfig(raw: unknown, source = CONFIG_FILE): PlayerConfig {
  const result = playerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}
