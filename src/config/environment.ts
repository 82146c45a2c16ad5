import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@/domain/errors';
import { LOG_LEVELS, type LogLevel } from '@/types/logLevel';
import { expandHome } from '@/shared/utils/file';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  logLevel: LogLevel;
  logJson: boolean;
  dataDir: string;
}

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.playroll');

const environmentSchema = z.object({
  PLAYROLL_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PLAYROLL_LOG_JSON: z
    .enum(['0', '1', 'true', 'false'])
    .default('false')
    .transform((value) => value === '1' || value === 'true'),
  PLAYROLL_DATA_DIR: z.string().min(1).optional(),
});

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid environment: ${issues}`);
  }
  const parsed = result.data;
  return {
    logLevel: parsed.PLAYROLL_LOG_LEVEL,
    logJson: parsed.PLAYROLL_LOG_JSON,
    dataDir: path.resolve(expandHome(parsed.PLAYROLL_DATA_DIR ?? DEFAULT_DATA_DIR)),
  };
}
