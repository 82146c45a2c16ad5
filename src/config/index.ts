import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { expandHome } from '@/shared/utils/file';
import path from 'node:path';

export interface AppConfig {
  env: EnvironmentConfig;
  dataDir: string;
  logFile: string;
}

/**
 * Environment plus the per-invocation data directory override.
 */
export const loadConfig = (overrides: { dataDir?: string } = {}, env?: NodeJS.ProcessEnv): AppConfig => {
  const environment = loadEnvironment(env);
  const dataDir = overrides.dataDir
    ? path.resolve(expandHome(overrides.dataDir))
    : environment.dataDir;
  return {
    env: environment,
    dataDir,
    logFile: path.join(dataDir, 'playroll.log'),
  };
};
