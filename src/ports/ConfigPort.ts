import type { PlayerConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<PlayerConfig>;
}

export type { PlayerConfig };
