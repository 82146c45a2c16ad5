import type { SessionView } from '@/domain/playback/types';

export interface DisplayPort {
  render(view: SessionView): void;
  clear(): void;
}
