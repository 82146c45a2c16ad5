import type { PlayerHandle } from '@/ports/PlayerPort';

/**
 * Scoped acquisition of a player process: whatever `use` does, the handle is
 * stopped before this settles. Resolves false when `acquire` yielded no
 * handle (the session was already stopping).
 */
export async function withPlayback(
  acquire: () => Promise<PlayerHandle | null>,
  use: (handle: PlayerHandle) => Promise<void>,
): Promise<boolean> {
  const handle = await acquire();
  if (!handle) {
    return false;
  }
  try {
    await use(handle);
  } finally {
    handle.stop();
  }
  return true;
}
