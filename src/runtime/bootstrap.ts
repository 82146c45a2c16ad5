import type { PlayerConfig } from '@/domain/config/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { DisplayPort } from '@/ports/DisplayPort';
import type { InputPort } from '@/ports/InputPort';
import type { PlayerPort } from '@/ports/PlayerPort';
import { openCatalogStore, type CatalogStore } from '@/adapters/catalog/catalogStore';
import { FfplayPlayer } from '@/adapters/player/ffplayPlayer';
import { KeyboardInput } from '@/adapters/terminal/keyboardInput';
import { TerminalDisplay } from '@/adapters/terminal/terminalDisplay';
import { PlaybackSession } from '@/application/playback/playbackSession';
import { systemClock } from '@/infrastructure/time/systemClock';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, logManager } from '@/shared/logging/logger';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for parts that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  run: () => Promise<void>;
  stop: () => Promise<void>;
};

export interface PlayRuntimeOptions {
  dbPath: string;
  config: PlayerConfig;
  /** Log destination while the display owns the terminal. */
  logFile?: string;
  player?: PlayerPort;
  display?: DisplayPort;
  input?: InputPort;
  clock?: ClockPort;
  stopTimeoutMs?: number;
}

const DEFAULT_STOP_TIMEOUT_MS = 4000;

/**
 * Wires a playback session to the terminal, ffplay and two connections on
 * the library database: one for selection, one for favourite writes.
 */
export function createPlayRuntime(options: PlayRuntimeOptions): Runtime {
  const log = createLogger('Runtime');
  let session: PlaybackSession | null = null;
  let stores: CatalogStore[] = [];
  let stopRequested = false;

  async function run(): Promise<void> {
    if (options.logFile) {
      logManager.redirectToFile(options.logFile);
    }
    try {
      const selection = await openCatalogStore(options.dbPath);
      stores.push(selection);
      if (stopRequested) {
        abandonStart();
        return;
      }
      const favourites = await openCatalogStore(options.dbPath);
      stores.push(favourites);
      if (stopRequested) {
        abandonStart();
        return;
      }
      session = new PlaybackSession({
        catalog: selection,
        favourites,
        player:
          options.player ??
          new FfplayPlayer({ binary: options.config.binaries.ffplay }),
        display: options.display ?? new TerminalDisplay(),
        input: options.input ?? openKeyboard(),
        clock: options.clock ?? systemClock,
        keymap: options.config.controls,
        progressIntervalMs: options.config.progressIntervalMs,
      });
      log.info('playback runtime started', { db: options.dbPath });
      await session.run();
    } finally {
      closeStores();
      if (options.logFile) {
        await logManager.restoreConsole();
      }
    }
  }

  async function stop(): Promise<void> {
    stopRequested = true;
    const active = session;
    const services: LifecycleService[] = [];
    if (active) {
      services.push({ name: 'playback session', stop: () => active.quit() });
    }
    await Promise.all(
      services.map((service) =>
        stopWithTimeout(
          service.name,
          service.stop,
          options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS,
          log,
        ),
      ),
    );
  }

  // Stop arrived while the catalogue was still opening.
  function abandonStart(): void {
    log.info('playback runtime stopped before start', { db: options.dbPath });
    options.input?.close();
  }

  function closeStores(): void {
    for (const store of stores) {
      bestEffortSync(() => store.close(), {
        fallback: undefined,
        onError: 'warn',
        log,
        label: 'failed to close catalogue',
      });
    }
    stores = [];
  }

  return { run, stop };
}

function openKeyboard(): KeyboardInput {
  const input = new KeyboardInput();
  input.open();
  return input;
}
