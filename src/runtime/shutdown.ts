import { createLogger, type Log } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

export const FORCE_EXIT_MS = 8000;

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/** The slice of `process` the handlers use. */
export interface SignalTarget {
  on(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

/**
 * SIGINT/SIGTERM stop the runtime; the process exits on its own once the
 * session has drained. Returns a function that removes the handlers.
 */
export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log: Log = createLogger('Runtime', 'Shutdown'),
  target: SignalTarget = process,
): () => void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Force-exit watchdog so a stop that never resolves cannot hang the terminal.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      target.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    runtime
      .stop()
      .catch((error: unknown) => {
        log.error('shutdown failed', { error });
      })
      .finally(() => clearTimeout(forceExit));
  };

  target.on('SIGINT', shutdown);
  target.on('SIGTERM', shutdown);
  return () => {
    target.off('SIGINT', shutdown);
    target.off('SIGTERM', shutdown);
  };
}
