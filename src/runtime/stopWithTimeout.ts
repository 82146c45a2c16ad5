import { createLogger, errorMessage, type Log } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Runs `stopFn` but gives up waiting after `timeoutMs`. A stop that fails
 * after the timeout is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: Log = createLogger('Runtime'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  if (result.kind === 'stopped') {
    log.info(`${name} stopped`);
    return result;
  }

  if (result.kind === 'timeout') {
    log.warn(`${name} stop timed out`, { timeoutMs });
    void stopPromise.then((finalResult) => {
      if (finalResult.kind === 'error') {
        log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
      }
    });
    return result;
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
  return result;
}
