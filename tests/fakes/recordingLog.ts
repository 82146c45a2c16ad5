import type { Log, LogContext } from '../../src/shared/logging/logger';

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: LogContext;
};

export function createRecordingLog(): { log: Log; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log: Log = {
    debug: (message, data) => {
      entries.push({ level: 'debug', message, data });
    },
    info: (message, data) => {
      entries.push({ level: 'info', message, data });
    },
    warn: (message, data) => {
      entries.push({ level: 'warn', message, data });
    },
    error: (message, data) => {
      entries.push({ level: 'error', message, data });
    },
  };
  return { log, entries };
}
