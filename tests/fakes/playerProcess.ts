import { EventEmitter } from 'node:events';
import type { PlayerProcess, SpawnPlayer } from '../../src/adapters/player/ffplayPlayer';

/**
 * Stand-in for an ffplay child. `exitOn` lists the signals it obeys.
 */
export class FakePlayerProcess extends EventEmitter implements PlayerProcess {
  public readonly pid = 4242;
  public readonly signals: NodeJS.Signals[] = [];

  constructor(private readonly exitOn: NodeJS.Signals[] = ['SIGTERM', 'SIGKILL']) {
    super();
  }

  public kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (this.exitOn.includes(signal)) {
      this.emit('exit', null, signal);
    }
    return true;
  }
}

export type SpawnRecorder = {
  spawn: SpawnPlayer;
  calls: Array<{ binary: string; args: string[] }>;
  processes: FakePlayerProcess[];
};

/**
 * Spawn function whose processes report `spawn` (or the given error) on the
 * next tick, as a real child does.
 */
export function recordSpawns(
  options: { exitOn?: NodeJS.Signals[]; error?: NodeJS.ErrnoException } = {},
): SpawnRecorder {
  const recorder: SpawnRecorder = { spawn: () => new FakePlayerProcess(), calls: [], processes: [] };
  recorder.spawn = (binary, args) => {
    const proc = new FakePlayerProcess(options.exitOn);
    recorder.calls.push({ binary, args });
    recorder.processes.push(proc);
    setImmediate(() => {
      if (options.error) {
        proc.emit('error', options.error);
      } else {
        proc.emit('spawn');
      }
    });
    return proc;
  };
  return recorder;
}
