import { spawn } from 'node:child_process';
import { LaunchError } from '@/domain/errors';
import type { TrackRecord } from '@/domain/library/types';
import type { PlayerHandle, PlayerPort, PlayerState } from '@/ports/PlayerPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { isReadableFile } from '@/shared/utils/file';

/**
 * The parts of a child process the driver relies on. `ChildProcess`
 * satisfies it; tests substitute an EventEmitter.
 */
export interface PlayerProcess {
  readonly pid?: number;
  kill(signal: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnPlayer = (binary: string, args: string[]) => PlayerProcess;

export interface FfplayPlayerOptions {
  binary: string;
  /** Arguments placed before the file path. */
  args?: string[];
  killTimeoutMs?: number;
  spawnProcess?: SpawnPlayer;
  isReadable?: (filePath: string) => Promise<boolean>;
}

export const DEFAULT_FFPLAY_ARGS = ['-nodisp', '-autoexit', '-loglevel', 'quiet'];

const DEFAULT_KILL_TIMEOUT_MS = 2000;

const spawnDetachedOutput: SpawnPlayer = (binary, args) =>
  spawn(binary, args, { stdio: ['ignore', 'ignore', 'ignore'] });

/**
 * Plays one file per handle through an external `ffplay` process.
 * Pause and resume are SIGSTOP/SIGCONT; stop is SIGTERM followed by SIGKILL
 * if the process has not exited within the kill timeout.
 */
export class FfplayPlayer implements PlayerPort {
  private readonly log = createLogger('Player', 'Ffplay');
  private readonly args: string[];
  private readonly killTimeoutMs: number;
  private readonly spawnProcess: SpawnPlayer;
  private readonly isReadable: (filePath: string) => Promise<boolean>;

  constructor(private readonly options: FfplayPlayerOptions) {
    this.args = options.args ?? DEFAULT_FFPLAY_ARGS;
    this.killTimeoutMs = options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;
    this.spawnProcess = options.spawnProcess ?? spawnDetachedOutput;
    this.isReadable = options.isReadable ?? isReadableFile;
  }

  public async start(track: TrackRecord): Promise<PlayerHandle> {
    if (!(await this.isReadable(track.path))) {
      throw new LaunchError(track.path, 'file is missing or unreadable');
    }
    let proc: PlayerProcess;
    try {
      proc = this.spawnProcess(this.options.binary, [...this.args, track.path]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LaunchError(track.path, message, { cause: error });
    }
    const handle = new FfplayHandle(track.path, proc, this.killTimeoutMs, this.log);
    await handle.launched;
    this.log.debug('player started', { path: track.path, pid: proc.pid });
    return handle;
  }
}

class FfplayHandle implements PlayerHandle {
  public readonly launched: Promise<void>;
  private currentState: PlayerState = 'playing';
  private spawned = false;
  private exited = false;
  private stopping = false;
  private killTimer?: NodeJS.Timeout;
  private markExited: () => void = () => undefined;
  private readonly exit = new Promise<void>((resolve) => {
    this.markExited = resolve;
  });

  constructor(
    public readonly path: string,
    private readonly proc: PlayerProcess,
    private readonly killTimeoutMs: number,
    private readonly log: ComponentLogger,
  ) {
    proc.once('exit', (code, signal) => {
      this.log.debug('player exited', { path, code, signal, stopped: this.stopping });
      this.finish();
    });
    this.launched = new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => {
        this.spawned = true;
        resolve();
      });
      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (this.spawned || this.exited) {
          this.log.warn('player process error', { path, message: error.message });
          return;
        }
        if (error.code === 'ENOENT') {
          reject(new LaunchError(path, 'player binary not found', { cause: error }));
        } else {
          reject(new LaunchError(path, error.message, { cause: error }));
        }
        this.finish();
      });
    });
  }

  public get state(): PlayerState {
    return this.currentState;
  }

  public pause(): boolean {
    if (this.currentState !== 'playing') {
      return false;
    }
    this.send('SIGSTOP');
    this.currentState = 'paused';
    return true;
  }

  public resume(): boolean {
    if (this.currentState !== 'paused') {
      return false;
    }
    this.send('SIGCONT');
    this.currentState = 'playing';
    return true;
  }

  public stop(): void {
    if (this.exited || this.stopping) {
      this.currentState = 'stopped';
      return;
    }
    this.stopping = true;
    // A stopped process does not act on SIGTERM until it is continued.
    if (this.currentState === 'paused') {
      this.send('SIGCONT');
    }
    this.currentState = 'stopped';
    this.send('SIGTERM');
    if (!this.exited) {
      this.armKillTimer();
    }
  }

  public waitForExit(): Promise<void> {
    return this.exit;
  }

  private finish(): void {
    this.exited = true;
    this.currentState = 'stopped';
    this.clearKillTimer();
    this.markExited();
  }

  private send(signal: NodeJS.Signals): void {
    if (!this.proc.kill(signal)) {
      this.log.debug('signal not delivered', { path: this.path, signal });
    }
  }

  private armKillTimer(): void {
    this.clearKillTimer();
    this.killTimer = setTimeout(() => {
      if (!this.exited) {
        this.log.warn('player ignored SIGTERM; killing', { path: this.path });
        this.send('SIGKILL');
      }
    }, this.killTimeoutMs);
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
  }
}
