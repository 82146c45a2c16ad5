import readline from 'node:readline';
import type { InputPort } from '@/ports/InputPort';

type KeySource = NodeJS.ReadStream;

/**
 * Raw-mode key reader. Ctrl+C closes the input, which the command loop
 * treats as quit.
 */
export class KeyboardInput implements InputPort {
  private readonly buffered: string[] = [];
  private readonly waiting: Array<(key: string | null) => void> = [];
  private opened = false;
  private closed = false;

  constructor(private readonly source: KeySource = process.stdin) {}

  public open(): void {
    if (this.opened || this.closed) {
      return;
    }
    this.opened = true;
    readline.emitKeypressEvents(this.source);
    if (this.source.isTTY) {
      this.source.setRawMode(true);
    }
    this.source.on('keypress', this.onKeypress);
    this.source.on('end', this.onEnd);
    this.source.resume();
  }

  public nextKey(): Promise<string | null> {
    const key = this.buffered.shift();
    if (key !== undefined) {
      return Promise.resolve(key);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.opened) {
      this.source.off('keypress', this.onKeypress);
      this.source.off('end', this.onEnd);
      if (this.source.isTTY) {
        this.source.setRawMode(false);
      }
      this.source.pause();
    }
    for (const resolve of this.waiting.splice(0)) {
      resolve(null);
    }
  }

  private readonly onKeypress = (text: string | undefined, key: readline.Key | undefined): void => {
    if (key?.ctrl && key.name === 'c') {
      this.close();
      return;
    }
    const name = keyName(text, key);
    if (!name) {
      return;
    }
    const resolve = this.waiting.shift();
    if (resolve) {
      resolve(name);
    } else {
      this.buffered.push(name);
    }
  };

  private readonly onEnd = (): void => {
    this.close();
  };
}

/**
 * Printable characters map to themselves (so `N` differs from `n`), space
 * to `space`, everything else to readline's key name (`right`, `escape`).
 */
export function keyName(text: string | undefined, key: readline.Key | undefined): string | null {
  if (text === ' ') {
    return 'space';
  }
  if (text && text.length === 1 && text > ' ' && text !== '\x7f') {
    return text;
  }
  return key?.name ?? null;
}
