import type { SessionView } from '@/domain/playback/types';
import type { DisplayPort } from '@/ports/DisplayPort';
import { renderLines } from '@/application/playback/sessionView';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const DEFAULT_COLUMNS = 80;

export interface Screen {
  write(chunk: string): boolean;
  readonly columns?: number;
}

/**
 * Redraws the whole player screen on every render.
 */
export class TerminalDisplay implements DisplayPort {
  private cursorHidden = false;

  constructor(private readonly screen: Screen = process.stdout) {}

  public render(view: SessionView): void {
    const width = this.screen.columns ?? DEFAULT_COLUMNS;
    const body = renderLines(view, width)
      .map((line) => ` ${line}`)
      .join('\n');
    const prefix = this.cursorHidden ? '' : HIDE_CURSOR;
    this.cursorHidden = true;
    this.screen.write(`${prefix}${CLEAR_SCREEN}${body}\n`);
  }

  public clear(): void {
    this.screen.write(`${CLEAR_SCREEN}${this.cursorHidden ? SHOW_CURSOR : ''}`);
    this.cursorHidden = false;
  }
}
