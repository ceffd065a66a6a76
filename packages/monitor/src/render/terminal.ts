import type { ExitOutcome } from '../outcome.js';
import type { PipelineState } from '../state.js';
import { composeFrame, composeOutcomeLine, type FrameOptions } from './frame.js';
import type { PipelineRenderer } from './renderer.js';

export interface OutputStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[2J';
const CURSOR_HOME = '\x1b[H';
const CLEAR_LINE_TAIL = '\x1b[K';
const CLEAR_BELOW = '\x1b[J';

/**
 * Full-screen renderer for interactive terminals. Each frame is written
 * over the previous one in a single write: the screen is cleared only
 * before the first frame.
 */
export class TerminalRenderer implements PipelineRenderer {
  private drawn = false;

  constructor(
    private readonly out: OutputStream,
    private readonly options: FrameOptions
  ) {}

  render(state: PipelineState): void {
    this.draw(state);
  }

  finish(state: PipelineState | null, outcome: ExitOutcome): void {
    if (state) {
      this.draw(state);
    }
    const restore = this.drawn ? `${SHOW_CURSOR}\n` : '';
    this.out.write(`${restore}${composeOutcomeLine(state, outcome, this.options)}\n`);
  }

  private draw(state: PipelineState): void {
    const prefix = this.drawn ? CURSOR_HOME : `${HIDE_CURSOR}${CLEAR_SCREEN}${CURSOR_HOME}`;
    this.drawn = true;
    const body = composeFrame(state, this.options)
      .map((line) => `${line}${CLEAR_LINE_TAIL}\n`)
      .join('');
    this.out.write(`${prefix}${body}${CLEAR_BELOW}`);
  }
}
