/**
 * ANSI terminal backend
 *
 * Buffers escape sequences and styled text in memory and writes them to the
 * output stream in a single call on flush.
 */

import ansiEscapes from 'ansi-escapes';
import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { Backend, BackendSize } from '../backend.js';
import type { PatchRun } from '../diff.js';
import type { Position } from '../rect.js';
import { paint } from '../style.js';

/**
 * The parts of a TTY write stream the backend uses
 */
export interface TerminalOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
  on?(event: 'resize', listener: () => void): unknown;
  removeListener?(event: 'resize', listener: () => void): unknown;
}

export interface AnsiBackendOptions {
  output?: TerminalOutput;
  /**
   * Use alternate screen buffer (full-screen mode)
   */
  altScreen?: boolean;
  /**
   * Chalk colour level; defaults to what chalk detected for stdout
   */
  colorLevel?: ColorSupportLevel;
}

const DEFAULT_SIZE: BackendSize = { width: 80, height: 24 };

export class AnsiBackend implements Backend {
  private readonly output: TerminalOutput;
  private readonly useAltScreen: boolean;
  private readonly painter: ChalkInstance;
  private pending = '';
  private cursor: Position = { x: 0, y: 0 };
  private entered = false;

  constructor(options: AnsiBackendOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.useAltScreen = options.altScreen ?? false;
    this.painter = new Chalk({ level: options.colorLevel ?? chalk.level });
  }

  /**
   * Prepare the terminal for full-screen drawing
   */
  enter(): void {
    if (this.entered) return;
    if (this.useAltScreen) {
      this.output.write(ansiEscapes.enterAlternativeScreen);
    }
    this.output.write(ansiEscapes.cursorHide);
    this.entered = true;
  }

  /**
   * Restore the terminal
   */
  leave(): void {
    if (!this.entered) return;
    this.flush();
    this.output.write(ansiEscapes.cursorShow);
    if (this.useAltScreen) {
      this.output.write(ansiEscapes.exitAlternativeScreen);
    } else {
      this.output.write('\n');
    }
    this.entered = false;
  }

  draw(runs: readonly PatchRun[]): void {
    for (const run of runs) {
      if (run.move || run.x !== this.cursor.x || run.y !== this.cursor.y) {
        this.pending += ansiEscapes.cursorTo(run.x, run.y);
      }
      this.pending += paint(this.painter, run.style, run.text);
      this.cursor = { x: run.x + run.width, y: run.y };
    }
  }

  hideCursor(): void {
    this.pending += ansiEscapes.cursorHide;
  }

  showCursor(): void {
    this.pending += ansiEscapes.cursorShow;
  }

  setCursor(x: number, y: number): void {
    this.pending += ansiEscapes.cursorTo(x, y);
    this.cursor = { x, y };
  }

  getCursor(): Position {
    return this.cursor;
  }

  size(): BackendSize {
    return {
      width: this.output.columns || DEFAULT_SIZE.width,
      height: this.output.rows || DEFAULT_SIZE.height
    };
  }

  clear(): void {
    this.pending += ansiEscapes.eraseScreen + ansiEscapes.cursorTo(0, 0);
    this.cursor = { x: 0, y: 0 };
  }

  flush(): void {
    if (this.pending.length === 0) return;
    const chunk = this.pending;
    this.pending = '';
    this.output.write(chunk);
  }

  onResize(listener: (size: BackendSize) => void): () => void {
    const output = this.output;
    const handler = (): void => listener(this.size());
    output.on?.('resize', handler);
    return () => {
      output.removeListener?.('resize', handler);
    };
  }
}
