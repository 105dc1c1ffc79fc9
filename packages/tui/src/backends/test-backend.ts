/**
 * In-memory backend
 *
 * Models a terminal as a canvas the runs are applied to, the way a real
 * terminal would: a wide glyph fills the column after it.
 */

import type { Backend, BackendSize } from '../backend.js';
import { Canvas } from '../canvas.js';
import { continuationCell, symbolWidth } from '../cell.js';
import type { PatchRun } from '../diff.js';
import { rect, type Position } from '../rect.js';

export type BackendCall =
  | { op: 'draw'; runs: number; cells: number }
  | { op: 'hideCursor' }
  | { op: 'showCursor' }
  | { op: 'setCursor'; x: number; y: number }
  | { op: 'clear' }
  | { op: 'flush' };

export class TestBackend implements Backend {
  private screen: Canvas;
  private cursor: Position = { x: 0, y: 0 };
  private visible = true;
  private flushes = 0;
  private lastRuns: readonly PatchRun[] = [];
  private readonly listeners = new Set<(size: BackendSize) => void>();
  readonly calls: BackendCall[] = [];

  constructor(width: number, height: number) {
    this.screen = Canvas.empty(rect(0, 0, width, height));
  }

  draw(runs: readonly PatchRun[]): void {
    this.lastRuns = runs;
    let cells = 0;
    for (const run of runs) {
      let x = run.x;
      for (const cell of run.cells) {
        this.screen.setCell(x, run.y, cell);
        const width = symbolWidth(cell.symbol);
        for (let offset = 1; offset < width; offset++) {
          this.screen.setCell(x + offset, run.y, continuationCell(cell.style));
        }
        x += Math.max(1, width);
        cells++;
      }
      this.cursor = { x, y: run.y };
    }
    this.calls.push({ op: 'draw', runs: runs.length, cells });
  }

  hideCursor(): void {
    this.visible = false;
    this.calls.push({ op: 'hideCursor' });
  }

  showCursor(): void {
    this.visible = true;
    this.calls.push({ op: 'showCursor' });
  }

  setCursor(x: number, y: number): void {
    this.cursor = { x, y };
    this.calls.push({ op: 'setCursor', x, y });
  }

  getCursor(): Position {
    return this.cursor;
  }

  size(): BackendSize {
    return { width: this.screen.area.width, height: this.screen.area.height };
  }

  clear(): void {
    this.screen.reset();
    this.calls.push({ op: 'clear' });
  }

  flush(): void {
    this.flushes++;
    this.calls.push({ op: 'flush' });
  }

  onResize(listener: (size: BackendSize) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Change the simulated terminal size. Content is lost, as on most
   * terminals when the alternate screen is resized.
   */
  resize(width: number, height: number): void {
    this.screen = Canvas.empty(rect(0, 0, width, height));
    for (const listener of this.listeners) {
      listener({ width, height });
    }
  }

  /**
   * What the simulated screen shows
   */
  buffer(): Canvas {
    return this.screen;
  }

  lines(): string[] {
    return this.screen.toLines();
  }

  get cursorVisible(): boolean {
    return this.visible;
  }

  get flushCount(): number {
    return this.flushes;
  }

  /**
   * Runs passed to the most recent `draw` call
   */
  get lastDraw(): readonly PatchRun[] {
    return this.lastRuns;
  }
}
