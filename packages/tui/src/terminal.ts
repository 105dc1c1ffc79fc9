/**
 * Terminal - the render driver
 *
 * Owns the current/previous canvas pair and runs drawing cycles:
 * idle -> drawing -> diffing -> flushing -> idle.
 */

import type { Backend } from './backend.js';
import { Canvas } from './canvas.js';
import { reconcile, type Patch } from './diff.js';
import { ReentrantDrawError, TerminalIoError, type BackendOperation } from './errors.js';
import { Frame, nextFrameCount, type CompletedFrame } from './frame.js';
import { logger } from './logger.js';
import { rect, rectsEqual, type Position, type Rect } from './rect.js';

export type Viewport =
  | { kind: 'fullscreen' }
  | { kind: 'fixed'; area: Rect };

export type DriverState = 'idle' | 'drawing' | 'diffing' | 'flushing';

export interface TerminalOptions {
  viewport?: Viewport;
  /**
   * Count reported by the first frame
   */
  initialFrameCount?: number;
}

export class Terminal<B extends Backend = Backend> {
  readonly backend: B;
  private readonly viewport: Viewport;
  private readonly buffers: [Canvas, Canvas];
  private current: 0 | 1 = 0;
  private area: Rect;
  private count: number;
  private phase: DriverState = 'idle';
  private fullRepaintPending = true;
  private lastPatch: Patch | null = null;

  constructor(backend: B, options: TerminalOptions = {}) {
    this.backend = backend;
    this.viewport = options.viewport ?? { kind: 'fullscreen' };
    this.count = (options.initialFrameCount ?? 0) >>> 0;
    this.area = this.viewport.kind === 'fixed' ? this.viewport.area : this.queryArea();
    this.buffers = [Canvas.empty(this.area), Canvas.empty(this.area)];
  }

  /**
   * Run one cycle: let `render` draw into a fresh frame, then write the
   * difference from the previous cycle to the backend.
   *
   * @throws TerminalIoError when the backend fails; the cycle is abandoned
   * and the next one repaints everything
   */
  draw(render: (frame: Frame) => void): CompletedFrame {
    if (this.phase !== 'idle') {
      throw new ReentrantDrawError();
    }

    try {
      this.autoresize();

      this.phase = 'drawing';
      const frame = new Frame(this.currentBuffer(), this.area, this.count);
      try {
        render(frame);
      } finally {
        frame.release();
      }

      this.phase = 'diffing';
      const patch = reconcile(this.previousBuffer(), this.currentBuffer(), {
        fullRepaint: this.fullRepaintPending
      });

      this.phase = 'flushing';
      this.io('draw', () => this.backend.draw(patch.runs));
      this.applyCursor(frame.cursorPosition());
      this.io('flush', () => this.backend.flush());

      this.fullRepaintPending = false;
      this.lastPatch = patch;
      this.swapBuffers();

      const completed: CompletedFrame = {
        buffer: this.previousBuffer(),
        area: this.area,
        count: this.count
      };
      logger.debug('Frame rendered', {
        count: this.count,
        runs: patch.runs.length,
        cells: patch.cellCount,
        fullRepaint: patch.fullRepaint
      });
      this.count = nextFrameCount(this.count);
      return completed;
    } catch (error) {
      // The half-drawn canvas must not leak into the next cycle
      this.currentBuffer().reset();
      if (error instanceof TerminalIoError) {
        logger.error(error.message, { operation: error.operation, count: this.count });
        this.fullRepaintPending = true;
      }
      throw error;
    } finally {
      this.phase = 'idle';
    }
  }

  /**
   * Pick up a new backend size, fullscreen viewports only
   */
  autoresize(): void {
    if (this.viewport.kind !== 'fullscreen') return;
    const area = this.queryArea();
    if (!rectsEqual(area, this.area)) {
      this.resize(area);
    }
  }

  /**
   * Reallocate both canvases for `area`; the next cycle repaints everything
   */
  resize(area: Rect): void {
    logger.info('Viewport resized', {
      from: { width: this.area.width, height: this.area.height },
      to: { width: area.width, height: area.height }
    });
    this.area = area;
    this.buffers[0].resize(area);
    this.buffers[1].resize(area);
    this.io('clear', () => this.backend.clear());
    this.fullRepaintPending = true;
  }

  /**
   * Erase the screen and forget what was shown
   */
  clear(): void {
    this.io('clear', () => this.backend.clear());
    this.io('flush', () => this.backend.flush());
    this.previousBuffer().reset();
    this.fullRepaintPending = true;
  }

  size(): Rect {
    return this.queryArea();
  }

  hideCursor(): void {
    this.io('hideCursor', () => this.backend.hideCursor());
    this.io('flush', () => this.backend.flush());
  }

  showCursor(): void {
    this.io('showCursor', () => this.backend.showCursor());
    this.io('flush', () => this.backend.flush());
  }

  setCursorPosition(x: number, y: number): void {
    this.io('setCursor', () => this.backend.setCursor(x, y));
    this.io('flush', () => this.backend.flush());
  }

  getCursorPosition(): Position {
    return this.io('getCursor', () => this.backend.getCursor());
  }

  get viewportArea(): Rect {
    return this.area;
  }

  get frameCount(): number {
    return this.count;
  }

  get state(): DriverState {
    return this.phase;
  }

  /**
   * Patch written by the most recent successful cycle
   */
  get lastRenderedPatch(): Patch | null {
    return this.lastPatch;
  }

  private applyCursor(position: Position | undefined): void {
    if (position === undefined) {
      this.io('hideCursor', () => this.backend.hideCursor());
      return;
    }
    this.io('showCursor', () => this.backend.showCursor());
    this.io('setCursor', () => this.backend.setCursor(position.x, position.y));
  }

  private swapBuffers(): void {
    this.previousBuffer().reset();
    this.current = this.current === 0 ? 1 : 0;
  }

  private currentBuffer(): Canvas {
    return this.buffers[this.current];
  }

  private previousBuffer(): Canvas {
    return this.buffers[this.current === 0 ? 1 : 0];
  }

  private queryArea(): Rect {
    const { width, height } = this.io('size', () => this.backend.size());
    return rect(0, 0, width, height);
  }

  private io<T>(operation: BackendOperation, call: () => T): T {
    try {
      return call();
    } catch (error) {
      throw new TerminalIoError(operation, error);
    }
  }
}
