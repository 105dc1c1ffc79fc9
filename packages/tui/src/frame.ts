/**
 * Frame - the per-cycle drawing handle
 */

import type { Canvas, ReadonlyCanvas } from './canvas.js';
import {
  renderItem,
  type Drawable,
  type DrawableRef,
  type StatefulDrawable,
  type StatefulDrawableRef
} from './drawable.js';
import { FrameReleasedError } from './errors.js';
import type { Position, Rect } from './rect.js';

/**
 * Largest frame count before the counter wraps back to zero
 */
export const FRAME_COUNT_MAX = 0xffffffff;

/**
 * Next frame count, wrapping at `FRAME_COUNT_MAX`
 */
export function nextFrameCount(count: number): number {
  return (count + 1) >>> 0;
}

/**
 * What the terminal showed after a `Terminal.draw` call. Only meaningful
 * until the next call.
 */
export interface CompletedFrame {
  readonly buffer: ReadonlyCanvas;
  readonly area: Rect;
  readonly count: number;
}

/**
 * A consistent view into the terminal state for rendering a single frame.
 *
 * Obtained as the argument of the `Terminal.draw` closure. Everything drawn
 * lands in the current canvas; once the closure returns the driver diffs it
 * against the previous canvas and writes only the changes. The frame is
 * released at that point and rejects further use.
 */
export class Frame {
  private cursor: Position | undefined;
  private released = false;

  constructor(
    private readonly buffer: Canvas,
    private readonly viewportArea: Rect,
    private readonly frameCount: number
  ) {}

  /**
   * The area of the current frame.
   *
   * Stable for the whole cycle. Apps reacting to resize notifications should
   * lay out against this value, since it is the size of the canvas being drawn.
   */
  size(): Rect {
    return this.viewportArea;
  }

  /**
   * Show the cursor at (x, y) after this frame is flushed. The last call
   * wins; without a call the cursor is hidden.
   */
  setCursor(x: number, y: number): void {
    this.assertActive();
    this.cursor = { x, y };
  }

  /**
   * The canvas this frame draws into
   */
  bufferMut(): Canvas {
    this.assertActive();
    return this.buffer;
  }

  /**
   * Number of frames rendered before this one. Wraps to zero after
   * `FRAME_COUNT_MAX`; suitable for animation and debugging.
   */
  count(): number {
    return this.frameCount;
  }

  renderWidget(widget: Drawable | string, area: Rect): void {
    renderItem(widget, area, this.bufferMut());
  }

  renderWidgetRef(widget: DrawableRef, area: Rect): void {
    widget.renderRef(area, this.bufferMut());
  }

  renderStatefulWidget<S>(widget: StatefulDrawable<S>, area: Rect, state: S): void {
    widget.render(area, this.bufferMut(), state);
  }

  renderStatefulWidgetRef<S>(widget: StatefulDrawableRef<S>, area: Rect, state: S): void {
    widget.renderRef(area, this.bufferMut(), state);
  }

  /**
   * Cursor target recorded during the cycle
   */
  cursorPosition(): Position | undefined {
    return this.cursor;
  }

  /**
   * Called by the driver when the drawing closure returns
   */
  release(): void {
    this.released = true;
  }

  get isReleased(): boolean {
    return this.released;
  }

  private assertActive(): void {
    if (this.released) {
      throw new FrameReleasedError(this.frameCount);
    }
  }
}
