/**
 * Draw contract
 *
 * Components paint themselves into a sub-area of a canvas. Writes outside
 * the area are clipped by the canvas, so a draw call never fails.
 */

import type { Canvas } from './canvas.js';
import { isEmptyRect, type Rect } from './rect.js';
import { DEFAULT_STYLE } from './style.js';

/**
 * Consuming draw: build the component, render it once, drop it
 */
export interface Drawable {
  render(area: Rect, canvas: Canvas): void;
}

/**
 * Borrowed draw: the component survives the call and can be rendered again,
 * stored in collections or drawn by a container
 */
export interface DrawableRef {
  renderRef(area: Rect, canvas: Canvas): void;
}

export interface StatefulDrawable<S> {
  render(area: Rect, canvas: Canvas, state: S): void;
}

export interface StatefulDrawableRef<S> {
  renderRef(area: Rect, canvas: Canvas, state: S): void;
}

/**
 * Anything a frame or container knows how to draw
 */
export type Renderable = Drawable | DrawableRef | string | null | undefined;

/**
 * Base class for components: implement `renderRef`, get `render` for free
 */
export abstract class Widget implements Drawable, DrawableRef {
  abstract renderRef(area: Rect, canvas: Canvas): void;

  render(area: Rect, canvas: Canvas): void {
    this.renderRef(area, canvas);
  }
}

/**
 * Stateful counterpart of `Widget`
 */
export abstract class StatefulWidget<S> implements StatefulDrawable<S>, StatefulDrawableRef<S> {
  abstract renderRef(area: Rect, canvas: Canvas, state: S): void;

  render(area: Rect, canvas: Canvas, state: S): void {
    this.renderRef(area, canvas, state);
  }
}

/**
 * Adapt a borrowed drawable to the consuming contract
 */
export function asDrawable(drawable: DrawableRef): Drawable {
  return {
    render: (area, canvas) => drawable.renderRef(area, canvas)
  };
}

export function isDrawableRef(value: unknown): value is DrawableRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'renderRef' in value &&
    typeof value.renderRef === 'function'
  );
}

/**
 * Plain text at the area origin, clipped to the area width
 */
export function renderStr(text: string, area: Rect, canvas: Canvas): void {
  if (isEmptyRect(area)) return;
  canvas.setText(area.x, area.y, text, DEFAULT_STYLE, area.width);
}

/**
 * Draw any renderable. Borrowed drawing is preferred when available;
 * null and undefined draw nothing.
 */
export function renderItem(item: Renderable, area: Rect, canvas: Canvas): void {
  if (item === null || item === undefined) return;
  if (typeof item === 'string') {
    renderStr(item, area, canvas);
    return;
  }
  if (isDrawableRef(item)) {
    item.renderRef(area, canvas);
    return;
  }
  item.render(area, canvas);
}
