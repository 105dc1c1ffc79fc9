/**
 * Generic building blocks: clearing an area and grouping children
 */

import type { Canvas } from './canvas.js';
import { BLANK_CELL } from './cell.js';
import { Widget, renderItem, type Drawable, type DrawableRef } from './drawable.js';
import { intersectRects, isEmptyRect, type Rect } from './rect.js';

/**
 * Resets every cell of its area. Draw it before content that must fully
 * cover whatever was drawn underneath, such as a popup.
 */
export class Clear extends Widget {
  renderRef(area: Rect, canvas: Canvas): void {
    canvas.fill(area, BLANK_CELL);
  }
}

export type AreaFn = (parent: Rect) => Rect;

interface GroupEntry {
  readonly drawable: DrawableRef | Drawable | string;
  readonly area?: AreaFn;
}

/**
 * Container of heterogeneous children drawn in insertion order. Each child
 * may pick its own area from the parent's; the result is clipped to the parent.
 */
export class Group extends Widget {
  private readonly entries: GroupEntry[] = [];

  constructor(children: ReadonlyArray<DrawableRef | string> = []) {
    super();
    for (const child of children) {
      this.entries.push({ drawable: child });
    }
  }

  /**
   * Append a child. Consuming drawables are rendered on every draw of the
   * group, so only add ones that tolerate that.
   */
  add(drawable: DrawableRef | Drawable | string, area?: AreaFn): this {
    this.entries.push(area ? { drawable, area } : { drawable });
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  renderRef(area: Rect, canvas: Canvas): void {
    for (const entry of this.entries) {
      const target = entry.area ? intersectRects(area, entry.area(area)) : area;
      if (isEmptyRect(target)) continue;
      renderItem(entry.drawable, target, canvas);
    }
  }
}
