/**
 * Rectangle and position helpers
 *
 * All coordinates are absolute terminal columns/rows. Rects are plain
 * readonly objects so they can be shared between frames without copying.
 */

export interface Position {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type Margin = number | { horizontal: number; vertical: number };

/**
 * Create a rect, clamping negative sizes to zero
 */
export function rect(x: number, y: number, width: number, height: number): Rect {
  return {
    x,
    y,
    width: Math.max(0, width),
    height: Math.max(0, height)
  };
}

export function rectRight(r: Rect): number {
  return r.x + r.width;
}

export function rectBottom(r: Rect): number {
  return r.y + r.height;
}

export function rectArea(r: Rect): number {
  return r.width * r.height;
}

export function isEmptyRect(r: Rect): boolean {
  return r.width === 0 || r.height === 0;
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function containsPosition(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x < rectRight(r) && y >= r.y && y < rectBottom(r);
}

/**
 * Overlap of two rects. Disjoint rects give an empty rect anchored at the
 * clamped origin.
 */
export function intersectRects(a: Rect, b: Rect): Rect {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(rectRight(a), rectRight(b));
  const bottom = Math.min(rectBottom(a), rectBottom(b));
  return rect(x, y, right - x, bottom - y);
}

/**
 * Shrink a rect on every side
 */
export function innerRect(r: Rect, margin: Margin): Rect {
  const horizontal = typeof margin === 'number' ? margin : margin.horizontal;
  const vertical = typeof margin === 'number' ? margin : margin.vertical;
  if (r.width < horizontal * 2 || r.height < vertical * 2) {
    return rect(r.x, r.y, 0, 0);
  }
  return rect(r.x + horizontal, r.y + vertical, r.width - horizontal * 2, r.height - vertical * 2);
}

/**
 * The single-row slice of a rect at absolute row `y`
 */
export function rowRect(r: Rect, y: number): Rect {
  if (y < r.y || y >= rectBottom(r)) {
    return rect(r.x, y, r.width, 0);
  }
  return rect(r.x, y, r.width, 1);
}
