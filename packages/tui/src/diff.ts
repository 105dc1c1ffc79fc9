/**
 * Reconciler
 *
 * Compares the previously shown canvas with the freshly drawn one and turns
 * the differences into runs of same-style cells, ordered row-major, that a
 * backend can write with as few cursor moves as possible.
 */

import type { ReadonlyCanvas } from './canvas.js';
import { cellsEqual, symbolWidth, type Cell } from './cell.js';
import { rectsEqual } from './rect.js';
import { stylesEqual, type Style } from './style.js';

export interface CellUpdate {
  readonly x: number;
  readonly y: number;
  readonly cell: Cell;
}

export interface PatchRun {
  readonly x: number;
  readonly y: number;
  readonly cells: readonly Cell[];
  /** Symbols of the run joined together */
  readonly text: string;
  /** Columns covered, wide glyphs counted twice */
  readonly width: number;
  readonly style: Style;
  /** The cursor must be moved to (x, y) before writing this run */
  readonly move: boolean;
}

export interface Patch {
  readonly runs: readonly PatchRun[];
  /** Every cell of the next canvas was treated as dirty */
  readonly fullRepaint: boolean;
  readonly cellCount: number;
}

export interface ReconcileOptions {
  /** Treat every cell as dirty even when dimensions match */
  fullRepaint?: boolean;
}

/**
 * Dirty cells of `next` relative to `prev`, in row-major order.
 *
 * Cells covered by a wide glyph are skipped: writing the glyph fills them.
 * When a wide glyph in `prev` is overwritten, the columns it used are
 * re-emitted even if they compare equal.
 */
export function diffCells(prev: ReadonlyCanvas, next: ReadonlyCanvas, options: ReconcileOptions = {}): CellUpdate[] {
  const area = next.area;
  const full = options.fullRepaint === true || !rectsEqual(prev.area, area);
  const previous = prev.content;
  const current = next.content;
  const updates: CellUpdate[] = [];

  for (let row = 0; row < area.height; row++) {
    let toSkip = 0;
    let invalidated = 0;

    for (let col = 0; col < area.width; col++) {
      const index = row * area.width + col;
      const cell = current[index];
      if (cell === undefined) continue;
      const old = full ? undefined : previous[index];

      const dirty = old === undefined || invalidated > 0 || !cellsEqual(old, cell);
      if (dirty && toSkip === 0) {
        updates.push({ x: area.x + col, y: area.y + row, cell });
      }

      const width = symbolWidth(cell.symbol);
      const oldWidth = old === undefined ? 1 : symbolWidth(old.symbol);
      toSkip = toSkip > 0 ? toSkip - 1 : Math.max(0, width - 1);
      invalidated = Math.max(0, Math.max(width, oldWidth, invalidated) - 1);
    }
  }

  return updates;
}

/**
 * Coalesce ordered updates into runs. Adjacent same-row updates sharing a
 * style join the current run; anything else starts a new one.
 */
export function buildPatch(updates: readonly CellUpdate[], fullRepaint = false): Patch {
  const runs: PatchRun[] = [];

  let pending: { x: number; y: number; cells: Cell[]; width: number; style: Style } | null = null;
  let cursor: { x: number; y: number } | null = null;

  const closePending = (): void => {
    if (!pending) return;
    const move = cursor === null || cursor.y !== pending.y || cursor.x !== pending.x;
    runs.push({
      x: pending.x,
      y: pending.y,
      cells: pending.cells,
      text: pending.cells.map(cell => cell.symbol).join(''),
      width: pending.width,
      style: pending.style,
      move
    });
    cursor = { x: pending.x + pending.width, y: pending.y };
    pending = null;
  };

  for (const { x, y, cell } of updates) {
    const width = Math.max(1, symbolWidth(cell.symbol));
    if (
      pending !== null &&
      pending.y === y &&
      pending.x + pending.width === x &&
      stylesEqual(pending.style, cell.style)
    ) {
      pending.cells.push(cell);
      pending.width += width;
      continue;
    }
    closePending();
    pending = { x, y, cells: [cell], width, style: cell.style };
  }
  closePending();

  return { runs, fullRepaint, cellCount: updates.length };
}

/**
 * Compute the patch that turns what `prev` shows into `next`
 */
export function reconcile(prev: ReadonlyCanvas, next: ReadonlyCanvas, options: ReconcileOptions = {}): Patch {
  const fullRepaint = options.fullRepaint === true || !rectsEqual(prev.area, next.area);
  return buildPatch(diffCells(prev, next, { fullRepaint }), fullRepaint);
}
