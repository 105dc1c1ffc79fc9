/**
 * Canvas - a rectangular grid of cells stored row-major
 */

import {
  BLANK_CELL,
  cellsEqual,
  continuationCell,
  createCell,
  graphemes,
  isContinuation,
  symbolWidth,
  type Cell
} from './cell.js';
import { InvalidCoordinateError } from './errors.js';
import {
  containsPosition,
  intersectRects,
  rect,
  rectArea,
  rectBottom,
  rectRight,
  rectsEqual,
  type Position,
  type Rect
} from './rect.js';
import { DEFAULT_STYLE, patchStyle, type Style } from './style.js';

/**
 * Read side of a canvas, handed out where mutation is not allowed
 */
export interface ReadonlyCanvas {
  readonly area: Rect;
  readonly content: readonly Cell[];
  cellAt(x: number, y: number): Cell;
  indexOf(x: number, y: number): number;
  positionOf(index: number): Position;
  equals(other: ReadonlyCanvas): boolean;
  toLines(): string[];
}

export class Canvas implements ReadonlyCanvas {
  private _area: Rect;
  private cells: Cell[];

  constructor(area: Rect, fill: Cell = BLANK_CELL) {
    this._area = rect(area.x, area.y, area.width, area.height);
    this.cells = new Array<Cell>(rectArea(this._area)).fill(fill);
  }

  static empty(area: Rect): Canvas {
    return new Canvas(area);
  }

  static filled(area: Rect, cell: Cell): Canvas {
    return new Canvas(area, cell);
  }

  /**
   * Build a canvas at the origin from plain text rows. The width is the
   * widest row; shorter rows are padded with blanks.
   */
  static withLines(lines: readonly string[], style: Style = DEFAULT_STYLE): Canvas {
    const width = lines.reduce((max, line) => Math.max(max, symbolWidth(line)), 0);
    const canvas = new Canvas(rect(0, 0, width, lines.length));
    lines.forEach((line, y) => {
      canvas.setText(0, y, line, style);
    });
    return canvas;
  }

  get area(): Rect {
    return this._area;
  }

  get content(): readonly Cell[] {
    return this.cells;
  }

  /**
   * Index into the cell array, or -1 when outside the area
   */
  indexOf(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || !containsPosition(this._area, x, y)) {
      return -1;
    }
    return (y - this._area.y) * this._area.width + (x - this._area.x);
  }

  positionOf(index: number): Position {
    if (index < 0 || index >= this.cells.length) {
      throw new RangeError(`Index ${index} is outside a canvas of ${this.cells.length} cells`);
    }
    return {
      x: this._area.x + (index % this._area.width),
      y: this._area.y + Math.floor(index / this._area.width)
    };
  }

  cellAt(x: number, y: number): Cell {
    const index = this.indexOf(x, y);
    const cell = this.cells[index];
    if (index < 0 || cell === undefined) {
      throw new InvalidCoordinateError(x, y, this._area);
    }
    return cell;
  }

  /**
   * Store a cell; writes outside the area are ignored. Replacing one half
   * of a wide glyph blanks the other half.
   */
  setCell(x: number, y: number, cell: Cell): void {
    const index = this.indexOf(x, y);
    if (index < 0) return;

    const previous = this.cells[index] ?? BLANK_CELL;
    const replacingContinuation = isContinuation(previous) && !isContinuation(cell);

    if (replacingContinuation && x > this._area.x) {
      const lead = this.cells[index - 1];
      if (lead !== undefined && symbolWidth(lead.symbol) > 1) {
        this.cells[index - 1] = createCell(' ', lead.style);
      }
    }

    if (symbolWidth(previous.symbol) > 1 && x + 1 < rectRight(this._area)) {
      const trailing = this.cells[index + 1];
      if (trailing !== undefined && isContinuation(trailing)) {
        this.cells[index + 1] = createCell(' ', trailing.style);
      }
    }

    this.cells[index] = cell;
  }

  /**
   * Write text left to right from (x, y). Stops at the right edge or after
   * `maxWidth` columns; a glyph that would straddle the limit is dropped.
   *
   * @returns the column after the last glyph written
   */
  setText(x: number, y: number, text: string, style: Style = DEFAULT_STYLE, maxWidth = Infinity): number {
    const limit = Math.min(rectRight(this._area), x + Math.max(0, maxWidth));
    let column = x;

    for (const { symbol, width } of graphemes(text)) {
      if (column + width > limit) break;

      if (column >= this._area.x) {
        this.setCell(column, y, createCell(symbol, style));
        for (let offset = 1; offset < width; offset++) {
          this.setCell(column + offset, y, continuationCell(style));
        }
      } else {
        // Glyph starts left of the area: blank whatever part of it is visible
        for (let offset = 1; offset < width; offset++) {
          if (column + offset >= this._area.x) {
            this.setCell(column + offset, y, createCell(' ', style));
          }
        }
      }
      column += width;
    }

    return column;
  }

  /**
   * Patch the style of every cell inside `area`
   */
  setStyle(area: Rect, style: Style): void {
    const target = intersectRects(area, this._area);
    for (let y = target.y; y < rectBottom(target); y++) {
      for (let x = target.x; x < rectRight(target); x++) {
        const index = this.indexOf(x, y);
        const cell = this.cells[index];
        if (cell !== undefined) {
          this.cells[index] = createCell(cell.symbol, patchStyle(cell.style, style));
        }
      }
    }
  }

  fill(area: Rect, cell: Cell): void {
    const target = intersectRects(area, this._area);
    for (let y = target.y; y < rectBottom(target); y++) {
      for (let x = target.x; x < rectRight(target); x++) {
        this.setCell(x, y, cell);
      }
    }
  }

  /**
   * Reset every cell to the blank default
   */
  reset(): void {
    this.cells.fill(BLANK_CELL);
  }

  /**
   * Reallocate for a new area; previous content is discarded
   */
  resize(area: Rect): void {
    this._area = rect(area.x, area.y, area.width, area.height);
    this.cells = new Array<Cell>(rectArea(this._area)).fill(BLANK_CELL);
  }

  equals(other: ReadonlyCanvas): boolean {
    if (!rectsEqual(this._area, other.area)) return false;
    const theirs = other.content;
    if (theirs.length !== this.cells.length) return false;
    for (let i = 0; i < this.cells.length; i++) {
      const mine = this.cells[i];
      const their = theirs[i];
      if (mine === undefined || their === undefined || !cellsEqual(mine, their)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Rows as plain text, continuation cells omitted
   */
  toLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this._area.height; row++) {
      const start = row * this._area.width;
      lines.push(
        this.cells
          .slice(start, start + this._area.width)
          .map(cell => cell.symbol)
          .join('')
      );
    }
    return lines;
  }
}
