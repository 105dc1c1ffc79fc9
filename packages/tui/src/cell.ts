/**
 * Cell model
 *
 * A cell is one terminal column: a grapheme plus its style. The second
 * column of a wide glyph holds a continuation cell whose symbol is empty.
 */

import stringWidth from 'string-width';
import { DEFAULT_STYLE, stylesEqual, type Style } from './style.js';

export interface Cell {
  readonly symbol: string;
  readonly style: Style;
}

export const CONTINUATION_SYMBOL = '';

export const BLANK_CELL: Cell = Object.freeze({ symbol: ' ', style: DEFAULT_STYLE });

const CONTROL_CHAR_REGEX = /\p{Cc}/u;

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Create a cell with default values
 */
export function createCell(symbol: string = ' ', style: Style = DEFAULT_STYLE): Cell {
  return { symbol, style };
}

export function continuationCell(style: Style): Cell {
  return { symbol: CONTINUATION_SYMBOL, style };
}

export function isContinuation(cell: Cell): boolean {
  return cell.symbol === CONTINUATION_SYMBOL;
}

/**
 * Compare two cells for equality
 */
export function cellsEqual(a: Cell, b: Cell): boolean {
  return a === b || (a.symbol === b.symbol && stylesEqual(a.style, b.style));
}

/**
 * Number of terminal columns a symbol occupies
 */
export function symbolWidth(symbol: string): number {
  if (symbol.length === 0) return 0;
  return stringWidth(symbol);
}

/**
 * Split text into drawable graphemes with their column widths.
 * Control characters and zero-width graphemes are dropped.
 */
export function graphemes(text: string): Array<{ symbol: string; width: number }> {
  const result: Array<{ symbol: string; width: number }> = [];
  for (const { segment } of segmenter.segment(text)) {
    if (CONTROL_CHAR_REGEX.test(segment)) continue;
    const width = symbolWidth(segment);
    if (width > 0) {
      result.push({ symbol: segment, width });
    }
  }
  return result;
}
