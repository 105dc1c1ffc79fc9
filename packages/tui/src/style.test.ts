import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { DEFAULT_STYLE, isDefaultStyle, paint, patchStyle, stylesEqual } from './style.js';

const ESC = '\u001b';

describe('style', () => {
  it('should compare modifiers with unset meaning off', () => {
    expect(stylesEqual({ bold: false }, {})).toBe(true);
    expect(stylesEqual({ fg: 'red' }, { fg: 'red', italic: false })).toBe(true);
    expect(stylesEqual({ fg: 'red' }, { fg: 'brightRed' })).toBe(false);
    expect(stylesEqual({ bg: 17 }, { bg: '#00005f' })).toBe(false);
    expect(isDefaultStyle({ underline: false })).toBe(true);
  });

  it('should layer set fields of the overlay over the base', () => {
    expect(patchStyle({ fg: 'red', bold: true }, { bg: 'blue', bold: false })).toEqual({
      fg: 'red',
      bg: 'blue',
      bold: false
    });
    const base = { fg: 'green' } as const;
    expect(patchStyle(base, DEFAULT_STYLE)).toBe(base);
  });

  describe('paint', () => {
    const painter = new Chalk({ level: 1 });

    it('should leave default-styled text untouched', () => {
      expect(paint(painter, {}, 'plain')).toBe('plain');
    });

    it('should open foreground before background and close in reverse', () => {
      expect(paint(painter, { fg: 'red', bg: 'blue' }, 'x')).toBe(`${ESC}[31m${ESC}[44mx${ESC}[49m${ESC}[39m`);
    });

    it('should apply modifiers', () => {
      expect(paint(painter, { bold: true }, 'b')).toBe(`${ESC}[1mb${ESC}[22m`);
    });

    it('should emit nothing at colour level 0', () => {
      expect(paint(new Chalk({ level: 0 }), { fg: '#ff0000', underline: true }, 'x')).toBe('x');
    });
  });
});
