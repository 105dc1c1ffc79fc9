/**
 * Cell styling
 *
 * A style is a sparse set of colour and attribute fields. Missing fields mean
 * "terminal default", so the empty object is the default style.
 */

import type { ChalkInstance, ForegroundColorName, BackgroundColorName } from 'chalk';

export type NamedColor =
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white'
  | 'gray'
  | 'brightRed'
  | 'brightGreen'
  | 'brightYellow'
  | 'brightBlue'
  | 'brightMagenta'
  | 'brightCyan'
  | 'brightWhite';

export type HexColor = `#${string}`;

/**
 * Named colour, `#rrggbb` hex string, or ANSI-256 palette index
 */
export type Color = NamedColor | HexColor | number;

export interface Style {
  readonly fg?: Color;
  readonly bg?: Color;
  readonly bold?: boolean;
  readonly dim?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  readonly inverse?: boolean;
  readonly strikethrough?: boolean;
}

export type Modifier = 'bold' | 'dim' | 'italic' | 'underline' | 'inverse' | 'strikethrough';

export const MODIFIERS: readonly Modifier[] = [
  'bold',
  'dim',
  'italic',
  'underline',
  'inverse',
  'strikethrough'
];

export const DEFAULT_STYLE: Style = Object.freeze({});

const FOREGROUND_NAMES: Record<NamedColor, ForegroundColorName> = {
  black: 'black',
  red: 'red',
  green: 'green',
  yellow: 'yellow',
  blue: 'blue',
  magenta: 'magenta',
  cyan: 'cyan',
  white: 'white',
  gray: 'gray',
  brightRed: 'redBright',
  brightGreen: 'greenBright',
  brightYellow: 'yellowBright',
  brightBlue: 'blueBright',
  brightMagenta: 'magentaBright',
  brightCyan: 'cyanBright',
  brightWhite: 'whiteBright'
};

const BACKGROUND_NAMES: Record<NamedColor, BackgroundColorName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  white: 'bgWhite',
  gray: 'bgGray',
  brightRed: 'bgRedBright',
  brightGreen: 'bgGreenBright',
  brightYellow: 'bgYellowBright',
  brightBlue: 'bgBlueBright',
  brightMagenta: 'bgMagentaBright',
  brightCyan: 'bgCyanBright',
  brightWhite: 'bgWhiteBright'
};

export function stylesEqual(a: Style, b: Style): boolean {
  if (a === b) return true;
  if (a.fg !== b.fg || a.bg !== b.bg) return false;
  for (const modifier of MODIFIERS) {
    if ((a[modifier] ?? false) !== (b[modifier] ?? false)) {
      return false;
    }
  }
  return true;
}

export function isDefaultStyle(style: Style): boolean {
  return stylesEqual(style, DEFAULT_STYLE);
}

/**
 * Layer `overlay` on top of `base`; every field set in the overlay wins
 */
export function patchStyle(base: Style, overlay: Style): Style {
  if (overlay === DEFAULT_STYLE) return base;
  const merged: { -readonly [K in keyof Style]: Style[K] } = { ...base };
  if (overlay.fg !== undefined) merged.fg = overlay.fg;
  if (overlay.bg !== undefined) merged.bg = overlay.bg;
  for (const modifier of MODIFIERS) {
    const value = overlay[modifier];
    if (value !== undefined) {
      merged[modifier] = value;
    }
  }
  return merged;
}

function isNamedColor(color: Color): color is NamedColor {
  return typeof color === 'string' && Object.hasOwn(FOREGROUND_NAMES, color);
}

function withForeground(painter: ChalkInstance, color: Color): ChalkInstance {
  if (typeof color === 'number') return painter.ansi256(color);
  if (isNamedColor(color)) return painter[FOREGROUND_NAMES[color]];
  return painter.hex(color);
}

function withBackground(painter: ChalkInstance, color: Color): ChalkInstance {
  if (typeof color === 'number') return painter.bgAnsi256(color);
  if (isNamedColor(color)) return painter[BACKGROUND_NAMES[color]];
  return painter.bgHex(color);
}

/**
 * Wrap text in the escape sequences for `style` using the given chalk instance
 */
export function paint(painter: ChalkInstance, style: Style, text: string): string {
  if (isDefaultStyle(style) || text.length === 0) {
    return text;
  }

  let styled = painter;
  if (style.fg !== undefined) styled = withForeground(styled, style.fg);
  if (style.bg !== undefined) styled = withBackground(styled, style.bg);
  for (const modifier of MODIFIERS) {
    if (style[modifier]) {
      styled = styled[modifier];
    }
  }
  return styled(text);
}
