/**
 * Styled text primitives
 */

import type { Canvas } from './canvas.js';
import { symbolWidth } from './cell.js';
import { Widget } from './drawable.js';
import { isEmptyRect, rect, rectRight, type Rect } from './rect.js';
import { DEFAULT_STYLE, patchStyle, type Style } from './style.js';

export type Alignment = 'left' | 'center' | 'right';

/**
 * A run of text sharing one style
 */
export class Span extends Widget {
  constructor(
    readonly content: string,
    readonly style: Style = DEFAULT_STYLE
  ) {
    super();
  }

  static raw(content: string): Span {
    return new Span(content);
  }

  static styled(content: string, style: Style): Span {
    return new Span(content, style);
  }

  width(): number {
    return symbolWidth(this.content);
  }

  renderRef(area: Rect, canvas: Canvas): void {
    if (isEmptyRect(area)) return;
    canvas.setText(area.x, area.y, this.content, this.style, area.width);
  }
}

/**
 * One row of spans. The line style is applied to the whole row first, then
 * each span's style is layered over it.
 */
export class Line extends Widget {
  readonly spans: readonly Span[];
  readonly style: Style;
  readonly alignment: Alignment;

  constructor(spans: string | Span | readonly Span[], options: { style?: Style; alignment?: Alignment } = {}) {
    super();
    if (typeof spans === 'string') {
      this.spans = [new Span(spans)];
    } else if (spans instanceof Span) {
      this.spans = [spans];
    } else {
      this.spans = spans;
    }
    this.style = options.style ?? DEFAULT_STYLE;
    this.alignment = options.alignment ?? 'left';
  }

  static from(text: string): Line {
    return new Line(text);
  }

  width(): number {
    return this.spans.reduce((total, span) => total + span.width(), 0);
  }

  aligned(alignment: Alignment): Line {
    return new Line(this.spans, { style: this.style, alignment });
  }

  centered(): Line {
    return this.aligned('center');
  }

  rightAligned(): Line {
    return this.aligned('right');
  }

  styled(style: Style): Line {
    return new Line(this.spans, { style, alignment: this.alignment });
  }

  renderRef(area: Rect, canvas: Canvas): void {
    if (isEmptyRect(area)) return;

    const row = rect(area.x, area.y, area.width, 1);
    canvas.setStyle(row, this.style);

    // Too wide for the area: always keep the start of the line
    const free = Math.max(0, area.width - this.width());
    let offset = 0;
    if (this.alignment === 'center') {
      offset = Math.floor(free / 2);
    } else if (this.alignment === 'right') {
      offset = free;
    }

    let x = area.x + offset;
    const right = rectRight(area);
    for (const span of this.spans) {
      if (x >= right) break;
      const end = x + span.width();
      x = canvas.setText(x, area.y, span.content, patchStyle(this.style, span.style), right - x);
      // A glyph was dropped at the edge; later spans must not fill its columns
      if (x < end) break;
    }
  }
}
