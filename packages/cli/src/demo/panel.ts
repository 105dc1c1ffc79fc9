/**
 * Bordered panel with an optional title in the top border
 */

import {
  Widget,
  createCell,
  innerRect,
  rectBottom,
  rectRight,
  symbolWidth,
  type Canvas,
  type Rect,
  type Style
} from '@tessera/tui';

/**
 * Box drawing characters
 */
export const BOX_STYLES = {
  single: {
    topLeft: '┌',
    topRight: '┐',
    bottomLeft: '└',
    bottomRight: '┘',
    horizontal: '─',
    vertical: '│'
  },
  double: {
    topLeft: '╔',
    topRight: '╗',
    bottomLeft: '╚',
    bottomRight: '╝',
    horizontal: '═',
    vertical: '║'
  },
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
    horizontal: '─',
    vertical: '│'
  },
  heavy: {
    topLeft: '┏',
    topRight: '┓',
    bottomLeft: '┗',
    bottomRight: '┛',
    horizontal: '━',
    vertical: '┃'
  }
} as const;

export type BoxStyleName = keyof typeof BOX_STYLES;

export interface PanelOptions {
  title?: string;
  box?: BoxStyleName;
  titleAlign?: 'left' | 'center' | 'right';
  borderStyle?: Style;
  titleStyle?: Style;
}

export class Panel extends Widget {
  constructor(private readonly options: PanelOptions = {}) {
    super();
  }

  /**
   * Area left for content inside the border
   */
  inner(area: Rect): Rect {
    return innerRect(area, 1);
  }

  renderRef(area: Rect, canvas: Canvas): void {
    if (area.width < 2 || area.height < 2) return;

    const box = BOX_STYLES[this.options.box ?? 'single'];
    const border = this.options.borderStyle ?? {};
    const right = rectRight(area) - 1;
    const bottom = rectBottom(area) - 1;

    for (let x = area.x + 1; x < right; x++) {
      canvas.setCell(x, area.y, createCell(box.horizontal, border));
      canvas.setCell(x, bottom, createCell(box.horizontal, border));
    }
    for (let y = area.y + 1; y < bottom; y++) {
      canvas.setCell(area.x, y, createCell(box.vertical, border));
      canvas.setCell(right, y, createCell(box.vertical, border));
    }
    canvas.setCell(area.x, area.y, createCell(box.topLeft, border));
    canvas.setCell(right, area.y, createCell(box.topRight, border));
    canvas.setCell(area.x, bottom, createCell(box.bottomLeft, border));
    canvas.setCell(right, bottom, createCell(box.bottomRight, border));

    if (this.options.title) {
      this.renderTitle(area, canvas, ` ${this.options.title} `);
    }
  }

  private renderTitle(area: Rect, canvas: Canvas, title: string): void {
    const innerWidth = area.width - 2;
    const titleWidth = symbolWidth(title);
    if (titleWidth >= innerWidth) return;

    let leftPad: number;
    switch (this.options.titleAlign) {
      case 'center':
        leftPad = Math.floor((innerWidth - titleWidth) / 2);
        break;
      case 'right':
        leftPad = innerWidth - titleWidth - 1;
        break;
      default:
        leftPad = 1;
    }
    canvas.setText(area.x + 1 + leftPad, area.y, title, this.options.titleStyle ?? { bold: true });
  }
}
