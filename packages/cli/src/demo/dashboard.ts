/**
 * Demo dashboard
 *
 * A panel that changes a little on every tick: uptime, frame counter and a
 * progress bar. Static parts (border, labels) are written once; later
 * frames only touch the cells that change.
 */

import {
  Line,
  Span,
  every,
  rect,
  rectBottom,
  type Command,
  type Frame,
  type Init,
  type Rect,
  type Update,
  type View
} from '@tessera/tui';
import { Panel } from './panel.js';

export interface DashboardModel {
  startedAt: number;
  now: number;
  progress: number;
  lastError: string | null;
}

export type DashboardMsg = { type: 'tick'; time: number };

export interface DashboardOptions {
  tickMs: number;
  clock?: () => number;
  title?: string;
}

const LABEL = { bold: true } as const;
const PROGRESS_STEP = 5;
const PROMPT = '> ';
export const WIDE_SAMPLE = '漢字 かな wide glyphs';

/**
 * mm:ss, or h:mm:ss once an hour has passed
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const mmss = `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  return hours > 0 ? `${hours}:${mmss}` : mmss;
}

/**
 * `[████░░░░]  50%` fitted to `width` columns
 */
export function progressBar(percent: number, width: number): string {
  const label = ` ${String(percent).padStart(3)}%`;
  const barWidth = Math.max(0, width - label.length - 2);
  const filled = Math.round((barWidth * percent) / 100);
  return `[${'█'.repeat(filled)}${'░'.repeat(barWidth - filled)}]${label}`;
}

function row(inner: Rect, index: number): Rect {
  return rect(inner.x + 1, inner.y + index, inner.width - 2, 1);
}

export function createDashboard(options: DashboardOptions): {
  init: Init<DashboardModel, DashboardMsg>;
  update: Update<DashboardModel, DashboardMsg>;
  view: View<DashboardModel>;
} {
  const clock = options.clock ?? Date.now;
  const panel = new Panel({ title: options.title ?? 'tessera', box: 'rounded', titleAlign: 'center' });
  const tick = (): Command<DashboardMsg> => every(options.tickMs, (): DashboardMsg => ({ type: 'tick', time: clock() }));

  const init: Init<DashboardModel, DashboardMsg> = () => {
    const now = clock();
    return [{ startedAt: now, now, progress: 0, lastError: null }, tick()];
  };

  const update: Update<DashboardModel, DashboardMsg> = (model, msg) => {
    switch (msg.type) {
      case 'tick':
        return [
          {
            ...model,
            now: msg.time,
            progress: model.progress >= 100 ? 0 : model.progress + PROGRESS_STEP
          },
          tick()
        ];
      case 'error':
        return [{ ...model, lastError: msg.error.message }];
      default:
        return [model];
    }
  };

  const view: View<DashboardModel> = (model, frame: Frame) => {
    const area = frame.size();
    frame.renderWidgetRef(panel, area);
    const inner = panel.inner(area);
    if (inner.height === 0) return;

    const lines = [
      new Line([Span.styled('Uptime  ', LABEL), Span.raw(formatDuration(model.now - model.startedAt))]),
      new Line([Span.styled('Frame   ', LABEL), Span.raw(String(frame.count()))]),
      new Line([Span.styled('Size    ', LABEL), Span.raw(`${area.width}x${area.height}`)]),
      new Line(WIDE_SAMPLE),
      new Line(progressBar(model.progress, inner.width - 2), { style: { fg: 'green' } })
    ];
    if (model.lastError !== null) {
      lines.push(new Line(model.lastError, { style: { fg: 'red' } }));
    }

    // Last inner row holds the prompt
    lines.slice(0, inner.height - 1).forEach((line, i) => {
      frame.renderWidgetRef(line, row(inner, i));
    });

    const promptRow = rectBottom(inner) - 1;
    frame.renderWidget(new Line(PROMPT, { style: LABEL }), rect(inner.x + 1, promptRow, inner.width - 2, 1));
    frame.setCursor(inner.x + 1 + PROMPT.length, promptRow);
  };

  return { init, update, view };
}
