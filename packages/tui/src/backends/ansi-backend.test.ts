/**
 * ANSI Backend Tests
 */

import { describe, it, expect } from 'vitest';
import { Canvas } from '../canvas.js';
import { reconcile } from '../diff.js';
import { rect } from '../rect.js';
import type { Style } from '../style.js';
import { AnsiBackend, type TerminalOutput } from './ansi-backend.js';

const ESC = '\u001b';

class FakeOutput implements TerminalOutput {
  readonly chunks: string[] = [];
  private readonly listeners = new Set<() => void>();

  constructor(
    readonly columns?: number,
    readonly rows?: number
  ) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  on(_event: 'resize', listener: () => void): this {
    this.listeners.add(listener);
    return this;
  }

  removeListener(_event: 'resize', listener: () => void): this {
    this.listeners.delete(listener);
    return this;
  }

  emitResize(): void {
    for (const listener of this.listeners) listener();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

function runsFor(lines: string[], style: Style = {}, width = 6, height = 2) {
  const area = rect(0, 0, width, height);
  const next = Canvas.empty(area);
  lines.forEach((line, y) => next.setText(0, y, line, style));
  return reconcile(Canvas.empty(area), next).runs;
}

describe('AnsiBackend', () => {
  it('should move the cursor before the first run and write text', () => {
    const output = new FakeOutput(6, 2);
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    const next = Canvas.empty(rect(0, 0, 6, 2));
    next.setText(2, 1, 'Hi');
    backend.draw(reconcile(Canvas.empty(next.area), next).runs);
    backend.flush();

    expect(output.chunks).toEqual([`${ESC}[2;3HHi`]);
    expect(backend.getCursor()).toEqual({ x: 4, y: 1 });
  });

  it('should not move the cursor between adjacent runs', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    const next = Canvas.empty(rect(0, 0, 4, 1));
    next.setText(0, 0, 'ab', { bold: true });
    next.setText(2, 0, 'cd');
    backend.draw(reconcile(Canvas.empty(next.area), next).runs);
    backend.flush();

    expect(output.chunks).toEqual([`${ESC}[1;1Habcd`]);
  });

  it('should wrap styled runs in colour sequences', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 1 });

    backend.draw(runsFor(['ok'], { fg: 'red' }));
    backend.flush();

    expect(output.chunks).toEqual([`${ESC}[1;1H${ESC}[31mok${ESC}[39m`]);
  });

  it('should buffer everything until flush', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    backend.draw(runsFor(['a', 'b']));
    backend.hideCursor();
    expect(output.chunks).toEqual([]);

    backend.flush();
    backend.flush();
    expect(output.chunks).toEqual([`${ESC}[1;1Ha${ESC}[2;1Hb${ESC}[?25l`]);
  });

  it('should track explicit cursor moves', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    backend.setCursor(5, 3);
    backend.showCursor();
    backend.flush();

    expect(backend.getCursor()).toEqual({ x: 5, y: 3 });
    expect(output.chunks).toEqual([`${ESC}[4;6H${ESC}[?25h`]);
  });

  it('should erase the screen and home the cursor on clear', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    backend.setCursor(3, 3);
    backend.clear();

    expect(backend.getCursor()).toEqual({ x: 0, y: 0 });
  });

  it('should report the stream size or fall back to 80x24', () => {
    expect(new AnsiBackend({ output: new FakeOutput(100, 40) }).size()).toEqual({ width: 100, height: 40 });
    expect(new AnsiBackend({ output: new FakeOutput() }).size()).toEqual({ width: 80, height: 24 });
  });

  it('should enter and leave the alternate screen once', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, altScreen: true, colorLevel: 0 });

    backend.enter();
    backend.enter();
    backend.leave();
    backend.leave();

    expect(output.chunks).toEqual([`${ESC}[?1049h`, `${ESC}[?25l`, `${ESC}[?25h`, `${ESC}[?1049l`]);
  });

  it('should end with a newline when not using the alternate screen', () => {
    const output = new FakeOutput();
    const backend = new AnsiBackend({ output, colorLevel: 0 });

    backend.enter();
    backend.leave();

    expect(output.chunks).toEqual([`${ESC}[?25l`, `${ESC}[?25h`, '\n']);
  });

  it('should notify resize listeners until unsubscribed', () => {
    const output = new FakeOutput(10, 5);
    const backend = new AnsiBackend({ output });
    const sizes: Array<{ width: number; height: number }> = [];

    const unsubscribe = backend.onResize(size => sizes.push(size));
    output.emitResize();
    unsubscribe();
    output.emitResize();

    expect(sizes).toEqual([{ width: 10, height: 5 }]);
    expect(output.listenerCount).toBe(0);
  });
});
