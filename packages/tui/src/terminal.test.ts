/**
 * Terminal Driver Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { TestBackend } from './backends/test-backend.js';
import { FrameReleasedError, ReentrantDrawError, TerminalIoError } from './errors.js';
import { FRAME_COUNT_MAX, type Frame } from './frame.js';
import { setConsoleLoggingEnabled } from './logger.js';
import { rect } from './rect.js';
import { Terminal } from './terminal.js';
import { Line } from './text.js';

class FlakyBackend extends TestBackend {
  failFlush = false;

  override flush(): void {
    if (this.failFlush) {
      this.failFlush = false;
      throw new Error('broken pipe');
    }
    super.flush();
  }
}

function hello(frame: Frame): void {
  frame.renderWidget('Hello', frame.size());
}

describe('Terminal', () => {
  beforeAll(() => {
    setConsoleLoggingEnabled(false);
  });

  afterAll(() => {
    setConsoleLoggingEnabled(true);
  });

  describe('draw', () => {
    it('should write Hello to a fresh 5x1 backend', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);

      const completed = terminal.draw(hello);

      expect(backend.lines()).toEqual(['Hello']);
      expect(backend.lastDraw).toHaveLength(1);
      expect(backend.lastDraw[0]?.text).toBe('Hello');
      expect(completed.count).toBe(0);
      expect(completed.area).toEqual({ x: 0, y: 0, width: 5, height: 1 });
      expect(completed.buffer.toLines()).toEqual(['Hello']);
    });

    it('should draw, place the cursor, then flush', () => {
      const backend = new TestBackend(5, 1);
      new Terminal(backend).draw(hello);

      expect(backend.calls).toEqual([
        { op: 'draw', runs: 1, cells: 5 },
        { op: 'hideCursor' },
        { op: 'flush' }
      ]);
    });

    it('should write nothing when a cycle repeats the previous one', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);

      terminal.draw(hello);
      terminal.draw(hello);

      expect(backend.lastDraw).toEqual([]);
      expect(terminal.lastRenderedPatch?.cellCount).toBe(0);
      expect(backend.lines()).toEqual(['Hello']);
    });

    it('should write only the changed cells on later cycles', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);

      terminal.draw(hello);
      terminal.draw(frame => frame.renderWidget('Help!', frame.size()));

      expect(backend.lastDraw.map(run => [run.x, run.text])).toEqual([[3, 'p!']]);
      expect(backend.lines()).toEqual(['Help!']);
    });

    it('should start every cycle from a blank canvas', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);

      terminal.draw(hello);
      const completed = terminal.draw(frame => frame.renderWidget('Hi', frame.size()));

      expect(completed.buffer.toLines()).toEqual(['Hi   ']);
      expect(backend.lines()).toEqual(['Hi   ']);
    });

    it('should repaint everything on the first cycle', () => {
      const terminal = new Terminal(new TestBackend(3, 2));
      terminal.draw(() => {});
      expect(terminal.lastRenderedPatch?.fullRepaint).toBe(true);
      expect(terminal.lastRenderedPatch?.cellCount).toBe(6);
    });

    it('should return to idle and count frames', () => {
      const terminal = new Terminal(new TestBackend(5, 1));
      const states: string[] = [];

      terminal.draw(() => {
        states.push(terminal.state);
      });
      terminal.draw(() => {});

      expect(states).toEqual(['drawing']);
      expect(terminal.state).toBe('idle');
      expect(terminal.frameCount).toBe(2);
    });
  });

  describe('cursor', () => {
    it('should hide the cursor when the frame does not set it', () => {
      const backend = new TestBackend(5, 1);
      new Terminal(backend).draw(hello);
      expect(backend.cursorVisible).toBe(false);
    });

    it('should show the cursor at the last position set during the cycle', () => {
      const backend = new TestBackend(5, 1);
      new Terminal(backend).draw(frame => {
        frame.setCursor(1, 0);
        frame.setCursor(3, 0);
      });

      expect(backend.cursorVisible).toBe(true);
      expect(backend.getCursor()).toEqual({ x: 3, y: 0 });
      expect(backend.calls.slice(1)).toEqual([
        { op: 'showCursor' },
        { op: 'setCursor', x: 3, y: 0 },
        { op: 'flush' }
      ]);
    });

    it('should expose direct cursor control', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);

      terminal.setCursorPosition(2, 0);
      terminal.hideCursor();

      expect(terminal.getCursorPosition()).toEqual({ x: 2, y: 0 });
      expect(backend.cursorVisible).toBe(false);
      expect(backend.flushCount).toBe(2);
    });
  });

  describe('frame count', () => {
    it('should wrap to zero after the maximum', () => {
      const terminal = new Terminal(new TestBackend(1, 1), { initialFrameCount: FRAME_COUNT_MAX });
      const seen: number[] = [];

      const first = terminal.draw(frame => seen.push(frame.count()));
      const second = terminal.draw(frame => seen.push(frame.count()));

      expect(seen).toEqual([0xffffffff, 0]);
      expect(first.count).toBe(0xffffffff);
      expect(second.count).toBe(0);
      expect(terminal.frameCount).toBe(1);
    });
  });

  describe('resize', () => {
    it('should pick up a new backend size and repaint everything', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);
      terminal.draw(hello);

      backend.resize(3, 2);
      const completed = terminal.draw(frame => {
        frame.renderWidget(new Line('abc'), frame.size());
      });

      expect(completed.area).toEqual({ x: 0, y: 0, width: 3, height: 2 });
      expect(terminal.viewportArea).toEqual({ x: 0, y: 0, width: 3, height: 2 });
      expect(terminal.lastRenderedPatch?.fullRepaint).toBe(true);
      expect(backend.calls).toContainEqual({ op: 'clear' });
      expect(backend.lines()).toEqual(['abc', '   ']);
    });

    it('should keep a fixed viewport regardless of the backend size', () => {
      const backend = new TestBackend(10, 3);
      const area = rect(2, 1, 4, 1);
      const terminal = new Terminal(backend, { viewport: { kind: 'fixed', area } });

      terminal.draw(frame => {
        expect(frame.size()).toEqual(area);
        frame.renderWidget('abcdef', frame.size());
      });
      backend.resize(20, 5);
      terminal.draw(frame => frame.renderWidget('abcdef', frame.size()));

      expect(terminal.viewportArea).toEqual(area);
      expect(backend.calls).not.toContainEqual({ op: 'clear' });
    });

    it('should draw a fixed viewport at its offset', () => {
      const backend = new TestBackend(8, 3);
      const terminal = new Terminal(backend, { viewport: { kind: 'fixed', area: rect(2, 1, 4, 1) } });

      terminal.draw(frame => frame.renderWidget('ab', frame.size()));

      expect(backend.lines()).toEqual(['        ', '  ab    ', '        ']);
    });
  });

  describe('clear', () => {
    it('should erase the screen and repaint on the next cycle', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);
      terminal.draw(hello);

      terminal.clear();
      expect(backend.lines()).toEqual(['     ']);

      terminal.draw(hello);
      expect(terminal.lastRenderedPatch?.fullRepaint).toBe(true);
      expect(backend.lines()).toEqual(['Hello']);
    });
  });

  describe('errors', () => {
    it('should wrap backend failures in TerminalIoError', () => {
      const backend = new FlakyBackend(5, 1);
      const terminal = new Terminal(backend);
      backend.failFlush = true;

      try {
        terminal.draw(hello);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TerminalIoError);
        if (error instanceof TerminalIoError) {
          expect(error.code).toBe('IO_FAILURE');
          expect(error.operation).toBe('flush');
          expect(error.cause).toBeInstanceOf(Error);
          expect(error.message).toBe('Backend flush failed: broken pipe');
        }
      }
      expect(terminal.state).toBe('idle');
      expect(terminal.frameCount).toBe(0);
    });

    it('should repaint everything after a failed cycle', () => {
      const backend = new FlakyBackend(5, 1);
      const terminal = new Terminal(backend);
      terminal.draw(hello);

      backend.failFlush = true;
      expect(() => terminal.draw(hello)).toThrow(TerminalIoError);

      terminal.draw(hello);
      expect(terminal.lastRenderedPatch?.fullRepaint).toBe(true);
      expect(backend.lastDraw[0]?.text).toBe('Hello');
    });

    it('should discard a cycle whose render callback throws', () => {
      const backend = new TestBackend(5, 1);
      const terminal = new Terminal(backend);
      terminal.draw(hello);

      expect(() =>
        terminal.draw(frame => {
          frame.renderWidget('XX', frame.size());
          throw new Error('view failed');
        })
      ).toThrow('view failed');

      terminal.draw(hello);
      expect(backend.lastDraw).toEqual([]);
      expect(terminal.frameCount).toBe(2);
    });

    it('should reject a draw started from inside another', () => {
      const terminal = new Terminal(new TestBackend(5, 1));
      expect(() => terminal.draw(() => terminal.draw(() => {}))).toThrow(ReentrantDrawError);
      expect(terminal.state).toBe('idle');
    });

    it('should reject use of a frame after its cycle ends', () => {
      const terminal = new Terminal(new TestBackend(5, 1));
      const frames: Frame[] = [];
      terminal.draw(frame => {
        frames.push(frame);
      });
      const kept = frames[0];

      expect(kept?.isReleased).toBe(true);
      expect(() => kept?.setCursor(0, 0)).toThrow(FrameReleasedError);
      expect(() => kept?.bufferMut()).toThrow(FrameReleasedError);
    });
  });
});
