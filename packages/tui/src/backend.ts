/**
 * Backend contract
 *
 * The driver talks to the physical terminal only through this interface,
 * and only while flushing a cycle: runs first, then cursor, then flush.
 */

import type { PatchRun } from './diff.js';
import type { Position } from './rect.js';

export interface BackendSize {
  width: number;
  height: number;
}

export interface Backend {
  /**
   * Write styled runs. A run with `move` set starts with a cursor move.
   */
  draw(runs: readonly PatchRun[]): void;
  hideCursor(): void;
  showCursor(): void;
  setCursor(x: number, y: number): void;
  getCursor(): Position;
  /**
   * Current physical size in columns and rows
   */
  size(): BackendSize;
  /**
   * Erase the whole screen
   */
  clear(): void;
  flush(): void;
  /**
   * Subscribe to size changes. Returns an unsubscribe function.
   */
  onResize?(listener: (size: BackendSize) => void): () => void;
}
