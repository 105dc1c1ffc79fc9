/**
 * Error types surfaced by the engine
 *
 * Drawing never throws; these cover reads, driver misuse and backend I/O.
 */

import type { Rect } from './rect.js';

export type TesseraErrorCode =
  | 'INVALID_COORDINATE'
  | 'IO_FAILURE'
  | 'REENTRANT_DRAW'
  | 'FRAME_RELEASED';

export class TesseraError extends Error {
  readonly code: TesseraErrorCode;

  constructor(code: TesseraErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCoordinateError extends TesseraError {
  readonly x: number;
  readonly y: number;
  readonly area: Rect;

  constructor(x: number, y: number, area: Rect) {
    super(
      'INVALID_COORDINATE',
      `Coordinate (${x}, ${y}) is outside ${area.width}x${area.height} area at (${area.x}, ${area.y})`
    );
    this.x = x;
    this.y = y;
    this.area = area;
  }
}

export type BackendOperation =
  | 'size'
  | 'draw'
  | 'hideCursor'
  | 'showCursor'
  | 'setCursor'
  | 'getCursor'
  | 'clear'
  | 'flush';

export class TerminalIoError extends TesseraError {
  readonly operation: BackendOperation;

  constructor(operation: BackendOperation, cause: unknown) {
    super('IO_FAILURE', `Backend ${operation} failed: ${getErrorMessage(cause)}`, { cause });
    this.operation = operation;
  }
}

export class ReentrantDrawError extends TesseraError {
  constructor() {
    super('REENTRANT_DRAW', 'draw() called while another cycle is in progress');
  }
}

export class FrameReleasedError extends TesseraError {
  constructor(count: number) {
    super('FRAME_RELEASED', `Frame ${count} was used after its drawing cycle ended`);
  }
}

/**
 * Safely extracts the message from an error object
 * Works with both Error objects and unknown types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }

  return String(error);
}
