/**
 * Program loop types
 */

import type { Backend } from './backend.js';
import type { Frame } from './frame.js';
import type { Viewport } from './terminal.js';

/**
 * Quit message - ends `Program.run`
 */
export interface QuitMsg {
  type: 'quit';
}

/**
 * Resize message when terminal size changes
 */
export interface ResizeMsg {
  type: 'resize';
  width: number;
  height: number;
}

/**
 * Error message, delivered when a draw cycle fails
 */
export interface ErrorMsg {
  type: 'error';
  error: Error;
}

/**
 * Messages the program itself produces
 */
export type SystemMsg = QuitMsg | ResizeMsg | ErrorMsg;

/**
 * Command is an async operation that may produce a message
 */
export type Cmd<Msg> = () => Promise<Msg | QuitMsg | null>;

/**
 * Batch allows running multiple commands
 */
export type BatchCmd<Msg> = {
  type: 'batch';
  cmds: Cmd<Msg>[];
};

export type Command<Msg> = Cmd<Msg> | BatchCmd<Msg> | null;

/**
 * Init function returns the initial model and optional command
 */
export type Init<Model, Msg> = () => [Model, Command<Msg>?];

/**
 * Update function handles messages and returns updated model + optional command
 */
export type Update<Model, Msg> = (
  model: Model,
  msg: Msg | SystemMsg
) => [Model, Command<Msg>?];

/**
 * View function draws the current model into the frame
 */
export type View<Model> = (model: Model, frame: Frame) => void;

/**
 * Program options
 */
export interface ProgramOptions {
  /**
   * Backend to draw on (default: an `AnsiBackend` on stdout)
   */
  backend?: Backend;
  /**
   * Use alternate screen buffer (full-screen mode) for the default backend
   */
  altScreen?: boolean;
  /**
   * Viewport passed to the terminal
   */
  viewport?: Viewport;
  /**
   * Quit on SIGINT/SIGTERM (default: true)
   */
  handleSignals?: boolean;
}
