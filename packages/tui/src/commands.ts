/**
 * Commands returned from `init` and `update`
 */

import type { BatchCmd, Cmd, QuitMsg } from './types.js';

/**
 * Run several commands at once. Each result goes back through `update`
 * in the order the commands were given.
 */
export function batch<Msg>(...cmds: Cmd<Msg>[]): BatchCmd<Msg> {
  return { type: 'batch', cmds };
}

/**
 * Stop the program once the command resolves
 */
export function quit<Msg>(): Cmd<Msg> {
  return async (): Promise<QuitMsg> => ({ type: 'quit' });
}

/**
 * Wait `intervalMs`, then build a message. The factory runs when the timer
 * fires, so clock readings taken inside it are current.
 */
export function every<Msg>(intervalMs: number, build: () => Msg): Cmd<Msg> {
  return () =>
    new Promise<Msg>(resolve => {
      setTimeout(() => resolve(build()), intervalMs);
    });
}

export function isQuitMsg(msg: unknown): msg is QuitMsg {
  return typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === 'quit';
}
