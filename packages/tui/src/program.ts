/**
 * Program - The main event loop
 * Implements The Elm Architecture pattern on top of the render driver:
 * every update schedules one draw cycle, and the view draws into its frame.
 */

import type { Backend } from './backend.js';
import { AnsiBackend } from './backends/ansi-backend.js';
import { isQuitMsg } from './commands.js';
import { getErrorMessage } from './errors.js';
import { logger } from './logger.js';
import { Terminal } from './terminal.js';
import type {
  BatchCmd,
  Cmd,
  Command,
  ErrorMsg,
  Init,
  ProgramOptions,
  SystemMsg,
  Update,
  View
} from './types.js';

export class Program<Model, Msg> {
  private model!: Model;
  private readonly init: Init<Model, Msg>;
  private readonly update: Update<Model, Msg>;
  private readonly view: View<Model>;
  private readonly term: Terminal;
  private readonly handleSignals: boolean;
  private running: boolean = false;
  private renderRequested: boolean = false;
  private unsubscribeResize: (() => void) | null = null;
  private resolveQuit: (() => void) | null = null;

  constructor(
    init: Init<Model, Msg>,
    update: Update<Model, Msg>,
    view: View<Model>,
    options: ProgramOptions = {}
  ) {
    this.init = init;
    this.update = update;
    this.view = view;
    const backend: Backend = options.backend ?? new AnsiBackend({ altScreen: options.altScreen ?? false });
    this.term = new Terminal(backend, options.viewport ? { viewport: options.viewport } : {});
    this.handleSignals = options.handleSignals ?? true;
  }

  /**
   * Run the program until a quit message arrives
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Program is already running');
    }

    this.running = true;
    const quitted = new Promise<void>(resolve => {
      this.resolveQuit = resolve;
    });

    this.setupCleanup();

    const backend = this.term.backend;
    if (backend instanceof AnsiBackend) {
      backend.enter();
    }

    // Resize only queues a message; the driver reads the new size at the
    // start of the next cycle
    this.unsubscribeResize = backend.onResize?.(({ width, height }) => {
      this.handleMessage({ type: 'resize', width, height });
    }) ?? null;

    const [initialModel, initialCmd] = this.init();
    this.model = initialModel;

    this.render();

    if (initialCmd) {
      this.dispatch(initialCmd);
    }

    await quitted;
  }

  /**
   * Send a message to update the model
   */
  send(msg: Msg | SystemMsg): void {
    this.handleMessage(msg);
  }

  /**
   * Quit the program
   */
  quit(): void {
    this.cleanup();
    const resolve = this.resolveQuit;
    this.resolveQuit = null;
    resolve?.();
  }

  get terminal(): Terminal {
    return this.term;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Handle a message by calling update and running returned command
   */
  private handleMessage(msg: Msg | SystemMsg, render: boolean = true): void {
    if (isQuitMsg(msg)) {
      this.quit();
      return;
    }
    if (!this.running) return;

    const [newModel, cmd] = this.update(this.model, msg);
    this.model = newModel;

    if (render) {
      this.requestRender();
    }

    if (cmd) {
      this.dispatch(cmd);
    }
  }

  /**
   * Request a render on next tick
   */
  private requestRender(): void {
    if (this.renderRequested) return;
    this.renderRequested = true;

    setImmediate(() => {
      this.renderRequested = false;
      this.render();
    });
  }

  /**
   * Run one draw cycle with the current model
   */
  private render(): void {
    if (!this.running) return;
    try {
      this.term.draw(frame => this.view(this.model, frame));
    } catch (error) {
      logger.error(`Render failed: ${getErrorMessage(error)}`);
      const errorMsg: ErrorMsg = {
        type: 'error',
        error: error instanceof Error ? error : new Error(getErrorMessage(error))
      };
      // No render request here, or a failing backend would spin
      this.handleMessage(errorMsg, false);
    }
  }

  private dispatch(cmd: NonNullable<Command<Msg>>): void {
    this.runCommand(cmd).catch(err => {
      logger.error(`Command error: ${getErrorMessage(err)}`);
    });
  }

  /**
   * Run a command
   */
  private async runCommand(cmd: Cmd<Msg> | BatchCmd<Msg>): Promise<void> {
    if (this.isBatchCmd(cmd)) {
      // Run all commands in parallel
      const results = await Promise.all(cmd.cmds.map(c => c()));
      for (const result of results) {
        if (result) {
          this.handleMessage(result);
        }
      }
    } else {
      const result = await cmd();
      if (result) {
        this.handleMessage(result);
      }
    }
  }

  /**
   * Type guard for batch commands
   */
  private isBatchCmd(cmd: Cmd<Msg> | BatchCmd<Msg>): cmd is BatchCmd<Msg> {
    return typeof cmd === 'object' && 'type' in cmd && cmd.type === 'batch';
  }

  private handleSignal = (): void => {
    this.quit();
  };

  /**
   * Setup cleanup handlers
   */
  private setupCleanup(): void {
    if (!this.handleSignals) return;
    process.on('SIGINT', this.handleSignal);
    process.on('SIGTERM', this.handleSignal);
    process.on('exit', this.handleSignal);
  }

  /**
   * Cleanup resources
   */
  private cleanup(): void {
    if (!this.running) return;

    this.running = false;
    this.unsubscribeResize?.();
    this.unsubscribeResize = null;
    if (this.handleSignals) {
      process.removeListener('SIGINT', this.handleSignal);
      process.removeListener('SIGTERM', this.handleSignal);
      process.removeListener('exit', this.handleSignal);
    }
    const backend = this.term.backend;
    if (backend instanceof AnsiBackend) {
      backend.leave();
    }
  }
}
