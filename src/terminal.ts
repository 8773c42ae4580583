// Terminal lifecycle management - setup, cleanup, signal handling and the
// queue of input events read from the terminal

import process from 'node:process';
import { ANSI } from './ansi-output.js';
import type { BrowserEvent, KeyEvent } from './events.js';
import { KeyDecoder } from './input.js';
import type { Size } from './geometry.js';
import { getLogger } from './logging.js';

const logger = getLogger('Terminal');

export interface TerminalOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  alternateScreen?: boolean;
  hideCursor?: boolean;
}

export type TerminalEvent =
  | { kind: 'key'; key: KeyEvent }
  | { kind: 'browser'; event: BrowserEvent };

const DEFAULT_SIZE: Size = { width: 80, height: 24 };

/**
 * Raw-mode terminal: writes frames and queues key and resize events. Events
 * are handed out one at a time by `nextEvent`.
 */
export class Terminal {
  private readonly _input: NodeJS.ReadStream;
  private readonly _output: NodeJS.WriteStream;
  private readonly _options: Required<Pick<TerminalOptions, 'alternateScreen' | 'hideCursor'>>;
  private readonly _decoder = new KeyDecoder();
  private readonly _queue: TerminalEvent[] = [];
  private _waiter: ((event: TerminalEvent) => void) | null = null;
  private _started = false;

  private readonly _onData = (data: Buffer) => {
    for (const key of this._decoder.processRawInput(data)) this._push({ kind: 'key', key });
  };

  private readonly _onResize = () => {
    const { width, height } = this.size();
    this._push({ kind: 'browser', event: { type: 'resize', width, height } });
  };

  private readonly _onSignal = (signal: NodeJS.Signals) => {
    logger.info('Terminating on signal', { signal });
    this._push({ kind: 'browser', event: { type: 'quit' } });
  };

  // Registered with process 'exit' so the terminal is restored however we leave
  private readonly _onExit = () => this.stop();

  constructor(options: TerminalOptions = {}) {
    this._input = options.input ?? process.stdin;
    this._output = options.output ?? process.stdout;
    this._options = {
      alternateScreen: options.alternateScreen ?? true,
      hideCursor: options.hideCursor ?? true,
    };
  }

  get isInteractive(): boolean {
    return this._input.isTTY === true && this._output.isTTY === true;
  }

  size(): Size {
    return {
      width: this._output.columns || DEFAULT_SIZE.width,
      height: this._output.rows || DEFAULT_SIZE.height,
    };
  }

  /**
   * Set up terminal for full-screen mode (raw input, alternate screen, hidden cursor)
   */
  start(): void {
    if (this._started) return;
    this._started = true;

    if (this._input.isTTY) this._input.setRawMode(true);
    this._input.on('data', this._onData);
    this._input.resume();
    this._output.on('resize', this._onResize);
    process.on('SIGTERM', this._onSignal);
    process.on('SIGHUP', this._onSignal);
    process.on('exit', this._onExit);

    const codes: string[] = [];
    if (this._options.alternateScreen) codes.push(ANSI.alternateScreen);
    if (this._options.hideCursor) codes.push(ANSI.hideCursor);
    codes.push(ANSI.clearScreen, ANSI.cursorHome);
    this._output.write(codes.join(''));
    logger.debug('Terminal started', { ...this.size() });
  }

  /**
   * Clean up terminal (restore normal screen, show cursor)
   */
  stop(): void {
    if (!this._started) return;
    this._started = false;

    this._input.off('data', this._onData);
    this._output.off('resize', this._onResize);
    process.off('SIGTERM', this._onSignal);
    process.off('SIGHUP', this._onSignal);
    process.off('exit', this._onExit);
    if (this._input.isTTY) this._input.setRawMode(false);
    this._input.pause();

    const codes: string[] = [ANSI.reset];
    if (this._options.alternateScreen) codes.push(ANSI.normalScreen);
    if (this._options.hideCursor) codes.push(ANSI.showCursor);
    this._output.write(codes.join(''));
    logger.debug('Terminal restored');
  }

  /** Write one frame inside a synchronized update */
  writeFrame(data: string): void {
    if (data === '') return;
    this._output.write(ANSI.beginSync + data + ANSI.endSync);
  }

  /** Queue an event as if it came from the terminal */
  post(event: BrowserEvent): void {
    this._push({ kind: 'browser', event });
  }

  /** Next queued event, waiting for one if the queue is empty */
  nextEvent(): Promise<TerminalEvent> {
    const queued = this._queue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise(resolve => {
      this._waiter = resolve;
    });
  }

  private _push(event: TerminalEvent): void {
    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter(event);
    } else {
      this._queue.push(event);
    }
  }
}
