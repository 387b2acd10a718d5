/**
 * Raw console I/O used by commands and the CLI runner.
 *
 * The engine itself only calls write() (help output) and writeErrorLine()
 * (runner error reporting); readLine() and readKey() are for command actions.
 */

import { createInterface, type Interface } from 'node:readline';
import { paint, RED } from './renderers/colors.js';

export interface IoService {
  write(text: string): void;
  writeLine(text?: string): void;
  writeError(text: string): void;
  writeErrorLine(text: string): void;
  /** Next line of input, or undefined once input has ended. */
  readLine(): Promise<string | undefined>;
  /** Next key press as the raw characters received, or '' once input has ended. */
  readKey(): Promise<string>;
}

/** Readable input, optionally a TTY that can switch to raw mode. */
export type IoInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface ConsoleIoOptions {
  input?: IoInput;
  output?: NodeJS.WritableStream;
  error?: NodeJS.WritableStream;
  /** Paint error text red. */
  color?: boolean;
}

export class ConsoleIoService implements IoService {
  private readonly input: IoInput;
  private readonly output: NodeJS.WritableStream;
  private readonly error: NodeJS.WritableStream;
  private readonly color: boolean;
  private reader: Interface | null = null;
  private readonly pendingLines: string[] = [];
  private readonly waiters: Array<(line: string | undefined) => void> = [];
  private inputEnded = false;

  constructor(options: ConsoleIoOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.error = options.error ?? process.stderr;
    this.color = options.color ?? false;
  }

  write(text: string): void {
    this.output.write(text);
  }

  writeLine(text = ''): void {
    this.output.write(`${text}\n`);
  }

  writeError(text: string): void {
    this.error.write(paint(text, RED, this.color));
  }

  writeErrorLine(text: string): void {
    this.error.write(`${paint(text, RED, this.color)}\n`);
  }

  readLine(): Promise<string | undefined> {
    const queued = this.pendingLines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.inputEnded) return Promise.resolve(undefined);

    const reader = this.getReader();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
      reader.resume();
    });
  }

  /** One line reader per service. Paused whenever no read is pending. */
  private getReader(): Interface {
    if (this.reader) return this.reader;

    const reader = createInterface({ input: this.input, terminal: false });
    reader.on('line', (line: string) => {
      const waiter = this.waiters.shift();
      if (waiter) waiter(line);
      else this.pendingLines.push(line);
      if (this.waiters.length === 0 && this.reader === reader) reader.pause();
    });
    reader.on('close', () => {
      // A reader detached for a key read does not mean end of input
      if (this.reader !== reader) return;
      this.reader = null;
      this.endInput();
    });
    this.reader = reader;
    return reader;
  }

  /** Close the line reader so a key read is the only consumer of input. */
  private detachReader(): void {
    const reader = this.reader;
    if (!reader) return;
    this.reader = null;
    reader.close();
  }

  private endInput(): void {
    this.inputEnded = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  readKey(): Promise<string> {
    if (this.inputEnded) return Promise.resolve('');
    this.detachReader();

    const input = this.input;
    const wasRaw = input.isRaw === true;
    const setRawMode = input.isTTY ? input.setRawMode : undefined;
    setRawMode?.call(input, true);

    return new Promise((resolve) => {
      const finish = (key: string): void => {
        input.removeListener('data', onData);
        input.removeListener('end', onEnd);
        input.removeListener('close', onEnd);
        setRawMode?.call(input, wasRaw);
        input.pause();
        if (this.waiters.length > 0) this.getReader().resume();
        resolve(key);
      };
      const onData = (chunk: Buffer | string): void => {
        finish(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      };
      const onEnd = (): void => {
        this.endInput();
        finish('');
      };

      input.on('data', onData);
      input.on('end', onEnd);
      input.on('close', onEnd);
      input.resume();
    });
  }
}
