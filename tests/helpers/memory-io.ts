/**
 * In-memory IoService for tests: captures output and serves scripted input.
 */

import type { IoService } from '../../src/cli/io.js';

export class MemoryIoService implements IoService {
  out = '';
  err = '';
  private readonly lines: string[];
  private readonly keys: string[];

  constructor(input: { lines?: string[]; keys?: string[] } = {}) {
    this.lines = [...(input.lines ?? [])];
    this.keys = [...(input.keys ?? [])];
  }

  write(text: string): void {
    this.out += text;
  }

  writeLine(text = ''): void {
    this.out += `${text}\n`;
  }

  writeError(text: string): void {
    this.err += text;
  }

  writeErrorLine(text: string): void {
    this.err += `${text}\n`;
  }

  async readLine(): Promise<string | undefined> {
    return this.lines.shift();
  }

  async readKey(): Promise<string> {
    return this.keys.shift() ?? '';
  }
}
