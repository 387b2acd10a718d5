/**
 * Call-scoped collection of the options parsed for one command.
 *
 * Values stay the strings the user typed; the typed accessors coerce on read.
 */

import { ParseError } from '../errors.js';
import { hasName } from './definitions.js';
import type { ParsedOption } from '../../types/options.js';

const INTEGER_LITERAL = /^[+-]?\d+$/;
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a decimal floating-point literal. Returns undefined for anything
 * else, including the empty string, hex and `Infinity`.
 */
export function parseDecimal(value: string): number | undefined {
  if (!DECIMAL_LITERAL.test(value)) return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

export class ParsedOptions implements Iterable<ParsedOption> {
  private readonly items: readonly ParsedOption[];

  constructor(items: readonly ParsedOption[] = []) {
    this.items = Object.freeze([...items]);
  }

  get size(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<ParsedOption> {
    return this.items[Symbol.iterator]();
  }

  /** Parsed options in the order they appeared. */
  toArray(): readonly ParsedOption[] {
    return this.items;
  }

  /** The parsed option whose short or long name equals `name`. */
  get(name: string): ParsedOption | undefined {
    return this.items.find((item) => hasName(item.option, name));
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Raw value tokens of `name`, or an empty list when absent. */
  args(name: string): readonly string[] {
    return this.get(name)?.args ?? [];
  }

  /** First value of `name` as typed. */
  string(name: string): string | undefined {
    return this.get(name)?.args[0];
  }

  /**
   * First value of `name` as an integer. Throws ParseError when malformed
   * or outside the safe integer range.
   */
  integer(name: string): number | undefined {
    const parsed = this.get(name);
    const raw = parsed?.args[0];
    if (parsed === undefined || raw === undefined) return undefined;
    const value = INTEGER_LITERAL.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (!Number.isSafeInteger(value)) {
      throw new ParseError(`Invalid argument value: ${parsed.token} ${raw}`);
    }
    return value;
  }

  /** First value of `name` as a number. Throws ParseError when malformed. */
  number(name: string): number | undefined {
    const parsed = this.get(name);
    const raw = parsed?.args[0];
    if (parsed === undefined || raw === undefined) return undefined;
    const num = parseDecimal(raw);
    if (num === undefined) {
      throw new ParseError(`Invalid argument value: ${parsed.token} ${raw}`);
    }
    return num;
  }
}
