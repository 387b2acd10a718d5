/**
 * Option-prefix parser.
 *
 * Consumes the longest prefix of `args` made of recognised option tokens and
 * their value tokens. The first unrecognised token ends the prefix; it and
 * everything after it belong to the sub-command or to positional input.
 */

import { ParseError } from '../errors.js';
import { matchesToken } from './definitions.js';
import { ParsedOptions } from './parsed-options.js';
import type { OptionDefinition, ParsedOption } from '../../types/options.js';

export interface OptionParseResult {
  /** Number of tokens consumed from the front of the input. */
  consumed: number;
  options: ParsedOptions;
}

export function parseOptions(
  definitions: readonly OptionDefinition[],
  args: readonly string[],
): OptionParseResult {
  const parsed: ParsedOption[] = [];
  let index = 0;

  for (;;) {
    const token = args[index];
    if (token === undefined) break;
    const option = definitions.find((def) => matchesToken(def, token));
    if (!option) break;

    const previous = parsed.find((item) => item.option === option);
    if (previous) {
      throw new ParseError(
        previous.token === token
          ? `Option ${token} was given more than once.`
          : `Option ${token} was given more than once (already set as ${previous.token}).`,
      );
    }

    const arity = option.args.length;
    const available = args.length - index - 1;
    if (available < arity) {
      throw new ParseError(
        `Option ${token} requires ${arity} argument${arity === 1 ? '' : 's'} (${option.args.join(', ')}), got ${available}.`,
      );
    }

    parsed.push({
      option,
      token,
      args: Object.freeze(args.slice(index + 1, index + 1 + arity)),
    });
    index += 1 + arity;
  }

  return { consumed: index, options: new ParsedOptions(parsed) };
}
