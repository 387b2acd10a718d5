/**
 * Option declarations and name lookups.
 *
 * Options are declared with bare names (`tag`, `t`) and typed on the command
 * line as `--tag` / `-t`. Requirement rules reference either bare name.
 */

import { ConfigurationError } from '../errors.js';
import type { ArgKind, OptionDefinition } from '../../types/options.js';

const OPTION_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/** Input accepted by defineOption(). */
export interface OptionInput {
  long: string;
  short?: string;
  description: string;
  args?: readonly ArgKind[];
}

function assertOptionName(name: string, label: string): void {
  if (!OPTION_NAME.test(name)) {
    throw new ConfigurationError(
      `Invalid ${label} option name '${name}': use letters, digits, '_', '.' or '-', without leading dashes.`,
    );
  }
}

/**
 * Declare an option. The returned definition is frozen.
 *
 * @example
 * defineOption({ long: 'tag', short: 't', description: 'Image tag', args: ['string'] })
 */
export function defineOption(input: OptionInput): OptionDefinition {
  assertOptionName(input.long, 'long');
  if (input.short !== undefined) assertOptionName(input.short, 'short');
  if (input.description.trim() === '') {
    throw new ConfigurationError(`Option --${input.long} needs a description.`);
  }

  return Object.freeze({
    long: input.long,
    ...(input.short !== undefined && { short: input.short }),
    description: input.description,
    args: Object.freeze([...(input.args ?? [])]),
  });
}

/** Canonical token for an option, e.g. `--tag`. */
export function longToken(option: OptionDefinition): string {
  return `--${option.long}`;
}

/** Alias token for an option, e.g. `-t`, if it has one. */
export function shortToken(option: OptionDefinition): string | undefined {
  return option.short === undefined ? undefined : `-${option.short}`;
}

/** True when `name` is the option's short or long name. */
export function hasName(option: OptionDefinition, name: string): boolean {
  return option.long === name || option.short === name;
}

/** True when `token` is how the option is typed on the command line. */
export function matchesToken(option: OptionDefinition, token: string): boolean {
  return token === longToken(option) || token === shortToken(option);
}

/**
 * Find the definition whose short or long name equals `name`.
 * A rule that names an undeclared option is a configuration error.
 */
export function findOptionByName(
  definitions: readonly OptionDefinition[],
  name: string,
): OptionDefinition {
  const found = definitions.find((def) => hasName(def, name));
  if (!found) {
    throw new ConfigurationError(`Option '${name}' is referenced by a requirement but never declared.`);
  }
  return found;
}

/**
 * Check a command's option list: long names unique, short names unique, and
 * no short name shadowing another option's long name.
 */
export function assertValidDefinitions(definitions: readonly OptionDefinition[]): void {
  const longNames = new Set<string>();
  const shortNames = new Set<string>();

  for (const def of definitions) {
    if (longNames.has(def.long)) {
      throw new ConfigurationError(`Option --${def.long} is declared more than once.`);
    }
    longNames.add(def.long);

    if (def.short !== undefined) {
      if (shortNames.has(def.short)) {
        throw new ConfigurationError(`Short option -${def.short} is declared more than once.`);
      }
      shortNames.add(def.short);
    }
  }

  for (const def of definitions) {
    if (def.short !== undefined && def.short !== def.long && longNames.has(def.short)) {
      throw new ConfigurationError(
        `Short option -${def.short} of --${def.long} clashes with the long option --${def.short}.`,
      );
    }
  }
}
