/**
 * Option requirement engine.
 *
 * Rules are plain tagged values built with exclusive(), requireOneOf(),
 * ifPresentThen() and range(). validateRequirements() runs every top-level
 * rule and returns all violations in rule order; describeRequirement()
 * renders the line shown under "Option requirements:" in help.
 */

import { ConfigurationError } from '../errors.js';
import { findOptionByName, hasName, longToken } from './definitions.js';
import { parseDecimal, type ParsedOptions } from './parsed-options.js';
import type {
  ExclusiveRequirement,
  IfPresentThenRequirement,
  OptionDefinition,
  OptionRequirement,
  OptionRequirementError,
  RangeRequirement,
  RequireOneOfRequirement,
} from '../../types/options.js';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function exclusive(...names: string[]): ExclusiveRequirement {
  if (names.length < 2) {
    throw new ConfigurationError('An exclusive requirement needs at least two options.');
  }
  return Object.freeze<ExclusiveRequirement>({ kind: 'exclusive', names: Object.freeze(names) });
}

export function requireOneOf(...names: string[]): RequireOneOfRequirement {
  if (names.length === 0) {
    throw new ConfigurationError('A require-one-of requirement needs at least one option.');
  }
  return Object.freeze<RequireOneOfRequirement>({ kind: 'requireOneOf', names: Object.freeze(names) });
}

export function ifPresentThen(name: string, then: OptionRequirement): IfPresentThenRequirement {
  return Object.freeze<IfPresentThenRequirement>({ kind: 'ifPresentThen', name, then });
}

export function range(name: string, min: number, max: number): RangeRequirement {
  // Written as a negation so NaN bounds are rejected too.
  if (!(min < max)) {
    throw new ConfigurationError(`Range on '${name}': min value must be smaller than max value (got ${min}, ${max}).`);
  }
  return Object.freeze<RangeRequirement>({ kind: 'range', name, min, max });
}

// ---------------------------------------------------------------------------
// Setup checks
// ---------------------------------------------------------------------------

/** Every option name a rule references, nested rules included. */
export function referencedNames(rule: OptionRequirement): string[] {
  switch (rule.kind) {
    case 'exclusive':
    case 'requireOneOf':
      return [...rule.names];
    case 'ifPresentThen':
      return [rule.name, ...referencedNames(rule.then)];
    case 'range':
      return [rule.name];
  }
}

function assertRule(definitions: readonly OptionDefinition[], rule: OptionRequirement): void {
  for (const name of referencedNames(rule)) {
    findOptionByName(definitions, name);
  }
  if (rule.kind === 'range' && findOptionByName(definitions, rule.name).args.length === 0) {
    throw new ConfigurationError(`Range on '${rule.name}': the option takes no value.`);
  }
  if (rule.kind === 'ifPresentThen') assertRule(definitions, rule.then);
}

/**
 * Fail with a ConfigurationError when any rule references an undeclared
 * option or puts a range on a flag.
 */
export function assertRequirements(
  definitions: readonly OptionDefinition[],
  requirements: readonly OptionRequirement[],
): void {
  for (const rule of requirements) assertRule(definitions, rule);
}

// ---------------------------------------------------------------------------
// Help lines
// ---------------------------------------------------------------------------

function canonicalTokens(definitions: readonly OptionDefinition[], names: readonly string[]): string {
  return names.map((name) => longToken(findOptionByName(definitions, name))).join(', ');
}

export function describeRequirement(
  definitions: readonly OptionDefinition[],
  rule: OptionRequirement,
): string {
  switch (rule.kind) {
    case 'exclusive':
      return `${canonicalTokens(definitions, rule.names)} are mutually exclusive.`;
    case 'requireOneOf':
      return canonicalTokens(definitions, rule.names) +
        (rule.names.length === 1 ? ' is required.' : ' at least one is required.');
    case 'ifPresentThen':
      return `If ${canonicalTokens(definitions, [rule.name])} is present then ${describeRequirement(definitions, rule.then)}`;
    case 'range':
      return `${canonicalTokens(definitions, [rule.name])} must be in range [${rule.min}, ${rule.max}].`;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateRule(
  definitions: readonly OptionDefinition[],
  rule: OptionRequirement,
  parsed: ParsedOptions,
): OptionRequirementError[] {
  switch (rule.kind) {
    case 'exclusive': {
      const present = parsed.toArray().filter((item) =>
        rule.names.some((name) => hasName(item.option, name)));
      if (present.length < 2) return [];
      return [{ message: `${present.map((item) => item.token).join(', ')} are mutually exclusive.` }];
    }

    case 'requireOneOf':
      return rule.names.some((name) => parsed.has(name))
        ? []
        : [{ message: describeRequirement(definitions, rule) }];

    case 'ifPresentThen': {
      if (!parsed.has(rule.name)) return [];
      return validateRule(definitions, rule.then, parsed).map((inner) => ({
        message: `If ${rule.name} is present then ${inner.message}`,
      }));
    }

    case 'range': {
      const found = parsed.get(rule.name);
      if (!found) return [];
      const raw = found.args[0];
      if (raw === undefined) {
        throw new ConfigurationError(`Range on '${rule.name}': the option takes no value.`);
      }
      const value = parseDecimal(raw);
      if (value === undefined) {
        return [{ message: `Invalid argument value: ${found.token} ${raw}` }];
      }
      return value >= rule.min && value <= rule.max
        ? []
        : [{ message: describeRequirement(definitions, rule) }];
    }
  }
}

/**
 * Validate parsed options against a command's rules.
 * Pure: all rules run, every violation is returned in rule order.
 */
export function validateRequirements(
  definitions: readonly OptionDefinition[],
  requirements: readonly OptionRequirement[],
  parsed: ParsedOptions,
): OptionRequirementError[] {
  assertRequirements(definitions, requirements);
  return requirements.flatMap((rule) => validateRule(definitions, rule, parsed));
}
