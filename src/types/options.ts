/**
 * Option type definitions: declared shapes, parsed occurrences and
 * requirement rules.
 */

/** Kind of a value slot an option takes. Rendered lower-case in help. */
export type ArgKind = 'string' | 'integer' | 'double';

/** Declared shape of an option. */
export interface OptionDefinition {
  /** Canonical name, typed as `--<long>`. Unique within a command. */
  readonly long: string;
  /** Optional alias, typed as `-<short>`. */
  readonly short?: string;
  readonly description: string;
  /** Ordered value slots. Empty for a boolean flag. */
  readonly args: readonly ArgKind[];
}

/** One occurrence of an option on the command line. */
export interface ParsedOption {
  readonly option: OptionDefinition;
  /** The literal token the user typed, short or long form. */
  readonly token: string;
  /** Value tokens consumed for the option, verbatim. */
  readonly args: readonly string[];
}

/** At most one of the named options may be present. */
export interface ExclusiveRequirement {
  readonly kind: 'exclusive';
  readonly names: readonly string[];
}

/** At least one of the named options must be present. */
export interface RequireOneOfRequirement {
  readonly kind: 'requireOneOf';
  readonly names: readonly string[];
}

/** When `name` is present, `then` must hold. */
export interface IfPresentThenRequirement {
  readonly kind: 'ifPresentThen';
  readonly name: string;
  readonly then: OptionRequirement;
}

/** The first argument of `name` lies in the closed interval [min, max]. */
export interface RangeRequirement {
  readonly kind: 'range';
  readonly name: string;
  readonly min: number;
  readonly max: number;
}

export type OptionRequirement =
  | ExclusiveRequirement
  | RequireOneOfRequirement
  | IfPresentThenRequirement
  | RangeRequirement;

/** A single violated rule instance. */
export interface OptionRequirementError {
  readonly message: string;
}
