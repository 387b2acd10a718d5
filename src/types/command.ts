/**
 * Command tree type definitions.
 */

import type { IoService } from '../cli/io.js';
import type { ParsedOptions } from '../core/options/parsed-options.js';
import type { OptionDefinition, OptionRequirement } from './options.js';

/** Action run when dispatch reaches a command with no sub-commands. */
export type CommandAction = (ctx: InvocationContext) => Promise<void> | void;

/** Declaration accepted by defineCommand(). */
export interface CommandSpec {
  /** Identity name, e.g. `PullCommand`. The display name is derived from it. */
  id: string;
  description: string;
  options?: readonly OptionDefinition[];
  requirements?: readonly OptionRequirement[];
  /** Usage shows `NAME_OPTIONS` instead of `[NAME_OPTIONS]`. */
  optionsRequired?: boolean;
  /** @default true */
  printHelpWithNoArgs?: boolean;
  /** Root commands add the "COMMAND -h" hint to their help. */
  isRoot?: boolean;
  /** Placeholder rendered after the path in the usage line of a leaf. */
  argsHelp?: string;
  execute?: CommandAction;
}

/** A node of the command tree. Immutable, holds no per-invocation state. */
export interface CommandNode {
  readonly id: string;
  /** Lower-case display name matched against sub-command tokens. */
  readonly name: string;
  readonly description: string;
  readonly options: readonly OptionDefinition[];
  readonly requirements: readonly OptionRequirement[];
  readonly hasOptions: boolean;
  readonly hasRequiredOptions: boolean;
  readonly printHelpWithNoArgs: boolean;
  readonly isRoot: boolean;
  readonly argsHelp?: string;
  readonly execute?: CommandAction;
}

/** Parsed options of one command along the dispatch path. */
export interface InvocationLevel {
  readonly command: CommandNode;
  readonly options: ParsedOptions;
}

/** Call-scoped state handed to a command action. */
export interface InvocationContext {
  readonly command: CommandNode;
  /** Nodes from the root to `command`. */
  readonly path: readonly CommandNode[];
  /** Positional arguments left after the command's options. */
  readonly args: readonly string[];
  readonly options: ParsedOptions;
  /** Every level from the root to `command`, with its parsed options. */
  readonly chain: readonly InvocationLevel[];
  readonly io: IoService;
}

/**
 * Registry entry for a command.
 *
 * Children of a command live in the namespace `<namespace>.<name>`.
 */
export interface CommandDescriptor {
  readonly id: string;
  readonly namespace: string;
  /** Factory producing the command. Called at most once per registry. */
  readonly create: () => CommandNode;
}

/** Parent/child lookups over the command tree. */
export interface CommandRegistry {
  /** Child descriptors ordered by id. */
  childrenOf(command: CommandNode): readonly CommandDescriptor[];
  parentOf(command: CommandNode): CommandDescriptor | undefined;
  resolve(descriptor: CommandDescriptor): CommandNode;
}
