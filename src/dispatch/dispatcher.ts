/**
 * Dispatcher: resolves an argument vector to a command and runs it.
 *
 * Each level of the tree either prints its help, or strips its own option
 * prefix, validates it against its requirement rules and hands the rest
 * down to the sub-command named by the next token. A command without
 * sub-commands runs its action through the middleware pipeline.
 *
 * Flow: args → help? → parseOptions → validateRequirements → recurse | execute
 *
 * Parse results are call-scoped values threaded through the recursion;
 * commands hold no per-invocation state.
 */

import { ConfigurationError, RequirementViolationError, UnknownCommandError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { commandNameFromId } from '../core/commands/naming.js';
import { commandPath, commandPathNames } from '../core/commands/registry.js';
import { parseOptions } from '../core/options/parser.js';
import { validateRequirements } from '../core/options/requirements.js';
import { renderHelp } from '../cli/renderers/help.js';
import { compose } from './middleware/pipeline.js';
import type { IoService } from '../cli/io.js';
import type { CommandNode, CommandRegistry, InvocationContext, InvocationLevel } from '../types/command.js';
import type { DispatchOutcome, Middleware } from './types.js';

const HELP_TOKENS: ReadonlySet<string> = new Set(['-h', '--help']);

export interface DispatcherConfig {
  registry: CommandRegistry;
  io: IoService;
  middlewares?: Middleware[];
}

/**
 * True when `command` should print its help for `args`: no args and the
 * command prints help on empty input, or exactly one `-h`/`--help` token.
 */
export function shouldPrintHelp(command: CommandNode, args: readonly string[]): boolean {
  if (args.length === 0) return command.printHelpWithNoArgs;
  return args.length === 1 && HELP_TOKENS.has(args[0] ?? '');
}

export class Dispatcher {
  private readonly registry: CommandRegistry;
  private readonly io: IoService;
  private readonly pipeline: Middleware;

  constructor(config: DispatcherConfig) {
    this.registry = config.registry;
    this.io = config.io;
    this.pipeline = compose(config.middlewares ?? []);
  }

  /** Run `command` with `args`, its own options first. */
  async run(command: CommandNode, args: readonly string[]): Promise<DispatchOutcome> {
    return this.runLevel(command, args, []);
  }

  private async runLevel(
    command: CommandNode,
    args: readonly string[],
    chain: readonly InvocationLevel[],
  ): Promise<DispatchOutcome> {
    const log = getLogger('dispatch');

    // 1. Help wins over everything else
    if (shouldPrintHelp(command, args)) {
      log.debug({ command: command.id }, 'printing help');
      this.io.write(renderHelp(command, this.registry));
      return { kind: 'help', command };
    }

    // 2. Option prefix, then every requirement rule
    const { consumed, options } = parseOptions(command.options, args);
    const violations = validateRequirements(command.options, command.requirements, options);
    if (violations.length > 0) {
      throw new RequirementViolationError(commandPathNames(this.registry, command), violations);
    }

    const rest = args.slice(consumed);
    const levels: InvocationLevel[] = [...chain, { command, options }];
    const children = this.registry.childrenOf(command);
    log.debug({ command: command.id, consumed, remaining: rest.length }, 'options parsed');

    // 3. Leaf: run the action
    if (children.length === 0) {
      const execute = command.execute;
      if (!execute) {
        throw new ConfigurationError(`Command ${command.id} has no sub-commands and no action.`);
      }
      const ctx: InvocationContext = {
        command,
        path: commandPath(this.registry, command),
        args: rest,
        options,
        chain: levels,
        io: this.io,
      };
      await this.pipeline(ctx, async () => {
        await execute(ctx);
      });
      return { kind: 'executed', command };
    }

    // 4. Sub-command named by the next token
    const [token, ...subArgs] = rest;
    const selected = token === undefined
      ? undefined
      : children.find((d) => commandNameFromId(d.id) === token);
    if (!selected) {
      throw new UnknownCommandError(commandPathNames(this.registry, command), token);
    }
    log.debug({ command: command.id, subCommand: selected.id }, 'dispatching');
    return this.runLevel(this.registry.resolve(selected), subArgs, levels);
  }
}
