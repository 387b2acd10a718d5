/**
 * CLI runner: loads configuration, initializes logging, dispatches argv to
 * the root command and maps the outcome to a process exit code.
 *
 * Usage from a bin script:
 *
 *   process.exitCode = await runCli(registry, process.argv.slice(2));
 */

import { CommandError } from '../core/errors.js';
import { loadConfig, resolveShowColor } from '../core/config.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { Dispatcher } from '../dispatch/dispatcher.js';
import { createAudit } from '../dispatch/middleware/audit.js';
import { ExitCode } from '../types/exit-codes.js';
import { ConsoleIoService, type IoService } from './io.js';
import type { Middleware } from '../dispatch/types.js';
import type { CommandNode, CommandRegistry } from '../types/command.js';
import type { CliConfig, CliConfigOverrides } from '../types/config.js';

export interface RunCliOptions {
  /** Command to start from. Defaults to the registry's root. */
  root?: CommandNode;
  io?: IoService;
  /** Extra middlewares, run inside the audit middleware. */
  middlewares?: Middleware[];
  env?: NodeJS.ProcessEnv;
  config?: CliConfigOverrides;
}

/** A registry that can name its root command. */
export interface RootedRegistry extends CommandRegistry {
  root(): CommandNode;
}

/**
 * Print an error on the error stream and return its exit code.
 * Engine errors keep their own code; anything else is a general error.
 */
export function reportError(io: IoService, error: unknown): ExitCode {
  const log = getLogger('cli');

  if (error instanceof CommandError) {
    io.writeErrorLine(error.message);
    if (error.fix) io.writeErrorLine(error.fix);
    log.debug({ code: error.code, name: error.name }, error.message);
    return error.code;
  }

  const message = error instanceof Error ? error.message : String(error);
  io.writeErrorLine(message);
  log.error({ err: error }, 'command failed');
  return ExitCode.GENERAL_ERROR;
}

export async function runCli(
  registry: RootedRegistry,
  argv: readonly string[],
  options: RunCliOptions = {},
): Promise<ExitCode> {
  const env = options.env ?? process.env;

  let config: CliConfig;
  try {
    config = loadConfig(env, options.config);
  } catch (error) {
    return reportError(options.io ?? new ConsoleIoService(), error);
  }

  initLogger(config.logging);
  const io = options.io ?? new ConsoleIoService({ color: resolveShowColor(config, env) });
  const dispatcher = new Dispatcher({
    registry,
    io,
    middlewares: [createAudit(), ...(options.middlewares ?? [])],
  });

  try {
    const root = options.root ?? registry.root();
    await dispatcher.run(root, argv);
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportError(io, error);
  } finally {
    closeLogger();
  }
}
