/**
 * Error types raised by the command engine, each carrying the exit code the
 * CLI runner maps it to.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';
import type { OptionRequirementError } from '../types/options.js';

/**
 * Base class for every error the engine raises on purpose.
 * Carries an exit code, a human-readable message and an optional fix hint.
 */
export class CommandError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'CommandError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Malformed or truncated option arguments. */
export class ParseError extends CommandError {
  constructor(message: string) {
    super(ExitCode.INVALID_INPUT, message);
    this.name = 'ParseError';
  }
}

/** A sub-command token was missing or did not name a child command. */
export class UnknownCommandError extends CommandError {
  readonly commandPath: string;
  readonly token: string | undefined;

  constructor(commandPath: string, token: string | undefined) {
    super(
      ExitCode.NOT_FOUND,
      token === undefined
        ? `${commandPath}: a command name is required.`
        : `${commandPath}: '${token}' is not a valid command.`,
      { fix: `Run '${commandPath} --help' to list the available commands.` },
    );
    this.name = 'UnknownCommandError';
    this.commandPath = commandPath;
    this.token = token;
  }
}

/** One or more option requirement rules were violated. */
export class RequirementViolationError extends CommandError {
  readonly violations: readonly OptionRequirementError[];

  constructor(commandPath: string, violations: readonly OptionRequirementError[]) {
    super(
      ExitCode.VALIDATION_ERROR,
      violations.map((v) => v.message).join('\n'),
      { fix: `Run '${commandPath} --help' to see the option requirements.` },
    );
    this.name = 'RequirementViolationError';
    this.violations = violations;
  }

  override toJSON(): Record<string, unknown> {
    const base = super.toJSON();
    return { ...base, violations: this.violations.map((v) => v.message) };
  }
}

/**
 * The command tree itself is declared wrongly: a rule references an
 * undeclared option, a range has min >= max, ids collide, and so on.
 */
export class ConfigurationError extends CommandError {
  constructor(message: string) {
    super(ExitCode.CONFIG_ERROR, message);
    this.name = 'ConfigurationError';
  }
}
