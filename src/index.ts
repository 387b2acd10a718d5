/**
 * cmdtree - hierarchical command-line tools with typed options and
 * declarative option requirements.
 */

// Types
export { ExitCode, getExitCodeName, isErrorCode } from './types/exit-codes.js';
export type {
  ArgKind,
  OptionDefinition,
  ParsedOption,
  OptionRequirement,
  ExclusiveRequirement,
  RequireOneOfRequirement,
  IfPresentThenRequirement,
  RangeRequirement,
  OptionRequirementError,
} from './types/options.js';
export type {
  CommandAction,
  CommandSpec,
  CommandNode,
  CommandDescriptor,
  CommandRegistry,
  InvocationContext,
  InvocationLevel,
} from './types/command.js';
export type { CliConfig, CliConfigOverrides, LogLevel } from './types/config.js';

// Core
export {
  CommandError,
  ParseError,
  UnknownCommandError,
  RequirementViolationError,
  ConfigurationError,
} from './core/errors.js';
export { loadConfig } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Options
export { defineOption, findOptionByName, type OptionInput } from './core/options/definitions.js';
export { parseOptions, type OptionParseResult } from './core/options/parser.js';
export { ParsedOptions } from './core/options/parsed-options.js';
export {
  exclusive,
  requireOneOf,
  ifPresentThen,
  range,
  validateRequirements,
  describeRequirement,
} from './core/options/requirements.js';

// Commands
export { defineCommand } from './core/commands/define.js';
export { commandNameFromId } from './core/commands/naming.js';
export { StaticCommandRegistry, commandPath, commandPathNames } from './core/commands/registry.js';

// Dispatch
export { Dispatcher, shouldPrintHelp, type DispatcherConfig } from './dispatch/dispatcher.js';
export { compose } from './dispatch/middleware/pipeline.js';
export { createAudit, type AuditEntry } from './dispatch/middleware/audit.js';
export type { DispatchOutcome, DispatchNext, Middleware } from './dispatch/types.js';

// CLI
export { renderHelp, renderUsage } from './cli/renderers/help.js';
export { ConsoleIoService, type IoService, type ConsoleIoOptions } from './cli/io.js';
export { runCli, reportError, type RunCliOptions, type RootedRegistry } from './cli/index.js';
