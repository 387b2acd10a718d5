/**
 * Configuration type definitions for the CLI runner.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  level: LogLevel;
  /** Log file path. Null logs to stderr. */
  filePath: string | null;
}

/** Output configuration. */
export interface OutputConfig {
  /** Paint error output. Null detects from the terminal. */
  showColor: boolean | null;
}

/** Complete runner configuration. */
export interface CliConfig {
  logging: LoggingConfig;
  output: OutputConfig;
}

/** Deep-partial configuration accepted as overrides. */
export interface CliConfigOverrides {
  logging?: Partial<LoggingConfig>;
  output?: Partial<OutputConfig>;
}
