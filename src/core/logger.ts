/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Custom formatters for uppercase level labels and ISO
 * timestamps. Context via child loggers (getLogger('subsystem')).
 *
 * stdout belongs to the commands, so diagnostics go to a log file when one
 * is configured and to stderr otherwise.
 */

import pino from 'pino';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging section of the resolved configuration
 * @returns The root pino logger instance
 */
export function initLogger(config: LoggingConfig): pino.Logger {
  // sync writes so nothing is lost when a CLI exits right after logging
  const destination = config.filePath
    ? pino.destination({ dest: config.filePath, mkdir: true, sync: true })
    : pino.destination({ fd: 2, sync: true });

  rootLogger = pino(
    {
      level: config.level,
      formatters,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a warn-level stderr fallback so
 * library use and tests never need setup.
 *
 * @param subsystem - Logical subsystem name (e.g. 'dispatch', 'cli')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino({ level: 'warn', formatters }, pino.destination(2)).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Flush and drop the root logger. */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
