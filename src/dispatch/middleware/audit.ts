/**
 * Audit middleware: writes one structured pino record per executed command
 * (subsystem 'audit') with its path, positional argument count, option
 * tokens, duration and outcome.
 */

import { getLogger } from '../../core/logger.js';
import type { DispatchNext, Middleware } from '../types.js';
import type { InvocationContext } from '../../types/command.js';

export interface AuditEntry {
  command: string;
  options: string[];
  argCount: number;
  durationMs: number;
  success: boolean;
  error?: string;
}

/** Build an entry for the current invocation. */
function toEntry(ctx: InvocationContext, startTime: number, error?: unknown): AuditEntry {
  return {
    command: ctx.path.map((c) => c.name).join(' '),
    // Tokens only, never values
    options: ctx.chain.flatMap((level) => level.options.toArray().map((item) => item.token)),
    argCount: ctx.args.length,
    durationMs: Date.now() - startTime,
    success: error === undefined,
    ...(error !== undefined && { error: error instanceof Error ? error.message : String(error) }),
  };
}

/**
 * Create the audit middleware.
 *
 * @param onEntry Optional sink called with every entry after it is logged
 */
export function createAudit(onEntry?: (entry: AuditEntry) => void): Middleware {
  return async (ctx: InvocationContext, next: DispatchNext): Promise<void> => {
    const log = getLogger('audit');
    const startTime = Date.now();
    try {
      await next();
    } catch (error) {
      const entry = toEntry(ctx, startTime, error);
      log.warn(entry, 'command failed');
      onEntry?.(entry);
      throw error;
    }
    const entry = toEntry(ctx, startTime);
    log.info(entry, 'command executed');
    onEntry?.(entry);
  };
}
