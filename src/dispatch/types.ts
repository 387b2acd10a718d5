/**
 * Dispatch layer types.
 *
 * Every invocation flows through:
 *   argv → help check → option parse → requirement validation
 *        → sub-command recursion → Middleware → CommandAction
 */

import type { CommandNode, InvocationContext } from '../types/command.js';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/** How a dispatch finished. */
export type DispatchOutcome =
  | { kind: 'help'; command: CommandNode }
  | { kind: 'executed'; command: CommandNode };

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/** Continue to the next middleware, or to the command action. */
export type DispatchNext = () => Promise<void>;

/**
 * Middleware function signature.
 * Wraps the action of the command dispatch reached. Parsing, validation and
 * help never pass through middleware.
 */
export type Middleware = (
  ctx: InvocationContext,
  next: DispatchNext,
) => Promise<void>;
