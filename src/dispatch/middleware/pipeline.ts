/**
 * Middleware pipeline.
 *
 * Provides compose() to chain multiple Middleware functions together
 * into a single executable pipeline.
 */

import type { DispatchNext, Middleware } from '../types.js';
import type { InvocationContext } from '../../types/command.js';

/**
 * Composes an array of Middleware functions into a single Middleware function.
 * Execution flows through the array from first to last, and returns bubble
 * back up from last to first.
 *
 * @param middlewares Array of middleware functions to chain
 * @returns A single composed Middleware function
 */
export function compose(middlewares: readonly Middleware[]): Middleware {
  if (middlewares.length === 0) {
    return async (_ctx: InvocationContext, next: DispatchNext) => next();
  }

  return async (ctx: InvocationContext, next: DispatchNext): Promise<void> => {
    let index = -1;

    async function dispatch(i: number): Promise<void> {
      if (i <= index) {
        throw new Error('next() called multiple times in middleware');
      }
      index = i;

      const fn = middlewares[i];
      if (!fn) {
        // End of the chain: run the terminal handler
        return next();
      }

      return fn(ctx, () => dispatch(i + 1));
    }

    return dispatch(0);
  };
}
