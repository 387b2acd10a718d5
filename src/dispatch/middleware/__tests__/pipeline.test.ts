import { describe, it, expect, vi } from 'vitest';
import { compose } from '../pipeline.js';
import { createTestContext } from '../../../../tests/helpers/context.js';
import type { Middleware } from '../../types.js';

describe('Middleware Pipeline (compose)', () => {
  const ctx = createTestContext();

  it('should pass through when empty', async () => {
    const pipeline = compose([]);
    const final = vi.fn(async () => {});
    await pipeline(ctx, final);
    expect(final).toHaveBeenCalledTimes(1);
  });

  it('should execute middleware in order', async () => {
    const order: number[] = [];

    const m1: Middleware = async (_ctx, next) => {
      order.push(1);
      await next();
      order.push(5);
    };

    const m2: Middleware = async (_ctx, next) => {
      order.push(2);
      await next();
      order.push(4);
    };

    const pipeline = compose([m1, m2]);
    await pipeline(ctx, async () => {
      order.push(3);
    });

    expect(order).toEqual([1, 2, 3, 4, 5]);
  });

  it('should allow short-circuiting', async () => {
    const m1: Middleware = async () => {};
    const m2 = vi.fn<Middleware>(async (_ctx, next) => next());

    const pipeline = compose([m1, m2]);
    const finalNext = vi.fn(async () => {});
    await pipeline(ctx, finalNext);

    expect(m2).not.toHaveBeenCalled();
    expect(finalNext).not.toHaveBeenCalled();
  });

  it('should hand every middleware the same context', async () => {
    const seen: unknown[] = [];
    const capture: Middleware = async (c, next) => {
      seen.push(c);
      await next();
    };

    await compose([capture, capture])(ctx, async () => {});
    expect(seen).toEqual([ctx, ctx]);
    expect(seen[0]).toBe(ctx);
  });

  it('should propagate errors from the action', async () => {
    const m1: Middleware = async (_ctx, next) => next();
    const pipeline = compose([m1]);

    await expect(pipeline(ctx, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });

  it('should throw if next() is called multiple times', async () => {
    const m1: Middleware = async (_ctx, next) => {
      await next();
      await next();
    };

    const pipeline = compose([m1]);
    await expect(pipeline(ctx, async () => {})).rejects.toThrow('next() called multiple times in middleware');
  });
});
