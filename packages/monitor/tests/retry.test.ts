import { afterEach, describe, expect, it, vi } from 'vitest';
import { computeBackoffDelayMs, withRetries, type RetryContext } from '../src/retry.js';

const config = { attempts: 3, baseDelayMs: 10, maxDelayMs: 1000, jitter: 0.5 };

describe('withRetries', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the same delay it waits before the next attempt', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    const contexts: RetryContext[] = [];
    const announced: Array<{ attempt: number; delayMs: number }> = [];

    const result = await withRetries(
      async (ctx) => {
        contexts.push(ctx);
        if (ctx.attempt < 3) throw new Error('ECONNRESET');
        return 'ok';
      },
      config,
      () => true,
      { onRetry: (_err, next) => announced.push(next) }
    );

    expect(result).toBe('ok');
    expect(announced).toEqual([
      { attempt: 2, delayMs: 15 },
      { attempt: 3, delayMs: 30 },
    ]);
    expect(contexts.map((ctx) => ctx.delayMs)).toEqual([undefined, 15, 30]);
  });

  it('stops at the first error that is not retryable', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    await expect(
      withRetries(
        async () => {
          calls++;
          throw new Error('bad request');
        },
        config,
        () => false,
        { onRetry }
      )
    ).rejects.toThrow('bad request');

    expect(calls).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('caps the backoff and never delays the first attempt', () => {
    const noJitter = { attempts: 10, baseDelayMs: 100, maxDelayMs: 500, jitter: 0 };

    expect(computeBackoffDelayMs(noJitter, 1)).toBe(0);
    expect(computeBackoffDelayMs(noJitter, 2)).toBe(100);
    expect(computeBackoffDelayMs(noJitter, 4)).toBe(400);
    expect(computeBackoffDelayMs(noJitter, 5)).toBe(500);
  });
});
