import { describe, it, expect, vi } from 'vitest';
import {
  backoffDelay,
  withRetry,
  withTimeout,
  RetryExhaustedError,
  TimeoutError,
  isTransientFailure,
} from '../utils/retry.js';
import { ConcurrencyLimiter, mapWithConcurrency } from '../utils/concurrency.js';
import { seededRandom } from '../utils/random.js';
import { CancelledError, ServiceCallError } from '../types/errors.js';

const transient = (): ServiceCallError => new ServiceCallError('busy', 'llm', true, 503);

describe('backoffDelay', () => {
  it('grows exponentially with jitter and caps at the maximum', () => {
    expect(backoffDelay(1, 100, 1000, () => 0)).toBe(50);
    expect(backoffDelay(3, 100, 1000, () => 0.5)).toBe(300);
    expect(backoffDelay(10, 100, 1000, () => 0.5)).toBe(750);
    expect(backoffDelay(4, 0, 0, () => 0.9)).toBe(0);
  });
});

describe('withRetry', () => {
  it('retries transient failures until success', async () => {
    const task = vi.fn(async (_signal: AbortSignal, attempt: number): Promise<string> => {
      if (attempt < 3) throw transient();
      return 'ok';
    });
    const onRetry = vi.fn();

    const result = await withRetry(task, { maxAttempts: 4, baseDelayMs: 0, maxDelayMs: 0, onRetry });

    expect(result).toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, delayMs: 0 });
  });

  it('surfaces non-retryable errors immediately', async () => {
    const boom = new ServiceCallError('bad request', 'llm', false, 400);
    const task = vi.fn(async (): Promise<string> => {
      throw boom;
    });

    await expect(withRetry(task, { maxAttempts: 4, baseDelayMs: 0, maxDelayMs: 0 })).rejects.toBe(boom);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts', async () => {
    const task = vi.fn(async (): Promise<string> => {
      throw transient();
    });

    const err = await withRetry(task, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (!(err instanceof RetryExhaustedError)) return;
    expect(err.attempts).toBe(3);
    expect(err.lastError).toBeInstanceOf(ServiceCallError);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('treats timeouts as transient', async () => {
    const task = vi.fn((): Promise<string> => new Promise<string>(() => undefined));

    const err = await withRetry(task, { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 10 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (!(err instanceof RetryExhaustedError)) return;
    expect(err.lastError).toBeInstanceOf(TimeoutError);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async (): Promise<string> => 'never');

    await expect(withRetry(task, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, signal: controller.signal }))
      .rejects.toBeInstanceOf(CancelledError);
    expect(task).not.toHaveBeenCalled();
  });

  it('stops at the retry boundary once cancelled', async () => {
    const controller = new AbortController();
    const task = vi.fn(async (): Promise<string> => {
      throw transient();
    });

    await expect(withRetry(task, {
      maxAttempts: 5,
      baseDelayMs: 0,
      maxDelayMs: 0,
      signal: controller.signal,
      onRetry: () => controller.abort(),
    })).rejects.toBeInstanceOf(CancelledError);
    expect(task).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('hands the task an aborted signal on timeout', async () => {
    let seen: AbortSignal | undefined;
    const err = await withTimeout((signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    }, 5).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('classifies transient failures', () => {
    expect(isTransientFailure(new TimeoutError(5))).toBe(true);
    expect(isTransientFailure(transient())).toBe(true);
    expect(isTransientFailure(new ServiceCallError('denied', 'llm', false, 401))).toBe(false);
    expect(isTransientFailure(new Error('boom'))).toBe(false);
  });
});

describe('ConcurrencyLimiter', () => {
  it('never exceeds its limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let inFlight = 0;
    let peak = 0;

    await Promise.all(Array.from({ length: 6 }, () => limiter.run(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
    })));

    expect(peak).toBe(2);
    expect(limiter.inFlight).toBe(0);
    expect(limiter.queued).toBe(0);
  });

  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });

  it('keeps input order when mapping', async () => {
    const out = await mapWithConcurrency([30, 10, 20], 3, async (ms, i) => {
      await new Promise(resolve => setTimeout(resolve, ms));
      return `${i}:${ms}`;
    });
    expect(out).toEqual(['0:30', '1:10', '2:20']);
  });
});

describe('seededRandom', () => {
  it('repeats its stream for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
