// Bounded retry with jittered exponential backoff, per-call timeouts and
// cancellation at retry boundaries. Shared by the LLM, classifier and pg paths.

import { CancelledError, ServiceCallError } from '../types/errors.js';
import type { RandomSource } from './random.js';

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
    );
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout; exceeding it counts as a transient failure */
  timeoutMs?: number;
  signal?: AbortSignal;
  random?: RandomSource;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
}

export function isTransientFailure(err: unknown): boolean {
  return err instanceof TimeoutError || (err instanceof ServiceCallError && err.transient);
}

/**
 * Delay before the retry that follows `attempt` (1-based):
 * min(maxDelay, base · 2^(attempt−1)) scaled by a jitter factor in [0.5, 1).
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: RandomSource = Math.random,
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.round(exponential * (0.5 + random() / 2));
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  if (ms <= 0) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` with its own AbortSignal, rejecting with TimeoutError after `timeoutMs`
 * and with CancelledError if `outer` aborts first.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  outer?: AbortSignal,
): Promise<T> {
  throwIfAborted(outer);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        const err = new TimeoutError(timeoutMs);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    }
    if (outer) {
      onAbort = () => {
        controller.abort(outer.reason);
        reject(new CancelledError());
      };
      outer.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guards]);
  } finally {
    if (timer) clearTimeout(timer);
    if (outer && onAbort) outer.removeEventListener('abort', onAbort);
  }
}

export async function withRetry<T>(
  task: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientFailure;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await withTimeout((signal) => task(signal, attempt), options.timeoutMs, options.signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (!isRetryable(err)) throw err;
      if (attempt >= maxAttempts) throw new RetryExhaustedError(attempt, err);

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs, options.random);
      options.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs, options.signal);
    }
  }
}
