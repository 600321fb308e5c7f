// Timeout + bounded retry with exponential backoff for network-bound calls
// Cancellation by the caller is never retried.

import { RequestCancelled } from '../types/errors.js';

export interface RetryOptions {
  /** Additional attempts after the first one */
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, err: unknown) => void;
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new RequestCancelled(stage);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelled('backoff'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelled('backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with a per-attempt timeout. The attempt's AbortSignal fires on
 * timeout or when the caller's signal aborts.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  // Listen before starting the attempt so an abort raised inside it is seen
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      reject(timedOut ? new TimeoutError(timeoutMs) : new RequestCancelled('call'));
    }, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    if (attempt > 0) {
      options.onRetry?.(attempt, lastError);
      await sleep(options.backoffMs * 2 ** (attempt - 1), options.signal);
    }
    throwIfAborted(options.signal, 'call');

    try {
      return await withTimeout(fn, options.timeoutMs, options.signal);
    } catch (err) {
      if (err instanceof RequestCancelled) throw err;
      lastError = err;
    }
  }

  throw lastError;
}
