/**
 * Bounded retry with exponential backoff and cancellation.
 */

import type { Result } from '../../shared/types.js';
import { Err } from '../../shared/types.js';
import type { RetryPolicy } from './types.js';

export class AbortedError extends Error {
  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export interface RetryOptions<E> {
  signal?: AbortSignal;
  isRetryable: (error: E) => boolean;
  onRetry?: (error: E, attempt: number, delayMs: number) => void;
}

export interface RetryOutcome<T, E> {
  result: Result<T, E | AbortedError>;
  attempts: number;
}

/** Delay before retry number `retry` (1-based) */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

/** Sleep that resolves early (with false) when the signal aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a request against an abort signal. The request keeps running in the
 * transport; its late reply is discarded there.
 */
export function raceAbort<T, E>(
  request: Promise<Result<T, E>>,
  signal?: AbortSignal
): Promise<Result<T, E | AbortedError>> {
  if (!signal) return request;
  if (signal.aborted) return Promise.resolve(Err(new AbortedError()));

  return new Promise(resolve => {
    const onAbort = () => resolve(Err(new AbortedError()));
    signal.addEventListener('abort', onAbort, { once: true });
    request.then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve(Err(new AbortedError(`Request failed: ${err instanceof Error ? err.message : String(err)}`)));
      }
    );
  });
}

export async function withRetry<T, E>(
  operation: () => Promise<Result<T, E>>,
  policy: RetryPolicy,
  options: RetryOptions<E>
): Promise<RetryOutcome<T, E>> {
  const { signal, isRetryable, onRetry } = options;
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await raceAbort(operation(), signal);

    if (result.ok) return { result, attempts };
    if (result.error instanceof AbortedError) return { result, attempts };

    const error = result.error;
    const retry = attempts;
    if (!isRetryable(error) || retry > policy.maxRetries) {
      return { result, attempts };
    }

    const delayMs = backoffDelay(policy, retry);
    onRetry?.(error, retry, delayMs);

    const slept = await sleep(delayMs, signal);
    if (!slept) {
      return { result: Err(new AbortedError()), attempts };
    }
  }
}
