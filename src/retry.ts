/**
 * Backoff and timing primitives used by the fallback engine.
 *
 * Every wait here is a cancellable suspension point: an aborted signal settles
 * it immediately with a CancelledError.
 */

import { CancelledError, RateLimitError, TimeoutError } from './errors.js';
import type { RetryPolicy } from './types.js';

/**
 * Delay in milliseconds before retry number `attemptIndex` (0 = the wait before
 * the second attempt).
 *
 * The base grows as `initialBackoffMs * 2^attemptIndex`, capped at
 * `maxBackoffMs`. With jitter the result is drawn uniformly from [0, base].
 */
export function computeBackoff(
  attemptIndex: number,
  policy: Pick<RetryPolicy, 'initialBackoffMs' | 'maxBackoffMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const index = Number.isFinite(attemptIndex) && attemptIndex > 0 ? Math.floor(attemptIndex) : 0;
  const base = Math.min(policy.maxBackoffMs, policy.initialBackoffMs * 2 ** index);
  if (!policy.jitter) {
    return Math.max(0, base);
  }
  const r = Math.min(1, Math.max(0, random()));
  return Math.max(0, Math.min(policy.maxBackoffMs, r * base));
}

/**
 * Backoff for a retry after `error`. A rate-limit `Retry-After` hint raises the
 * delay, but never beyond `maxBackoffMs`.
 */
export function retryDelay(
  attemptIndex: number,
  policy: RetryPolicy,
  error: unknown,
  random?: () => number,
): number {
  const delay = computeBackoff(attemptIndex, policy, random);
  if (error instanceof RateLimitError && error.retryAfter !== undefined && error.retryAfter > 0) {
    return Math.min(policy.maxBackoffMs, Math.max(delay, error.retryAfter * 1000));
  }
  return delay;
}

/**
 * Wait `ms` milliseconds, or reject as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a timeout and an abort signal.
 *
 * Rejects with TimeoutError when `ms` elapses first and with CancelledError when
 * `signal` aborts first. `onTimeout` runs before the rejection so the caller can
 * tear down the underlying request.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  signal?: AbortSignal,
  onTimeout?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = () => {
      cleanup();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      cleanup();
      onTimeout?.();
      reject(new TimeoutError(label, ms));
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

/**
 * An AbortController that also aborts when `parent` does.
 */
export function linkSignal(parent?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (!parent) {
    return controller;
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return controller;
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  controller.signal.addEventListener('abort', () => parent.removeEventListener('abort', onAbort), { once: true });
  return controller;
}
