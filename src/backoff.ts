/**
 * Reconnection delays and timer helpers
 */

import type { ReconnectPolicy } from './config.js';

/**
 * Delay before the attempt following `attempt` (1-based):
 * exponential from baseDelayMs, capped at maxDelayMs, plus up to jitterMs.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.floor(Math.min(exponential, policy.maxDelayMs) + random() * policy.jitterMs);
}

/**
 * Resolves true once `ms` elapsed, false if `signal` aborted first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
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

export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
