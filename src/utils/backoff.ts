/**
 * Satori Telegram — Exponential Backoff
 *
 * Retry delays with jitter for the update poller.
 */

import type { ReconnectConfig } from '../config/types.js';

/**
 * Compute the next backoff delay with jitter.
 *
 * Uses exponential backoff: initialDelay * 2^retry, capped at maxDelay,
 * plus 0-25% random jitter. The first retry is 0.
 */
export function computeBackoff(config: ReconnectConfig, retry: number): number {
  const { initialDelayMs, maxDelayMs } = config;

  const exponential = initialDelayMs * 2 ** retry;
  const capped = Math.min(exponential, maxDelayMs);
  const jitter = capped * Math.random() * 0.25;

  return Math.round(capped + jitter);
}

/**
 * Check if the maximum number of attempts has been reached. Without a
 * configured maximum this never happens.
 */
export function isMaxAttemptsReached(config: ReconnectConfig, attempt: number): boolean {
  return config.maxAttempts !== undefined && attempt >= config.maxAttempts;
}

/**
 * Sleep for the specified duration in milliseconds.
 * Rejects with the signal's reason if it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new DOMException('Aborted', 'AbortError'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
