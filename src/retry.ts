// SPDX-License-Identifier: MIT
/**
 * Retry logic with exponential backoff for transient failures.
 */
import { TransportError, isTransient } from './types/errors.js';

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts, first one included (default: 3). */
  maxAttempts: number;
  /** Backoff before the second attempt in milliseconds (default: 200). */
  initialBackoffMs: number;
  /** Maximum backoff duration in milliseconds (default: 5000). */
  maxBackoffMs: number;
  /** Multiplier for exponential backoff (default: 2.0). */
  backoffMultiplier: number;
  /** Scale each backoff by a random factor between 0.8 and 1.2 (default: false). */
  jitter: boolean;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 200,
  maxBackoffMs: 5000,
  backoffMultiplier: 2.0,
  jitter: false,
};

/**
 * Partial retry configuration for overrides.
 */
export type PartialRetryConfig = Partial<RetryConfig>;

/**
 * Merge partial config with defaults.
 */
export function mergeRetryConfig(partial: PartialRetryConfig): RetryConfig {
  return { ...DEFAULT_RETRY_CONFIG, ...partial };
}

/**
 * Per-call retry options.
 */
export interface RetryOptions {
  /** Stops waiting and retrying when aborted. */
  signal?: AbortSignal | undefined;
  /** Decides whether a failure is worth another attempt (default: `isTransient`). */
  isRetryable?: (error: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (error: unknown, attempt: number, backoffMs: number) => void;
}

/**
 * Calculate backoff time.
 *
 * @param attempt - The attempt that just failed (0-indexed).
 * @returns Backoff time in milliseconds.
 */
export function calculateBackoff(
  attempt: number,
  initialMs: number,
  maxMs: number,
  multiplier: number,
  jitter = false
): number {
  const backoffMs = initialMs * Math.pow(multiplier, attempt);
  const factor = jitter ? 0.8 + Math.random() * 0.4 : 1;
  return Math.min(backoffMs * factor, maxMs);
}

/**
 * Sleep for a given number of milliseconds, waking early with a cancellation error on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(TransportError.cancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(TransportError.cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute an async function with retry logic.
 *
 * The attempt number (0-indexed) is passed to `fn`; no state survives the call.
 *
 * @returns The result of the first successful attempt.
 * @throws The last error once attempts are exhausted, or the first non-retryable one.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransient;
  const maxAttempts = Math.max(1, config.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const last = attempt >= maxAttempts - 1;
      if (last || !isRetryable(error)) {
        if (error instanceof TransportError) {
          error.attempts = attempt + 1;
        }
        throw error;
      }

      const backoffMs = calculateBackoff(
        attempt,
        config.initialBackoffMs,
        config.maxBackoffMs,
        config.backoffMultiplier,
        config.jitter
      );
      options.onRetry?.(error, attempt, backoffMs);
      await sleep(backoffMs, options.signal);
    }
  }
}
