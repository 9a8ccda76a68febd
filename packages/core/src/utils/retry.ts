/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import pRetry, { AbortError, type FailedAttemptError } from 'p-retry';
import { debugLogger } from './debugLogger.js';
import { ProviderError, getErrorMessage } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry in ms (default: 500) */
  initialDelayMs?: number;
  /** Upper bound for a single delay in ms (default: 8000) */
  maxDelayMs?: number;
  /** Decides whether a failure is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
  /** Stops further attempts when aborted */
  signal?: AbortSignal;
  /** Label used in log lines */
  label?: string;
}

const DEFAULTS = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
} as const;

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  // fetch() rejects with a TypeError on network failures
  return error instanceof TypeError;
}

/**
 * Runs `fn` until it succeeds, the failure is not retryable, or the attempts
 * run out. Delays grow exponentially with randomised spread. The last error is
 * rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const label = options.label ?? 'operation';

  return pRetry(
    async (attempt) => {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!shouldRetry(error)) {
          // AbortError makes p-retry reject with the wrapped error itself
          throw new AbortError(
            error instanceof Error ? error : getErrorMessage(error),
          );
        }
        throw error;
      }
    },
    {
      retries: maxAttempts - 1,
      factor: 2,
      minTimeout: options.initialDelayMs ?? DEFAULTS.initialDelayMs,
      maxTimeout: options.maxDelayMs ?? DEFAULTS.maxDelayMs,
      randomize: true,
      signal: options.signal,
      onFailedAttempt: (error: FailedAttemptError) => {
        if (error.retriesLeft > 0) {
          debugLogger.warn(
            `${label}: attempt ${error.attemptNumber}/${maxAttempts} failed (${error.message}), retrying`,
          );
        }
      },
    },
  );
}

/**
 * Combines an optional caller signal with a timeout.
 */
export function withTimeout(
  timeoutMs: number,
  signal?: AbortSignal,
): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
