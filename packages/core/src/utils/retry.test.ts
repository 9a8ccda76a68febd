/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { ProviderError } from './errors.js';
import {
  isRetryableError,
  retryWithBackoff,
  withTimeout,
} from './retry.js';

describe('retryWithBackoff', () => {
  it('should retry retryable failures until success', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError('busy', { status: 503 }))
      .mockRejectedValueOnce(new ProviderError('busy', { status: 429 }))
      .mockResolvedValueOnce('ok');

    const result = await retryWithBackoff(fn, { initialDelayMs: 0 });

    expect(result).toBe('ok');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should stop at the first non-retryable failure', async () => {
    const error = new ProviderError('bad request', { status: 400 });
    const fn = vi.fn(async () => {
      throw error;
    });

    await expect(retryWithBackoff(fn, { initialDelayMs: 0 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error when attempts run out', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new ProviderError(`down ${calls}`, { status: 500 });
    };

    await expect(
      retryWithBackoff(fn, { maxAttempts: 2, initialDelayMs: 0 }),
    ).rejects.toThrow('down 2');
    expect(calls).toBe(2);
  });

  it('should stop retrying once the caller aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort(new Error('cancelled'));
      throw new ProviderError('busy', { status: 503 });
    });

    await expect(
      retryWithBackoff(fn, { initialDelayMs: 0, signal: controller.signal }),
    ).rejects.toThrow();
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom retry predicate', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(7);

    const result = await retryWithBackoff(fn, {
      initialDelayMs: 0,
      shouldRetry: (error) => error instanceof Error && error.message === 'flaky',
    });

    expect(result).toBe(7);
  });
});

describe('isRetryableError', () => {
  it('should classify failures', () => {
    expect(isRetryableError(new ProviderError('x', { status: 502 }))).toBe(true);
    expect(isRetryableError(new ProviderError('x', { status: 401 }))).toBe(false);
    expect(isRetryableError(new ProviderError('x'))).toBe(true);
    expect(isRetryableError(new ProviderError('x', { retryable: false }))).toBe(false);
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryableError(new Error('boom'))).toBe(false);
  });
});

describe('withTimeout', () => {
  it('should follow the caller signal', () => {
    const controller = new AbortController();
    const signal = withTimeout(60_000, controller.signal);

    controller.abort('cancelled');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe('cancelled');
  });

  it('should follow the caller signal across repeated calls', () => {
    const controller = new AbortController();
    for (let i = 0; i < 50; i++) {
      withTimeout(60_000, controller.signal);
    }
    const signal = withTimeout(60_000, controller.signal);

    controller.abort('done');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe('done');
  });

  it('should return a plain timeout signal without a caller signal', () => {
    const signal = withTimeout(60_000);

    expect(signal.aborted).toBe(false);
  });
});
