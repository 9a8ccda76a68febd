/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ProviderError, getErrorMessage, toProviderError } from './errors.js';
import { withTimeout } from './retry.js';

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * POSTs a JSON body and returns the decoded JSON response.
 *
 * Non-2xx responses, network failures, timeouts and aborts all surface as
 * {@link ProviderError}; the HTTP status decides whether a retry makes sense.
 */
export async function postJson(
  provider: string,
  url: string,
  body: unknown,
  options: PostJsonOptions,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: withTimeout(options.timeoutMs, options.signal),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new ProviderError(
        `${provider}: request timed out after ${options.timeoutMs}ms`,
        { retryable: true, cause: error },
      );
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ProviderError(`${provider}: request aborted`, {
        retryable: false,
        cause: error,
      });
    }
    throw toProviderError(provider, error);
  }

  if (!response.ok) {
    throw new ProviderError(
      `${provider}: ${response.status} ${response.statusText}`,
      { status: response.status },
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(
      `${provider}: invalid JSON response (${getErrorMessage(error)})`,
      { retryable: false, cause: error },
    );
  }
}
