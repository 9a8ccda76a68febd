/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Error taxonomy shared across the assistant.
 *
 * - {@link UserVisibleError}: raised synchronously, caught at the orchestration
 *   boundary and shown to the user as a short message.
 * - {@link ToolArgumentError}: a model-issued tool call had bad arguments; ends
 *   up as a tool result, never propagated out of the loop.
 * - {@link ProviderError}: chat or embedding transport failure; propagates to
 *   the caller of the step after bounded retries.
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Unknown error';
  }
}

export class MealcartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UserVisibleError extends MealcartError {}

export class EmptyBasketError extends UserVisibleError {
  constructor() {
    super('Your basket is empty. Add something before checking out.');
  }
}

export class NotFoundError extends UserVisibleError {
  constructor(
    readonly entity: 'ingredient' | 'meal' | 'customer' | 'shop item',
    readonly id: number | string,
    detail?: string,
  ) {
    super(detail ?? `${entity} ${id} not found`);
  }
}

export class SessionBusyError extends UserVisibleError {
  constructor(customer: string) {
    super(
      `The session for ${customer} is still answering the previous message.`,
    );
  }
}

export class ToolArgumentError extends MealcartError {}

export class CatalogError extends MealcartError {}

export class ConfigError extends MealcartError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class ProviderError extends MealcartError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.retryable =
      options.retryable ??
      (options.status === undefined ||
        options.status === 429 ||
        options.status >= 500);
  }
}

/**
 * Wraps a failure from a provider SDK or `fetch` into a {@link ProviderError}.
 * SDK errors exposing a numeric `status` keep it for the retry decision.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  let status: number | undefined;
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    status = error.status;
  }
  return new ProviderError(`${provider}: ${getErrorMessage(error)}`, {
    status,
    cause: error,
  });
}
