/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logger } from './logger.js';

/**
 * Diagnostic logging for library internals.
 *
 * Module code logs through this facade with plain messages; records land on
 * the shared pino logger under the `debug` component.
 */
class DebugLogger {
  private readonly sink = logger.child({ component: 'debug' });

  log(message: string): void {
    this.sink.info(message);
  }

  debug(message: string): void {
    this.sink.debug(message);
  }

  warn(message: string): void {
    this.sink.warn(message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.sink.error(message);
      return;
    }
    this.sink.error({ err: error }, message);
  }
}

export const debugLogger = new DebugLogger();
