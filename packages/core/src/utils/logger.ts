/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Creates a pino logger writing JSON lines to stderr.
 *
 * Stdout is reserved for the MCP stdio transport, so nothing here may write
 * to fd 1. Output is silenced under Vitest and `NODE_ENV=test`.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling =
    process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test';

  return pino(
    {
      level: process.env['LOG_LEVEL'] ?? 'info',
      enabled: !isTestTooling,
      base: { ...bindings, app: 'mealcart' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ['apiKey', '*.apiKey', 'headers.Authorization'],
        censor: '[REDACTED]',
      },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

export const logger = makeLogger();
