/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Config
export * from './config/config.js';

// Utilities
export * from './utils/errors.js';
export { debugLogger } from './utils/debugLogger.js';
export { logger, makeLogger, type Logger } from './utils/logger.js';
export {
  isRetryableError,
  retryWithBackoff,
  withTimeout,
  type RetryOptions,
} from './utils/retry.js';

// Conversation memory
export * from './memory/index.js';

// Model adapters
export * from './llm/index.js';

// Catalog
export * from './catalog/index.js';

// Retrieval
export * from './retrieval/index.js';

// Tools
export * from './tools/index.js';

// Sessions
export * from './session/index.js';
