/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embeddings layer exports.
 */

export type { EmbeddingClient, EmbeddingConfig } from './embeddings.js';

export { OllamaEmbeddings } from './ollamaEmbeddings.js';
export { OpenAIEmbeddings } from './openaiEmbeddings.js';
export {
  GeminiEmbeddings,
  type EmbedContentApi,
  type GeminiEmbeddingConfig,
} from './geminiEmbeddings.js';
export {
  EmbeddingProviderFactory,
  type EmbeddingSettings,
  type ProviderInfo,
} from './embeddingProviderFactory.js';
