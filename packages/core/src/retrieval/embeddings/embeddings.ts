/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embedding client interface for generating vector embeddings.
 *
 * This interface abstracts embedding generation, allowing different providers
 * (Ollama, OpenAI, Gemini, a self-hosted endpoint) to be swapped without
 * changing the retrieval logic. A client is deterministic per text for a fixed
 * model and always returns vectors of one dimension.
 *
 * @see ./ollamaEmbeddings.ts for the Ollama implementation
 */

/**
 * Configuration shared by the HTTP embedding clients.
 */
export interface EmbeddingConfig {
  /** Base URL for the embedding API (e.g., 'http://localhost:11434') */
  baseUrl: string;

  /** Model name to use for embeddings (e.g., 'nomic-embed-text') */
  model: string;

  /** Dimension of the embedding vectors (e.g., 768 for nomic-embed-text) */
  dimension: number;

  /** Bearer token, for hosted APIs */
  apiKey?: string;

  /** Maximum texts per request (default: 32) */
  batchSize?: number;

  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;

  /** Attempts per batch including the first (default: 3) */
  maxAttempts?: number;
}

export const EMBEDDING_DEFAULTS = {
  batchSize: 32,
  timeoutMs: 30000,
  maxAttempts: 3,
} as const;

/**
 * Interface for embedding generation clients.
 *
 * Failures are raised as `ProviderError`; a client never substitutes a zero
 * vector for a text it could not embed.
 *
 * @example
 * ```typescript
 * const client = new OllamaEmbeddings({
 *   baseUrl: 'http://localhost:11434',
 *   model: 'nomic-embed-text',
 *   dimension: 768,
 * });
 *
 * const vector = await client.embedOne('smoky aubergine stew');
 * const vectors = await client.embed(['tomato', 'basil']);
 * ```
 */
export interface EmbeddingClient {
  /**
   * Generate embeddings for multiple texts, batching internally.
   *
   * @returns Array of embedding vectors (same order as input)
   */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  /**
   * Generate embedding for a single text.
   */
  embedOne(text: string, signal?: AbortSignal): Promise<number[]>;

  /**
   * Get the embedding dimension for this model.
   */
  getDimension(): number;

  /**
   * Get the model name being used.
   */
  getModel(): string;
}

/**
 * Splits `texts` into batches and embeds them one batch at a time.
 */
export async function embedInBatches(
  texts: string[],
  batchSize: number,
  embedBatch: (batch: string[]) => Promise<number[][]>,
): Promise<number[][]> {
  const all: number[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    all.push(...(await embedBatch(batch)));
  }
  return all;
}
