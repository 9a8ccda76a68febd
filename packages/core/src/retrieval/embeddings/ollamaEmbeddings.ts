/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Ollama embedding client implementation.
 *
 * Uses Ollama's `/api/embed` endpoint for batch embedding generation. The
 * same wire format is served by self-hosted endpoints (vLLM, TEI), so this
 * client also backs the `endpoint` provider.
 *
 * ## Endpoint
 *
 * POST http://localhost:11434/api/embed
 *
 * Request:
 * ```json
 * {
 *   "model": "nomic-embed-text",
 *   "input": ["text1", "text2", ...]
 * }
 * ```
 *
 * Response:
 * ```json
 * {
 *   "model": "nomic-embed-text",
 *   "embeddings": [[0.1, 0.2, ...], [0.3, 0.4, ...]]
 * }
 * ```
 */

import { z } from 'zod';
import { debugLogger } from '../../utils/debugLogger.js';
import { ProviderError } from '../../utils/errors.js';
import { postJson } from '../../utils/fetch.js';
import { retryWithBackoff } from '../../utils/retry.js';
import {
  EMBEDDING_DEFAULTS,
  embedInBatches,
  type EmbeddingClient,
  type EmbeddingConfig,
} from './embeddings.js';

const ollamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

/**
 * Ollama embedding client using the /api/embed endpoint.
 *
 * Features:
 * - Batch embedding with automatic chunking
 * - Per-request timeout combined with the caller's AbortSignal
 * - Bounded retry on 429/5xx and network failures
 */
export class OllamaEmbeddings implements EmbeddingClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly dimension: number;
  private readonly apiKey?: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(config: EmbeddingConfig) {
    // Remove trailing slash from base URL
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.dimension = config.dimension;
    this.apiKey = config.apiKey;
    this.batchSize = config.batchSize ?? EMBEDDING_DEFAULTS.batchSize;
    this.timeoutMs = config.timeoutMs ?? EMBEDDING_DEFAULTS.timeoutMs;
    this.maxAttempts = config.maxAttempts ?? EMBEDDING_DEFAULTS.maxAttempts;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return embedInBatches(texts, this.batchSize, (batch) =>
      retryWithBackoff(() => this.embedBatch(batch, signal), {
        maxAttempts: this.maxAttempts,
        signal,
        label: 'OllamaEmbeddings',
      }),
    );
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], signal);
    if (!vector) {
      throw new ProviderError('ollama: no embedding returned', {
        retryable: false,
      });
    }
    return vector;
  }

  getDimension(): number {
    return this.dimension;
  }

  getModel(): string {
    return this.model;
  }

  private async embedBatch(
    texts: string[],
    signal?: AbortSignal,
  ): Promise<number[][]> {
    debugLogger.debug(
      `OllamaEmbeddings: Embedding batch of ${texts.length} texts`,
    );

    const raw = await postJson(
      'ollama',
      `${this.baseUrl}/api/embed`,
      { model: this.model, input: texts },
      {
        headers: this.apiKey
          ? { Authorization: `Bearer ${this.apiKey}` }
          : undefined,
        timeoutMs: this.timeoutMs,
        signal,
      },
    );

    const parsed = ollamaEmbedResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError(
        'ollama: invalid response, missing embeddings array',
        { retryable: false },
      );
    }

    const { embeddings } = parsed.data;
    if (embeddings.length !== texts.length) {
      throw new ProviderError(
        `ollama: response length mismatch, expected ${texts.length}, got ${embeddings.length}`,
        { retryable: false },
      );
    }

    for (const embedding of embeddings) {
      if (embedding.length !== this.dimension) {
        debugLogger.warn(
          `OllamaEmbeddings: Dimension mismatch: expected ${this.dimension}, got ${embedding.length}`,
        );
      }
    }

    return embeddings;
  }
}
