/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview OpenAI embedding client (`POST {baseUrl}/embeddings`).
 *
 * Works against any OpenAI-compatible embeddings API; results are re-ordered
 * by the `index` field of each item.
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

const openAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number()),
    }),
  ),
});

export class OpenAIEmbeddings implements EmbeddingClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly dimension: number;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(config: EmbeddingConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimension = config.dimension;
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
        label: 'OpenAIEmbeddings',
      }),
    );
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], signal);
    if (!vector) {
      throw new ProviderError('openai: no embedding returned', {
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
      `OpenAIEmbeddings: Embedding batch of ${texts.length} texts`,
    );

    const raw = await postJson(
      'openai',
      `${this.baseUrl}/embeddings`,
      { model: this.model, input: texts },
      {
        headers: this.apiKey
          ? { Authorization: `Bearer ${this.apiKey}` }
          : undefined,
        timeoutMs: this.timeoutMs,
        signal,
      },
    );

    const parsed = openAIEmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('openai: invalid embeddings response', {
        retryable: false,
      });
    }
    if (parsed.data.data.length !== texts.length) {
      throw new ProviderError(
        `openai: response length mismatch, expected ${texts.length}, got ${parsed.data.data.length}`,
        { retryable: false },
      );
    }

    return parsed.data.data
      .map((item, position) => ({ order: item.index ?? position, item }))
      .sort((a, b) => a.order - b.order)
      .map(({ item }) => item.embedding);
  }
}
