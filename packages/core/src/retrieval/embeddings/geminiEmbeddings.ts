/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Gemini embedding client on `@google/genai` (`embedContent`).
 */

import {
  GoogleGenAI,
  type EmbedContentParameters,
  type EmbedContentResponse,
} from '@google/genai';
import { debugLogger } from '../../utils/debugLogger.js';
import { ProviderError, toProviderError } from '../../utils/errors.js';
import { retryWithBackoff, withTimeout } from '../../utils/retry.js';
import {
  EMBEDDING_DEFAULTS,
  embedInBatches,
  type EmbeddingClient,
} from './embeddings.js';

/**
 * The slice of the SDK's `models` module this client calls.
 */
export interface EmbedContentApi {
  embedContent(params: EmbedContentParameters): Promise<EmbedContentResponse>;
}

export interface GeminiEmbeddingConfig {
  model: string;
  dimension: number;
  apiKey?: string;
  /** Pre-built SDK surface; defaults to `new GoogleGenAI({ apiKey }).models` */
  api?: EmbedContentApi;
  batchSize?: number;
  timeoutMs?: number;
  maxAttempts?: number;
}

export class GeminiEmbeddings implements EmbeddingClient {
  private readonly api: EmbedContentApi;
  private readonly model: string;
  private readonly dimension: number;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(config: GeminiEmbeddingConfig) {
    this.api = config.api ?? new GoogleGenAI({ apiKey: config.apiKey }).models;
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
        label: 'GeminiEmbeddings',
      }),
    );
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], signal);
    if (!vector) {
      throw new ProviderError('gemini: no embedding returned', {
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
      `GeminiEmbeddings: Embedding batch of ${texts.length} texts`,
    );

    let response: EmbedContentResponse;
    try {
      response = await this.api.embedContent({
        model: this.model,
        contents: texts,
        config: { abortSignal: withTimeout(this.timeoutMs, signal) },
      });
    } catch (error) {
      throw toProviderError('gemini', error);
    }

    const vectors = (response.embeddings ?? []).map(
      (embedding) => embedding.values ?? [],
    );
    if (vectors.length !== texts.length || vectors.some((v) => v.length === 0)) {
      throw new ProviderError(
        `gemini: expected ${texts.length} embeddings, got ${vectors.length}`,
        { retryable: false },
      );
    }
    return vectors;
  }
}
