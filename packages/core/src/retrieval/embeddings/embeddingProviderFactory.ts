/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embedding provider factory with automatic detection.
 *
 * Implements a "provider ladder" that selects the best available
 * embedding provider based on configuration and availability.
 *
 * ## Provider Ladder (Detection Order)
 *
 * | Priority | Provider | Detection                   | Notes                           |
 * | -------- | -------- | --------------------------- | ------------------------------- |
 * | 1        | Ollama   | `OLLAMA_HOST` reachable     | Local, no key needed            |
 * | 2        | Endpoint | `EMBED_BASE_URL` set        | Self-hosted vLLM/TEI            |
 * | 3        | OpenAI   | `OPENAI_API_KEY` exists     | Hosted                          |
 * | 4        | Gemini   | `GEMINI_API_KEY` exists     | Hosted                          |
 *
 * An explicit `EMBED_PROVIDER` skips detection. When nothing is available the
 * factory fails with a configuration error instead of degrading silently.
 *
 * ## Usage
 *
 * ```typescript
 * const factory = new EmbeddingProviderFactory(config.embedding, config.providerPolicy);
 * const client = await factory.createClient();
 * ```
 */

import type {
  EmbeddingProviderName,
  MealcartConfig,
  ProviderPolicy,
} from '../../config/config.js';
import { debugLogger } from '../../utils/debugLogger.js';
import { ConfigError } from '../../utils/errors.js';
import type { EmbeddingClient } from './embeddings.js';
import { GeminiEmbeddings } from './geminiEmbeddings.js';
import { OllamaEmbeddings } from './ollamaEmbeddings.js';
import { OpenAIEmbeddings } from './openaiEmbeddings.js';

export type EmbeddingSettings = MealcartConfig['embedding'];

type ConcreteProvider = Exclude<EmbeddingProviderName, 'auto'>;

/**
 * Provider detection result.
 */
export interface ProviderInfo {
  provider: ConcreteProvider;
  model: string;
  dimension: number;
}

/**
 * Default models for each provider.
 */
const DEFAULT_MODELS: Record<ConcreteProvider, string> = {
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
  gemini: 'text-embedding-004',
  endpoint: 'nomic-embed-text',
};

/**
 * Default dimensions for known models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  // OpenAI
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  // Gemini
  'text-embedding-004': 768,
  'gemini-embedding-001': 3072,
  // Ollama / local models
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
};

/**
 * Timeout for availability checks (ms).
 */
const AVAILABILITY_CHECK_TIMEOUT = 3000;

/**
 * Factory for creating embedding clients with automatic provider detection.
 */
export class EmbeddingProviderFactory {
  private active: ProviderInfo | null = null;

  constructor(
    private readonly settings: EmbeddingSettings,
    private readonly policy: ProviderPolicy,
  ) {}

  /**
   * Create an embedding client using the provider ladder.
   *
   * @throws ConfigError when no provider is usable
   */
  async createClient(): Promise<EmbeddingClient> {
    const explicit = this.settings.provider;
    if (explicit !== 'auto') {
      debugLogger.log(
        `EmbeddingProviderFactory: Using explicit provider: ${explicit}`,
      );
      return this.createProviderClient(explicit);
    }

    debugLogger.log('EmbeddingProviderFactory: Auto-detecting provider...');

    if (await this.checkOllamaAvailability()) {
      debugLogger.log('EmbeddingProviderFactory: Using Ollama (reachable)');
      return this.createProviderClient('ollama');
    }
    if (this.settings.endpointUrl) {
      debugLogger.log(
        'EmbeddingProviderFactory: Using endpoint (EMBED_BASE_URL set)',
      );
      return this.createProviderClient('endpoint');
    }
    if (this.settings.openaiApiKey) {
      debugLogger.log('EmbeddingProviderFactory: Using OpenAI (key set)');
      return this.createProviderClient('openai');
    }
    if (this.settings.geminiApiKey) {
      debugLogger.log('EmbeddingProviderFactory: Using Gemini (key set)');
      return this.createProviderClient('gemini');
    }

    throw new ConfigError([
      'EMBED_PROVIDER: no embedding provider available; start Ollama or set EMBED_BASE_URL, OPENAI_API_KEY or GEMINI_API_KEY',
    ]);
  }

  /**
   * Create a client for a specific provider.
   */
  private createProviderClient(provider: ConcreteProvider): EmbeddingClient {
    const model = this.settings.model ?? DEFAULT_MODELS[provider];
    const dimension = MODEL_DIMENSIONS[model] ?? 768;
    const common = {
      model,
      dimension,
      timeoutMs: this.policy.timeoutMs,
      maxAttempts: this.policy.maxAttempts,
    };

    this.active = { provider, model, dimension };

    switch (provider) {
      case 'openai':
        if (!this.settings.openaiApiKey) {
          throw new ConfigError([
            'OPENAI_API_KEY: required for EMBED_PROVIDER=openai',
          ]);
        }
        return new OpenAIEmbeddings({
          ...common,
          baseUrl: this.settings.openaiBaseUrl,
          apiKey: this.settings.openaiApiKey,
        });

      case 'ollama':
        return new OllamaEmbeddings({
          ...common,
          baseUrl: this.settings.ollamaHost,
        });

      case 'gemini':
        if (!this.settings.geminiApiKey) {
          throw new ConfigError([
            'GEMINI_API_KEY: required for EMBED_PROVIDER=gemini',
          ]);
        }
        return new GeminiEmbeddings({
          ...common,
          apiKey: this.settings.geminiApiKey,
        });

      case 'endpoint':
        if (!this.settings.endpointUrl) {
          throw new ConfigError([
            'EMBED_BASE_URL: required for EMBED_PROVIDER=endpoint',
          ]);
        }
        return new OllamaEmbeddings({
          ...common,
          baseUrl: this.settings.endpointUrl,
        });

      default: {
        const unreachable: never = provider;
        throw new ConfigError([`EMBED_PROVIDER: unknown provider ${unreachable}`]);
      }
    }
  }

  /**
   * Check if Ollama is available at the configured host.
   */
  private async checkOllamaAvailability(): Promise<boolean> {
    const host = this.settings.ollamaHost.replace(/\/$/, '');

    try {
      const response = await fetch(`${host}/api/tags`, {
        signal: AbortSignal.timeout(AVAILABILITY_CHECK_TIMEOUT),
      });

      if (response.ok) {
        debugLogger.log('EmbeddingProviderFactory: Ollama is available');
        return true;
      }

      return false;
    } catch (error) {
      debugLogger.debug(
        `EmbeddingProviderFactory: Ollama not reachable: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  /**
   * Get provider info after createClient has been called.
   */
  getProviderInfo(): ProviderInfo | null {
    return this.active;
  }
}
