/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError } from '../../utils/errors.js';
import {
  EmbeddingProviderFactory,
  type EmbeddingSettings,
} from './embeddingProviderFactory.js';
import { OllamaEmbeddings } from './ollamaEmbeddings.js';
import { OpenAIEmbeddings } from './openaiEmbeddings.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const policy = { timeoutMs: 1000, maxAttempts: 1 };

function settings(overrides: Partial<EmbeddingSettings> = {}): EmbeddingSettings {
  return {
    provider: 'auto',
    ollamaHost: 'http://localhost:11434',
    openaiBaseUrl: 'https://api.openai.com/v1',
    ...overrides,
  };
}

describe('EmbeddingProviderFactory', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should use an explicit provider without probing', async () => {
    const factory = new EmbeddingProviderFactory(
      settings({ provider: 'openai', openaiApiKey: 'test-secret' }),
      policy,
    );

    const client = await factory.createClient();

    expect(client).toBeInstanceOf(OpenAIEmbeddings);
    expect(client.getModel()).toBe('text-embedding-3-small');
    expect(client.getDimension()).toBe(1536);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should prefer Ollama when reachable', async () => {
    mockFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const factory = new EmbeddingProviderFactory(
      settings({ openaiApiKey: 'test-secret' }),
      policy,
    );

    const client = await factory.createClient();

    expect(client).toBeInstanceOf(OllamaEmbeddings);
    expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
    expect(factory.getProviderInfo()).toEqual({
      provider: 'ollama',
      model: 'nomic-embed-text',
      dimension: 768,
    });
  });

  it('should fall back to the configured endpoint', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const factory = new EmbeddingProviderFactory(
      settings({ endpointUrl: 'http://tei.local:8080', model: 'all-minilm' }),
      policy,
    );

    const client = await factory.createClient();

    expect(client).toBeInstanceOf(OllamaEmbeddings);
    expect(factory.getProviderInfo()).toEqual({
      provider: 'endpoint',
      model: 'all-minilm',
      dimension: 384,
    });
  });

  it('should fall back to OpenAI when a key is set', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 404 }));
    const factory = new EmbeddingProviderFactory(
      settings({ openaiApiKey: 'test-secret' }),
      policy,
    );

    expect(await factory.createClient()).toBeInstanceOf(OpenAIEmbeddings);
  });

  it('should fail with a configuration error when nothing is available', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const factory = new EmbeddingProviderFactory(settings(), policy);

    await expect(factory.createClient()).rejects.toBeInstanceOf(ConfigError);
  });

  it('should require a key for an explicit hosted provider', async () => {
    const factory = new EmbeddingProviderFactory(
      settings({ provider: 'gemini' }),
      policy,
    );

    await expect(factory.createClient()).rejects.toThrow(
      'GEMINI_API_KEY: required for EMBED_PROVIDER=gemini',
    );
  });
});
