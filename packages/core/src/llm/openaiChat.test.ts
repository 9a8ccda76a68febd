/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError } from '../utils/errors.js';
import { OpenAIChatProvider, decodeArguments } from './openaiChat.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('OpenAIChatProvider', () => {
  let provider: OpenAIChatProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    provider = new OpenAIChatProvider({
      model: 'gpt-test',
      apiKey: 'test-secret',
      baseUrl: 'https://llm.example.test/v1/',
      policy: { maxAttempts: 1 },
    });
  });

  it('should post messages and tools to /chat/completions', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: 'Hello!' } }] }),
    );

    const result = await provider.complete(
      [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: null,
          toolCalls: [{ id: 'c1', name: 'list_ingredients', args: {} }],
        },
        { role: 'tool', toolCallId: 'c1', toolName: 'list_ingredients', content: '[]' },
      ],
      {
        tools: [
          {
            name: 'list_ingredients',
            description: 'All ingredients',
            parameters: { type: 'object', properties: {} },
          },
        ],
        maxOutputTokens: 64,
      },
    );

    expect(result).toEqual({ content: 'Hello!', toolCalls: [] });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://llm.example.test/v1/chat/completions');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({
      model: 'gpt-test',
      max_tokens: 64,
      tool_choice: 'auto',
      messages: [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: 'c1',
              type: 'function',
              function: { name: 'list_ingredients', arguments: '{}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'c1', content: '[]' },
      ],
      tools: [
        {
          type: 'function',
          function: {
            name: 'list_ingredients',
            description: 'All ingredients',
            parameters: { type: 'object', properties: {} },
          },
        },
      ],
    });
  });

  it('should decode tool calls', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                {
                  id: 'call_1',
                  type: 'function',
                  function: { name: 'add_to_basket', arguments: '{"ingredient_id":1,"qty":2}' },
                },
                {
                  id: 'call_2',
                  type: 'function',
                  function: { name: 'get_price', arguments: '{broken' },
                },
              ],
            },
          },
        ],
      }),
    );

    const result = await provider.complete([{ role: 'user', content: 'add' }]);

    expect(result).toEqual({
      content: null,
      toolCalls: [
        { id: 'call_1', name: 'add_to_basket', args: { ingredient_id: 1, qty: 2 } },
        { id: 'call_2', name: 'get_price', args: {} },
      ],
    });
  });

  it('should raise ProviderError for an unexpected body', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));

    await expect(provider.complete([{ role: 'user', content: 'x' }])).rejects.toThrow(
      'openai: unexpected chat completion response',
    );
  });

  it('should raise ProviderError with the HTTP status', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: {} }, 401));

    const error = await provider
      .complete([{ role: 'user', content: 'x' }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ status: 401, retryable: false });
  });
});

describe('decodeArguments', () => {
  it('should only accept JSON objects', () => {
    expect(decodeArguments('t', '{"a":1}')).toEqual({ a: 1 });
    expect(decodeArguments('t', '')).toEqual({});
    expect(decodeArguments('t', '[1,2]')).toEqual({});
    expect(decodeArguments('t', '"text"')).toEqual({});
    expect(decodeArguments('t', 'not json')).toEqual({});
  });
});
