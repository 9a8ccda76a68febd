/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FunctionCallingConfigMode } from '@google/genai';
import { describe, it, expect, vi } from 'vitest';
import { ProviderError } from '../utils/errors.js';
import type { ToolDeclaration } from './chat.js';
import {
  GeminiChatProvider,
  fromGeminiResponse,
  toGeminiContents,
  type ContentGenerator,
} from './geminiChat.js';

const priceTool: ToolDeclaration = {
  name: 'get_price',
  description: 'Price of an ingredient',
  parameters: {
    type: 'object',
    properties: { ingredient_id: { type: 'integer' } },
    required: ['ingredient_id'],
  },
};

describe('toGeminiContents', () => {
  it('should map turns to contents and a system instruction', () => {
    const { systemInstruction, contents } = toGeminiContents([
      { role: 'system', content: 'Be helpful.' },
      { role: 'system', content: 'Conversation summary:\nnone' },
      { role: 'user', content: 'Price of tomato?' },
      {
        role: 'assistant',
        content: null,
        toolCalls: [
          { id: 'c1', name: 'get_price', args: { ingredient_id: 1 } },
          { id: 'c2', name: 'get_price', args: { ingredient_id: 2 } },
        ],
      },
      { role: 'tool', toolCallId: 'c1', toolName: 'get_price', content: '{"price":2}' },
      { role: 'tool', toolCallId: 'c2', toolName: 'get_price', content: '{"price":1}' },
      { role: 'assistant', content: 'Tomato is €2.' },
    ]);

    expect(systemInstruction).toBe('Be helpful.\n\nConversation summary:\nnone');
    expect(contents).toEqual([
      { role: 'user', parts: [{ text: 'Price of tomato?' }] },
      {
        role: 'model',
        parts: [
          { functionCall: { id: 'c1', name: 'get_price', args: { ingredient_id: 1 } } },
          { functionCall: { id: 'c2', name: 'get_price', args: { ingredient_id: 2 } } },
        ],
      },
      {
        role: 'user',
        parts: [
          {
            functionResponse: {
              id: 'c1',
              name: 'get_price',
              response: { output: '{"price":2}' },
            },
          },
          {
            functionResponse: {
              id: 'c2',
              name: 'get_price',
              response: { output: '{"price":1}' },
            },
          },
        ],
      },
      { role: 'model', parts: [{ text: 'Tomato is €2.' }] },
    ]);
  });
});

describe('fromGeminiResponse', () => {
  it('should read text', () => {
    expect(fromGeminiResponse({ text: 'Hello' })).toEqual({
      content: 'Hello',
      toolCalls: [],
    });
  });

  it('should keep call ids and generate missing ones', () => {
    const result = fromGeminiResponse({
      functionCalls: [
        { id: 'abc', name: 'list_sale_items', args: {} },
        { name: 'get_price', args: { ingredient_id: 3 } },
        { args: {} },
      ],
    });

    expect(result.content).toBeNull();
    expect(result.toolCalls).toHaveLength(2);
    expect(result.toolCalls[0]).toEqual({ id: 'abc', name: 'list_sale_items', args: {} });
    expect(result.toolCalls[1]?.name).toBe('get_price');
    expect(result.toolCalls[1]?.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('GeminiChatProvider', () => {
  it('should send model, contents and tool declarations', async () => {
    const generateContent = vi.fn<ContentGenerator['generateContent']>();
    generateContent.mockResolvedValueOnce({ text: 'Sure.' });
    const provider = new GeminiChatProvider({
      model: 'gemini-test',
      generator: { generateContent },
      policy: { maxAttempts: 1 },
    });

    const result = await provider.complete(
      [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'hi' },
      ],
      { tools: [priceTool], toolChoice: 'auto', maxOutputTokens: 50 },
    );

    expect(result).toEqual({ content: 'Sure.', toolCalls: [] });
    const params = generateContent.mock.calls[0]?.[0];
    expect(params?.model).toBe('gemini-test');
    expect(params?.contents).toEqual([{ role: 'user', parts: [{ text: 'hi' }] }]);
    expect(params?.config?.systemInstruction).toBe('SYS');
    expect(params?.config?.maxOutputTokens).toBe(50);
    expect(params?.config?.tools).toEqual([
      {
        functionDeclarations: [
          {
            name: 'get_price',
            description: 'Price of an ingredient',
            parametersJsonSchema: priceTool.parameters,
          },
        ],
      },
    ]);
    expect(params?.config?.toolConfig).toEqual({
      functionCallingConfig: { mode: FunctionCallingConfigMode.AUTO },
    });
    expect(params?.config?.abortSignal).toBeInstanceOf(AbortSignal);
  });

  it('should omit tools when none are attached', async () => {
    const generateContent = vi.fn<ContentGenerator['generateContent']>();
    generateContent.mockResolvedValueOnce({ text: 'Done.' });
    const provider = new GeminiChatProvider({
      model: 'gemini-test',
      generator: { generateContent },
    });

    await provider.complete([{ role: 'user', content: 'hi' }]);

    const config = generateContent.mock.calls[0]?.[0].config;
    expect(config?.tools).toBeUndefined();
    expect(config?.toolConfig).toBeUndefined();
    expect(config?.systemInstruction).toBeUndefined();
  });

  it('should wrap SDK errors and not retry client errors', async () => {
    const generateContent = vi.fn<ContentGenerator['generateContent']>();
    generateContent.mockRejectedValue(
      Object.assign(new Error('invalid argument'), { status: 400 }),
    );
    const provider = new GeminiChatProvider({
      model: 'gemini-test',
      generator: { generateContent },
      policy: { maxAttempts: 3 },
    });

    const error = await provider
      .complete([{ role: 'user', content: 'hi' }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'gemini: invalid argument',
      status: 400,
      retryable: false,
    });
    expect(generateContent).toHaveBeenCalledTimes(1);
  });
});
