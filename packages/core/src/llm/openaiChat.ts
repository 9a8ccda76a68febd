/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Chat completion provider for OpenAI-compatible APIs.
 *
 * POST {baseUrl}/chat/completions with function tools. Tool call arguments
 * arrive as JSON text; text that does not decode to an object becomes `{}` so
 * that argument validation reports what is missing.
 */

import { z } from 'zod';
import type { ProviderPolicy } from '../config/config.js';
import type { ToolCall } from '../memory/types.js';
import { debugLogger } from '../utils/debugLogger.js';
import { ProviderError } from '../utils/errors.js';
import { postJson } from '../utils/fetch.js';
import { retryWithBackoff } from '../utils/retry.js';
import type {
  ChatCompletion,
  ChatCompletionProvider,
  ChatMessage,
  ChatRequestOptions,
} from './chat.js';

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().default(''),
                }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
});

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: 'function';
        function: { name: string; arguments: string };
      }>;
    }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface OpenAIChatProviderOptions {
  model: string;
  apiKey?: string;
  /** Default: https://api.openai.com/v1 */
  baseUrl?: string;
  policy?: Partial<ProviderPolicy>;
}

const DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  timeoutMs: 60_000,
  maxAttempts: 3,
} as const;

export class OpenAIChatProvider implements ChatCompletionProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(options: OpenAIChatProviderOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULTS.baseUrl).replace(/\/$/, '');
    this.timeoutMs = options.policy?.timeoutMs ?? DEFAULTS.timeoutMs;
    this.maxAttempts = options.policy?.maxAttempts ?? DEFAULTS.maxAttempts;
  }

  async complete(
    messages: readonly ChatMessage[],
    options: ChatRequestOptions = {},
  ): Promise<ChatCompletion> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: messages.map(toOpenAIMessage),
    };
    if (options.maxOutputTokens !== undefined) {
      body['max_tokens'] = options.maxOutputTokens;
    }
    if (options.tools && options.tools.length > 0) {
      body['tools'] = options.tools.map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
      body['tool_choice'] = options.toolChoice ?? 'auto';
    }

    const raw = await retryWithBackoff(
      () =>
        postJson('openai', `${this.baseUrl}/chat/completions`, body, {
          headers: this.apiKey
            ? { Authorization: `Bearer ${this.apiKey}` }
            : undefined,
          timeoutMs: this.timeoutMs,
          signal: options.signal,
        }),
      {
        maxAttempts: this.maxAttempts,
        signal: options.signal,
        label: 'OpenAIChatProvider',
      },
    );

    const parsed = chatCompletionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('openai: unexpected chat completion response', {
        retryable: false,
      });
    }

    const [choice] = parsed.data.choices;
    const message = choice?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      args: decodeArguments(call.function.name, call.function.arguments),
    }));
    const content = message?.content;
    return {
      content: content !== undefined && content !== null && content !== '' ? content : null,
      toolCalls,
    };
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case 'system':
    case 'user':
      return { role: message.role, content: message.content };
    case 'assistant':
      if (!message.toolCalls || message.toolCalls.length === 0) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: JSON.stringify(call.args) },
        })),
      };
    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId,
        content: message.content,
      };
    default: {
      const unreachable: never = message;
      throw new Error(`Unsupported message ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Decodes tool call arguments; anything but a JSON object becomes `{}`.
 */
export function decodeArguments(
  toolName: string,
  text: string,
): Record<string, unknown> {
  if (text.trim() === '') {
    return {};
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    debugLogger.warn(
      `OpenAIChatProvider: undecodable arguments for ${toolName}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
    return {};
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return {};
  }
  return Object.fromEntries(Object.entries(decoded));
}
