/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Chat completion provider on `@google/genai`.
 *
 * ## Message mapping
 *
 * | turn      | Gemini                                                   |
 * | --------- | -------------------------------------------------------- |
 * | system    | joined into `config.systemInstruction`                   |
 * | user      | `user` content with a text part                          |
 * | assistant | `model` content with text and `functionCall` parts       |
 * | tool      | `functionResponse` parts, consecutive ones in one `user` |
 */

import {
  FunctionCallingConfigMode,
  GoogleGenAI,
  type Content,
  type FunctionCall,
  type GenerateContentConfig,
  type GenerateContentParameters,
  type Part,
} from '@google/genai';
import { v4 as uuidv4 } from 'uuid';
import type { ProviderPolicy } from '../config/config.js';
import type { ToolCall } from '../memory/types.js';
import { debugLogger } from '../utils/debugLogger.js';
import { toProviderError } from '../utils/errors.js';
import { retryWithBackoff, withTimeout } from '../utils/retry.js';
import type {
  ChatCompletion,
  ChatCompletionProvider,
  ChatMessage,
  ChatRequestOptions,
} from './chat.js';

/**
 * The part of a generateContent response this provider reads.
 */
export interface GeneratedContent {
  text?: string;
  functionCalls?: FunctionCall[];
}

/**
 * The slice of the SDK's `models` module this provider calls.
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<GeneratedContent>;
}

export interface GeminiChatProviderOptions {
  model: string;
  apiKey?: string;
  /** Pre-built SDK surface; defaults to `new GoogleGenAI({ apiKey }).models` */
  generator?: ContentGenerator;
  policy?: Partial<ProviderPolicy>;
}

const DEFAULTS = {
  timeoutMs: 60_000,
  maxAttempts: 3,
} as const;

export class GeminiChatProvider implements ChatCompletionProvider {
  readonly name = 'gemini';
  readonly model: string;
  private readonly generator: ContentGenerator;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(options: GeminiChatProviderOptions) {
    this.model = options.model;
    this.generator =
      options.generator ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
    this.timeoutMs = options.policy?.timeoutMs ?? DEFAULTS.timeoutMs;
    this.maxAttempts = options.policy?.maxAttempts ?? DEFAULTS.maxAttempts;
  }

  async complete(
    messages: readonly ChatMessage[],
    options: ChatRequestOptions = {},
  ): Promise<ChatCompletion> {
    const { systemInstruction, contents } = toGeminiContents(messages);

    const response = await retryWithBackoff(
      async () => {
        const config: GenerateContentConfig = {
          abortSignal: withTimeout(this.timeoutMs, options.signal),
        };
        if (systemInstruction) {
          config.systemInstruction = systemInstruction;
        }
        if (options.maxOutputTokens !== undefined) {
          config.maxOutputTokens = options.maxOutputTokens;
        }
        if (options.tools && options.tools.length > 0) {
          config.tools = [
            {
              functionDeclarations: options.tools.map((tool) => ({
                name: tool.name,
                description: tool.description,
                parametersJsonSchema: tool.parameters,
              })),
            },
          ];
          config.toolConfig = {
            functionCallingConfig: {
              mode:
                options.toolChoice === 'none'
                  ? FunctionCallingConfigMode.NONE
                  : FunctionCallingConfigMode.AUTO,
            },
          };
        }

        try {
          return await this.generator.generateContent({
            model: this.model,
            contents,
            config,
          });
        } catch (error) {
          throw toProviderError('gemini', error);
        }
      },
      {
        maxAttempts: this.maxAttempts,
        signal: options.signal,
        label: 'GeminiChatProvider',
      },
    );

    return fromGeminiResponse(response);
  }
}

/**
 * Converts turns into Gemini contents plus a system instruction.
 */
export function toGeminiContents(messages: readonly ChatMessage[]): {
  systemInstruction: string | undefined;
  contents: Content[];
} {
  const system: string[] = [];
  const contents: Content[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        system.push(message.content);
        break;

      case 'user':
        contents.push({ role: 'user', parts: [{ text: message.content }] });
        break;

      case 'assistant': {
        const parts: Part[] = [];
        if (message.content) {
          parts.push({ text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          parts.push({
            functionCall: { id: call.id, name: call.name, args: call.args },
          });
        }
        contents.push({
          role: 'model',
          parts: parts.length > 0 ? parts : [{ text: '' }],
        });
        break;
      }

      case 'tool': {
        const part: Part = {
          functionResponse: {
            id: message.toolCallId,
            name: message.toolName,
            response: { output: message.content },
          },
        };
        const previous = contents.at(-1);
        const previousParts =
          previous?.role === 'user' ? previous.parts : undefined;
        if (
          previousParts &&
          previousParts.every((p) => p.functionResponse !== undefined)
        ) {
          previousParts.push(part);
        } else {
          contents.push({ role: 'user', parts: [part] });
        }
        break;
      }

      default: {
        const unreachable: never = message;
        throw new Error(`Unsupported message ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return {
    systemInstruction: system.length > 0 ? system.join('\n\n') : undefined,
    contents,
  };
}

export function fromGeminiResponse(response: GeneratedContent): ChatCompletion {
  const toolCalls: ToolCall[] = [];
  for (const call of response.functionCalls ?? []) {
    if (!call.name) {
      debugLogger.warn('GeminiChatProvider: dropping function call without a name');
      continue;
    }
    toolCalls.push({
      id: call.id ?? uuidv4(),
      name: call.name,
      args: call.args ?? {},
    });
  }
  const text = response.text;
  return {
    content: text !== undefined && text !== '' ? text : null,
    toolCalls,
  };
}
