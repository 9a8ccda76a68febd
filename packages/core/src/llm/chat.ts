/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Chat completion provider interface.
 *
 * Abstracts the language model so the session loop and the condensation pass
 * can run against Gemini, an OpenAI-compatible endpoint, or a test double.
 */

import type { ToolCall, Turn } from '../memory/types.js';

export type ChatMessage = Turn;

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  default?: string | number | boolean;
  enum?: string[];
  minimum?: number;
  maximum?: number;
}

export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

/**
 * What the model sees of a tool: its name, purpose and parameter shape.
 * Changing a declaration is a breaking change for the conversation protocol.
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
}

export interface ChatRequestOptions {
  /** Tools the model may call; omitted for tool-free completions */
  tools?: ToolDeclaration[];
  /** Tool selection policy when tools are attached (default: 'auto') */
  toolChoice?: 'auto' | 'none';
  /** Cap on generated tokens */
  maxOutputTokens?: number;
  /** Caller signal, combined with the provider timeout */
  signal?: AbortSignal;
}

export interface ChatCompletion {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ChatCompletionProvider {
  /** Provider identifier ('gemini', 'openai', ...) */
  readonly name: string;
  /** Model identifier */
  readonly model: string;

  /**
   * Completes a conversation.
   *
   * @throws ProviderError on transport or API failures after retries
   */
  complete(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatCompletion>;
}
