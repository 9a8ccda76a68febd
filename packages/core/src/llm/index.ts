/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type {
  ChatCompletion,
  ChatCompletionProvider,
  ChatMessage,
  ChatRequestOptions,
  JsonSchemaProperty,
  ToolDeclaration,
  ToolParameterSchema,
} from './chat.js';
export {
  GeminiChatProvider,
  fromGeminiResponse,
  toGeminiContents,
  type ContentGenerator,
  type GeminiChatProviderOptions,
  type GeneratedContent,
} from './geminiChat.js';
export {
  OpenAIChatProvider,
  decodeArguments,
  type OpenAIChatProviderOptions,
} from './openaiChat.js';
export { createChatProvider } from './chatProviderFactory.js';
