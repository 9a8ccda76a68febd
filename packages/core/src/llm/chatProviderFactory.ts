/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MealcartConfig, ProviderPolicy } from '../config/config.js';
import { debugLogger } from '../utils/debugLogger.js';
import { ConfigError } from '../utils/errors.js';
import type { ChatCompletionProvider } from './chat.js';
import { GeminiChatProvider } from './geminiChat.js';
import { OpenAIChatProvider } from './openaiChat.js';

const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

/**
 * Builds the configured chat provider.
 *
 * @throws ConfigError when the provider's API key is missing
 */
export function createChatProvider(
  chat: MealcartConfig['chat'],
  policy: ProviderPolicy,
): ChatCompletionProvider {
  debugLogger.log(`Chat provider: ${chat.provider} (${chat.model})`);

  switch (chat.provider) {
    case 'gemini':
      if (!chat.geminiApiKey) {
        throw new ConfigError([
          'GEMINI_API_KEY: required for MEALCART_CHAT_PROVIDER=gemini',
        ]);
      }
      return new GeminiChatProvider({
        model: chat.model,
        apiKey: chat.geminiApiKey,
        policy,
      });

    case 'openai':
      // Self-hosted OpenAI-compatible servers often run without a key
      if (!chat.openaiApiKey && chat.openaiBaseUrl === OPENAI_DEFAULT_BASE_URL) {
        throw new ConfigError([
          'OPENAI_API_KEY: required for MEALCART_CHAT_PROVIDER=openai',
        ]);
      }
      return new OpenAIChatProvider({
        model: chat.model,
        apiKey: chat.openaiApiKey,
        baseUrl: chat.openaiBaseUrl,
        policy,
      });

    default: {
      const unreachable: never = chat.provider;
      throw new ConfigError([
        `MEALCART_CHAT_PROVIDER: unknown provider ${String(unreachable)}`,
      ]);
    }
  }
}
