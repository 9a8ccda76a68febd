/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { debugLogger } from '../utils/debugLogger.js';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z
  .object({
    MEALCART_CHAT_PROVIDER: z.enum(['gemini', 'openai']).optional(),
    MEALCART_CHAT_MODEL: optionalString,
    GEMINI_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),

    EMBED_PROVIDER: z
      .enum(['auto', 'openai', 'ollama', 'gemini', 'endpoint'])
      .default('auto'),
    EMBED_MODEL: optionalString,
    EMBED_BASE_URL: optionalString,
    OLLAMA_HOST: z.string().url().default('http://localhost:11434'),

    MEALCART_STORE: z.enum(['lancedb', 'memory']).default('lancedb'),
    MEALCART_DB_PATH: z.string().default('.mealcart/catalog.lance'),
    MEALCART_SEED_PATH: z.string().default('data/seed-catalog.json'),

    MEALCART_MAX_LOOPS: z.coerce.number().int().min(0).default(5),
    MEALCART_HISTORY_HARD_CAP: z.coerce.number().int().min(2).default(26),
    MEALCART_HISTORY_KEEP: z.coerce.number().int().min(1).default(15),

    MEALCART_PROVIDER_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(60_000),
    MEALCART_PROVIDER_MAX_ATTEMPTS: z.coerce
      .number()
      .int()
      .min(1)
      .default(3),
  })
  .refine((env) => env.MEALCART_HISTORY_KEEP < env.MEALCART_HISTORY_HARD_CAP, {
    message: 'MEALCART_HISTORY_KEEP must be smaller than MEALCART_HISTORY_HARD_CAP',
    path: ['MEALCART_HISTORY_KEEP'],
  });

export type ChatProviderName = 'gemini' | 'openai';
export type EmbeddingProviderName =
  | 'auto'
  | 'openai'
  | 'ollama'
  | 'gemini'
  | 'endpoint';

export interface ProviderPolicy {
  timeoutMs: number;
  maxAttempts: number;
}

export interface MealcartConfig {
  chat: {
    provider: ChatProviderName;
    model: string;
    geminiApiKey?: string;
    openaiApiKey?: string;
    openaiBaseUrl: string;
  };
  embedding: {
    provider: EmbeddingProviderName;
    model?: string;
    endpointUrl?: string;
    ollamaHost: string;
    geminiApiKey?: string;
    openaiApiKey?: string;
    openaiBaseUrl: string;
  };
  store: {
    kind: 'lancedb' | 'memory';
    dbPath: string;
    seedPath: string;
  };
  session: {
    maxLoops: number;
    historyHardCap: number;
    historyKeep: number;
  };
  providerPolicy: ProviderPolicy;
}

const DEFAULT_CHAT_MODELS: Record<ChatProviderName, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
};

/**
 * Loads the first `.env` found walking up from `startDir` into `process.env`.
 * Existing variables win over file values.
 */
export function loadEnvironment(startDir: string = process.cwd()): void {
  const envFile = findEnvFile(startDir);
  if (envFile) {
    debugLogger.log(`Loading environment from ${envFile}`);
    dotenv.config({ path: envFile });
  }
}

function findEnvFile(startDir: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, '.env');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Validates environment variables into a {@link MealcartConfig}.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): MealcartConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
      ),
    );
  }
  const e = parsed.data;

  const chatProvider: ChatProviderName =
    e.MEALCART_CHAT_PROVIDER ?? (e.GEMINI_API_KEY ? 'gemini' : 'openai');

  return {
    chat: {
      provider: chatProvider,
      model: e.MEALCART_CHAT_MODEL ?? DEFAULT_CHAT_MODELS[chatProvider],
      geminiApiKey: e.GEMINI_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
    },
    embedding: {
      provider: e.EMBED_PROVIDER,
      model: e.EMBED_MODEL,
      endpointUrl: e.EMBED_BASE_URL,
      ollamaHost: e.OLLAMA_HOST,
      geminiApiKey: e.GEMINI_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
    },
    store: {
      kind: e.MEALCART_STORE,
      dbPath: e.MEALCART_DB_PATH,
      seedPath: e.MEALCART_SEED_PATH,
    },
    session: {
      maxLoops: e.MEALCART_MAX_LOOPS,
      historyHardCap: e.MEALCART_HISTORY_HARD_CAP,
      historyKeep: e.MEALCART_HISTORY_KEEP,
    },
    providerPolicy: {
      timeoutMs: e.MEALCART_PROVIDER_TIMEOUT_MS,
      maxAttempts: e.MEALCART_PROVIDER_MAX_ATTEMPTS,
    },
  };
}
