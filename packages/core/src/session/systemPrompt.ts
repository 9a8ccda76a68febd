/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview The system message, rendered fresh for every model call from
 * the customer profile and the basket state.
 */

import { sanitizeProfileText } from '../memory/formatters.js';

export interface SystemPromptState {
  /** Stored profile summary; model-written, sanitised before use */
  customerSummary: string | null;
  /** {@link Basket.synopsis} line */
  basketSynopsis: string;
}

export const SYSTEM_PROMPT_TEMPLATE = `You are Mealcart, a friendly culinary assistant.
Goal: help the user choose meals they will enjoy and build a shopping basket.
{customer_summary}
{basket_synopsis}
Do not impose strict meal rules on the user. Listen to their needs and let their summary inform suggestions quietly in the background.
Use the provided tools only when you need factual data (search, price lookup, basket operations).
After any basket change, confirm it and show the new basket state.
On checkout, give cooking tips and a compact session summary.`;

export const FORCED_ANSWER_INSTRUCTION =
  "You can't use any more tools. Finish answering.";

export function renderSystemPrompt(state: SystemPromptState): string {
  const summary = state.customerSummary
    ? sanitizeProfileText(state.customerSummary)
    : '';
  const summaryLine =
    summary === '' ? 'User summary: (none yet)' : `User summary: ${summary}`;

  return SYSTEM_PROMPT_TEMPLATE.replace('{customer_summary}', () => summaryLine).replace(
    '{basket_synopsis}',
    () => state.basketSynopsis,
  );
}
