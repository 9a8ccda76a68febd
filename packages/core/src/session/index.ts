/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { Basket, MAX_UNITS_PER_ADD, roundCents } from './basket.js';
export type { BasketItem, BasketLine } from './basket.js';
export {
  FORCED_ANSWER_INSTRUCTION,
  SYSTEM_PROMPT_TEMPLATE,
  renderSystemPrompt,
} from './systemPrompt.js';
export type { SystemPromptState } from './systemPrompt.js';
export {
  DEFAULT_MAX_LOOPS,
  PROFILE_DIALOGUE_WINDOW,
  PROFILE_INSTRUCTION,
  SessionController,
} from './sessionController.js';
export type {
  CheckoutResult,
  PurchasedItem,
  SessionDependencies,
  SessionReply,
  SessionState,
} from './sessionController.js';
export { CAMPAIGN_DEFAULTS, SaleCampaignManager } from './saleCampaign.js';
export type {
  CampaignMeal,
  CustomerMatch,
  SaleCampaignOptions,
} from './saleCampaign.js';
