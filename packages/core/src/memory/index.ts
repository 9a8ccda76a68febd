/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Public exports for conversation memory.
 *
 * ```
 * addUser/addAssistant/addTool → turn log ──(over hardCap)──► condense()
 *                                    │                            │
 *                                    ▼                            ▼
 *                     buildContext(systemPrompt)  ◄──  rolling summary
 * ```
 */

// =============================================================================
// Type exports
// =============================================================================

export type {
  AssistantTurn,
  SystemTurn,
  ToolCall,
  ToolTurn,
  Turn,
  TurnRole,
  UserTurn,
} from './types.js';

// =============================================================================
// Memory exports
// =============================================================================

export {
  CONDENSE_INSTRUCTION,
  ConversationMemory,
  DEFAULT_HISTORY_HARD_CAP,
  DEFAULT_HISTORY_KEEP,
  SUMMARY_PLACEHOLDER,
  findCondensationCut,
  type ConversationMemoryOptions,
} from './conversationMemory.js';

// =============================================================================
// Formatter exports
// =============================================================================

export {
  preview,
  renderTranscript,
  sanitizeProfileText,
} from './formatters.js';
