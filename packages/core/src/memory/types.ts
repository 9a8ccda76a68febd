/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Type definitions for the conversation memory.
 *
 * A conversation is an append-only, chronological log of turns. Tool turns
 * always answer a tool call emitted by an earlier assistant turn.
 */

export type TurnRole = 'user' | 'assistant' | 'tool' | 'system';

/**
 * A model-issued request to run a named local action.
 * Consumed exactly once by the dispatcher.
 */
export interface ToolCall {
  /** Unique identifier issued with the call */
  id: string;
  /** Tool name as declared to the model */
  name: string;
  /** Decoded arguments */
  args: Record<string, unknown>;
}

export interface UserTurn {
  role: 'user';
  content: string;
}

export interface AssistantTurn {
  role: 'assistant';
  /** Null when the model only issued tool calls */
  content: string | null;
  /** Present only when the model requested tools */
  toolCalls?: ToolCall[];
}

export interface ToolTurn {
  role: 'tool';
  /** Serialized tool result */
  content: string;
  /** Id of the tool call this turn answers */
  toolCallId: string;
  /** Name of the answered tool, needed by providers that key responses by name */
  toolName: string;
}

export interface SystemTurn {
  role: 'system';
  content: string;
}

export type Turn = UserTurn | AssistantTurn | ToolTurn | SystemTurn;
