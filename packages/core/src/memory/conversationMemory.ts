/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Bounded conversation memory.
 *
 * Holds the chronological turn log plus one rolling summary slot. Before every
 * model call {@link ConversationMemory.condense} enforces the turn budget: once
 * the log grows past `hardCap`, the oldest turns are summarised by a secondary
 * model call, the result is appended to the rolling summary, and only the most
 * recent `keep` turns remain.
 *
 * ## Cut policy
 *
 * The cut never separates a tool turn from the assistant turn that issued its
 * call. If the nominal cut lands on tool turns, it moves forward past them (the
 * owning assistant turn is condensed together with its results). If every turn
 * after the cut is a tool turn, it moves back to the owning assistant turn, so
 * the kept tail may then be longer than `keep`. An assistant turn carries at
 * most `hardCap - 1` tool calls, so that tail never exceeds `hardCap`.
 */

import type {
  ChatCompletionProvider,
  ChatMessage,
} from '../llm/chat.js';
import { debugLogger } from '../utils/debugLogger.js';
import { renderTranscript } from './formatters.js';
import type { ToolCall, Turn } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_HISTORY_HARD_CAP = 26;
export const DEFAULT_HISTORY_KEEP = 15;

export const SUMMARY_PLACEHOLDER =
  '(conversation summary will appear here as needed)';

export const CONDENSE_INSTRUCTION =
  'Summarise the following chat history in under 150 words, preserve facts:';

const CONDENSE_MAX_OUTPUT_TOKENS = 200;

// =============================================================================
// Cut policy
// =============================================================================

/**
 * Index of the first turn to keep when condensing `turns` down to `keep`.
 */
export function findCondensationCut(
  turns: readonly Turn[],
  keep: number,
): number {
  const nominal = Math.max(0, turns.length - keep);

  let forward = nominal;
  while (forward < turns.length && turns[forward]?.role === 'tool') {
    forward++;
  }
  if (forward < turns.length) {
    return forward;
  }

  let backward = nominal;
  while (backward > 0 && turns[backward]?.role === 'tool') {
    backward--;
  }
  return backward;
}

// =============================================================================
// ConversationMemory
// =============================================================================

export interface ConversationMemoryOptions {
  /** Model used for the condensation call */
  summarizer: ChatCompletionProvider;
  /** Condense once the log holds more turns than this (default: 26) */
  hardCap?: number;
  /** Turns retained after condensation (default: 15) */
  keep?: number;
}

export class ConversationMemory {
  private readonly summarizer: ChatCompletionProvider;
  private readonly hardCap: number;
  private readonly keep: number;

  private turnLog: Turn[] = [];
  private summary = '';
  private condensations = 0;
  private readonly pendingToolCalls = new Set<string>();

  constructor(options: ConversationMemoryOptions) {
    this.summarizer = options.summarizer;
    this.hardCap = options.hardCap ?? DEFAULT_HISTORY_HARD_CAP;
    this.keep = options.keep ?? DEFAULT_HISTORY_KEEP;

    if (this.keep < 1 || this.keep >= this.hardCap) {
      throw new RangeError(
        `keep (${this.keep}) must be at least 1 and smaller than hardCap (${this.hardCap})`,
      );
    }
  }

  /** Most tool calls one assistant turn may carry */
  get maxToolCallsPerTurn(): number {
    return this.hardCap - 1;
  }

  get turns(): readonly Turn[] {
    return this.turnLog;
  }

  /** Empty until the first condensation */
  get rollingSummary(): string {
    return this.summary;
  }

  get condensationCount(): number {
    return this.condensations;
  }

  // ---------------------------------------------------------------------------
  // Accumulate
  // ---------------------------------------------------------------------------

  addUser(content: string): void {
    this.turnLog.push({ role: 'user', content });
  }

  /**
   * @throws RangeError when `toolCalls` holds more than
   *   {@link maxToolCallsPerTurn} calls
   */
  addAssistant(content: string | null, toolCalls: ToolCall[] = []): void {
    if (toolCalls.length > this.maxToolCallsPerTurn) {
      throw new RangeError(
        `An assistant turn may carry at most ${this.maxToolCallsPerTurn} tool calls, got ${toolCalls.length}`,
      );
    }
    if (toolCalls.length === 0) {
      this.turnLog.push({ role: 'assistant', content });
      return;
    }
    for (const call of toolCalls) {
      this.pendingToolCalls.add(call.id);
    }
    this.turnLog.push({
      role: 'assistant',
      content,
      toolCalls: toolCalls.map((call) => ({ ...call, args: { ...call.args } })),
    });
  }

  /**
   * Appends the result of a tool call.
   *
   * @throws Error if no earlier assistant turn issued `toolCallId`, or it was
   *   already answered
   */
  addTool(toolCallId: string, toolName: string, content: string): void {
    if (!this.pendingToolCalls.delete(toolCallId)) {
      throw new Error(`No pending tool call with id '${toolCallId}'`);
    }
    this.turnLog.push({ role: 'tool', content, toolCallId, toolName });
  }

  // ---------------------------------------------------------------------------
  // Condense
  // ---------------------------------------------------------------------------

  /**
   * Enforces the turn budget. Returns true when a condensation happened.
   *
   * A summariser failure propagates and leaves the log untouched.
   */
  async condense(signal?: AbortSignal): Promise<boolean> {
    if (this.turnLog.length <= this.hardCap) {
      return false;
    }

    const cut = findCondensationCut(this.turnLog, this.keep);
    const overflow = this.turnLog.slice(0, cut);
    const transcript = renderTranscript(overflow);

    if (transcript !== '') {
      const completion = await this.summarizer.complete(
        [
          { role: 'system', content: CONDENSE_INSTRUCTION },
          { role: 'user', content: transcript },
        ],
        { maxOutputTokens: CONDENSE_MAX_OUTPUT_TOKENS, signal },
      );
      const text = completion.content?.trim() ?? '';
      if (text !== '') {
        this.summary = this.summary === '' ? text : `${this.summary}\n${text}`;
      }
    }

    this.turnLog = this.turnLog.slice(cut);
    this.condensations++;
    debugLogger.debug(
      `[ConversationMemory] Condensed ${overflow.length} turns, ${this.turnLog.length} kept`,
    );
    return true;
  }

  // ---------------------------------------------------------------------------
  // Render
  // ---------------------------------------------------------------------------

  /**
   * Messages for the next model call:
   * `[system prompt, summary, ...turns, ...trailing]`.
   */
  buildContext(
    systemPrompt: string,
    trailing: readonly ChatMessage[] = [],
  ): ChatMessage[] {
    return [
      { role: 'system', content: systemPrompt },
      {
        role: 'system',
        content: `Conversation summary:\n${this.summary === '' ? SUMMARY_PLACEHOLDER : this.summary}`,
      },
      ...this.turnLog,
      ...trailing,
    ];
  }

  /**
   * The last `window` turns, keeping user and assistant text only.
   */
  recentDialogue(window = DEFAULT_HISTORY_KEEP): string {
    return renderTranscript(this.turnLog.slice(-window));
  }
}
