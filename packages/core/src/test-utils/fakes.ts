/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview In-process stand-ins for the model and embedding providers.
 */

import type {
  ChatCompletion,
  ChatCompletionProvider,
  ChatMessage,
  ChatRequestOptions,
} from '../llm/chat.js';
import type { ToolCall } from '../memory/types.js';
import type { EmbeddingClient } from '../retrieval/embeddings/index.js';

// =============================================================================
// Chat
// =============================================================================

export type ScriptedReply =
  | ChatCompletion
  | Error
  | ((messages: ChatMessage[], options: ChatRequestOptions) => ChatCompletion);

export interface RecordedChatCall {
  messages: ChatMessage[];
  options: ChatRequestOptions;
}

/**
 * Replays scripted replies in order, then `fallback` once the script runs out.
 */
export class FakeChatProvider implements ChatCompletionProvider {
  readonly name = 'fake';
  readonly model = 'fake-model';
  readonly calls: RecordedChatCall[] = [];
  private readonly script: ScriptedReply[];

  constructor(
    script: ScriptedReply[] = [],
    private readonly fallback: ChatCompletion = reply('ok'),
  ) {
    this.script = [...script];
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.script.push(...replies);
  }

  async complete(
    messages: readonly ChatMessage[],
    options: ChatRequestOptions = {},
  ): Promise<ChatCompletion> {
    const snapshot = messages.map((message) => ({ ...message }));
    this.calls.push({ messages: snapshot, options });

    const next = this.script.shift();
    if (next === undefined) {
      return { ...this.fallback, toolCalls: [...this.fallback.toolCalls] };
    }
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'function') {
      return next(snapshot, options);
    }
    return next;
  }
}

export function reply(content: string | null): ChatCompletion {
  return { content, toolCalls: [] };
}

let nextCallId = 0;

/**
 * A completion requesting the given tools, with fresh call ids.
 */
export function callTools(
  ...calls: Array<[name: string, args: Record<string, unknown>]>
): ChatCompletion {
  const toolCalls: ToolCall[] = calls.map(([name, args]) => ({
    id: `call-${++nextCallId}`,
    name,
    args,
  }));
  return { content: null, toolCalls };
}

// =============================================================================
// Embeddings
// =============================================================================

/**
 * Deterministic embeddings: fixed vectors for known texts, otherwise a hashed
 * bag of words.
 */
export class FakeEmbeddings implements EmbeddingClient {
  readonly embedded: string[] = [];
  private readonly fixed = new Map<string, number[]>();

  constructor(private readonly dimension = 4) {}

  set(text: string, vector: number[]): this {
    this.fixed.set(text, vector);
    return this;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorFor(text));
  }

  async embedOne(text: string): Promise<number[]> {
    return this.vectorFor(text);
  }

  getDimension(): number {
    return this.dimension;
  }

  getModel(): string {
    return 'fake-embedding';
  }

  private vectorFor(text: string): number[] {
    this.embedded.push(text);
    const fixed = this.fixed.get(text);
    if (fixed) {
      return [...fixed];
    }
    const vector = new Array<number>(this.dimension).fill(0);
    for (const word of text.toLowerCase().split(/\W+/).filter(Boolean)) {
      let hash = 0;
      for (const char of word) {
        hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
      }
      const slot = hash % this.dimension;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }
}
