/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview One customer's conversation with the assistant.
 *
 * The reasoning loop is a bounded state machine:
 *
 * ```
 * AwaitingUser → Reasoning → (ToolDispatch → Reasoning)* → AwaitingUser
 * ```
 *
 * Every model call is preceded by a condensation check and gets a freshly
 * rendered system prompt. After `maxLoops` rounds of tool calls the model is
 * called once more without tools and told to finish.
 */

import type { CatalogStore, Customer, PersistenceStore } from '../catalog/types.js';
import type { MealcartConfig } from '../config/config.js';
import type { ChatCompletionProvider, ChatMessage } from '../llm/chat.js';
import {
  ConversationMemory,
  DEFAULT_HISTORY_HARD_CAP,
  DEFAULT_HISTORY_KEEP,
} from '../memory/conversationMemory.js';
import { preview } from '../memory/formatters.js';
import type { CatalogIndexes } from '../retrieval/catalogIndexes.js';
import { createShopToolRegistry } from '../tools/index.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { debugLogger } from '../utils/debugLogger.js';
import {
  EmptyBasketError,
  NotFoundError,
  SessionBusyError,
} from '../utils/errors.js';
import { Basket, roundCents } from './basket.js';
import { FORCED_ANSWER_INSTRUCTION, renderSystemPrompt } from './systemPrompt.js';

export const DEFAULT_MAX_LOOPS = 5;

/** Turns of recent dialogue merged into the profile at checkout */
export const PROFILE_DIALOGUE_WINDOW = 15;

export const PROFILE_INSTRUCTION =
  'You are updating a short user profile (<80 words). Merge the OLD summary with what the user talked about lately. Highlight recent cooking trends or diet changes.';

const PROFILE_MAX_OUTPUT_TOKENS = 120;

export type SessionState =
  | 'awaiting_user'
  | 'reasoning'
  | 'tool_dispatch'
  | 'checking_out';

export interface SessionDependencies {
  store: CatalogStore & PersistenceStore;
  indexes: CatalogIndexes;
  chat: ChatCompletionProvider;
  /** Model for condensation and profile updates (default: `chat`) */
  summarizer?: ChatCompletionProvider;
  settings?: Partial<MealcartConfig['session']>;
  /** Clock for purchase timestamps, epoch ms */
  now?: () => number;
}

export interface SessionReply {
  text: string;
  /** Rounds of tool calls made for this message */
  loops: number;
  /** True when the loop cap forced a tool-free answer */
  forcedAnswer: boolean;
}

export interface PurchasedItem {
  ingredientId: number;
  name: string;
  price: number;
}

export interface CheckoutResult {
  purchases: PurchasedItem[];
  total: number;
  newSummary: string;
}

export class SessionController {
  readonly basket = new Basket();
  readonly memory: ConversationMemory;
  readonly tools: ToolRegistry;

  private readonly maxLoops: number;
  private readonly summarizer: ChatCompletionProvider;
  private readonly now: () => number;
  private currentState: SessionState = 'awaiting_user';

  constructor(
    private readonly deps: SessionDependencies,
    private customerRecord: Customer,
  ) {
    const settings = deps.settings ?? {};
    this.maxLoops = settings.maxLoops ?? DEFAULT_MAX_LOOPS;
    this.summarizer = deps.summarizer ?? deps.chat;
    this.now = deps.now ?? Date.now;
    this.memory = new ConversationMemory({
      summarizer: this.summarizer,
      hardCap: settings.historyHardCap ?? DEFAULT_HISTORY_HARD_CAP,
      keep: settings.historyKeep ?? DEFAULT_HISTORY_KEEP,
    });
    this.tools = createShopToolRegistry({
      catalog: deps.store,
      indexes: deps.indexes,
      basket: this.basket,
    });
  }

  /**
   * Opens a session for `customerName`, creating the customer on first visit.
   */
  static async open(
    deps: SessionDependencies,
    customerName: string,
  ): Promise<SessionController> {
    const name = customerName.trim();
    let customer = await deps.store.findCustomerByName(name);
    if (!customer) {
      customer = await deps.store.createCustomer({ fullName: name });
      debugLogger.log(`[Session] Created customer ${customer.id} (${name})`);
    }
    return new SessionController(deps, customer);
  }

  get customer(): Customer {
    return { ...this.customerRecord };
  }

  get state(): SessionState {
    return this.currentState;
  }

  systemPrompt(): string {
    return renderSystemPrompt({
      customerSummary: this.customerRecord.summary,
      basketSynopsis: this.basket.synopsis(),
    });
  }

  // ---------------------------------------------------------------------------
  // Reasoning loop
  // ---------------------------------------------------------------------------

  /**
   * Runs the loop for one user message and returns the final answer.
   *
   * @throws SessionBusyError while a previous message or checkout is running
   * @throws ProviderError when a model call fails after retries
   */
  async addUserMessage(text: string, signal?: AbortSignal): Promise<SessionReply> {
    this.enter('reasoning');
    try {
      debugLogger.log(
        `[Session:${this.customerRecord.id}] user: "${preview(text)}"`,
      );
      this.memory.addUser(text);
      return await this.reason(signal);
    } finally {
      this.currentState = 'awaiting_user';
    }
  }

  private async reason(signal?: AbortSignal): Promise<SessionReply> {
    const declarations = this.tools.getFunctionDeclarations();
    let loops = 0;

    for (;;) {
      this.currentState = 'reasoning';
      await this.memory.condense(signal);

      const forcedAnswer = loops >= this.maxLoops;
      const trailing: ChatMessage[] = forcedAnswer
        ? [{ role: 'system', content: FORCED_ANSWER_INSTRUCTION }]
        : [];
      const messages = this.memory.buildContext(this.systemPrompt(), trailing);
      const completion = await this.deps.chat.complete(
        messages,
        forcedAnswer ? { signal } : { tools: declarations, toolChoice: 'auto', signal },
      );

      if (forcedAnswer || completion.toolCalls.length === 0) {
        if (forcedAnswer && completion.toolCalls.length > 0) {
          debugLogger.warn(
            `[Session:${this.customerRecord.id}] Ignoring ${completion.toolCalls.length} tool calls after the loop cap`,
          );
        }
        this.memory.addAssistant(completion.content);
        return { text: completion.content ?? '', loops, forcedAnswer };
      }

      const calls = completion.toolCalls.slice(0, this.memory.maxToolCallsPerTurn);
      if (calls.length < completion.toolCalls.length) {
        debugLogger.warn(
          `[Session:${this.customerRecord.id}] Dropping ${completion.toolCalls.length - calls.length} tool calls past the per-turn limit`,
        );
      }
      this.memory.addAssistant(completion.content, calls);
      this.currentState = 'tool_dispatch';
      for (const call of calls) {
        const result = await this.tools.dispatch(call, signal);
        this.memory.addTool(call.id, call.name, result.content);
      }
      loops++;
    }
  }

  // ---------------------------------------------------------------------------
  // Checkout
  // ---------------------------------------------------------------------------

  /**
   * Records the basket as purchases and refreshes the customer profile.
   *
   * Prices are read before anything is written; a missing listing aborts with
   * no rows recorded. The basket is cleared once the purchases are committed.
   *
   * @throws EmptyBasketError when there is nothing to buy
   */
  async checkout(signal?: AbortSignal): Promise<CheckoutResult> {
    this.enter('checking_out');
    try {
      if (this.basket.isEmpty) {
        throw new EmptyBasketError();
      }

      const purchases: PurchasedItem[] = [];
      for (const line of this.basket.lines) {
        const item = await this.deps.store.getShopItem(line.ingredientId);
        if (!item) {
          throw new NotFoundError(
            'shop item',
            line.ingredientId,
            `${line.name} is no longer sold in the shop`,
          );
        }
        for (let unit = 0; unit < line.quantity; unit++) {
          purchases.push({
            ingredientId: line.ingredientId,
            name: line.name,
            price: item.price,
          });
        }
      }

      const purchasedAt = this.now();
      await this.deps.store.recordPurchases(
        purchases.map((purchase) => ({
          customerId: this.customerRecord.id,
          ingredientId: purchase.ingredientId,
          price: purchase.price,
          quantity: 1,
          purchasedAt,
        })),
      );
      this.basket.clear();

      const total = roundCents(
        purchases.reduce((sum, purchase) => sum + purchase.price, 0),
      );
      debugLogger.log(
        `[Session:${this.customerRecord.id}] Checked out ${purchases.length} items, total ${total.toFixed(2)}`,
      );

      const newSummary = await this.refreshProfile(signal);
      return { purchases, total, newSummary };
    } finally {
      this.currentState = 'awaiting_user';
    }
  }

  private async refreshProfile(signal?: AbortSignal): Promise<string> {
    const old = this.customerRecord.summary;
    const completion = await this.summarizer.complete(
      [
        { role: 'system', content: PROFILE_INSTRUCTION },
        {
          role: 'user',
          content: `OLD:\n${old}\n\nRECENT CHAT:\n${this.memory.recentDialogue(PROFILE_DIALOGUE_WINDOW)}`,
        },
      ],
      { maxOutputTokens: PROFILE_MAX_OUTPUT_TOKENS, signal },
    );
    const written = completion.content?.trim() ?? '';
    const summary = written === '' ? old : written;

    const vector = await this.deps.indexes.embeddings.embedOne(summary, signal);
    this.customerRecord = await this.deps.store.updateCustomerProfile(
      this.customerRecord.id,
      {
        summary,
        summaryVector: JSON.stringify(vector),
        conversationCount: this.customerRecord.conversationCount + 1,
      },
    );
    await this.deps.indexes.refresh('customerSummary');
    return summary;
  }

  private enter(state: SessionState): void {
    if (this.currentState !== 'awaiting_user') {
      throw new SessionBusyError(this.customerRecord.fullName);
    }
    this.currentState = state;
  }
}
