/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview MCP server exposing the assistant to an MCP client acting as
 * the chat UI, plus the shop-side campaign tooling.
 *
 * User-visible failures (empty basket, unknown id) come back as plain text
 * results; anything unexpected is returned with `isError`.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import {
  NotFoundError,
  UserVisibleError,
  getErrorMessage,
  logger,
  type CatalogIndexes,
  type CatalogStore,
  type SaleCampaignManager,
} from '@mealcart/core';
import { z } from 'zod';
import type { SessionManager } from './sessionManager.js';

export const SERVER_INFO = {
  name: 'mealcart',
  version: '0.1.0',
} as const;

export interface MealcartServices {
  store: CatalogStore;
  indexes: CatalogIndexes;
  sessions: SessionManager;
  campaigns: SaleCampaignManager;
}

const log = logger.child({ component: 'mcp-server' });

// ============================================================================
// Tool Definitions
// ============================================================================

const customerProperty = {
  type: 'string',
  description: 'Full name of the customer; a new customer is created on first use',
} as const;

export const tools: Tool[] = [
  // ==========================================================================
  // Customer session
  // ==========================================================================
  {
    name: 'mealcart_chat',
    description: `Send a customer's message to the shopping assistant and get its answer.

The assistant searches meals and ingredients, looks up prices and adds items to the customer's basket. The conversation continues across calls for the same customer.`,
    inputSchema: {
      type: 'object',
      properties: {
        customer: customerProperty,
        message: { type: 'string', description: 'What the customer says' },
      },
      required: ['customer', 'message'],
    },
  },
  {
    name: 'mealcart_basket',
    description: "Show the customer's current basket.",
    inputSchema: {
      type: 'object',
      properties: { customer: customerProperty },
      required: ['customer'],
    },
  },
  {
    name: 'mealcart_checkout',
    description:
      "Buy everything in the customer's basket and update their profile from the conversation.",
    inputSchema: {
      type: 'object',
      properties: { customer: customerProperty },
      required: ['customer'],
    },
  },
  {
    name: 'mealcart_end_session',
    description:
      "Forget the customer's conversation and basket. The next message starts fresh.",
    inputSchema: {
      type: 'object',
      properties: { customer: customerProperty },
      required: ['customer'],
    },
  },

  // ==========================================================================
  // Shop tooling
  // ==========================================================================
  {
    name: 'mealcart_list_customers',
    description: 'List all customers with their profile summary.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'mealcart_similar_customers',
    description: 'Customers whose profile is closest to the given customer.',
    inputSchema: {
      type: 'object',
      properties: {
        customer: { type: 'string', description: 'Full name of an existing customer' },
        k: { type: 'number', description: 'How many customers to return. Default: 5' },
      },
      required: ['customer'],
    },
  },
  {
    name: 'mealcart_set_sale',
    description: 'Put an ingredient on sale or take it off sale.',
    inputSchema: {
      type: 'object',
      properties: {
        ingredientId: { type: 'number', description: 'Ingredient id' },
        onSale: { type: 'boolean', description: 'Whether the ingredient is on sale' },
        discount: {
          type: 'number',
          description: 'Discount as a fraction between 0 and 1 (ignored when not on sale)',
        },
      },
      required: ['ingredientId', 'onSale'],
    },
  },
  {
    name: 'mealcart_plan_sale_campaign',
    description: `Plan a sale campaign: the meals using the most sale ingredients, each with the customers whose profile matches the meal.`,
    inputSchema: {
      type: 'object',
      properties: {
        topN: { type: 'number', description: 'Number of meals. Default: 10' },
        threshold: {
          type: 'number',
          description: 'Minimum profile similarity for a customer to be targeted. Default: 0.3',
        },
      },
    },
  },
  {
    name: 'mealcart_refresh_indexes',
    description: 'Rebuild the vector indexes from the catalog.',
    inputSchema: { type: 'object', properties: {} },
  },
];

// ============================================================================
// Argument Schemas
// ============================================================================

const customerArgs = z.object({ customer: z.string().trim().min(1) });

const chatArgs = customerArgs.extend({ message: z.string().min(1) });

const similarArgs = customerArgs.extend({
  k: z.number().int().positive().default(5),
});

const setSaleArgs = z.object({
  ingredientId: z.number().int(),
  onSale: z.boolean(),
  discount: z.number().nullable().default(null),
});

const campaignArgs = z.object({
  topN: z.number().int().positive().optional(),
  threshold: z.number().min(-1).max(1).optional(),
});

// ============================================================================
// Response Formatting
// ============================================================================

function text(value: string): CallToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function euros(amount: number): string {
  return `€${amount.toFixed(2)}`;
}

function percent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

// ============================================================================
// Tool Calls
// ============================================================================

export async function handleToolCall(
  services: MealcartServices,
  name: string,
  args: Record<string, unknown> = {},
): Promise<CallToolResult> {
  try {
    switch (name) {
      // ======================================================================
      // mealcart_chat
      // ======================================================================
      case 'mealcart_chat': {
        const { customer, message } = chatArgs.parse(args);
        const session = await services.sessions.get(customer);
        const reply = await session.addUserMessage(message);
        const answer = reply.text.trim() === '' ? '[No answer]' : reply.text;
        return text(`${answer}\n\n${session.basket.synopsis()}`);
      }

      // ======================================================================
      // mealcart_basket
      // ======================================================================
      case 'mealcart_basket': {
        const { customer } = customerArgs.parse(args);
        const session = await services.sessions.get(customer);
        return text(session.basket.synopsis());
      }

      // ======================================================================
      // mealcart_checkout
      // ======================================================================
      case 'mealcart_checkout': {
        const { customer } = customerArgs.parse(args);
        const session = await services.sessions.get(customer);
        const result = await session.checkout();
        const lines = [
          `Purchased ${result.purchases.length} items:`,
          ...result.purchases.map((item) => `  • ${item.name} ${euros(item.price)}`),
          `Total: ${euros(result.total)}`,
          '',
          `Updated profile: ${result.newSummary}`,
        ];
        return text(lines.join('\n'));
      }

      // ======================================================================
      // mealcart_end_session
      // ======================================================================
      case 'mealcart_end_session': {
        const { customer } = customerArgs.parse(args);
        return text(
          services.sessions.end(customer)
            ? `Session for ${customer} ended.`
            : `No active session for ${customer}.`,
        );
      }

      // ======================================================================
      // mealcart_list_customers
      // ======================================================================
      case 'mealcart_list_customers': {
        const customers = await services.store.listCustomers();
        if (customers.length === 0) {
          return text('No customers yet.');
        }
        const lines = ['Customers:', ''];
        for (const customer of customers) {
          lines.push(
            `• #${customer.id} ${customer.fullName} (${customer.conversationCount} conversations)`,
          );
          lines.push(`  ${customer.summary}`);
        }
        return text(lines.join('\n'));
      }

      // ======================================================================
      // mealcart_similar_customers
      // ======================================================================
      case 'mealcart_similar_customers': {
        const { customer, k } = similarArgs.parse(args);
        const record = await services.store.findCustomerByName(customer);
        if (!record) {
          throw new NotFoundError('customer', customer);
        }
        const matches = await services.campaigns.findSimilarCustomers(record.id, k);
        if (matches.length === 0) {
          return text(`No customers similar to ${record.fullName}.`);
        }
        const lines = [`Customers similar to ${record.fullName}:`];
        for (const match of matches) {
          lines.push(`  • #${match.customerId} ${match.fullName} (${match.score.toFixed(2)})`);
        }
        return text(lines.join('\n'));
      }

      // ======================================================================
      // mealcart_set_sale
      // ======================================================================
      case 'mealcart_set_sale': {
        const { ingredientId, onSale, discount } = setSaleArgs.parse(args);
        const item = await services.campaigns.setSale(ingredientId, { onSale, discount });
        if (!item.onSale) {
          return text(`Ingredient ${ingredientId} is no longer on sale (${euros(item.price)}).`);
        }
        const detail = item.discount === null ? '' : `, discount ${percent(item.discount)}`;
        return text(`Ingredient ${ingredientId} is on sale (${euros(item.price)}${detail}).`);
      }

      // ======================================================================
      // mealcart_plan_sale_campaign
      // ======================================================================
      case 'mealcart_plan_sale_campaign': {
        const options = campaignArgs.parse(args);
        const plan = await services.campaigns.planSaleCampaign(options);
        if (plan.length === 0) {
          return text('No meals use ingredients that are on sale.');
        }
        const lines = ['Sale campaign:', ''];
        for (const meal of plan) {
          lines.push(`• ${meal.name} (#${meal.mealId}), ${meal.overlap} sale ingredients`);
          if (meal.audience.length === 0) {
            lines.push('  Audience: none');
          } else {
            lines.push(
              `  Audience: ${meal.audience
                .map((match) => `${match.fullName} (${match.score.toFixed(2)})`)
                .join(', ')}`,
            );
          }
        }
        return text(lines.join('\n'));
      }

      // ======================================================================
      // mealcart_refresh_indexes
      // ======================================================================
      case 'mealcart_refresh_indexes': {
        const stats = await services.indexes.refreshAll();
        const lines = Object.entries(stats).map(
          ([field, { indexed, skipped }]) => `${field}: ${indexed} indexed, ${skipped} skipped`,
        );
        return text(lines.join('\n'));
      }

      // ======================================================================
      // Unknown tool
      // ======================================================================
      default:
        return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ');
      return { content: [{ type: 'text', text: `Invalid arguments: ${issues}` }], isError: true };
    }
    if (error instanceof UserVisibleError) {
      return text(error.message);
    }
    log.error({ err: error, tool: name }, 'Tool call failed');
    return {
      content: [{ type: 'text', text: `Error: ${getErrorMessage(error)}` }],
      isError: true,
    };
  }
}

// ============================================================================
// MCP Server Setup
// ============================================================================

export function createMcpServer(services: MealcartServices): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(services, name, args);
  });

  return server;
}

export { SessionManager } from './sessionManager.js';
