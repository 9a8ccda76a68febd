/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Semantic search over ingredients and meals.
 *
 * Results keep the ranking of the index. Hits whose record disappeared since
 * the last refresh are dropped.
 */

import { z } from 'zod';
import type { VectorHit } from '../retrieval/vectorIndex.js';
import {
  RETRIEVE_INGREDIENT_TOOL_NAME,
  RETRIEVE_MEAL_BY_INSTRUCTIONS_TOOL_NAME,
  RETRIEVE_MEAL_TOOL_NAME,
} from './tool-names.js';
import type { ShopToolContext } from './toolContext.js';
import { defineTool, type AnyDeclarativeTool } from './tools.js';

export const DEFAULT_RETRIEVAL_K = 5;
const MAX_RETRIEVAL_K = 50;

export interface RetrievedRecord {
  id: number;
  name: string;
  score: number;
}

const kProperty = {
  type: 'integer',
  description: `Number of results to return. Defaults to ${DEFAULT_RETRIEVAL_K}.`,
  default: DEFAULT_RETRIEVAL_K,
  minimum: 1,
} as const;

const kSchema = z.number().int().default(DEFAULT_RETRIEVAL_K);

function validateK(k: number): string | null {
  if (k < 1) {
    return "The 'k' parameter must be a positive number.";
  }
  if (k > MAX_RETRIEVAL_K) {
    return `The 'k' parameter cannot exceed ${MAX_RETRIEVAL_K}.`;
  }
  return null;
}

function validateText(name: string, text: string): string | null {
  return text.trim() === '' ? `The '${name}' parameter cannot be empty.` : null;
}

async function named(
  hits: VectorHit[],
  lookup: (id: number) => Promise<{ name: string } | undefined>,
): Promise<RetrievedRecord[]> {
  const records: RetrievedRecord[] = [];
  for (const hit of hits) {
    const record = await lookup(hit.id);
    if (record) {
      records.push({ id: hit.id, name: record.name, score: hit.score });
    }
  }
  return records;
}

export function createRetrievalTools(ctx: ShopToolContext): AnyDeclarativeTool[] {
  const { catalog, indexes } = ctx;

  return [
    defineTool({
      name: RETRIEVE_INGREDIENT_TOOL_NAME,
      displayName: 'RetrieveIngredient',
      description:
        'Find ingredients whose description is semantically closest to the given text. Returns ids, names and similarity scores.',
      parameters: {
        type: 'object',
        properties: {
          description: {
            type: 'string',
            description: 'What the ingredient is like, e.g. "fragrant green herb".',
          },
          k: kProperty,
        },
        required: ['description'],
      },
      schema: z.object({ description: z.string(), k: kSchema }),
      validate: (params) =>
        validateText('description', params.description) ?? validateK(params.k),
      run: async (params, signal) =>
        named(
          await indexes.ingredients.queryText(params.description, params.k, signal),
          (id) => catalog.getIngredient(id),
        ),
    }),

    defineTool({
      name: RETRIEVE_MEAL_TOOL_NAME,
      displayName: 'RetrieveMeal',
      description:
        'Find meals whose description is semantically closest to the given text. Returns ids, names and similarity scores.',
      parameters: {
        type: 'object',
        properties: {
          description: {
            type: 'string',
            description: 'The kind of meal wanted, e.g. "light summer pasta".',
          },
          k: kProperty,
        },
        required: ['description'],
      },
      schema: z.object({ description: z.string(), k: kSchema }),
      validate: (params) =>
        validateText('description', params.description) ?? validateK(params.k),
      run: async (params, signal) =>
        named(
          await indexes.meals.queryText(params.description, params.k, signal),
          (id) => catalog.getMeal(id),
        ),
    }),

    defineTool({
      name: RETRIEVE_MEAL_BY_INSTRUCTIONS_TOOL_NAME,
      displayName: 'RetrieveMealByInstructions',
      description:
        'Find meals whose cooking instructions are semantically closest to the given text, e.g. a technique or a piece of equipment.',
      parameters: {
        type: 'object',
        properties: {
          instructions: {
            type: 'string',
            description: 'How the meal is cooked, e.g. "slow cooked in one pot".',
          },
          k: kProperty,
        },
        required: ['instructions'],
      },
      schema: z.object({ instructions: z.string(), k: kSchema }),
      validate: (params) =>
        validateText('instructions', params.instructions) ?? validateK(params.k),
      run: async (params, signal) =>
        named(
          await indexes.instructions.queryText(params.instructions, params.k, signal),
          (id) => catalog.getMeal(id),
        ),
    }),
  ];
}
