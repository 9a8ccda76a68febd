/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Tools that add to the session basket.
 *
 * Only priced ingredients can be added. Both tools answer with the whole
 * basket so the model can confirm it back to the user.
 */

import { z } from 'zod';
import { getMealIngredientRows } from '../catalog/queries.js';
import { NotFoundError } from '../utils/errors.js';
import { debugLogger } from '../utils/debugLogger.js';
import { MAX_UNITS_PER_ADD, type Basket } from '../session/basket.js';
import {
  ADD_MEAL_TO_BASKET_TOOL_NAME,
  ADD_TO_BASKET_TOOL_NAME,
} from './tool-names.js';
import type { ShopToolContext } from './toolContext.js';
import { defineTool, type AnyDeclarativeTool } from './tools.js';

export interface BasketView {
  items: string[];
  total: number;
}

function viewOf(basket: Basket): BasketView {
  return { items: basket.itemNames(), total: basket.total };
}

export function createBasketTools(ctx: ShopToolContext): AnyDeclarativeTool[] {
  const { catalog, basket } = ctx;

  return [
    defineTool({
      name: ADD_TO_BASKET_TOOL_NAME,
      displayName: 'AddToBasket',
      description:
        'Add an ingredient to the basket. Returns the basket contents and total.',
      parameters: {
        type: 'object',
        properties: {
          ingredient_id: {
            type: 'integer',
            description: 'Ingredient id, as returned by the search and list tools.',
          },
          qty: {
            type: 'integer',
            description: `How many units to add, at most ${MAX_UNITS_PER_ADD}. Defaults to 1.`,
            default: 1,
            minimum: 1,
            maximum: MAX_UNITS_PER_ADD,
          },
        },
        required: ['ingredient_id'],
      },
      schema: z.object({
        ingredient_id: z.number().int(),
        qty: z.number().max(MAX_UNITS_PER_ADD).default(1),
      }),
      run: async (params): Promise<BasketView> => {
        const ingredient = await catalog.getIngredient(params.ingredient_id);
        if (!ingredient) {
          throw new NotFoundError('ingredient', params.ingredient_id);
        }
        const item = await catalog.getShopItem(ingredient.id);
        if (!item) {
          throw new NotFoundError(
            'shop item',
            ingredient.id,
            `${ingredient.name} is not sold in the shop`,
          );
        }
        basket.add(
          { ingredientId: ingredient.id, name: ingredient.name, price: item.price },
          params.qty,
        );
        debugLogger.debug(`[Basket] ${basket.synopsis()}`);
        return viewOf(basket);
      },
    }),

    defineTool({
      name: ADD_MEAL_TO_BASKET_TOOL_NAME,
      displayName: 'AddMealToBasket',
      description:
        'Add every priced ingredient of a meal to the basket, once per serving. Returns the basket contents and total.',
      parameters: {
        type: 'object',
        properties: {
          meal_id: {
            type: 'integer',
            description: 'Meal id, as returned by the meal search tools.',
          },
          servings: {
            type: 'integer',
            description: `How many times to add the ingredients, at most ${MAX_UNITS_PER_ADD}. Defaults to 1.`,
            default: 1,
            minimum: 1,
            maximum: MAX_UNITS_PER_ADD,
          },
        },
        required: ['meal_id'],
      },
      schema: z.object({
        meal_id: z.number().int(),
        servings: z.number().max(MAX_UNITS_PER_ADD).default(1),
      }),
      run: async (params): Promise<BasketView> => {
        const meal = await catalog.getMeal(params.meal_id);
        if (!meal) {
          throw new NotFoundError('meal', params.meal_id);
        }
        const priced = (await getMealIngredientRows(catalog, meal.id)).filter(
          (row) => row.price !== null,
        );
        if (priced.length === 0) {
          throw new NotFoundError(
            'shop item',
            meal.id,
            `None of the ingredients of ${meal.name} are sold in the shop`,
          );
        }
        for (const row of priced) {
          basket.add(
            { ingredientId: row.ingredientId, name: row.name, price: row.price ?? 0 },
            params.servings,
          );
        }
        debugLogger.debug(`[Basket] ${basket.synopsis()}`);
        return viewOf(basket);
      },
    }),
  ];
}
