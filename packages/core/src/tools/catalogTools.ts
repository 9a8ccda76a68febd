/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Read-only catalog lookups: ingredients, meals, prices and the
 * current sale. Result fields use snake_case, like the parameters.
 */

import { z } from 'zod';
import {
  findMealsWithSaleOverlap,
  getMealIngredientRows,
} from '../catalog/queries.js';
import type { CatalogStore, Meal } from '../catalog/types.js';
import { NotFoundError } from '../utils/errors.js';
import {
  GET_INGREDIENT_DETAILS_TOOL_NAME,
  GET_MEAL_DETAILS_TOOL_NAME,
  GET_MEAL_INGREDIENTS_TOOL_NAME,
  GET_PRICE_TOOL_NAME,
  LIST_INGREDIENTS_TOOL_NAME,
  LIST_SALE_ITEMS_TOOL_NAME,
  RETRIEVE_MEALS_WITH_SALE_OVERLAP_TOOL_NAME,
} from './tool-names.js';
import type { ShopToolContext } from './toolContext.js';
import { defineTool, type AnyDeclarativeTool } from './tools.js';

const ingredientIdProperty = {
  type: 'integer',
  description: 'Ingredient id, as returned by the search and list tools.',
} as const;

const mealIdProperty = {
  type: 'integer',
  description: 'Meal id, as returned by the meal search tools.',
} as const;

async function requireMeal(
  catalog: CatalogStore,
  mealId: number,
): Promise<Meal> {
  const meal = await catalog.getMeal(mealId);
  if (!meal) {
    throw new NotFoundError('meal', mealId);
  }
  return meal;
}

export function createCatalogTools(ctx: ShopToolContext): AnyDeclarativeTool[] {
  const { catalog } = ctx;

  return [
    defineTool({
      name: LIST_INGREDIENTS_TOOL_NAME,
      displayName: 'ListIngredients',
      description: 'List every ingredient in the catalog with its id.',
      parameters: { type: 'object', properties: {} },
      schema: z.object({}),
      run: async () =>
        (await catalog.listIngredients()).map((ingredient) => ({
          id: ingredient.id,
          name: ingredient.name,
        })),
    }),

    defineTool({
      name: GET_PRICE_TOOL_NAME,
      displayName: 'GetPrice',
      description:
        'Current shop price of an ingredient, whether it is on sale and its discount.',
      parameters: {
        type: 'object',
        properties: { ingredient_id: ingredientIdProperty },
        required: ['ingredient_id'],
      },
      schema: z.object({ ingredient_id: z.number().int() }),
      run: async (params) => {
        const item = await catalog.getShopItem(params.ingredient_id);
        if (!item) {
          throw new NotFoundError(
            'shop item',
            params.ingredient_id,
            `Ingredient ${params.ingredient_id} has no price listing`,
          );
        }
        return { price: item.price, on_sale: item.onSale, discount: item.discount };
      },
    }),

    defineTool({
      name: LIST_SALE_ITEMS_TOOL_NAME,
      displayName: 'ListSaleItems',
      description: 'List the ingredients currently on sale with price and discount.',
      parameters: { type: 'object', properties: {} },
      schema: z.object({}),
      run: async () => {
        const items = (await catalog.listShopItems()).filter((item) => item.onSale);
        const rows: Array<{
          ingredient_id: number;
          name: string;
          price: number;
          discount: number | null;
        }> = [];
        for (const item of items) {
          const ingredient = await catalog.getIngredient(item.ingredientId);
          if (ingredient) {
            rows.push({
              ingredient_id: item.ingredientId,
              name: ingredient.name,
              price: item.price,
              discount: item.discount,
            });
          }
        }
        return rows;
      },
    }),

    defineTool({
      name: RETRIEVE_MEALS_WITH_SALE_OVERLAP_TOOL_NAME,
      displayName: 'RetrieveMealsWithSaleOverlap',
      description:
        'Meals that use ingredients currently on sale, most sale ingredients first.',
      parameters: {
        type: 'object',
        properties: {
          min_overlap: {
            type: 'integer',
            description: 'Minimum number of sale ingredients a meal must use. Defaults to 1.',
            default: 1,
            minimum: 1,
          },
          k: {
            type: 'integer',
            description: 'Maximum number of meals to return. Defaults to 10.',
            default: 10,
            minimum: 1,
          },
        },
      },
      schema: z.object({
        min_overlap: z.number().int().default(1),
        k: z.number().int().default(10),
      }),
      run: async (params) =>
        (await findMealsWithSaleOverlap(catalog, params.min_overlap, params.k)).map(
          (row) => ({
            meal_id: row.mealId,
            name: row.name,
            overlap: row.overlap,
            description: row.description,
          }),
        ),
    }),

    defineTool({
      name: GET_MEAL_DETAILS_TOOL_NAME,
      displayName: 'GetMealDetails',
      description: 'Name, category, cuisine, description and instructions of a meal.',
      parameters: {
        type: 'object',
        properties: { meal_id: mealIdProperty },
        required: ['meal_id'],
      },
      schema: z.object({ meal_id: z.number().int() }),
      run: async (params) => {
        const meal = await requireMeal(catalog, params.meal_id);
        return {
          id: meal.id,
          name: meal.name,
          category: meal.category,
          area: meal.area,
          description: meal.description,
          instructions: meal.instructions,
        };
      },
    }),

    defineTool({
      name: GET_MEAL_INGREDIENTS_TOOL_NAME,
      displayName: 'GetMealIngredients',
      description:
        'Ingredients of a meal with measures and shop prices. Price is null for ingredients the shop does not list.',
      parameters: {
        type: 'object',
        properties: { meal_id: mealIdProperty },
        required: ['meal_id'],
      },
      schema: z.object({ meal_id: z.number().int() }),
      run: async (params) => {
        await requireMeal(catalog, params.meal_id);
        return (await getMealIngredientRows(catalog, params.meal_id)).map((row) => ({
          ingredient_id: row.ingredientId,
          name: row.name,
          measure: row.measure,
          price: row.price,
          on_sale: row.onSale,
          discount: row.discount,
        }));
      },
    }),

    defineTool({
      name: GET_INGREDIENT_DETAILS_TOOL_NAME,
      displayName: 'GetIngredientDetails',
      description: 'Name, description and type of an ingredient.',
      parameters: {
        type: 'object',
        properties: { ingredient_id: ingredientIdProperty },
        required: ['ingredient_id'],
      },
      schema: z.object({ ingredient_id: z.number().int() }),
      run: async (params) => {
        const ingredient = await catalog.getIngredient(params.ingredient_id);
        if (!ingredient) {
          throw new NotFoundError('ingredient', params.ingredient_id);
        }
        return {
          id: ingredient.id,
          name: ingredient.name,
          description: ingredient.description,
          type: ingredient.type,
        };
      },
    }),
  ];
}
