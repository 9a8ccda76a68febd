/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview JSON catalog seed: schema, validation and loading.
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { debugLogger } from '../utils/debugLogger.js';
import { CatalogError, getErrorMessage } from '../utils/errors.js';
import { NEW_CUSTOMER_SUMMARY } from './types.js';

const id = z.number().int().nonnegative();
const optionalText = z.string().nullable().default(null);

/**
 * Vectors may be given as arrays or as JSON text; both are stored as text.
 */
const storedVector = z
  .union([z.array(z.number()), z.string()])
  .nullable()
  .default(null)
  .transform((value) =>
    value === null || typeof value === 'string' ? value : JSON.stringify(value),
  );

const seedIngredientSchema = z.object({
  id,
  name: z.string().min(1),
  description: optionalText,
  type: optionalText,
  descriptionVector: storedVector,
});

const seedMealSchema = z.object({
  id,
  name: z.string().min(1),
  category: optionalText,
  area: optionalText,
  description: optionalText,
  instructions: optionalText,
  descriptionVector: storedVector,
  instructionsVector: storedVector,
  ingredients: z
    .array(z.object({ ingredientId: id, measure: z.string().default('') }))
    .default([]),
});

const seedShopItemSchema = z.object({
  ingredientId: id,
  price: z.number().nonnegative(),
  onSale: z.boolean().default(false),
  discount: z.number().min(0).max(1).nullable().default(null),
});

const seedCustomerSchema = z.object({
  id,
  fullName: z.string().min(1),
  email: z.string().default(''),
  summary: z.string().default(NEW_CUSTOMER_SUMMARY),
  summaryVector: storedVector,
  conversationCount: z.number().int().nonnegative().default(0),
});

export const catalogSeedSchema = z
  .object({
    ingredients: z.array(seedIngredientSchema),
    meals: z.array(seedMealSchema).default([]),
    shopItems: z.array(seedShopItemSchema).default([]),
    customers: z.array(seedCustomerSchema).default([]),
  })
  .superRefine((seed, ctx) => {
    const ingredientIds = new Set<number>();
    seed.ingredients.forEach((ingredient, i) => {
      if (ingredientIds.has(ingredient.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ingredients', i, 'id'],
          message: `duplicate ingredient id ${ingredient.id}`,
        });
      }
      ingredientIds.add(ingredient.id);
    });

    const mealIds = new Set<number>();
    seed.meals.forEach((meal, i) => {
      if (mealIds.has(meal.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['meals', i, 'id'],
          message: `duplicate meal id ${meal.id}`,
        });
      }
      mealIds.add(meal.id);
      meal.ingredients.forEach((link, j) => {
        if (!ingredientIds.has(link.ingredientId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['meals', i, 'ingredients', j, 'ingredientId'],
            message: `unknown ingredient ${link.ingredientId}`,
          });
        }
      });
    });

    const listed = new Set<number>();
    seed.shopItems.forEach((item, i) => {
      if (!ingredientIds.has(item.ingredientId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['shopItems', i, 'ingredientId'],
          message: `unknown ingredient ${item.ingredientId}`,
        });
      }
      if (listed.has(item.ingredientId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['shopItems', i, 'ingredientId'],
          message: `ingredient ${item.ingredientId} listed twice`,
        });
      }
      listed.add(item.ingredientId);
    });

    const customerIds = new Set<number>();
    seed.customers.forEach((customer, i) => {
      if (customerIds.has(customer.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['customers', i, 'id'],
          message: `duplicate customer id ${customer.id}`,
        });
      }
      customerIds.add(customer.id);
    });
  });

export type CatalogSeed = z.output<typeof catalogSeedSchema>;
export type CatalogSeedInput = z.input<typeof catalogSeedSchema>;

/**
 * Validates an already-decoded seed document.
 *
 * @throws CatalogError listing every problem
 */
export function parseCatalogSeed(raw: unknown): CatalogSeed {
  const parsed = catalogSeedSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'seed'}: ${issue.message}`,
    );
    throw new CatalogError(`Invalid catalog seed: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Reads and validates a JSON seed file.
 */
export async function loadCatalogSeed(filePath: string): Promise<CatalogSeed> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new CatalogError(
      `Cannot read catalog seed ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogError(
      `Catalog seed ${filePath} is not valid JSON: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const seed = parseCatalogSeed(raw);
  debugLogger.log(
    `Loaded catalog seed ${filePath}: ${seed.ingredients.length} ingredients, ${seed.meals.length} meals, ${seed.shopItems.length} shop items`,
  );
  return seed;
}
