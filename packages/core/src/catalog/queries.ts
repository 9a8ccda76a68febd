/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Joins over the catalog store used by tools and campaigns.
 */

import { CatalogError } from '../utils/errors.js';
import type { CatalogStore, VectorField } from './types.js';

export interface MealIngredientRow {
  ingredientId: number;
  name: string;
  measure: string;
  /** Null when the ingredient has no shop listing */
  price: number | null;
  onSale: boolean | null;
  discount: number | null;
}

/**
 * The ingredients of a meal with their shop listing, if any.
 * Links to ingredients that no longer exist are dropped.
 */
export async function getMealIngredientRows(
  store: CatalogStore,
  mealId: number,
): Promise<MealIngredientRow[]> {
  const links = await store.getMealIngredients(mealId);
  const rows: MealIngredientRow[] = [];
  for (const link of links) {
    const ingredient = await store.getIngredient(link.ingredientId);
    if (!ingredient) {
      continue;
    }
    const shopItem = await store.getShopItem(link.ingredientId);
    rows.push({
      ingredientId: ingredient.id,
      name: ingredient.name,
      measure: link.measure,
      price: shopItem?.price ?? null,
      onSale: shopItem?.onSale ?? null,
      discount: shopItem?.discount ?? null,
    });
  }
  return rows;
}

export interface SaleOverlap {
  mealId: number;
  name: string;
  /** Number of the meal's ingredients currently on sale */
  overlap: number;
  description: string | null;
}

/**
 * Meals sharing at least `max(1, minOverlap)` ingredients with the current
 * sale, by descending overlap. Equal overlaps keep catalog order.
 */
export async function findMealsWithSaleOverlap(
  store: CatalogStore,
  minOverlap = 1,
  k = 10,
): Promise<SaleOverlap[]> {
  const onSale = new Set(
    (await store.listShopItems())
      .filter((item) => item.onSale)
      .map((item) => item.ingredientId),
  );
  if (onSale.size === 0 || k <= 0) {
    return [];
  }

  const counts = new Map<number, number>();
  for (const link of await store.listMealIngredients()) {
    if (onSale.has(link.ingredientId)) {
      counts.set(link.mealId, (counts.get(link.mealId) ?? 0) + 1);
    }
  }

  const threshold = Math.max(1, minOverlap);
  const overlaps: SaleOverlap[] = [];
  for (const meal of await store.listMeals()) {
    const overlap = counts.get(meal.id) ?? 0;
    if (overlap >= threshold) {
      overlaps.push({
        mealId: meal.id,
        name: meal.name,
        overlap,
        description: meal.description,
      });
    }
  }

  overlaps.sort((a, b) => b.overlap - a.overlap);
  return overlaps.slice(0, Math.floor(k));
}

export interface VectorRow {
  id: number;
  /** Text the vector is computed from */
  text: string | null;
  vector: string | null;
}

/**
 * The `(id, text, vector)` triples of one vector field.
 */
export async function listVectorRows(
  store: CatalogStore,
  field: VectorField,
): Promise<VectorRow[]> {
  switch (field) {
    case 'ingredientDescription':
      return (await store.listIngredients()).map((row) => ({
        id: row.id,
        text: row.description,
        vector: row.descriptionVector,
      }));
    case 'mealDescription':
      return (await store.listMeals()).map((row) => ({
        id: row.id,
        text: row.description,
        vector: row.descriptionVector,
      }));
    case 'mealInstructions':
      return (await store.listMeals()).map((row) => ({
        id: row.id,
        text: row.instructions,
        vector: row.instructionsVector,
      }));
    case 'customerSummary':
      return (await store.listCustomers()).map((row) => ({
        id: row.id,
        text: row.summary,
        vector: row.summaryVector,
      }));
    default: {
      const unreachable: never = field;
      throw new CatalogError(`Unknown vector field ${String(unreachable)}`);
    }
  }
}
