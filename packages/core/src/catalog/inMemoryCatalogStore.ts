/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Process-local catalog store.
 *
 * Backs tests and `MEALCART_STORE=memory`. Reads return copies so callers
 * cannot mutate stored rows; writes validate everything before touching state,
 * which makes every call all-or-nothing.
 */

import { debugLogger } from '../utils/debugLogger.js';
import { CatalogError, NotFoundError } from '../utils/errors.js';
import type { CatalogSeed } from './seed.js';
import {
  NEW_CUSTOMER_SUMMARY,
  type Customer,
  type CustomerProfileUpdate,
  type Ingredient,
  type Meal,
  type MealIngredientLink,
  type MealcartStore,
  type NewCustomer,
  type NewPurchase,
  type PurchaseRecord,
  type SaleUpdate,
  type ShopItem,
  type VectorField,
  type VectorUpdate,
} from './types.js';

export class InMemoryCatalogStore implements MealcartStore {
  private readonly ingredients = new Map<number, Ingredient>();
  private readonly meals = new Map<number, Meal>();
  private mealIngredients: MealIngredientLink[] = [];
  private readonly shopItems = new Map<number, ShopItem>();
  private readonly customers = new Map<number, Customer>();
  private purchases: PurchaseRecord[] = [];

  constructor(seed?: CatalogSeed) {
    if (seed) {
      this.importSeed(seed);
    }
  }

  async init(): Promise<void> {
    debugLogger.debug(
      `InMemoryCatalogStore: ${this.ingredients.size} ingredients, ${this.meals.size} meals`,
    );
  }

  async close(): Promise<void> {
    debugLogger.debug('InMemoryCatalogStore: closed');
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async listIngredients(): Promise<Ingredient[]> {
    return [...this.ingredients.values()].map((row) => ({ ...row }));
  }

  async getIngredient(id: number): Promise<Ingredient | undefined> {
    const row = this.ingredients.get(id);
    return row ? { ...row } : undefined;
  }

  async listMeals(): Promise<Meal[]> {
    return [...this.meals.values()].map((row) => ({ ...row }));
  }

  async getMeal(id: number): Promise<Meal | undefined> {
    const row = this.meals.get(id);
    return row ? { ...row } : undefined;
  }

  async listMealIngredients(): Promise<MealIngredientLink[]> {
    return this.mealIngredients.map((row) => ({ ...row }));
  }

  async getMealIngredients(mealId: number): Promise<MealIngredientLink[]> {
    return this.mealIngredients
      .filter((row) => row.mealId === mealId)
      .map((row) => ({ ...row }));
  }

  async listShopItems(): Promise<ShopItem[]> {
    return [...this.shopItems.values()].map((row) => ({ ...row }));
  }

  async getShopItem(ingredientId: number): Promise<ShopItem | undefined> {
    const row = this.shopItems.get(ingredientId);
    return row ? { ...row } : undefined;
  }

  async listCustomers(): Promise<Customer[]> {
    return [...this.customers.values()].map((row) => ({ ...row }));
  }

  async getCustomer(id: number): Promise<Customer | undefined> {
    const row = this.customers.get(id);
    return row ? { ...row } : undefined;
  }

  async findCustomerByName(fullName: string): Promise<Customer | undefined> {
    for (const row of this.customers.values()) {
      if (row.fullName === fullName) {
        return { ...row };
      }
    }
    return undefined;
  }

  async listPurchases(customerId?: number): Promise<PurchaseRecord[]> {
    return this.purchases
      .filter((row) => customerId === undefined || row.customerId === customerId)
      .map((row) => ({ ...row }));
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async createCustomer(customer: NewCustomer): Promise<Customer> {
    const row: Customer = {
      id: nextId(this.customers.keys()),
      fullName: customer.fullName,
      email: customer.email ?? '',
      summary: customer.summary ?? NEW_CUSTOMER_SUMMARY,
      summaryVector: null,
      conversationCount: 0,
    };
    this.customers.set(row.id, row);
    return { ...row };
  }

  async recordPurchases(purchases: NewPurchase[]): Promise<PurchaseRecord[]> {
    for (const purchase of purchases) {
      if (!this.customers.has(purchase.customerId)) {
        throw new NotFoundError('customer', purchase.customerId);
      }
      if (!this.ingredients.has(purchase.ingredientId)) {
        throw new NotFoundError('ingredient', purchase.ingredientId);
      }
    }

    let id = nextId(this.purchases.map((row) => row.id));
    const rows = purchases.map((purchase) => ({ ...purchase, id: id++ }));
    this.purchases = [...this.purchases, ...rows];
    return rows.map((row) => ({ ...row }));
  }

  async updateCustomerProfile(
    customerId: number,
    update: CustomerProfileUpdate,
  ): Promise<Customer> {
    const row = this.customers.get(customerId);
    if (!row) {
      throw new NotFoundError('customer', customerId);
    }
    const updated: Customer = { ...row, ...update };
    this.customers.set(customerId, updated);
    return { ...updated };
  }

  async setSale(ingredientId: number, sale: SaleUpdate): Promise<ShopItem> {
    const row = this.shopItems.get(ingredientId);
    if (!row) {
      throw new NotFoundError('shop item', ingredientId);
    }
    const updated: ShopItem = { ...row, ...sale };
    this.shopItems.set(ingredientId, updated);
    return { ...updated };
  }

  async updateVectors(field: VectorField, updates: VectorUpdate[]): Promise<void> {
    const apply = <T extends { id: number }>(
      rows: Map<number, T>,
      entity: 'ingredient' | 'meal' | 'customer',
      set: (row: T, vector: string) => T,
    ): void => {
      for (const update of updates) {
        if (!rows.has(update.id)) {
          throw new NotFoundError(entity, update.id);
        }
      }
      for (const update of updates) {
        const row = rows.get(update.id);
        if (row) {
          rows.set(update.id, set(row, update.vector));
        }
      }
    };

    switch (field) {
      case 'ingredientDescription':
        apply(this.ingredients, 'ingredient', (row, vector) => ({
          ...row,
          descriptionVector: vector,
        }));
        return;
      case 'mealDescription':
        apply(this.meals, 'meal', (row, vector) => ({
          ...row,
          descriptionVector: vector,
        }));
        return;
      case 'mealInstructions':
        apply(this.meals, 'meal', (row, vector) => ({
          ...row,
          instructionsVector: vector,
        }));
        return;
      case 'customerSummary':
        apply(this.customers, 'customer', (row, vector) => ({
          ...row,
          summaryVector: vector,
        }));
        return;
      default: {
        const unreachable: never = field;
        throw new CatalogError(`Unknown vector field ${String(unreachable)}`);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Seed
  // ---------------------------------------------------------------------------

  private importSeed(seed: CatalogSeed): void {
    for (const ingredient of seed.ingredients) {
      this.ingredients.set(ingredient.id, { ...ingredient });
    }
    for (const { ingredients, ...meal } of seed.meals) {
      this.meals.set(meal.id, { ...meal });
      for (const link of ingredients) {
        this.mealIngredients.push({
          mealId: meal.id,
          ingredientId: link.ingredientId,
          measure: link.measure,
        });
      }
    }
    seed.shopItems.forEach((item, index) => {
      this.shopItems.set(item.ingredientId, { id: index + 1, ...item });
    });
    for (const customer of seed.customers) {
      this.customers.set(customer.id, { ...customer });
    }
  }
}

function nextId(ids: Iterable<number>): number {
  let max = 0;
  for (const id of ids) {
    max = Math.max(max, id);
  }
  return max + 1;
}
