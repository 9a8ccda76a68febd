/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Catalog records and the store interfaces behind them.
 *
 * Vectors are persisted as JSON text so that any store can round-trip them;
 * `null` means "not embedded yet".
 */

// =============================================================================
// Records
// =============================================================================

export interface Ingredient {
  id: number;
  name: string;
  description: string | null;
  type: string | null;
  descriptionVector: string | null;
}

export interface Meal {
  id: number;
  name: string;
  category: string | null;
  area: string | null;
  description: string | null;
  instructions: string | null;
  descriptionVector: string | null;
  instructionsVector: string | null;
}

export interface MealIngredientLink {
  mealId: number;
  ingredientId: number;
  measure: string;
}

/**
 * A priced shop listing. At most one per ingredient.
 */
export interface ShopItem {
  id: number;
  ingredientId: number;
  price: number;
  onSale: boolean;
  discount: number | null;
}

export interface Customer {
  id: number;
  fullName: string;
  email: string;
  summary: string;
  summaryVector: string | null;
  conversationCount: number;
}

export interface PurchaseRecord {
  id: number;
  customerId: number;
  ingredientId: number;
  price: number;
  quantity: number;
  /** Epoch milliseconds; equal for every row of one checkout */
  purchasedAt: number;
}

export type NewPurchase = Omit<PurchaseRecord, 'id'>;

export interface NewCustomer {
  fullName: string;
  email?: string;
  summary?: string;
}

export interface CustomerProfileUpdate {
  summary: string;
  summaryVector: string | null;
  conversationCount: number;
}

export interface SaleUpdate {
  onSale: boolean;
  discount: number | null;
}

export const NEW_CUSTOMER_SUMMARY = 'No summary available yet.';

// =============================================================================
// Vector fields
// =============================================================================

export const VECTOR_FIELDS = [
  'ingredientDescription',
  'mealDescription',
  'mealInstructions',
  'customerSummary',
] as const;

export type VectorField = (typeof VECTOR_FIELDS)[number];

export interface VectorUpdate {
  id: number;
  /** JSON-encoded vector */
  vector: string;
}

// =============================================================================
// Stores
// =============================================================================

/**
 * Read side of the catalog.
 */
export interface CatalogStore {
  listIngredients(): Promise<Ingredient[]>;
  getIngredient(id: number): Promise<Ingredient | undefined>;

  listMeals(): Promise<Meal[]>;
  getMeal(id: number): Promise<Meal | undefined>;

  listMealIngredients(): Promise<MealIngredientLink[]>;
  getMealIngredients(mealId: number): Promise<MealIngredientLink[]>;

  listShopItems(): Promise<ShopItem[]>;
  getShopItem(ingredientId: number): Promise<ShopItem | undefined>;

  listCustomers(): Promise<Customer[]>;
  getCustomer(id: number): Promise<Customer | undefined>;
  findCustomerByName(fullName: string): Promise<Customer | undefined>;

  listPurchases(customerId?: number): Promise<PurchaseRecord[]>;
}

/**
 * Write side. Purchases are append-only and each call commits as one unit.
 */
export interface PersistenceStore {
  createCustomer(customer: NewCustomer): Promise<Customer>;

  /**
   * Appends all rows or none.
   */
  recordPurchases(purchases: NewPurchase[]): Promise<PurchaseRecord[]>;

  updateCustomerProfile(
    customerId: number,
    update: CustomerProfileUpdate,
  ): Promise<Customer>;

  setSale(ingredientId: number, sale: SaleUpdate): Promise<ShopItem>;

  updateVectors(field: VectorField, updates: VectorUpdate[]): Promise<void>;
}

export interface MealcartStore extends CatalogStore, PersistenceStore {
  init(): Promise<void>;
  close(): Promise<void>;
}
