/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export {
  catalogSeedSchema,
  loadCatalogSeed,
  parseCatalogSeed,
  type CatalogSeed,
  type CatalogSeedInput,
} from './seed.js';
export { InMemoryCatalogStore } from './inMemoryCatalogStore.js';
export { LanceDBCatalogStore } from './lancedbCatalogStore.js';
export {
  findMealsWithSaleOverlap,
  getMealIngredientRows,
  listVectorRows,
  type MealIngredientRow,
  type SaleOverlap,
  type VectorRow,
} from './queries.js';
