/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview The four catalog indexes sharing one embedding client.
 */

import {
  VECTOR_FIELDS,
  type CatalogStore,
  type VectorField,
} from '../catalog/types.js';
import { debugLogger } from '../utils/debugLogger.js';
import type { EmbeddingClient } from './embeddings/index.js';
import { VectorIndex, type RefreshStats } from './vectorIndex.js';
import { catalogVectorSource } from './vectorSource.js';

export class CatalogIndexes {
  readonly ingredients: VectorIndex;
  readonly meals: VectorIndex;
  readonly instructions: VectorIndex;
  readonly customers: VectorIndex;

  constructor(
    private readonly store: CatalogStore,
    readonly embeddings: EmbeddingClient,
  ) {
    this.ingredients = new VectorIndex(embeddings, 'ingredientDescription');
    this.meals = new VectorIndex(embeddings, 'mealDescription');
    this.instructions = new VectorIndex(embeddings, 'mealInstructions');
    this.customers = new VectorIndex(embeddings, 'customerSummary');
  }

  indexFor(field: VectorField): VectorIndex {
    switch (field) {
      case 'ingredientDescription':
        return this.ingredients;
      case 'mealDescription':
        return this.meals;
      case 'mealInstructions':
        return this.instructions;
      case 'customerSummary':
        return this.customers;
      default: {
        const unreachable: never = field;
        throw new Error(`Unknown vector field ${String(unreachable)}`);
      }
    }
  }

  refresh(field: VectorField): Promise<RefreshStats> {
    return this.indexFor(field).refresh(catalogVectorSource(this.store, field));
  }

  /**
   * Rebuilds every index, one after another.
   */
  async refreshAll(): Promise<Record<VectorField, RefreshStats>> {
    const stats: Partial<Record<VectorField, RefreshStats>> = {};
    for (const field of VECTOR_FIELDS) {
      stats[field] = await this.refresh(field);
    }
    debugLogger.log(
      `[CatalogIndexes] Refreshed: ${VECTOR_FIELDS.map((field) => `${field}=${stats[field]?.indexed ?? 0}`).join(', ')}`,
    );
    return {
      ingredientDescription: stats.ingredientDescription ?? EMPTY_STATS,
      mealDescription: stats.mealDescription ?? EMPTY_STATS,
      mealInstructions: stats.mealInstructions ?? EMPTY_STATS,
      customerSummary: stats.customerSummary ?? EMPTY_STATS,
    };
  }
}

const EMPTY_STATS: RefreshStats = { indexed: 0, skipped: 0 };
