/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Shop-side tooling: sale flags, sale campaigns and customer
 * similarity.
 *
 * A campaign picks the meals that use the most sale ingredients and, for
 * each, the customers whose profile is close to the meal description.
 */

import { findMealsWithSaleOverlap } from '../catalog/queries.js';
import type {
  CatalogStore,
  PersistenceStore,
  SaleUpdate,
  ShopItem,
} from '../catalog/types.js';
import type { CatalogIndexes } from '../retrieval/catalogIndexes.js';
import { parseStoredVector } from '../retrieval/vectorIndex.js';
import { debugLogger } from '../utils/debugLogger.js';
import { NotFoundError, UserVisibleError } from '../utils/errors.js';

export const CAMPAIGN_DEFAULTS = {
  topN: 10,
  threshold: 0.3,
} as const;

export interface SaleCampaignOptions {
  /** Meals to include (default: 10) */
  topN?: number;
  /** Minimum profile similarity for a customer to be targeted (default: 0.3) */
  threshold?: number;
}

export interface CustomerMatch {
  customerId: number;
  fullName: string;
  score: number;
}

export interface CampaignMeal {
  mealId: number;
  name: string;
  overlap: number;
  description: string | null;
  /** Best match first */
  audience: CustomerMatch[];
}

export class SaleCampaignManager {
  constructor(
    private readonly store: CatalogStore & PersistenceStore,
    private readonly indexes: CatalogIndexes,
  ) {}

  /**
   * Puts an ingredient on sale or takes it off. Taking it off clears the
   * discount.
   */
  async setSale(ingredientId: number, sale: SaleUpdate): Promise<ShopItem> {
    if (sale.discount !== null && (sale.discount < 0 || sale.discount > 1)) {
      throw new UserVisibleError(
        `Discount must be between 0 and 1, got ${sale.discount}`,
      );
    }
    const item = await this.store.setSale(ingredientId, {
      onSale: sale.onSale,
      discount: sale.onSale ? sale.discount : null,
    });
    debugLogger.log(
      `[SaleCampaign] Ingredient ${ingredientId} ${item.onSale ? `on sale (discount ${item.discount ?? 0})` : 'off sale'}`,
    );
    return item;
  }

  async planSaleCampaign(
    options: SaleCampaignOptions = {},
  ): Promise<CampaignMeal[]> {
    const topN = options.topN ?? CAMPAIGN_DEFAULTS.topN;
    const threshold = options.threshold ?? CAMPAIGN_DEFAULTS.threshold;

    const overlaps = await findMealsWithSaleOverlap(this.store, 1, topN);
    const plan: CampaignMeal[] = [];
    for (const overlap of overlaps) {
      const meal = await this.store.getMeal(overlap.mealId);
      const vector = parseStoredVector(meal?.descriptionVector);
      let audience: CustomerMatch[] = [];
      if (vector) {
        const hits = this.indexes.customers
          .query(vector, this.indexes.customers.size)
          .filter((hit) => hit.score >= threshold);
        audience = await this.toMatches(hits);
      } else {
        debugLogger.debug(
          `[SaleCampaign] Meal ${overlap.mealId} has no description vector`,
        );
      }
      plan.push({ ...overlap, audience });
    }
    return plan;
  }

  /**
   * Customers whose profile is closest to the given customer's, excluding
   * the customer.
   */
  async findSimilarCustomers(customerId: number, k = 5): Promise<CustomerMatch[]> {
    const customer = await this.store.getCustomer(customerId);
    if (!customer) {
      throw new NotFoundError('customer', customerId);
    }
    const vector = parseStoredVector(customer.summaryVector);
    if (!vector) {
      return [];
    }
    const hits = this.indexes.customers
      .query(vector, k + 1)
      .filter((hit) => hit.id !== customerId)
      .slice(0, Math.max(0, k));
    return this.toMatches(hits);
  }

  private async toMatches(
    hits: Array<{ id: number; score: number }>,
  ): Promise<CustomerMatch[]> {
    const matches: CustomerMatch[] = [];
    for (const hit of hits) {
      const customer = await this.store.getCustomer(hit.id);
      if (customer) {
        matches.push({
          customerId: customer.id,
          fullName: customer.fullName,
          score: hit.score,
        });
      }
    }
    return matches;
  }
}
