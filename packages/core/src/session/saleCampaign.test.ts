/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { InMemoryCatalogStore } from '../catalog/inMemoryCatalogStore.js';
import { CatalogIndexes } from '../retrieval/catalogIndexes.js';
import {
  BASIL,
  PASTA,
  PESTO,
  TOMATO,
  TOMATO_PASTA,
  testStore,
} from '../test-utils/catalogFixture.js';
import { FakeEmbeddings } from '../test-utils/fakes.js';
import { NotFoundError, UserVisibleError } from '../utils/errors.js';
import { SaleCampaignManager } from './saleCampaign.js';

describe('SaleCampaignManager', () => {
  let store: InMemoryCatalogStore;
  let indexes: CatalogIndexes;
  let manager: SaleCampaignManager;

  beforeEach(async () => {
    store = testStore();
    indexes = new CatalogIndexes(store, new FakeEmbeddings(4));
    await indexes.refreshAll();
    manager = new SaleCampaignManager(store, indexes);
  });

  describe('setSale', () => {
    it('should put an ingredient on sale', async () => {
      const item = await manager.setSale(TOMATO, { onSale: true, discount: 0.25 });

      expect(item).toMatchObject({ ingredientId: TOMATO, onSale: true, discount: 0.25 });
      expect(await store.getShopItem(TOMATO)).toMatchObject({ onSale: true });
    });

    it('should clear the discount when taking an item off sale', async () => {
      const item = await manager.setSale(BASIL, { onSale: false, discount: 0.2 });

      expect(item).toMatchObject({ onSale: false, discount: null });
    });

    it('should reject discounts outside [0, 1]', async () => {
      await expect(
        manager.setSale(TOMATO, { onSale: true, discount: 1.5 }),
      ).rejects.toThrow('Discount must be between 0 and 1, got 1.5');
      await expect(
        manager.setSale(TOMATO, { onSale: true, discount: -0.1 }),
      ).rejects.toBeInstanceOf(UserVisibleError);
    });

    it('should reject unlisted ingredients', async () => {
      await expect(
        manager.setSale(99, { onSale: true, discount: null }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('planSaleCampaign', () => {
    it('should target customers above the threshold', async () => {
      const plan = await manager.planSaleCampaign();

      expect(plan.map((meal) => [meal.mealId, meal.overlap])).toEqual([
        [TOMATO_PASTA, 2],
        [PESTO, 1],
      ]);
      expect(plan[0]?.audience).toHaveLength(1);
      expect(plan[0]?.audience[0]?.fullName).toBe('Ada Test');
      expect(plan[0]?.audience[0]?.score).toBeCloseTo(1, 10);
      expect(plan[1]?.audience[0]?.score).toBeCloseTo(1 / Math.sqrt(3), 10);
    });

    it('should honour topN and threshold', async () => {
      const plan = await manager.planSaleCampaign({ topN: 2, threshold: 0.6 });

      expect(plan.map((meal) => meal.audience.length)).toEqual([1, 0]);
      expect(await manager.planSaleCampaign({ topN: 1 })).toHaveLength(1);
    });

    it('should follow sale changes', async () => {
      await manager.setSale(BASIL, { onSale: false, discount: null });
      await manager.setSale(PASTA, { onSale: false, discount: null });

      expect(await manager.planSaleCampaign()).toEqual([]);
    });
  });

  describe('findSimilarCustomers', () => {
    it('should rank other customers', async () => {
      const matches = await manager.findSimilarCustomers(1, 5);

      expect(matches).toEqual([{ customerId: 2, fullName: 'Ben Test', score: 0 }]);
    });

    it('should reject unknown customers', async () => {
      await expect(manager.findSimilarCustomers(42)).rejects.toThrow(
        'customer 42 not found',
      );
    });

    it('should return nothing for a customer without a profile vector', async () => {
      const created = await store.createCustomer({ fullName: 'Cleo New' });

      expect(await manager.findSimilarCustomers(created.id)).toEqual([]);
    });
  });
});
