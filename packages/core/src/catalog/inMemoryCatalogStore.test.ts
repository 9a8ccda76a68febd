/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BASIL,
  ONION,
  PESTO,
  SAFFRON,
  TOMATO,
  TOMATO_PASTA,
  testStore,
} from '../test-utils/catalogFixture.js';
import { NotFoundError } from '../utils/errors.js';
import { InMemoryCatalogStore } from './inMemoryCatalogStore.js';
import {
  findMealsWithSaleOverlap,
  getMealIngredientRows,
  listVectorRows,
} from './queries.js';
import { NEW_CUSTOMER_SUMMARY } from './types.js';

describe('InMemoryCatalogStore', () => {
  let store: InMemoryCatalogStore;

  beforeEach(() => {
    store = testStore();
  });

  describe('reads', () => {
    it('should list seeded records in id order', async () => {
      expect((await store.listIngredients()).map((i) => i.name)).toEqual([
        'Tomato',
        'Onion',
        'Basil',
        'Pasta',
        'Saffron',
      ]);
      expect(await store.getShopItem(BASIL)).toEqual({
        id: 3,
        ingredientId: BASIL,
        price: 1.5,
        onSale: true,
        discount: 0.2,
      });
      expect(await store.getShopItem(SAFFRON)).toBeUndefined();
    });

    it('should store seed vectors as JSON text', async () => {
      const tomato = await store.getIngredient(TOMATO);
      expect(tomato?.descriptionVector).toBe('[1,0,0,0]');
    });

    it('should return copies', async () => {
      const tomato = await store.getIngredient(TOMATO);
      if (tomato) {
        tomato.name = 'Changed';
      }
      expect((await store.getIngredient(TOMATO))?.name).toBe('Tomato');
    });

    it('should find customers by name', async () => {
      expect((await store.findCustomerByName('Ben Test'))?.id).toBe(2);
      expect(await store.findCustomerByName('Nobody')).toBeUndefined();
    });
  });

  describe('writes', () => {
    it('should create customers with the default summary', async () => {
      const customer = await store.createCustomer({ fullName: 'Cleo Test' });

      expect(customer).toEqual({
        id: 3,
        fullName: 'Cleo Test',
        email: '',
        summary: NEW_CUSTOMER_SUMMARY,
        summaryVector: null,
        conversationCount: 0,
      });
    });

    it('should record purchases as one batch', async () => {
      const rows = await store.recordPurchases([
        { customerId: 1, ingredientId: TOMATO, price: 2, quantity: 1, purchasedAt: 1000 },
        { customerId: 1, ingredientId: ONION, price: 1, quantity: 1, purchasedAt: 1000 },
      ]);

      expect(rows.map((row) => row.id)).toEqual([1, 2]);
      expect(await store.listPurchases(1)).toHaveLength(2);
      expect(await store.listPurchases(2)).toEqual([]);
    });

    it('should write nothing when any purchase is invalid', async () => {
      await expect(
        store.recordPurchases([
          { customerId: 1, ingredientId: TOMATO, price: 2, quantity: 1, purchasedAt: 1 },
          { customerId: 1, ingredientId: 99, price: 1, quantity: 1, purchasedAt: 1 },
        ]),
      ).rejects.toBeInstanceOf(NotFoundError);

      expect(await store.listPurchases()).toEqual([]);
    });

    it('should update a profile in one step', async () => {
      const updated = await store.updateCustomerProfile(1, {
        summary: 'Now vegetarian.',
        summaryVector: '[0,0,1,0]',
        conversationCount: 3,
      });

      expect(updated.summary).toBe('Now vegetarian.');
      expect(await store.getCustomer(1)).toEqual(updated);
    });

    it('should change sale flags', async () => {
      await store.setSale(TOMATO, { onSale: true, discount: 0.5 });

      expect(await store.getShopItem(TOMATO)).toMatchObject({
        onSale: true,
        discount: 0.5,
      });
      await expect(
        store.setSale(SAFFRON, { onSale: true, discount: null }),
      ).rejects.toThrow('shop item 5 not found');
    });

    it('should update vectors and reject unknown ids without writing', async () => {
      await store.updateVectors('mealInstructions', [
        { id: TOMATO_PASTA, vector: '[9]' },
      ]);
      expect((await store.getMeal(TOMATO_PASTA))?.instructionsVector).toBe('[9]');

      await expect(
        store.updateVectors('ingredientDescription', [
          { id: SAFFRON, vector: '[1]' },
          { id: 42, vector: '[1]' },
        ]),
      ).rejects.toThrow('ingredient 42 not found');
      expect((await store.getIngredient(SAFFRON))?.descriptionVector).toBeNull();
    });
  });
});

describe('catalog queries', () => {
  it('should join meal ingredients with their listing', async () => {
    const rows = await getMealIngredientRows(testStore(), TOMATO_PASTA);

    expect(rows[0]).toEqual({
      ingredientId: TOMATO,
      name: 'Tomato',
      measure: '4 large',
      price: 2,
      onSale: false,
      discount: null,
    });
    expect(rows).toHaveLength(4);
  });

  it('should report missing listings as null', async () => {
    const store = testStore();
    const rows = await getMealIngredientRows(store, 3);

    expect(rows).toEqual([
      {
        ingredientId: SAFFRON,
        name: 'Saffron',
        measure: 'pinch',
        price: null,
        onSale: null,
        discount: null,
      },
    ]);
  });

  it('should rank meals by sale overlap', async () => {
    const overlaps = await findMealsWithSaleOverlap(testStore());

    expect(overlaps).toEqual([
      {
        mealId: TOMATO_PASTA,
        name: 'Tomato Pasta',
        overlap: 2,
        description: 'Pasta in a quick tomato and basil sauce',
      },
      {
        mealId: PESTO,
        name: 'Pesto',
        overlap: 1,
        description: 'Green basil sauce',
      },
    ]);
  });

  it('should apply min overlap and k', async () => {
    const store = testStore();

    expect((await findMealsWithSaleOverlap(store, 2)).map((o) => o.mealId)).toEqual([
      TOMATO_PASTA,
    ]);
    expect((await findMealsWithSaleOverlap(store, 0, 1)).map((o) => o.mealId)).toEqual([
      TOMATO_PASTA,
    ]);
  });

  it('should return nothing when no item is on sale', async () => {
    const store = testStore();
    await store.setSale(BASIL, { onSale: false, discount: null });
    await store.setSale(4, { onSale: false, discount: null });

    expect(await findMealsWithSaleOverlap(store)).toEqual([]);
  });

  it('should list vector rows per field', async () => {
    const rows = await listVectorRows(testStore(), 'customerSummary');

    expect(rows).toEqual([
      { id: 1, text: 'Loves Italian pasta.', vector: '[1,0,1,1]' },
      { id: 2, text: 'Prefers soups.', vector: '[0,1,0,0]' },
    ]);
  });
});
