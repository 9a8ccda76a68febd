/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { InMemoryCatalogStore } from '../catalog/inMemoryCatalogStore.js';
import { CatalogIndexes } from '../retrieval/catalogIndexes.js';
import { Basket } from '../session/basket.js';
import {
  BASIL,
  ONION,
  PASTA,
  PESTO,
  SAFFRON,
  SAFFRON_RICE,
  TOMATO,
  TOMATO_PASTA,
  testStore,
} from '../test-utils/catalogFixture.js';
import { FakeEmbeddings } from '../test-utils/fakes.js';
import { createShopToolRegistry } from './index.js';
import type { ToolRegistry } from './toolRegistry.js';

describe('shop tools', () => {
  let store: InMemoryCatalogStore;
  let embeddings: FakeEmbeddings;
  let basket: Basket;
  let registry: ToolRegistry;
  let callCount = 0;

  async function call(name: string, args: Record<string, unknown> = {}) {
    return registry.dispatch({ id: `t${++callCount}`, name, args });
  }

  async function callJson(name: string, args: Record<string, unknown> = {}) {
    const result = await call(name, args);
    expect(result.ok).toBe(true);
    return JSON.parse(result.content);
  }

  beforeEach(async () => {
    store = testStore();
    embeddings = new FakeEmbeddings(4)
      .set('fragrant herb', [0, 0, 1, 0])
      .set('basil sauce', [0, 0, 2, 0])
      .set('pound with oil', [0, 0, 1, 0]);
    const indexes = new CatalogIndexes(store, embeddings);
    await indexes.refreshAll();
    basket = new Basket();
    registry = createShopToolRegistry({ catalog: store, indexes, basket });
  });

  it('should declare the twelve tools', () => {
    expect(registry.getToolNames()).toEqual([
      'retrieve_ingredient',
      'retrieve_meal',
      'retrieve_meal_by_instructions',
      'list_ingredients',
      'get_price',
      'list_sale_items',
      'retrieve_meals_with_sale_overlap',
      'get_meal_details',
      'get_meal_ingredients',
      'get_ingredient_details',
      'add_to_basket',
      'add_meal_to_basket',
    ]);
  });

  describe('retrieval', () => {
    it('should rank ingredients and keep source order on ties', async () => {
      const hits = await callJson('retrieve_ingredient', {
        description: 'fragrant herb',
        k: 2,
      });

      expect(hits).toEqual([
        { id: BASIL, name: 'Basil', score: 1 },
        { id: TOMATO, name: 'Tomato', score: 0 },
      ]);
    });

    it('should return every indexed meal when k is large', async () => {
      const hits = await callJson('retrieve_meal', { description: 'basil sauce' });

      expect(hits.map((hit: { id: number }) => hit.id)).toEqual([
        PESTO,
        TOMATO_PASTA,
        2,
      ]);
      expect(hits[1].score).toBeCloseTo(1 / Math.sqrt(3), 10);
    });

    it('should search instructions', async () => {
      const hits = await callJson('retrieve_meal_by_instructions', {
        instructions: 'pound with oil',
        k: 1,
      });

      expect(hits).toEqual([{ id: TOMATO_PASTA, name: 'Tomato Pasta', score: 1 }]);
    });

    it('should reject blank text and bad k', async () => {
      const blank = await call('retrieve_ingredient', { description: '  ' });
      const zero = await call('retrieve_meal', { description: 'soup', k: 0 });

      expect(blank.content).toBe(
        "Error from retrieve_ingredient: The 'description' parameter cannot be empty.",
      );
      expect(zero.content).toBe(
        "Error from retrieve_meal: The 'k' parameter must be a positive number.",
      );
      expect(embeddings.embedded).not.toContain('  ');
    });
  });

  describe('catalog', () => {
    it('should list ingredients', async () => {
      expect(await callJson('list_ingredients')).toEqual([
        { id: 1, name: 'Tomato' },
        { id: 2, name: 'Onion' },
        { id: 3, name: 'Basil' },
        { id: 4, name: 'Pasta' },
        { id: 5, name: 'Saffron' },
      ]);
    });

    it('should get prices', async () => {
      expect(await callJson('get_price', { ingredient_id: TOMATO })).toEqual({
        price: 2,
        on_sale: false,
        discount: null,
      });
      expect(await callJson('get_price', { ingredient_id: BASIL })).toEqual({
        price: 1.5,
        on_sale: true,
        discount: 0.2,
      });
      expect((await call('get_price', { ingredient_id: SAFFRON })).content).toBe(
        'Error from get_price: Ingredient 5 has no price listing',
      );
      expect((await call('get_price', {})).content).toBe(
        'Error from get_price: Invalid arguments: ingredient_id: Required',
      );
    });

    it('should list sale items', async () => {
      expect(await callJson('list_sale_items')).toEqual([
        { ingredient_id: BASIL, name: 'Basil', price: 1.5, discount: 0.2 },
        { ingredient_id: PASTA, name: 'Pasta', price: 1.2, discount: 0.1 },
      ]);
    });

    it('should rank meals by sale overlap', async () => {
      expect(await callJson('retrieve_meals_with_sale_overlap')).toEqual([
        {
          meal_id: TOMATO_PASTA,
          name: 'Tomato Pasta',
          overlap: 2,
          description: 'Pasta in a quick tomato and basil sauce',
        },
        { meal_id: PESTO, name: 'Pesto', overlap: 1, description: 'Green basil sauce' },
      ]);
      expect(
        await callJson('retrieve_meals_with_sale_overlap', { min_overlap: 2 }),
      ).toHaveLength(1);
    });

    it('should describe meals and their ingredients', async () => {
      expect(await callJson('get_meal_details', { meal_id: SAFFRON_RICE })).toEqual({
        id: SAFFRON_RICE,
        name: 'Saffron Rice',
        category: 'Side',
        area: 'Persian',
        description: null,
        instructions: null,
      });
      expect(await callJson('get_meal_ingredients', { meal_id: PESTO })).toEqual([
        {
          ingredient_id: BASIL,
          name: 'Basil',
          measure: '2 bunches',
          price: 1.5,
          on_sale: true,
          discount: 0.2,
        },
      ]);
      expect(await callJson('get_meal_ingredients', { meal_id: SAFFRON_RICE })).toEqual([
        {
          ingredient_id: SAFFRON,
          name: 'Saffron',
          measure: 'pinch',
          price: null,
          on_sale: null,
          discount: null,
        },
      ]);
      expect((await call('get_meal_details', { meal_id: 42 })).content).toBe(
        'Error from get_meal_details: meal 42 not found',
      );
    });

    it('should describe ingredients', async () => {
      expect(await callJson('get_ingredient_details', { ingredient_id: ONION })).toEqual({
        id: ONION,
        name: 'Onion',
        description: 'Pungent bulb',
        type: 'Vegetable',
      });
    });
  });

  describe('basket', () => {
    it('should add ingredients with quantities', async () => {
      await callJson('add_to_basket', { ingredient_id: TOMATO, qty: 2 });
      const view = await callJson('add_to_basket', { ingredient_id: ONION });

      expect(view).toEqual({ items: ['Tomato', 'Tomato', 'Onion'], total: 5 });
      expect(basket.synopsis()).toBe('Basket: 2× Tomato, 1× Onion (total €5.00)');
    });

    it('should count a quantity below 1 as 1', async () => {
      const view = await callJson('add_to_basket', { ingredient_id: ONION, qty: 0 });

      expect(view).toEqual({ items: ['Onion'], total: 1 });
    });

    it('should reject oversized quantities and leave the basket unchanged', async () => {
      await callJson('add_to_basket', { ingredient_id: TOMATO });

      const single = await call('add_to_basket', { ingredient_id: ONION, qty: 5e9 });
      const meal = await call('add_meal_to_basket', {
        meal_id: TOMATO_PASTA,
        servings: 100,
      });

      expect(single).toEqual({
        content:
          'Error from add_to_basket: Invalid arguments: qty: Number must be less than or equal to 99',
        ok: false,
      });
      expect(meal.content).toBe(
        'Error from add_meal_to_basket: Invalid arguments: servings: Number must be less than or equal to 99',
      );
      expect(basket.synopsis()).toBe('Basket: 1× Tomato (total €2.00)');
    });

    it('should refuse unknown and unpriced ingredients', async () => {
      const unknown = await call('add_to_basket', { ingredient_id: 99 });
      const unpriced = await call('add_to_basket', { ingredient_id: SAFFRON });

      expect(unknown.content).toBe('Error from add_to_basket: ingredient 99 not found');
      expect(unpriced.content).toBe(
        'Error from add_to_basket: Saffron is not sold in the shop',
      );
      expect(basket.isEmpty).toBe(true);
    });

    it('should add every priced ingredient of a meal per serving', async () => {
      const view = await callJson('add_meal_to_basket', {
        meal_id: TOMATO_PASTA,
        servings: 2,
      });

      expect(view).toEqual({
        items: ['Tomato', 'Tomato', 'Onion', 'Onion', 'Basil', 'Basil', 'Pasta', 'Pasta'],
        total: 11.4,
      });
    });

    it('should refuse a meal without priced ingredients', async () => {
      const result = await call('add_meal_to_basket', { meal_id: SAFFRON_RICE });

      expect(result.content).toBe(
        'Error from add_meal_to_basket: None of the ingredients of Saffron Rice are sold in the shop',
      );
      expect(basket.isEmpty).toBe(true);
    });
  });
});
