/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview A small catalog shared by tests.
 *
 * Ingredient vectors are one-hot in four dimensions: Tomato, Onion, Basil,
 * Pasta. Basil and Pasta are on sale; Saffron has no shop listing.
 */

import { InMemoryCatalogStore } from '../catalog/inMemoryCatalogStore.js';
import { parseCatalogSeed, type CatalogSeed } from '../catalog/seed.js';

export const TOMATO = 1;
export const ONION = 2;
export const BASIL = 3;
export const PASTA = 4;
export const SAFFRON = 5;

export const TOMATO_PASTA = 1;
export const ONION_SOUP = 2;
export const SAFFRON_RICE = 3;
export const PESTO = 4;

export function testSeed(): CatalogSeed {
  return parseCatalogSeed({
    ingredients: [
      { id: TOMATO, name: 'Tomato', description: 'Red juicy fruit', type: 'Vegetable', descriptionVector: [1, 0, 0, 0] },
      { id: ONION, name: 'Onion', description: 'Pungent bulb', type: 'Vegetable', descriptionVector: [0, 1, 0, 0] },
      { id: BASIL, name: 'Basil', description: 'Fragrant herb', type: 'Herb', descriptionVector: [0, 0, 1, 0] },
      { id: PASTA, name: 'Pasta', description: 'Dried durum wheat', type: 'Grain', descriptionVector: [0, 0, 0, 1] },
      { id: SAFFRON, name: 'Saffron', description: 'Costly spice', type: 'Spice', descriptionVector: null },
    ],
    meals: [
      {
        id: TOMATO_PASTA,
        name: 'Tomato Pasta',
        category: 'Pasta',
        area: 'Italian',
        description: 'Pasta in a quick tomato and basil sauce',
        instructions: 'Boil pasta. Simmer tomatoes. Toss with basil.',
        descriptionVector: [1, 0, 1, 1],
        instructionsVector: [0, 0, 1, 0],
        ingredients: [
          { ingredientId: TOMATO, measure: '4 large' },
          { ingredientId: ONION, measure: '1 small' },
          { ingredientId: BASIL, measure: 'handful' },
          { ingredientId: PASTA, measure: '400g' },
        ],
      },
      {
        id: ONION_SOUP,
        name: 'Onion Soup',
        category: 'Soup',
        area: 'French',
        description: 'Slow cooked onion broth',
        instructions: 'Caramelise onions for an hour.',
        descriptionVector: [0, 1, 0, 0],
        instructionsVector: [0, 1, 0, 0],
        ingredients: [{ ingredientId: ONION, measure: '6' }],
      },
      {
        id: SAFFRON_RICE,
        name: 'Saffron Rice',
        category: 'Side',
        area: 'Persian',
        description: null,
        instructions: null,
        ingredients: [{ ingredientId: SAFFRON, measure: 'pinch' }],
      },
      {
        id: PESTO,
        name: 'Pesto',
        category: 'Sauce',
        area: 'Italian',
        description: 'Green basil sauce',
        instructions: 'Pound basil with oil.',
        descriptionVector: [0, 0, 1, 0],
        instructionsVector: [0, 0, 1, 0],
        ingredients: [{ ingredientId: BASIL, measure: '2 bunches' }],
      },
    ],
    shopItems: [
      { ingredientId: TOMATO, price: 2.0 },
      { ingredientId: ONION, price: 1.0 },
      { ingredientId: BASIL, price: 1.5, onSale: true, discount: 0.2 },
      { ingredientId: PASTA, price: 1.2, onSale: true, discount: 0.1 },
    ],
    customers: [
      {
        id: 1,
        fullName: 'Ada Test',
        email: 'ada@example.test',
        summary: 'Loves Italian pasta.',
        summaryVector: [1, 0, 1, 1],
        conversationCount: 2,
      },
      {
        id: 2,
        fullName: 'Ben Test',
        summary: 'Prefers soups.',
        summaryVector: [0, 1, 0, 0],
      },
    ],
  });
}

export function testStore(): InMemoryCatalogStore {
  return new InMemoryCatalogStore(testSeed());
}
