/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  ONION_SOUP,
  PESTO,
  SAFFRON,
  SAFFRON_RICE,
  TOMATO,
  TOMATO_PASTA,
  testStore,
} from '../test-utils/catalogFixture.js';
import { FakeEmbeddings } from '../test-utils/fakes.js';
import { backfillVectors } from './backfill.js';
import { CatalogIndexes } from './catalogIndexes.js';

describe('CatalogIndexes', () => {
  it('should refresh all four indexes from the store', async () => {
    const indexes = new CatalogIndexes(testStore(), new FakeEmbeddings(4));

    const stats = await indexes.refreshAll();

    expect(stats).toEqual({
      ingredientDescription: { indexed: 4, skipped: 1 },
      mealDescription: { indexed: 3, skipped: 1 },
      mealInstructions: { indexed: 3, skipped: 1 },
      customerSummary: { indexed: 2, skipped: 0 },
    });
  });

  it('should answer text queries through the shared embeddings', async () => {
    const embeddings = new FakeEmbeddings(4).set('something red', [1, 0, 0, 0]);
    const indexes = new CatalogIndexes(testStore(), embeddings);
    await indexes.refreshAll();

    const [top] = await indexes.ingredients.queryText('something red', 1);

    expect(top).toEqual({ id: TOMATO, score: 1 });
  });

  it('should see new vectors only after a refresh', async () => {
    const store = testStore();
    const indexes = new CatalogIndexes(store, new FakeEmbeddings(4));
    await indexes.refresh('mealDescription');

    await store.updateVectors('mealDescription', [
      { id: SAFFRON_RICE, vector: '[0,1,0,0]' },
    ]);
    expect(indexes.meals.size).toBe(3);

    await indexes.refresh('mealDescription');
    expect(indexes.meals.query([0, 1, 0, 0], 2).map((hit) => hit.id)).toEqual([
      ONION_SOUP,
      SAFFRON_RICE,
    ]);
  });
});

describe('backfillVectors', () => {
  it('should embed rows with text but no vector', async () => {
    const store = testStore();
    const embeddings = new FakeEmbeddings(4).set('Costly spice', [0, 0.5, 0.5, 0]);

    const count = await backfillVectors(store, embeddings, 'ingredientDescription');

    expect(count).toBe(1);
    expect(embeddings.embedded).toEqual(['Costly spice']);
    expect((await store.getIngredient(SAFFRON))?.descriptionVector).toBe(
      '[0,0.5,0.5,0]',
    );
  });

  it('should skip rows without text', async () => {
    const store = testStore();
    const embeddings = new FakeEmbeddings(4);

    expect(await backfillVectors(store, embeddings, 'mealDescription')).toBe(0);
    expect(embeddings.embedded).toEqual([]);
    expect((await store.getMeal(SAFFRON_RICE))?.descriptionVector).toBeNull();
    expect((await store.getMeal(TOMATO_PASTA))?.descriptionVector).toBe(
      '[1,0,1,1]',
    );
    expect((await store.getMeal(PESTO))?.descriptionVector).toBe('[0,0,1,0]');
  });
});
