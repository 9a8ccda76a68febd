/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CatalogError } from '../utils/errors.js';
import { loadCatalogSeed, parseCatalogSeed } from './seed.js';

describe('parseCatalogSeed', () => {
  it('should fill defaults', () => {
    const seed = parseCatalogSeed({
      ingredients: [{ id: 1, name: 'Leek' }],
      shopItems: [{ ingredientId: 1, price: 0.8 }],
      customers: [{ id: 1, fullName: 'Dee Test' }],
    });

    expect(seed.ingredients[0]).toEqual({
      id: 1,
      name: 'Leek',
      description: null,
      type: null,
      descriptionVector: null,
    });
    expect(seed.meals).toEqual([]);
    expect(seed.shopItems[0]).toEqual({
      ingredientId: 1,
      price: 0.8,
      onSale: false,
      discount: null,
    });
    expect(seed.customers[0]?.summary).toBe('No summary available yet.');
  });

  it('should reject dangling references', () => {
    expect(() =>
      parseCatalogSeed({
        ingredients: [{ id: 1, name: 'Leek' }],
        meals: [{ id: 1, name: 'Soup', ingredients: [{ ingredientId: 7 }] }],
      }),
    ).toThrow('meals.0.ingredients.0.ingredientId: unknown ingredient 7');
  });

  it('should reject a second listing for one ingredient', () => {
    expect(() =>
      parseCatalogSeed({
        ingredients: [{ id: 1, name: 'Leek' }],
        shopItems: [
          { ingredientId: 1, price: 1 },
          { ingredientId: 1, price: 2 },
        ],
      }),
    ).toThrow('shopItems.1.ingredientId: ingredient 1 listed twice');
  });

  it('should reject a negative price', () => {
    expect(() =>
      parseCatalogSeed({
        ingredients: [{ id: 1, name: 'Leek' }],
        shopItems: [{ ingredientId: 1, price: -1 }],
      }),
    ).toThrow(CatalogError);
  });
});

describe('loadCatalogSeed', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mealcart-seed-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should read and validate a file', async () => {
    const file = path.join(dir, 'seed.json');
    await fs.writeFile(
      file,
      JSON.stringify({ ingredients: [{ id: 4, name: 'Kale' }] }),
    );

    const seed = await loadCatalogSeed(file);

    expect(seed.ingredients.map((i) => i.name)).toEqual(['Kale']);
  });

  it('should report invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ nope');

    await expect(loadCatalogSeed(file)).rejects.toThrow(
      `Catalog seed ${file} is not valid JSON`,
    );
  });

  it('should report a missing file', async () => {
    await expect(loadCatalogSeed(path.join(dir, 'none.json'))).rejects.toThrow(
      CatalogError,
    );
  });

  it('should accept the bundled seed catalog', async () => {
    const bundled = fileURLToPath(
      new URL('../../../../data/seed-catalog.json', import.meta.url),
    );

    const seed = await loadCatalogSeed(bundled);

    expect(seed.ingredients.length).toBeGreaterThan(0);
    expect(seed.meals.length).toBeGreaterThan(0);
  });
});
