/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview LanceDB implementation of the catalog and persistence stores.
 *
 * LanceDB is an embedded, file-based database (no server needed). Every write
 * call on a table commits one new table version, which is what makes a
 * checkout's purchase batch atomic: all rows go into a single `add`.
 *
 * @see https://lancedb.github.io/lancedb/
 *
 * ## Tables
 *
 * | table              | columns                                                              |
 * | ------------------ | -------------------------------------------------------------------- |
 * | `ingredients`      | id, name, description, type, description_vector                      |
 * | `meals`            | id, name, category, area, description, instructions, *_vector        |
 * | `meal_ingredients` | id, meal_id, ingredient_id, measure                                  |
 * | `shop_items`       | id, ingredient_id, price, on_sale, discount                          |
 * | `customers`        | id, full_name, email, summary, summary_vector, conversation_count    |
 * | `purchases`        | id, customer_id, ingredient_id, price, quantity, purchased_at        |
 *
 * Columns are never null, so the schema can be inferred from a placeholder
 * row: missing text is stored as `''` and a missing discount as `0`.
 * Vectors are stored as JSON text.
 *
 * ## Usage
 *
 * ```typescript
 * const store = new LanceDBCatalogStore('.mealcart/catalog.lance', {
 *   seed: await loadCatalogSeed('data/seed-catalog.json'),
 * });
 * await store.init();
 * ```
 */

import * as lancedb from '@lancedb/lancedb';
import { z } from 'zod';
import { debugLogger } from '../utils/debugLogger.js';
import { CatalogError, NotFoundError, getErrorMessage } from '../utils/errors.js';
import type { CatalogSeed } from './seed.js';
import {
  NEW_CUSTOMER_SUMMARY,
  type Customer,
  type CustomerProfileUpdate,
  type Ingredient,
  type Meal,
  type MealIngredientLink,
  type MealcartStore,
  type NewCustomer,
  type NewPurchase,
  type PurchaseRecord,
  type SaleUpdate,
  type ShopItem,
  type VectorField,
  type VectorUpdate,
} from './types.js';

// =============================================================================
// Row schemas
// =============================================================================

const ingredientRow = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string(),
  type: z.string(),
  description_vector: z.string(),
});

const mealRow = z.object({
  id: z.number(),
  name: z.string(),
  category: z.string(),
  area: z.string(),
  description: z.string(),
  instructions: z.string(),
  description_vector: z.string(),
  instructions_vector: z.string(),
});

const mealIngredientRow = z.object({
  id: z.number(),
  meal_id: z.number(),
  ingredient_id: z.number(),
  measure: z.string(),
});

const shopItemRow = z.object({
  id: z.number(),
  ingredient_id: z.number(),
  price: z.number(),
  on_sale: z.boolean(),
  discount: z.number(),
});

const customerRow = z.object({
  id: z.number(),
  full_name: z.string(),
  email: z.string(),
  summary: z.string(),
  summary_vector: z.string(),
  conversation_count: z.number(),
});

const purchaseRow = z.object({
  id: z.number(),
  customer_id: z.number(),
  ingredient_id: z.number(),
  price: z.number(),
  quantity: z.number(),
  purchased_at: z.number(),
});

type IngredientRow = z.infer<typeof ingredientRow>;
type MealRow = z.infer<typeof mealRow>;
type MealIngredientRow = z.infer<typeof mealIngredientRow>;
type ShopItemRow = z.infer<typeof shopItemRow>;
type CustomerRow = z.infer<typeof customerRow>;
type PurchaseRow = z.infer<typeof purchaseRow>;

type TableName =
  | 'ingredients'
  | 'meals'
  | 'meal_ingredients'
  | 'shop_items'
  | 'customers'
  | 'purchases';

const PLACEHOLDER_ID = -1;

/**
 * One row per table with every column set, used to infer the schema.
 */
const PLACEHOLDERS: Record<TableName, Record<string, unknown>> = {
  ingredients: {
    id: PLACEHOLDER_ID,
    name: '',
    description: '',
    type: '',
    description_vector: '',
  } satisfies IngredientRow,
  meals: {
    id: PLACEHOLDER_ID,
    name: '',
    category: '',
    area: '',
    description: '',
    instructions: '',
    description_vector: '',
    instructions_vector: '',
  } satisfies MealRow,
  meal_ingredients: {
    id: PLACEHOLDER_ID,
    meal_id: 0,
    ingredient_id: 0,
    measure: '',
  } satisfies MealIngredientRow,
  shop_items: {
    id: PLACEHOLDER_ID,
    ingredient_id: 0,
    price: 0,
    on_sale: false,
    discount: 0,
  } satisfies ShopItemRow,
  customers: {
    id: PLACEHOLDER_ID,
    full_name: '',
    email: '',
    summary: '',
    summary_vector: '',
    conversation_count: 0,
  } satisfies CustomerRow,
  purchases: {
    id: PLACEHOLDER_ID,
    customer_id: 0,
    ingredient_id: 0,
    price: 0,
    quantity: 0,
    purchased_at: 0,
  } satisfies PurchaseRow,
};

// =============================================================================
// Row mapping
// =============================================================================

const orNull = (value: string): string | null => (value === '' ? null : value);

function toIngredient(row: IngredientRow): Ingredient {
  return {
    id: row.id,
    name: row.name,
    description: orNull(row.description),
    type: orNull(row.type),
    descriptionVector: orNull(row.description_vector),
  };
}

function fromIngredient(ingredient: Ingredient): IngredientRow {
  return {
    id: ingredient.id,
    name: ingredient.name,
    description: ingredient.description ?? '',
    type: ingredient.type ?? '',
    description_vector: ingredient.descriptionVector ?? '',
  };
}

function toMeal(row: MealRow): Meal {
  return {
    id: row.id,
    name: row.name,
    category: orNull(row.category),
    area: orNull(row.area),
    description: orNull(row.description),
    instructions: orNull(row.instructions),
    descriptionVector: orNull(row.description_vector),
    instructionsVector: orNull(row.instructions_vector),
  };
}

function fromMeal(meal: Meal): MealRow {
  return {
    id: meal.id,
    name: meal.name,
    category: meal.category ?? '',
    area: meal.area ?? '',
    description: meal.description ?? '',
    instructions: meal.instructions ?? '',
    description_vector: meal.descriptionVector ?? '',
    instructions_vector: meal.instructionsVector ?? '',
  };
}

function toShopItem(row: ShopItemRow): ShopItem {
  return {
    id: row.id,
    ingredientId: row.ingredient_id,
    price: row.price,
    onSale: row.on_sale,
    discount: row.discount === 0 ? null : row.discount,
  };
}

function fromShopItem(item: ShopItem): ShopItemRow {
  return {
    id: item.id,
    ingredient_id: item.ingredientId,
    price: item.price,
    on_sale: item.onSale,
    discount: item.discount ?? 0,
  };
}

function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    fullName: row.full_name,
    email: row.email,
    summary: row.summary,
    summaryVector: orNull(row.summary_vector),
    conversationCount: row.conversation_count,
  };
}

function fromCustomer(customer: Customer): CustomerRow {
  return {
    id: customer.id,
    full_name: customer.fullName,
    email: customer.email,
    summary: customer.summary,
    summary_vector: customer.summaryVector ?? '',
    conversation_count: customer.conversationCount,
  };
}

function toPurchase(row: PurchaseRow): PurchaseRecord {
  return {
    id: row.id,
    customerId: row.customer_id,
    ingredientId: row.ingredient_id,
    price: row.price,
    quantity: row.quantity,
    purchasedAt: row.purchased_at,
  };
}

// =============================================================================
// LanceDBCatalogStore
// =============================================================================

export interface LanceDBCatalogStoreOptions {
  /** Imported on init when the ingredients table is empty */
  seed?: CatalogSeed;
}

export class LanceDBCatalogStore implements MealcartStore {
  private readonly dbPath: string;
  private readonly seed?: CatalogSeed;
  private db: lancedb.Connection | null = null;
  private tables: Map<TableName, lancedb.Table> | null = null;
  private initPromise: Promise<void> | null = null;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(dbPath: string, options: LanceDBCatalogStoreOptions = {}) {
    this.dbPath = dbPath;
    this.seed = options.seed;
  }

  /**
   * Connect and create missing tables.
   */
  async init(): Promise<void> {
    if (this.tables) {
      return;
    }

    // Prevent concurrent init calls
    if (this.initPromise) {
      return this.initPromise;
    }

    this.initPromise = this.doInit();
    return this.initPromise;
  }

  private async doInit(): Promise<void> {
    try {
      debugLogger.log(`LanceDBCatalogStore: Initializing at ${this.dbPath}`);
      const db = await lancedb.connect(this.dbPath);
      const tables = new Map<TableName, lancedb.Table>();
      for (const name of Object.keys(PLACEHOLDERS)) {
        if (isTableName(name)) {
          tables.set(name, await this.openOrCreate(db, name));
        }
      }
      this.db = db;
      this.tables = tables;

      if (this.seed && (await this.table('ingredients').countRows()) === 0) {
        await this.importSeed(this.seed);
      }

      this.initPromise = null;
      debugLogger.log('LanceDBCatalogStore: Initialized successfully');
    } catch (error) {
      this.initPromise = null; // Clear promise on failure to allow retry
      debugLogger.warn(
        `LanceDBCatalogStore: Failed to initialize: ${getErrorMessage(error)}`,
      );
      throw error;
    }
  }

  /**
   * Try open first, then create, then retry open if create fails (another
   * process created the table meanwhile).
   */
  private async openOrCreate(
    db: lancedb.Connection,
    name: TableName,
  ): Promise<lancedb.Table> {
    try {
      return await db.openTable(name);
    } catch (openError) {
      debugLogger.debug(
        `LanceDBCatalogStore: Table ${name} not found (${getErrorMessage(openError)}), creating`,
      );
    }

    try {
      const table = await db.createTable(name, [PLACEHOLDERS[name]]);
      await table.delete(`id = ${PLACEHOLDER_ID}`);
      debugLogger.log(`LanceDBCatalogStore: Created table ${name}`);
      return table;
    } catch (createError) {
      debugLogger.log(
        `LanceDBCatalogStore: Create failed, retrying open: ${getErrorMessage(createError)}`,
      );
      return db.openTable(name);
    }
  }

  private async importSeed(seed: CatalogSeed): Promise<void> {
    debugLogger.log(
      `LanceDBCatalogStore: Importing seed (${seed.ingredients.length} ingredients, ${seed.meals.length} meals)`,
    );

    await addRows(this.table('ingredients'), seed.ingredients.map(fromIngredient));
    await addRows(
      this.table('meals'),
      seed.meals.map((meal) => fromMeal(meal)),
    );

    let linkId = 1;
    const links: MealIngredientRow[] = [];
    for (const meal of seed.meals) {
      for (const link of meal.ingredients) {
        links.push({
          id: linkId++,
          meal_id: meal.id,
          ingredient_id: link.ingredientId,
          measure: link.measure,
        });
      }
    }
    await addRows(this.table('meal_ingredients'), links);

    await addRows(
      this.table('shop_items'),
      seed.shopItems.map((item, index) => fromShopItem({ id: index + 1, ...item })),
    );
    await addRows(this.table('customers'), seed.customers.map(fromCustomer));
  }

  async close(): Promise<void> {
    if (!this.tables) {
      return;
    }
    debugLogger.log('LanceDBCatalogStore: Closing connection');
    // Drain pending writes before dropping the handles
    await this.writeChain;
    this.tables = null;
    this.db = null;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async listIngredients(): Promise<Ingredient[]> {
    const rows = await readRows(this.table('ingredients'), ingredientRow);
    return rows.sort(byId).map(toIngredient);
  }

  async getIngredient(id: number): Promise<Ingredient | undefined> {
    const [row] = await readRows(this.table('ingredients'), ingredientRow, idIs(id));
    return row ? toIngredient(row) : undefined;
  }

  async listMeals(): Promise<Meal[]> {
    const rows = await readRows(this.table('meals'), mealRow);
    return rows.sort(byId).map(toMeal);
  }

  async getMeal(id: number): Promise<Meal | undefined> {
    const [row] = await readRows(this.table('meals'), mealRow, idIs(id));
    return row ? toMeal(row) : undefined;
  }

  async listMealIngredients(): Promise<MealIngredientLink[]> {
    const rows = await readRows(this.table('meal_ingredients'), mealIngredientRow);
    return rows.sort(byId).map(toLink);
  }

  async getMealIngredients(mealId: number): Promise<MealIngredientLink[]> {
    const rows = await readRows(
      this.table('meal_ingredients'),
      mealIngredientRow,
      `meal_id = ${numeric(mealId)}`,
    );
    return rows.sort(byId).map(toLink);
  }

  async listShopItems(): Promise<ShopItem[]> {
    const rows = await readRows(this.table('shop_items'), shopItemRow);
    return rows.sort(byId).map(toShopItem);
  }

  async getShopItem(ingredientId: number): Promise<ShopItem | undefined> {
    const [row] = await readRows(
      this.table('shop_items'),
      shopItemRow,
      `ingredient_id = ${numeric(ingredientId)}`,
    );
    return row ? toShopItem(row) : undefined;
  }

  async listCustomers(): Promise<Customer[]> {
    const rows = await readRows(this.table('customers'), customerRow);
    return rows.sort(byId).map(toCustomer);
  }

  async getCustomer(id: number): Promise<Customer | undefined> {
    const [row] = await readRows(this.table('customers'), customerRow, idIs(id));
    return row ? toCustomer(row) : undefined;
  }

  async findCustomerByName(fullName: string): Promise<Customer | undefined> {
    const rows = await readRows(
      this.table('customers'),
      customerRow,
      `full_name = '${escapeString(fullName)}'`,
    );
    const [row] = rows.sort(byId);
    return row ? toCustomer(row) : undefined;
  }

  async listPurchases(customerId?: number): Promise<PurchaseRecord[]> {
    const rows = await readRows(
      this.table('purchases'),
      purchaseRow,
      customerId === undefined ? undefined : `customer_id = ${numeric(customerId)}`,
    );
    return rows.sort(byId).map(toPurchase);
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async createCustomer(customer: NewCustomer): Promise<Customer> {
    return this.serialize(async () => {
      const existing = await readRows(this.table('customers'), customerRow);
      const created: Customer = {
        id: nextId(existing),
        fullName: customer.fullName,
        email: customer.email ?? '',
        summary: customer.summary ?? NEW_CUSTOMER_SUMMARY,
        summaryVector: null,
        conversationCount: 0,
      };
      await addRows(this.table('customers'), [fromCustomer(created)]);
      debugLogger.log(
        `LanceDBCatalogStore: Created customer ${created.id} (${created.fullName})`,
      );
      return created;
    });
  }

  async recordPurchases(purchases: NewPurchase[]): Promise<PurchaseRecord[]> {
    if (purchases.length === 0) {
      return [];
    }
    return this.serialize(async () => {
      for (const purchase of purchases) {
        if (!(await this.getCustomer(purchase.customerId))) {
          throw new NotFoundError('customer', purchase.customerId);
        }
        if (!(await this.getIngredient(purchase.ingredientId))) {
          throw new NotFoundError('ingredient', purchase.ingredientId);
        }
      }

      let id = nextId(await readRows(this.table('purchases'), purchaseRow));
      const records: PurchaseRecord[] = purchases.map((purchase) => ({
        ...purchase,
        id: id++,
      }));

      // One add, one table version: the batch is committed as a unit
      await addRows(
        this.table('purchases'),
        records.map((record) => ({
          id: record.id,
          customer_id: record.customerId,
          ingredient_id: record.ingredientId,
          price: record.price,
          quantity: record.quantity,
          purchased_at: record.purchasedAt,
        })),
      );
      debugLogger.log(
        `LanceDBCatalogStore: Recorded ${records.length} purchases`,
      );
      return records;
    });
  }

  async updateCustomerProfile(
    customerId: number,
    update: CustomerProfileUpdate,
  ): Promise<Customer> {
    return this.serialize(async () => {
      const current = await this.getCustomer(customerId);
      if (!current) {
        throw new NotFoundError('customer', customerId);
      }
      const updated: Customer = { ...current, ...update };
      await upsertById(this.table('customers'), [fromCustomer(updated)]);
      return updated;
    });
  }

  async setSale(ingredientId: number, sale: SaleUpdate): Promise<ShopItem> {
    return this.serialize(async () => {
      const current = await this.getShopItem(ingredientId);
      if (!current) {
        throw new NotFoundError('shop item', ingredientId);
      }
      const updated: ShopItem = { ...current, ...sale };
      await upsertById(this.table('shop_items'), [fromShopItem(updated)]);
      return updated;
    });
  }

  async updateVectors(field: VectorField, updates: VectorUpdate[]): Promise<void> {
    if (updates.length === 0) {
      return;
    }
    const vectors = new Map(updates.map((update) => [update.id, update.vector]));
    const where = `id IN (${updates.map((update) => numeric(update.id)).join(',')})`;

    await this.serialize(async () => {
      switch (field) {
        case 'ingredientDescription': {
          const rows = await readRows(this.table('ingredients'), ingredientRow, where);
          assertAllFound('ingredient', updates, rows);
          await upsertById(
            this.table('ingredients'),
            rows.map((row) => ({
              ...row,
              description_vector: vectors.get(row.id) ?? row.description_vector,
            })),
          );
          return;
        }
        case 'mealDescription':
        case 'mealInstructions': {
          const rows = await readRows(this.table('meals'), mealRow, where);
          assertAllFound('meal', updates, rows);
          await upsertById(
            this.table('meals'),
            rows.map((row) =>
              field === 'mealDescription'
                ? { ...row, description_vector: vectors.get(row.id) ?? row.description_vector }
                : { ...row, instructions_vector: vectors.get(row.id) ?? row.instructions_vector },
            ),
          );
          return;
        }
        case 'customerSummary': {
          const rows = await readRows(this.table('customers'), customerRow, where);
          assertAllFound('customer', updates, rows);
          await upsertById(
            this.table('customers'),
            rows.map((row) => ({
              ...row,
              summary_vector: vectors.get(row.id) ?? row.summary_vector,
            })),
          );
          return;
        }
        default: {
          const unreachable: never = field;
          throw new CatalogError(`Unknown vector field ${String(unreachable)}`);
        }
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Runs writes one at a time so read-modify-write sequences do not interleave.
   */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(fn, fn);
    this.writeChain = run.catch((error: unknown) => {
      debugLogger.debug(
        `LanceDBCatalogStore: write failed: ${getErrorMessage(error)}`,
      );
    });
    return run;
  }

  /**
   * Get a table, throwing if not initialized.
   */
  private table(name: TableName): lancedb.Table {
    const table = this.tables?.get(name);
    if (!table) {
      throw new CatalogError(
        'LanceDBCatalogStore not initialized. Call init() first.',
      );
    }
    return table;
  }
}

// =============================================================================
// Module helpers
// =============================================================================

function isTableName(name: string): name is TableName {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

function toLink(row: MealIngredientRow): MealIngredientLink {
  return {
    mealId: row.meal_id,
    ingredientId: row.ingredient_id,
    measure: row.measure,
  };
}

const byId = (a: { id: number }, b: { id: number }): number => a.id - b.id;

function nextId(rows: ReadonlyArray<{ id: number }>): number {
  return rows.reduce((max, row) => Math.max(max, row.id), 0) + 1;
}

function numeric(value: number): string {
  if (!Number.isFinite(value)) {
    throw new CatalogError(`Invalid id ${value}`);
  }
  return String(value);
}

function idIs(id: number): string {
  return `id = ${numeric(id)}`;
}

/**
 * Escape a string for use in SQL predicates.
 */
function escapeString(s: string): string {
  return s.replace(/'/g, "''");
}

function assertAllFound(
  entity: 'ingredient' | 'meal' | 'customer',
  updates: VectorUpdate[],
  rows: ReadonlyArray<{ id: number }>,
): void {
  const found = new Set(rows.map((row) => row.id));
  const missing = updates.find((update) => !found.has(update.id));
  if (missing) {
    throw new NotFoundError(entity, missing.id);
  }
}

/**
 * Reads every matching row and validates its shape.
 * A plain query is capped at a default limit, so the count is asked first.
 */
async function readRows<T>(
  table: lancedb.Table,
  schema: z.ZodType<T>,
  where?: string,
): Promise<T[]> {
  const count = await table.countRows(where);
  if (count === 0) {
    return [];
  }
  let query = table.query().limit(count);
  if (where) {
    query = query.where(where);
  }
  const rows: unknown[] = await query.toArray();
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new CatalogError(
        `Unexpected row shape: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      );
    }
    return parsed.data;
  });
}

async function addRows(
  table: lancedb.Table,
  rows: Array<Record<string, unknown>>,
): Promise<void> {
  if (rows.length === 0) {
    return;
  }
  await table.add(rows);
}

async function upsertById(
  table: lancedb.Table,
  rows: Array<Record<string, unknown>>,
): Promise<void> {
  if (rows.length === 0) {
    return;
  }
  await table
    .mergeInsert('id')
    .whenMatchedUpdateAll()
    .whenNotMatchedInsertAll()
    .execute(rows);
}
