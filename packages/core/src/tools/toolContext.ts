/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CatalogStore } from '../catalog/types.js';
import type { CatalogIndexes } from '../retrieval/catalogIndexes.js';
import type { Basket } from '../session/basket.js';

/**
 * What the shop tools act on. One per session.
 */
export interface ShopToolContext {
  catalog: CatalogStore;
  indexes: CatalogIndexes;
  basket: Basket;
}
