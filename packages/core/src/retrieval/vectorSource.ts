/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { listVectorRows } from '../catalog/queries.js';
import type { CatalogStore, VectorField } from '../catalog/types.js';
import type { VectorSource } from './vectorIndex.js';

/**
 * Reads the stored vectors of one catalog field.
 */
export function catalogVectorSource(
  store: CatalogStore,
  field: VectorField,
): VectorSource {
  return {
    name: field,
    load: async () =>
      (await listVectorRows(store, field)).map((row) => ({
        id: row.id,
        vector: row.vector,
      })),
  };
}
