/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Computes vectors for catalog rows that have text but no
 * usable vector yet, and writes them back as JSON.
 */

import { listVectorRows } from '../catalog/queries.js';
import type {
  CatalogStore,
  PersistenceStore,
  VectorField,
} from '../catalog/types.js';
import { debugLogger } from '../utils/debugLogger.js';
import type { EmbeddingClient } from './embeddings/index.js';
import { parseStoredVector } from './vectorIndex.js';

/**
 * @returns Number of rows that received a vector
 */
export async function backfillVectors(
  store: CatalogStore & PersistenceStore,
  embeddings: EmbeddingClient,
  field: VectorField,
  signal?: AbortSignal,
): Promise<number> {
  const pending = (await listVectorRows(store, field)).flatMap((row) =>
    row.text !== null &&
    row.text.trim() !== '' &&
    parseStoredVector(row.vector) === null
      ? [{ id: row.id, text: row.text }]
      : [],
  );
  if (pending.length === 0) {
    return 0;
  }

  debugLogger.log(
    `[backfill] Embedding ${pending.length} rows for ${field} with ${embeddings.getModel()}`,
  );
  const vectors = await embeddings.embed(
    pending.map((row) => row.text),
    signal,
  );

  await store.updateVectors(
    field,
    pending.map((row, i) => ({
      id: row.id,
      vector: JSON.stringify(vectors[i] ?? []),
    })),
  );
  return pending.length;
}
