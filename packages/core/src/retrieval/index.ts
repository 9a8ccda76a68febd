/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './embeddings/index.js';
export {
  VectorIndex,
  normalizeL2,
  parseStoredVector,
  type RefreshStats,
  type VectorHit,
  type VectorRecord,
  type VectorSource,
} from './vectorIndex.js';
export { catalogVectorSource } from './vectorSource.js';
export { CatalogIndexes } from './catalogIndexes.js';
export { backfillVectors } from './backfill.js';
