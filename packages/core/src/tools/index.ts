/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createBasketTools } from './basketTools.js';
import { createCatalogTools } from './catalogTools.js';
import { createRetrievalTools } from './retrievalTools.js';
import type { ShopToolContext } from './toolContext.js';
import { ToolRegistry } from './toolRegistry.js';

export * from './tool-names.js';
export * from './tools.js';
export * from './toolRegistry.js';
export type { ShopToolContext } from './toolContext.js';
export { createRetrievalTools, DEFAULT_RETRIEVAL_K } from './retrievalTools.js';
export type { RetrievedRecord } from './retrievalTools.js';
export { createCatalogTools } from './catalogTools.js';
export { createBasketTools } from './basketTools.js';
export type { BasketView } from './basketTools.js';

/**
 * The twelve shop tools bound to one session's basket.
 */
export function createShopToolRegistry(ctx: ShopToolContext): ToolRegistry {
  return new ToolRegistry([
    ...createRetrievalTools(ctx),
    ...createCatalogTools(ctx),
    ...createBasketTools(ctx),
  ]);
}
