#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Stdio entry point: loads configuration, opens the catalog,
 * embeds missing vectors, builds the indexes and serves MCP on stdin/stdout.
 * Logs go to stderr.
 */

import * as path from 'node:path';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CatalogIndexes,
  EmbeddingProviderFactory,
  InMemoryCatalogStore,
  LanceDBCatalogStore,
  SaleCampaignManager,
  VECTOR_FIELDS,
  backfillVectors,
  createChatProvider,
  loadCatalogSeed,
  loadConfig,
  loadEnvironment,
  logger,
  type MealcartConfig,
  type MealcartStore,
} from '@mealcart/core';
import { SERVER_INFO, createMcpServer } from './server.js';
import { SessionManager } from './sessionManager.js';

const log = logger.child({ component: 'main' });

async function openStore(config: MealcartConfig['store']): Promise<MealcartStore> {
  const seed = await loadCatalogSeed(path.resolve(config.seedPath));
  const store: MealcartStore =
    config.kind === 'memory'
      ? new InMemoryCatalogStore(seed)
      : new LanceDBCatalogStore(path.resolve(config.dbPath), { seed });
  await store.init();
  return store;
}

async function main(): Promise<void> {
  loadEnvironment();
  const config = loadConfig();

  const store = await openStore(config.store);
  const embeddings = await new EmbeddingProviderFactory(
    config.embedding,
    config.providerPolicy,
  ).createClient();

  for (const field of VECTOR_FIELDS) {
    const added = await backfillVectors(store, embeddings, field);
    if (added > 0) {
      log.info({ field, added }, 'Backfilled vectors');
    }
  }

  const indexes = new CatalogIndexes(store, embeddings);
  await indexes.refreshAll();

  const chat = createChatProvider(config.chat, config.providerPolicy);
  const sessions = new SessionManager({
    store,
    indexes,
    chat,
    settings: config.session,
  });
  const campaigns = new SaleCampaignManager(store, indexes);

  const server = createMcpServer({ store, indexes, sessions, campaigns });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(
    { version: SERVER_INFO.version, chat: config.chat.model, embeddings: embeddings.getModel() },
    'mealcart MCP server started',
  );

  const shutdown = async (): Promise<void> => {
    await server.close();
    await store.close();
  };
  process.once('SIGINT', () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      },
    );
  });
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'mealcart MCP server failed to start');
  process.exitCode = 1;
});
