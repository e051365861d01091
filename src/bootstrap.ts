/**
 * NotionRAG: Runtime Bootstrap
 *
 * Wires environment configuration into the shared services used by the MCP
 * server and the manual sync CLI.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { EnvConfig } from "./env-config.js";
import { CollectionManager, mergeConfig } from "./collection-manager.js";
import { createEmbeddingProvider } from "./embeddings.js";
import { SlidingWindowRateLimiter } from "./rate-limiter.js";
import { initRuntime, type Runtime } from "./runtime.js";
import { SettingsStore } from "./settings-store.js";
import { NotionClient } from "./tools/connect.js";
import { EventLogger } from "./utils.js";

export async function bootstrap(env: EnvConfig): Promise<Runtime> {
  const config = mergeConfig(env.overrides);

  const embedder = createEmbeddingProvider({
    provider: config.embedding.provider,
    model: config.embedding.model,
    apiKey: env.openaiApiKey,
    dimensions: config.embedding.dimensions,
    batchSize: config.embedding.batch_size,
    timeoutMs: config.embedding.timeout_ms,
  });

  const manager = new CollectionManager(embedder, config);
  await manager.ensureLayout();

  const logger = new EventLogger({ logsDir: manager.getLogsDir(), level: env.logLevel });
  await logger.init();

  const source = new NotionClient({
    token: env.notionToken,
    baseUrl: config.notion.api_base_url,
    apiVersion: config.notion.api_version,
    timeoutMs: config.notion.timeout_ms,
    maxRetries: config.notion.max_retries,
    pageSize: config.notion.page_size,
    limiter: new SlidingWindowRateLimiter(config.notion.requests_per_second, 1000),
    logger,
  });

  return initRuntime({
    manager,
    settings: new SettingsStore(manager.getDataDir(), logger),
    source,
    logger,
    defaultResourceId: env.defaultResourceId,
  });
}
