#!/usr/bin/env node
/**
 * NotionRAG: Main Server Entry Point
 *
 * Mirrors Notion databases and page trees into persisted vector collections
 * and serves conversational retrieval over them.
 * Pipeline: Connect → Normalize → Chunk → Reconcile → Index, then Serve.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 *
 * This source code is the property of vario.automation and is protected
 * by trade secret and copyright law. Unauthorized copying, modification,
 * distribution, or use of this software is strictly prohibited.
 */

import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import { notionSync } from "./tools/sync.js";
import { createHttpApp, notionGetContext } from "./tools/serve.js";
import {
  collectionClear,
  collectionList,
  collectionSet,
  collectionStatus,
  settingsGet,
  settingsReset,
  settingsSet,
} from "./tools/utilities.js";
import {
  CollectionClearInputSchema,
  CollectionListInputSchema,
  CollectionSetInputSchema,
  CollectionStatusInputSchema,
  GetContextInputSchema,
  SettingsGetInputSchema,
  SettingsResetInputSchema,
  SettingsSetInputSchema,
  SyncInputSchema,
} from "./schemas.js";
import { loadEnvConfig, type EnvConfig } from "./env-config.js";
import { bootstrap } from "./bootstrap.js";
import { ConfigError } from "./errors.js";
import { formatErrorResponse, isToolError } from "./utils.js";

const SERVER_NAME = "notion-rag-sync";
const SERVER_VERSION = "0.1.0";

// Initialize the MCP server
const server = new McpServer({
  name: SERVER_NAME,
  version: SERVER_VERSION,
});

function respond(result: unknown) {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

// ============================================================================
// SYNC TOOLS
// ============================================================================

server.tool(
  "notionrag_sync",
  `Sync a Notion database or page tree into a vector collection.

Detects whether resource_id is a database or a page, fetches every page
(following subpages and inline databases), chunks long pages and reconciles
against the collection: new pages are added, pages edited since the last
sync are replaced, pages gone from the source are deleted.

test_mode syncs only the first max_pages pages and never deletes.
Returns counts of logical documents: added, updated, deleted, skipped.`,
  SyncInputSchema.shape,
  async (args) => respond(await notionSync(args))
);

// ============================================================================
// RETRIEVAL TOOLS
// ============================================================================

server.tool(
  "notionrag_get_context",
  `Build the retrieval context for a question.

Retrieves the closest entries for the query; when history is given, also
retrieves for the conversation, merges both lists (direct hits ranked
ahead) and formats them as "Title / URL / Content" blocks.

With conversational=true, history turns unrelated to the query are dropped
first and the context is capped at the max_content_chars setting.`,
  GetContextInputSchema.shape,
  async (args) => respond(await notionGetContext(args))
);

// ============================================================================
// COLLECTION TOOLS
// ============================================================================

server.tool(
  "notionrag_collection_list",
  "List vector collections on disk and the active one.",
  CollectionListInputSchema.shape,
  async (args) => respond(await collectionList(args))
);

server.tool(
  "notionrag_collection_set",
  "Switch the active collection used when a tool call names none. The collection must exist.",
  CollectionSetInputSchema.shape,
  async (args) => respond(await collectionSet(args))
);

server.tool(
  "notionrag_collection_status",
  "Entry count, logical document count and manifest of a collection, with an optional peek at its first entries.",
  CollectionStatusInputSchema.shape,
  async (args) => respond(await collectionStatus(args))
);

server.tool(
  "notionrag_collection_clear",
  "Remove every entry from a collection. Requires confirm=true.",
  CollectionClearInputSchema.shape,
  async (args) => respond(await collectionClear(args))
);

// ============================================================================
// SETTINGS TOOLS
// ============================================================================

server.tool(
  "notionrag_settings_get",
  "Read one runtime setting, or all of them when no key is given.",
  SettingsGetInputSchema.shape,
  async (args) => respond(await settingsGet(args))
);

server.tool(
  "notionrag_settings_set",
  `Update a runtime setting. The value is coerced to the setting's type.

Keys: welcome_message, system_prompt, similarity_threshold, max_history,
chunk_size (capped at 6000), message_history_limit, max_content_chars,
max_tokens, num_retrieved_results, llm_model, embedding_model.`,
  SettingsSetInputSchema.shape,
  async (args) => respond(await settingsSet(args))
);

server.tool(
  "notionrag_settings_reset",
  "Reset one setting, or every setting when no key is given, to its default.",
  SettingsResetInputSchema.shape,
  async (args) => respond(await settingsReset(args))
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function runStdio(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

async function runHTTP(port: number): Promise<void> {
  const app = createHttpApp({ name: SERVER_NAME, version: SERVER_VERSION });

  // MCP endpoint
  app.post("/mcp", async (req, res) => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      transport.close().catch(err => console.error("Transport close failed:", err));
    });
    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("MCP request failed:", err);
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  app.listen(port, () => {
    console.error(`${SERVER_NAME} v${SERVER_VERSION} running on http://localhost:${port}/mcp`);
  });
}

async function main() {
  let env: EnvConfig;
  try {
    env = loadEnvConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const runtime = await bootstrap(env);
  await runtime.logger.info("server", "Server starting", {
    transport: env.transport,
    data_dir: runtime.manager.getDataDir(),
    collection: runtime.manager.getActiveName(),
    embedding_model: runtime.manager.getEmbedder().model,
  });

  if (env.transport === "http") {
    await runHTTP(env.port);
  } else {
    await runStdio();
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
