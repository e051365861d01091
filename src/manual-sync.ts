#!/usr/bin/env node
/**
 * NotionRAG: Manual Sync
 *
 * One-shot sync from the command line:
 *   notion-rag-manual-sync --resource <id> [--collection <name>] [--test] [--max-pages <n>]
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import "dotenv/config";
import { USAGE, parseCliArgs, type ManualSyncArgs } from "./manual-sync-args.js";
import { loadEnvConfig } from "./env-config.js";
import { bootstrap } from "./bootstrap.js";
import { notionSync } from "./tools/sync.js";
import { formatErrorResponse, isToolError, toToolError } from "./utils.js";

async function main(): Promise<number> {
  let parsed: ManualSyncArgs;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(formatErrorResponse(toToolError(err, "INVALID_INPUT")).content[0].text);
    console.error(USAGE);
    return 1;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  await bootstrap(loadEnvConfig());
  const result = await notionSync(parsed.input);

  if (isToolError(result)) {
    console.error(formatErrorResponse(result).content[0].text);
    return 1;
  }

  console.log(JSON.stringify(result, null, 2));
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
