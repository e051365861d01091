/**
 * NotionRAG: Manual Sync Arguments
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { parseArgs } from "node:util";
import { SyncInputSchema, type SyncInput } from "./schemas.js";

export const USAGE = `Usage: notion-rag-manual-sync [options]

  --resource <id>      Notion database or page id (default: NOTION_RESOURCE_ID)
  --collection <name>  Target collection (default: COLLECTION_NAME)
  --test               Sync only the first pages and skip deletions
  --max-pages <n>      Page limit; implies --test (default in test mode: 2)
  -h, --help           Show this message`;

export interface ManualSyncArgs {
  help: boolean;
  input: SyncInput;
}

export function parseCliArgs(argv: string[]): ManualSyncArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      resource: { type: "string" },
      collection: { type: "string" },
      test: { type: "boolean", default: false },
      "max-pages": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  const maxPages = values["max-pages"];

  return {
    help: values.help ?? false,
    input: SyncInputSchema.parse({
      resource_id: values.resource,
      collection: values.collection,
      // A page limit only applies to a partial sync
      test_mode: (values.test ?? false) || maxPages !== undefined,
      max_pages: maxPages === undefined ? undefined : Number(maxPages),
    }),
  };
}
