/**
 * NotionRAG: Runtime Services
 *
 * Process-wide services the tool handlers share. Set once at startup.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { CollectionManager } from "./collection-manager.js";
import type { SettingsStore } from "./settings-store.js";
import type { RemoteSource } from "./tools/connect.js";
import type { EventLogger } from "./utils.js";

export interface Runtime {
  manager: CollectionManager;
  settings: SettingsStore;
  source: RemoteSource;
  logger: EventLogger;
  defaultResourceId?: string;
}

let current: Runtime | null = null;

export function initRuntime(runtime: Runtime): Runtime {
  current = runtime;
  return runtime;
}

export function getRuntime(): Runtime {
  if (!current) {
    throw new Error("Runtime not initialized. Call initRuntime first.");
  }
  return current;
}
