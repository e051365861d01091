/**
 * NotionRAG: Utility Tools
 *
 * Collection management and runtime settings.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { CollectionManifest, IndexEntry, ToolError } from "../types.js";
import type {
  CollectionClearInput,
  CollectionListInput,
  CollectionSetInput,
  CollectionStatusInput,
  SettingsGetInput,
  SettingsResetInput,
  SettingsSetInput,
} from "../schemas.js";
import type { Settings } from "../settings-store.js";
import { getRuntime } from "../runtime.js";
import { createToolError, toToolError } from "../utils.js";

// ============================================================================
// Collection List
// ============================================================================

export interface CollectionListResult {
  active: string;
  collections: string[];
}

export async function collectionList(_input: CollectionListInput): Promise<CollectionListResult | ToolError> {
  const { manager } = getRuntime();

  try {
    return {
      active: manager.getActiveName(),
      collections: await manager.listCollections(),
    };
  } catch (err) {
    return toToolError(err, "STORE_UNAVAILABLE");
  }
}

// ============================================================================
// Collection Set
// ============================================================================

export interface CollectionSetResult {
  previous: string;
  active: string;
}

export async function collectionSet(input: CollectionSetInput): Promise<CollectionSetResult | ToolError> {
  const { manager, logger } = getRuntime();
  const previous = manager.getActiveName();

  try {
    const active = await manager.setActive(input.collection);
    await logger.info("collections", `Active collection set to ${active}`, { previous });
    return { previous, active };
  } catch (err) {
    return toToolError(err, "COLLECTION_NOT_FOUND");
  }
}

// ============================================================================
// Collection Status
// ============================================================================

export interface CollectionStatusResult {
  collection: string;
  active: boolean;
  count: number;
  manifest: CollectionManifest;
  documents: number;
  peek: Array<Pick<IndexEntry, "id" | "text" | "metadata">>;
}

export async function collectionStatus(input: CollectionStatusInput): Promise<CollectionStatusResult | ToolError> {
  const { manager } = getRuntime();
  const name = input.collection ?? manager.getActiveName();

  try {
    const collection = await manager.getExisting(name);
    const entries = await collection.get();
    const documents = new Set(entries.map(e => {
      const parent = e.metadata["parent_id"];
      return typeof parent === "string" && parent !== "" ? parent : e.id;
    }));
    const peek = input.peek > 0 ? await collection.peek(input.peek) : [];

    return {
      collection: collection.name,
      active: collection.name === manager.getActiveName(),
      count: entries.length,
      manifest: await collection.getManifest(),
      documents: documents.size,
      peek: peek.map(e => ({ id: e.id, text: e.text, metadata: e.metadata })),
    };
  } catch (err) {
    return toToolError(err, "STORE_UNAVAILABLE");
  }
}

// ============================================================================
// Collection Clear
// ============================================================================

export interface CollectionClearResult {
  collection: string;
  removed: number;
}

export async function collectionClear(input: CollectionClearInput): Promise<CollectionClearResult | ToolError> {
  const { manager, logger } = getRuntime();

  if (!input.confirm) {
    return createToolError("NOT_CONFIRMED", `Clearing ${input.collection} removes every entry`, {
      suggestion: "Call again with confirm=true",
      recoverable: true,
    });
  }

  try {
    const removed = await manager.clear(input.collection);
    await logger.warn("collections", `Cleared collection ${input.collection}`, { removed });
    return { collection: input.collection, removed };
  } catch (err) {
    return toToolError(err, "STORE_UNAVAILABLE");
  }
}

// ============================================================================
// Settings
// ============================================================================

export interface SettingsGetResult {
  settings: Record<string, Settings[keyof Settings]>;
}

export async function settingsGet(input: SettingsGetInput): Promise<SettingsGetResult | ToolError> {
  const { settings } = getRuntime();

  try {
    const all: Record<string, Settings[keyof Settings]> = { ...await settings.getAll() };
    if (input.key === undefined) {
      return { settings: all };
    }
    const key = input.key;
    const entry = Object.entries(all).find(([k]) => k === key);
    if (!entry) {
      return createToolError("INVALID_INPUT", `Invalid configuration key: ${key}`, {
        suggestion: `Known keys: ${Object.keys(all).join(", ")}`,
      });
    }
    return { settings: { [entry[0]]: entry[1] } };
  } catch (err) {
    return toToolError(err, "SETTINGS_FAILED");
  }
}

export interface SettingsSetResult {
  key: string;
  value: Settings[keyof Settings];
}

export async function settingsSet(input: SettingsSetInput): Promise<SettingsSetResult | ToolError> {
  const { settings } = getRuntime();

  try {
    const value = await settings.set(input.key, input.value);
    return { key: input.key, value };
  } catch (err) {
    return toToolError(err, "SETTINGS_FAILED");
  }
}

export interface SettingsResetResult {
  reset: string;
  settings: Settings;
}

export async function settingsReset(input: SettingsResetInput): Promise<SettingsResetResult | ToolError> {
  const { settings } = getRuntime();

  try {
    await settings.reset(input.key);
    return { reset: input.key ?? "all", settings: await settings.getAll() };
  } catch (err) {
    return toToolError(err, "SETTINGS_FAILED");
  }
}
