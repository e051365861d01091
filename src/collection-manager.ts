/**
 * NotionRAG: Collection Manager
 *
 * Owns the data directory layout, opens named vector collections and tracks
 * which one is active for sync and retrieval calls that name none.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import type { NotionRagConfig, NotionRagConfigOverrides } from "./types.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { JsonlVectorCollection } from "./vector-store.js";
import { CollectionNameSchema } from "./schemas.js";
import { CollectionNotFoundError } from "./errors.js";
import { ensureDir, listDirs, pathExists } from "./utils.js";

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: NotionRagConfig = {
  version: "0.1.0",

  storage: {
    data_dir: "./data",
    collections_dir: "collections",
    logs_dir: "logs",
    default_collection: "notion_docs",
  },

  notion: {
    api_base_url: "https://api.notion.com/v1",
    api_version: "2022-06-28",
    requests_per_second: 3,
    timeout_ms: 30000,
    max_retries: 3,
    page_size: 100,
  },

  store: {
    add_batch_size: 20,
    update_batch_size: 20,
    delete_batch_size: 100,
    continue_on_error: true,
  },

  embedding: {
    provider: "openai",
    model: "text-embedding-3-small",
    api_key_env: "OPENAI_API_KEY",
    batch_size: 50,
    timeout_ms: 30000,
  },
};

export function mergeConfig(overrides: NotionRagConfigOverrides = {}): NotionRagConfig {
  return {
    version: DEFAULT_CONFIG.version,
    storage: { ...DEFAULT_CONFIG.storage, ...overrides.storage },
    notion: { ...DEFAULT_CONFIG.notion, ...overrides.notion },
    store: { ...DEFAULT_CONFIG.store, ...overrides.store },
    embedding: { ...DEFAULT_CONFIG.embedding, ...overrides.embedding },
  };
}

// ============================================================================
// Collection Manager Class
// ============================================================================

export class CollectionManager {
  private config: NotionRagConfig;
  private embedder: EmbeddingProvider;
  private open = new Map<string, JsonlVectorCollection>();
  private activeName: string;

  constructor(embedder: EmbeddingProvider, config?: NotionRagConfigOverrides) {
    this.config = mergeConfig(config);
    this.embedder = embedder;
    this.activeName = CollectionNameSchema.parse(this.config.storage.default_collection);
  }

  // --------------------------------------------------------------------------
  // Collections
  // --------------------------------------------------------------------------

  /**
   * Open (creating on first use) a named collection
   */
  async openCollection(name: string): Promise<JsonlVectorCollection> {
    const valid = CollectionNameSchema.parse(name);
    const cached = this.open.get(valid);
    if (cached) return cached;

    const collection = new JsonlVectorCollection(this.getCollectionsDir(), valid, this.embedder);
    await collection.init();
    this.open.set(valid, collection);
    return collection;
  }

  /**
   * Open an existing collection; never creates one
   */
  async getExisting(name: string): Promise<JsonlVectorCollection> {
    const valid = CollectionNameSchema.parse(name);
    if (!this.open.has(valid) && !await this.exists(valid)) {
      throw new CollectionNotFoundError(valid);
    }
    return this.openCollection(valid);
  }

  async exists(name: string): Promise<boolean> {
    return pathExists(path.join(this.getCollectionsDir(), name, "collection.json"));
  }

  /**
   * List collections on disk (sorted)
   */
  async listCollections(): Promise<string[]> {
    const dir = this.getCollectionsDir();
    if (!await pathExists(dir)) return [];

    const names: string[] = [];
    for (const name of await listDirs(dir)) {
      if (await pathExists(path.join(dir, name, "collection.json"))) {
        names.push(name);
      }
    }
    return names;
  }

  /**
   * Resolve an explicit collection name, or fall back to the active one
   */
  async resolve(name?: string): Promise<JsonlVectorCollection> {
    return this.openCollection(name ?? this.activeName);
  }

  getActiveName(): string {
    return this.activeName;
  }

  /**
   * Switch the active collection. Unknown names are rejected.
   */
  async setActive(name: string): Promise<string> {
    const valid = CollectionNameSchema.parse(name);
    if (!this.open.has(valid) && !await this.exists(valid)) {
      throw new CollectionNotFoundError(valid);
    }
    this.activeName = valid;
    return valid;
  }

  /**
   * Remove every entry from a collection, keeping the collection itself
   */
  async clear(name: string): Promise<number> {
    const collection = await this.getExisting(name);
    const removed = await collection.count();
    await collection.clear();
    return removed;
  }

  // --------------------------------------------------------------------------
  // Path Helpers
  // --------------------------------------------------------------------------

  getDataDir(): string {
    return this.config.storage.data_dir;
  }

  getCollectionsDir(): string {
    return path.join(this.config.storage.data_dir, this.config.storage.collections_dir);
  }

  getLogsDir(): string {
    return path.join(this.config.storage.data_dir, this.config.storage.logs_dir);
  }

  async ensureLayout(): Promise<void> {
    await ensureDir(this.getCollectionsDir());
    await ensureDir(this.getLogsDir());
  }

  // --------------------------------------------------------------------------
  // Configuration Access
  // --------------------------------------------------------------------------

  getConfig(): NotionRagConfig {
    return this.config;
  }

  getEmbedder(): EmbeddingProvider {
    return this.embedder;
  }
}
