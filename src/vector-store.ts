/**
 * NotionRAG: Persisted Vector Collections
 *
 * A collection lives in <collections_dir>/<name>/ as:
 *   collection.json  - manifest (model, dimensions, distance)
 *   entries.jsonl    - one IndexEntry per line, insertion order
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import type {
  CollectionManifest,
  IndexEntry,
  QueryMatch,
  StorageUnit,
  WhereFilter,
} from "./types.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { StoreError } from "./errors.js";
import {
  cosineDistance,
  ensureDir,
  isMissingFileError,
  now,
  readJson,
  readJsonl,
  writeJson,
  writeJsonl,
} from "./utils.js";

// ============================================================================
// Collection Interface
// ============================================================================

export interface VectorCollection {
  readonly name: string;
  readonly embedder: EmbeddingProvider;

  /** All entries, or the ones matching ids (missing ids are omitted) */
  get(ids?: string[]): Promise<IndexEntry[]>;
  /** Rejects the whole batch with ID_EXISTS when any id is already stored */
  add(items: StorageUnit[]): Promise<void>;
  /** Rejects the whole batch with NOT_FOUND when any id is missing */
  update(items: StorageUnit[]): Promise<void>;
  /** Missing ids are ignored */
  delete(ids: string[]): Promise<void>;
  query(text: string, k: number, where?: WhereFilter): Promise<QueryMatch[]>;
  count(): Promise<number>;
  peek(n: number): Promise<IndexEntry[]>;
  clear(): Promise<void>;
}

export function matchesWhere(metadata: IndexEntry["metadata"], where?: WhereFilter): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => metadata[key] === value);
}

// ============================================================================
// JSONL-backed Collection
// ============================================================================

export class JsonlVectorCollection implements VectorCollection {
  readonly name: string;
  readonly embedder: EmbeddingProvider;
  private dir: string;
  private entries: Map<string, IndexEntry> | null = null;
  private manifest: CollectionManifest | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(collectionsDir: string, name: string, embedder: EmbeddingProvider) {
    this.name = name;
    this.embedder = embedder;
    this.dir = path.join(collectionsDir, name);
  }

  get entriesPath(): string {
    return path.join(this.dir, "entries.jsonl");
  }

  get manifestPath(): string {
    return path.join(this.dir, "collection.json");
  }

  /**
   * Create the collection on disk if needed. Fails when an existing
   * collection was built with a different embedding model.
   */
  async init(): Promise<CollectionManifest> {
    return this.exclusive(async () => {
      await this.load();
      return this.requireManifest();
    });
  }

  async getManifest(): Promise<CollectionManifest> {
    return this.init();
  }

  async get(ids?: string[]): Promise<IndexEntry[]> {
    const entries = await this.load();
    if (!ids) return [...entries.values()];
    return ids.flatMap(id => {
      const entry = entries.get(id);
      return entry ? [entry] : [];
    });
  }

  async add(items: StorageUnit[]): Promise<void> {
    if (items.length === 0) return;
    await this.exclusive(async () => {
      const entries = await this.load();
      const seen = new Set<string>();
      const conflicts: string[] = [];
      for (const item of items) {
        if (entries.has(item.id) || seen.has(item.id)) conflicts.push(item.id);
        seen.add(item.id);
      }
      if (conflicts.length > 0) {
        throw new StoreError("ID_EXISTS", `IDs already exist in ${this.name}: ${conflicts.join(", ")}`, conflicts);
      }

      const embeddings = await this.embedder.embed(items.map(i => i.text));
      items.forEach((item, idx) => {
        entries.set(item.id, { ...item, embedding: embeddings[idx] });
      });
      await this.persist(entries, embeddings[0]?.length);
    });
  }

  async update(items: StorageUnit[]): Promise<void> {
    if (items.length === 0) return;
    await this.exclusive(async () => {
      const entries = await this.load();
      const missing = items.filter(i => !entries.has(i.id)).map(i => i.id);
      if (missing.length > 0) {
        throw new StoreError("NOT_FOUND", `IDs not found in ${this.name}: ${missing.join(", ")}`, missing);
      }

      const embeddings = await this.embedder.embed(items.map(i => i.text));
      items.forEach((item, idx) => {
        entries.set(item.id, { ...item, embedding: embeddings[idx] });
      });
      await this.persist(entries, embeddings[0]?.length);
    });
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.exclusive(async () => {
      const entries = await this.load();
      let changed = false;
      for (const id of ids) {
        changed = entries.delete(id) || changed;
      }
      if (changed) await this.persist(entries);
    });
  }

  async query(text: string, k: number, where?: WhereFilter): Promise<QueryMatch[]> {
    const entries = await this.load();
    if (entries.size === 0 || k <= 0) return [];

    const [queryVector] = await this.embedder.embed([text]);
    const matches: QueryMatch[] = [];
    for (const entry of entries.values()) {
      if (!matchesWhere(entry.metadata, where)) continue;
      matches.push({
        id: entry.id,
        text: entry.text,
        metadata: entry.metadata,
        distance: cosineDistance(queryVector, entry.embedding),
      });
    }

    matches.sort((a, b) => a.distance - b.distance);
    return matches.slice(0, k);
  }

  async count(): Promise<number> {
    return (await this.load()).size;
  }

  async peek(n: number): Promise<IndexEntry[]> {
    return [...(await this.load()).values()].slice(0, n);
  }

  async clear(): Promise<void> {
    await this.exclusive(async () => {
      const entries = await this.load();
      entries.clear();
      await this.persist(entries);
    });
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private requireManifest(): CollectionManifest {
    if (!this.manifest) {
      throw new StoreError("STORE_UNAVAILABLE", `Collection ${this.name} is not loaded`);
    }
    return this.manifest;
  }

  private async load(): Promise<Map<string, IndexEntry>> {
    if (this.entries) return this.entries;

    try {
      await ensureDir(this.dir);

      let manifest: CollectionManifest;
      try {
        manifest = await readJson<CollectionManifest>(this.manifestPath);
      } catch (err) {
        if (!isMissingFileError(err)) throw err;
        const timestamp = now();
        manifest = {
          name: this.name,
          embedding_model: this.embedder.model,
          dimensions: 0,
          distance: "cosine",
          created_at: timestamp,
          updated_at: timestamp,
        };
        await writeJson(this.manifestPath, manifest);
      }

      if (manifest.embedding_model !== this.embedder.model) {
        throw new StoreError(
          "STORE_UNAVAILABLE",
          `Collection ${this.name} was built with ${manifest.embedding_model}, not ${this.embedder.model}`
        );
      }

      let records: IndexEntry[] = [];
      try {
        records = await readJsonl<IndexEntry>(this.entriesPath);
      } catch (err) {
        if (!isMissingFileError(err)) throw err;
      }

      this.manifest = manifest;
      this.entries = new Map(records.map(r => [r.id, r]));
      return this.entries;
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError("STORE_UNAVAILABLE", `Cannot open collection ${this.name}: ${err instanceof Error ? err.message : String(err)}`, [], { cause: err });
    }
  }

  private async persist(entries: Map<string, IndexEntry>, dimensions?: number): Promise<void> {
    const manifest = this.requireManifest();
    const updated: CollectionManifest = {
      ...manifest,
      dimensions: dimensions ?? manifest.dimensions,
      updated_at: now(),
    };

    try {
      await writeJsonl(this.entriesPath, [...entries.values()]);
      await writeJson(this.manifestPath, updated);
      this.manifest = updated;
    } catch (err) {
      // Drop the cache so the next call re-reads what actually reached disk
      this.entries = null;
      throw new StoreError("STORE_UNAVAILABLE", `Cannot write collection ${this.name}: ${err instanceof Error ? err.message : String(err)}`, [], { cause: err });
    }
  }
}
