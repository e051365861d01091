/**
 * NotionRAG: Index Tools (Phase 4)
 *
 * Store adapter: executes the writes a sync plan asks for against a vector
 * collection. Sub-batched, with per-item fallback on id collisions and
 * batch-level failure tolerance. It never decides what to write.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type {
  IndexEntry,
  RawMetadata,
  StorageUnit,
  StoredMetadata,
  StoreWriteOutcome,
} from "../types.js";
import type { VectorCollection } from "../vector-store.js";
import { InvariantError, StoreError, isStoreUnavailable } from "../errors.js";
import { EventLogger, processInBatches, truncatePreview } from "../utils.js";

// ============================================================================
// Metadata Cleaning
// ============================================================================

/**
 * Reduce metadata to the scalar values the collection accepts
 *
 * @example
 * cleanMetadata({ tags: ["a", "b"], parent_page_id: null })
 * // { tags: "a, b", parent_page_id: "" }
 */
export function cleanMetadata(metadata: RawMetadata): StoredMetadata {
  const cleaned: StoredMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    cleaned[key] = cleanValue(value);
  }
  return cleaned;
}

function cleanValue(value: unknown): string | number | boolean {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map(v => String(v)).join(", ");
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

// ============================================================================
// Store Adapter
// ============================================================================

export interface StoreAdapterOptions {
  addBatchSize?: number;
  updateBatchSize?: number;
  deleteBatchSize?: number;
  continueOnError?: boolean;
  logger?: EventLogger;
  /** Unix seconds for collision fallback ids */
  clockSeconds?: () => number;
}

export interface DeleteOutcome {
  deleted: string[];
  failed: string[];
}

export class StoreAdapter {
  readonly collection: VectorCollection;
  private addBatchSize: number;
  private updateBatchSize: number;
  private deleteBatchSize: number;
  private continueOnError: boolean;
  private logger: EventLogger;
  private clockSeconds: () => number;

  constructor(collection: VectorCollection, options: StoreAdapterOptions = {}) {
    this.collection = collection;
    this.addBatchSize = options.addBatchSize ?? 20;
    this.updateBatchSize = options.updateBatchSize ?? 20;
    this.deleteBatchSize = options.deleteBatchSize ?? 100;
    this.continueOnError = options.continueOnError ?? true;
    this.logger = options.logger ?? new EventLogger({ echo: false });
    this.clockSeconds = options.clockSeconds ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * Every persisted entry. Any failure means the store is unreachable.
   */
  async readAll(): Promise<IndexEntry[]> {
    try {
      return await this.collection.get();
    } catch (err) {
      if (isStoreUnavailable(err)) throw err;
      throw new StoreError("STORE_UNAVAILABLE", `Cannot read collection ${this.collection.name}: ${truncatePreview(err)}`, [], {
        cause: err,
      });
    }
  }

  async add(ids: string[], texts: string[], metadatas: RawMetadata[]): Promise<StoreWriteOutcome> {
    const units = this.zip(ids, texts, metadatas);
    const outcome: StoreWriteOutcome = { written: [], dropped: [] };

    await processInBatches(units, async batch => {
      try {
        await this.collection.add(batch);
        outcome.written.push(...batch.map(u => ({ id: u.id, stored_id: u.id })));
      } catch (err) {
        if (!(err instanceof StoreError && err.code === "ID_EXISTS")) throw err;
        await this.logger.warn("store", `Some ids already exist, adding ${batch.length} items one by one`);
        for (const unit of batch) {
          await this.addOne(unit, outcome);
        }
      }
    }, {
      batchSize: this.addBatchSize,
      description: "additions",
      logger: this.logger,
      continueOnError: this.continueOnError,
      isFatal: isStoreUnavailable,
      onFailure: batch => outcome.dropped.push(...batch.map(u => u.id)),
    });

    return outcome;
  }

  /**
   * Update in place; items missing from the store are added instead
   */
  async update(ids: string[], texts: string[], metadatas: RawMetadata[]): Promise<StoreWriteOutcome> {
    const units = this.zip(ids, texts, metadatas);
    const outcome: StoreWriteOutcome = { written: [], dropped: [] };

    await processInBatches(units, async batch => {
      try {
        await this.collection.update(batch);
        outcome.written.push(...batch.map(u => ({ id: u.id, stored_id: u.id })));
      } catch (err) {
        if (!(err instanceof StoreError && err.code === "NOT_FOUND")) throw err;
        for (const unit of batch) {
          try {
            await this.collection.update([unit]);
            outcome.written.push({ id: unit.id, stored_id: unit.id });
          } catch (itemErr) {
            if (!(itemErr instanceof StoreError && itemErr.code === "NOT_FOUND")) throw itemErr;
            await this.logger.debug("store", `Document ${unit.id} not found for update, adding as new`);
            await this.addOne(unit, outcome);
          }
        }
      }
    }, {
      batchSize: this.updateBatchSize,
      description: "updates",
      logger: this.logger,
      continueOnError: this.continueOnError,
      isFatal: isStoreUnavailable,
      onFailure: batch => outcome.dropped.push(...batch.map(u => u.id)),
    });

    return outcome;
  }

  async delete(ids: string[]): Promise<DeleteOutcome> {
    const outcome: DeleteOutcome = { deleted: [], failed: [] };

    await processInBatches(ids, batch => this.collection.delete(batch), {
      batchSize: this.deleteBatchSize,
      description: "deletions",
      logger: this.logger,
      continueOnError: this.continueOnError,
      isFatal: isStoreUnavailable,
      onSuccess: batch => outcome.deleted.push(...batch),
      onFailure: batch => outcome.failed.push(...batch),
    });

    return outcome;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Add one unit; on an id collision retry once under "{id}_{unix seconds}"
   */
  private async addOne(unit: StorageUnit, outcome: StoreWriteOutcome): Promise<void> {
    try {
      await this.collection.add([unit]);
      outcome.written.push({ id: unit.id, stored_id: unit.id });
      return;
    } catch (err) {
      if (isStoreUnavailable(err)) throw err;
      if (!(err instanceof StoreError && err.code === "ID_EXISTS")) {
        await this.logger.error("store", `Failed to add ${unit.id}`, { error: truncatePreview(err) });
        outcome.dropped.push(unit.id);
        return;
      }
    }

    const alternateId = `${unit.id}_${this.clockSeconds()}`;
    try {
      await this.collection.add([{ ...unit, id: alternateId }]);
      outcome.written.push({ id: unit.id, stored_id: alternateId });
      await this.logger.warn("store", `Stored ${unit.id} under alternate id ${alternateId}`);
    } catch (err) {
      if (isStoreUnavailable(err)) throw err;
      await this.logger.error("store", `Failed to add ${unit.id} with alternate id`, { error: truncatePreview(err) });
      outcome.dropped.push(unit.id);
    }
  }

  private zip(ids: string[], texts: string[], metadatas: RawMetadata[]): StorageUnit[] {
    if (ids.length !== texts.length || ids.length !== metadatas.length) {
      throw new InvariantError("ids, texts and metadatas must have the same length", {
        ids: ids.length,
        texts: texts.length,
        metadatas: metadatas.length,
      });
    }
    return ids.map((id, i) => ({ id, text: texts[i], metadata: cleanMetadata(metadatas[i]) }));
  }
}
