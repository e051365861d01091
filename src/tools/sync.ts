/**
 * NotionRAG: Sync Tools (Phase 3)
 *
 * Executes a reconciliation plan through the store adapter, and drives a
 * full resource sync: validate, fetch, normalize, reconcile.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { SourceDocument, SyncResult, ToolError } from "../types.js";
import type { SyncInput } from "../schemas.js";
import { InvalidResourceError } from "../errors.js";
import { StoreAdapter } from "./index.js";
import { fetchResourcePages, type RemoteSource } from "./connect.js";
import { buildUnits, normalizePage } from "./normalize.js";
import { indexExisting, planSync, protectCurrentDocuments } from "./reconcile.js";
import { getRuntime } from "../runtime.js";
import {
  EventLogger,
  createToolError,
  generateRunId,
  now,
  timed,
  toToolError,
  truncatePreview,
} from "../utils.js";

// ============================================================================
// Reconcile Documents
// ============================================================================

export interface ReconcileOptions {
  resourceIds: string[];
  chunkSize: number;
  allowDeletes?: boolean;
  /** Ids of fetched pages that failed to normalize; their stored entries are kept */
  retainIds?: string[];
  logger?: EventLogger;
  now?: () => string;
}

/**
 * Remove the units a partial write left behind, so the document is absent
 * rather than stored as current with units missing. The next sync adds it.
 */
async function rollbackPartialWrite(
  adapter: StoreAdapter,
  documentId: string,
  storedIds: string[],
  logger: EventLogger
): Promise<void> {
  if (storedIds.length === 0) return;
  const removal = await adapter.delete(storedIds);
  if (removal.failed.length > 0) {
    await logger.error("sync", `Could not roll back partial write of ${documentId}`, { failed: removal.failed });
  }
}

/**
 * Bring the collection in line with documents. Counts are logical documents
 * whose units all reached the store; a partial write is rolled back and
 * skipped. An unreachable store propagates.
 */
export async function reconcileDocuments(
  adapter: StoreAdapter,
  documents: SourceDocument[],
  options: ReconcileOptions
): Promise<SyncResult> {
  const logger = options.logger ?? new EventLogger({ echo: false });
  const result: SyncResult = { added: 0, updated: 0, deleted: 0, total: documents.length, skipped: 0 };

  if (documents.length === 0) {
    await logger.warn("sync", "No valid documents found to sync");
    return result;
  }

  const existing = indexExisting(await adapter.readAll());
  const draft = planSync(documents, existing, {
    resourceIds: options.resourceIds,
    allowDeletes: options.allowDeletes,
    retainIds: options.retainIds,
  });

  for (const dropped of draft.dropped) {
    if (dropped.reason === "duplicate") {
      await logger.warn("sync", `Duplicate document id ${dropped.documentId}, keeping the first`);
    } else {
      await logger.error("sync", `Invariant violation: document ${dropped.documentId} dropped`, {
        detail: dropped.detail,
      });
    }
  }
  result.skipped += draft.dropped.length;

  const { plan, violations } = protectCurrentDocuments(draft, [
    ...documents.map(d => d.id),
    ...options.retainIds ?? [],
  ]);
  for (const violation of violations) {
    await logger.error("sync", `Invariant violation: ${violation} removed from plan`);
  }

  await logger.info("sync", "Sync plan ready", {
    add: plan.adds.length,
    update: plan.updates.length,
    unchanged: plan.noops.length,
    delete: plan.deletions.length,
  });

  const syncedAt = (options.now ?? now)();

  // Orphans
  if (plan.deletions.length > 0) {
    const outcome = await adapter.delete(plan.deletions.flatMap(d => d.ids));
    const removed = new Set(outcome.deleted);
    for (const deletion of plan.deletions) {
      if (deletion.ids.every(id => removed.has(id))) {
        result.deleted++;
        await logger.info("sync", `Deleted document ${deletion.documentId}`, { units: deletion.ids.length });
      } else {
        await logger.error("sync", `Failed to delete every unit of ${deletion.documentId}`);
      }
    }
  }

  // Updates: stale units go before the new ones are written
  for (const { document, staleIds } of plan.updates) {
    const units = buildUnits(document, options.chunkSize, syncedAt);
    const whole = units.length === 1 && units[0].id === document.id;
    const toDelete = whole ? staleIds.filter(id => id !== document.id) : staleIds;

    if (toDelete.length > 0) {
      const removal = await adapter.delete(toDelete);
      if (removal.failed.length > 0) {
        await logger.error("sync", `Could not remove stale units of ${document.id}, update skipped`, {
          failed: removal.failed,
        });
        result.skipped++;
        continue;
      }
    }

    const ids = units.map(u => u.id);
    const texts = units.map(u => u.text);
    const metadatas = units.map(u => u.metadata);
    const outcome = whole
      ? await adapter.update(ids, texts, metadatas)
      : await adapter.add(ids, texts, metadatas);

    if (outcome.dropped.length === 0) {
      result.updated++;
    } else {
      result.skipped++;
      await logger.error("sync", `Update of ${document.id} dropped ${outcome.dropped.length} units, rolling back`);
      await rollbackPartialWrite(adapter, document.id, outcome.written.map(w => w.stored_id), logger);
    }
  }

  // Additions
  if (plan.adds.length > 0) {
    const owners = new Map<string, string>();
    const ids: string[] = [];
    const texts: string[] = [];
    const metadatas: Array<Record<string, unknown>> = [];
    for (const document of plan.adds) {
      for (const unit of buildUnits(document, options.chunkSize, syncedAt)) {
        owners.set(unit.id, document.id);
        ids.push(unit.id);
        texts.push(unit.text);
        metadatas.push(unit.metadata);
      }
    }

    const outcome = await adapter.add(ids, texts, metadatas);
    const incomplete = new Set(outcome.dropped.map(id => owners.get(id)));

    for (const document of plan.adds) {
      if (!incomplete.has(document.id)) {
        result.added++;
        continue;
      }
      result.skipped++;
      await logger.error("sync", `Failed to add every unit of ${document.id}, rolling back`);
      const storedIds = outcome.written.filter(w => owners.get(w.id) === document.id).map(w => w.stored_id);
      await rollbackPartialWrite(adapter, document.id, storedIds, logger);
    }
  }

  await logger.info("sync", `Sync complete: ${result.added} added, ${result.updated} updated, ${result.deleted} deleted`);
  return result;
}

// ============================================================================
// Sync Resource
// ============================================================================

export type ProgressCallback = (message: string) => void | Promise<void>;

export interface SyncResourceOptions {
  chunkSize: number;
  testMode?: boolean;
  maxPages?: number;
  logger?: EventLogger;
  onProgress?: ProgressCallback;
}

export async function syncResource(
  source: RemoteSource,
  adapter: StoreAdapter,
  resourceId: string,
  options: SyncResourceOptions
): Promise<SyncResult> {
  if (!resourceId.trim()) {
    throw new InvalidResourceError(resourceId, "a resource id is required");
  }

  const runId = generateRunId();
  const logger = (options.logger ?? new EventLogger({ echo: false })).child(runId);

  const progress = async (message: string) => {
    if (!options.onProgress) return;
    try {
      await options.onProgress(message);
    } catch (err) {
      await logger.error("sync", "Error in progress callback", { error: truncatePreview(err) });
    }
  };

  try {
    await progress(`Starting sync from ${resourceId}...`);
    const fetched = await fetchResourcePages(source, resourceId, {
      maxPages: options.testMode ? options.maxPages ?? 2 : undefined,
      logger,
    });
    await logger.info("sync", `Fetched ${fetched.pages.length} pages`, {
      resource_id: resourceId,
      resource_type: fetched.resourceType,
      test_mode: options.testMode ?? false,
    });
    await progress(
      `Resource type: ${fetched.resourceType}\n` +
      `Pages found: ${fetched.pages.length}\n` +
      "Syncing..."
    );

    const documents: SourceDocument[] = [];
    const failedIds: string[] = [];
    let skipped = 0;

    for (const [i, item] of fetched.pages.entries()) {
      try {
        const fragments = item.fragments ?? await source.getFragments(item.page.id);
        const { document, skipped: fragmentsSkipped } = normalizePage(item.page, fragments, resourceId, {
          parentPageId: item.parentPageId,
          fallbackTitle: item.fallbackTitle,
        });

        for (const fragment of fragmentsSkipped) {
          await logger.debug("normalize", `Skipped ${fragment.reason} fragment ${fragment.type}`, {
            page_id: item.page.id,
            fragment_id: fragment.id,
            error: fragment.error,
          });
        }

        if (document) {
          documents.push(document);
        } else {
          skipped++;
          await logger.warn("sync", `Empty content for page ${item.page.id}, skipping`);
        }
      } catch (err) {
        skipped++;
        failedIds.push(item.page.id);
        await logger.error("sync", `Error processing page ${item.page.id}`, { error: truncatePreview(err) });
      }

      if ((i + 1) % 10 === 0) {
        await progress(`Processed ${i + 1}/${fetched.pages.length} pages...`);
      }
    }

    const result = await reconcileDocuments(adapter, documents, {
      resourceIds: [resourceId],
      chunkSize: options.chunkSize,
      allowDeletes: !options.testMode,
      retainIds: failedIds,
      logger,
    });

    return { ...result, total: fetched.pages.length, skipped: result.skipped + skipped, run_id: runId };
  } catch (err) {
    await logger.error("sync", "Error syncing Notion content", { error: truncatePreview(err) });
    throw err;
  }
}

// ============================================================================
// Sync Tool
// ============================================================================

export interface SyncToolResult {
  success: boolean;
  collection: string;
  resource_id: string;
  result: SyncResult;
  duration_ms: number;
}

export async function notionSync(input: SyncInput): Promise<SyncToolResult | ToolError> {
  const { manager, settings, source, logger, defaultResourceId } = getRuntime();
  const resourceId = input.resource_id ?? defaultResourceId;

  if (!resourceId) {
    return createToolError("INVALID_RESOURCE", "No resource_id given and NOTION_RESOURCE_ID is not set", {
      suggestion: "Pass resource_id or set NOTION_RESOURCE_ID",
    });
  }

  try {
    const collection = await manager.resolve(input.collection);
    const config = manager.getConfig();
    const adapter = new StoreAdapter(collection, {
      addBatchSize: config.store.add_batch_size,
      updateBatchSize: config.store.update_batch_size,
      deleteBatchSize: config.store.delete_batch_size,
      continueOnError: config.store.continue_on_error,
      logger,
    });

    const { result, duration_ms } = await timed(async () =>
      syncResource(source, adapter, resourceId, {
        chunkSize: await settings.get("chunk_size"),
        testMode: input.test_mode,
        maxPages: input.max_pages,
        logger,
      })
    );

    return {
      success: true,
      collection: collection.name,
      resource_id: resourceId,
      result,
      duration_ms,
    };
  } catch (err) {
    return toToolError(err, "SYNC_FAILED");
  }
}
