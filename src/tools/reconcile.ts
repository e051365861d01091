/**
 * NotionRAG: Reconciliation Planning
 *
 * Pure functions that compare incoming documents with what the collection
 * already holds and decide, per logical document, whether to add, update,
 * leave alone or delete.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { IndexEntry, SourceDocument } from "../types.js";

// ============================================================================
// Reverse Index
// ============================================================================

export interface ExistingDocument {
  id: string;
  /** Entry stored whole under the document id, if any */
  wholeId?: string;
  /** Chunk entry ids, in chunk order */
  chunkIds: string[];
  resourceId?: string;
  lastModified?: string;
}

export interface ExistingIndex {
  documents: Map<string, ExistingDocument>;
  /** Chunk entry id → owning document id */
  chunkOwners: Map<string, string>;
}

function stringField(metadata: IndexEntry["metadata"], key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Group persisted entries by logical document (parent_id, else the entry id)
 */
export function indexExisting(entries: Array<Pick<IndexEntry, "id" | "metadata">>): ExistingIndex {
  const documents = new Map<string, ExistingDocument>();
  const chunkOwners = new Map<string, string>();
  const chunkOrder = new Map<string, number>();

  for (const entry of entries) {
    const parentId = stringField(entry.metadata, "parent_id");
    const docId = parentId ?? entry.id;

    let doc = documents.get(docId);
    if (!doc) {
      doc = { id: docId, chunkIds: [] };
      documents.set(docId, doc);
    }

    if (parentId) {
      doc.chunkIds.push(entry.id);
      chunkOwners.set(entry.id, docId);
      const index = entry.metadata["chunk_index"];
      chunkOrder.set(entry.id, typeof index === "number" ? index : Number.MAX_SAFE_INTEGER);
    } else {
      doc.wholeId = entry.id;
    }

    // The whole entry is authoritative; otherwise the first chunk seen
    if (!parentId || doc.lastModified === undefined) {
      doc.lastModified = stringField(entry.metadata, "last_modified") ?? doc.lastModified;
    }
    if (!parentId || doc.resourceId === undefined) {
      doc.resourceId = stringField(entry.metadata, "resource_id") ?? doc.resourceId;
    }
  }

  for (const doc of documents.values()) {
    doc.chunkIds.sort((a, b) => {
      const byIndex = (chunkOrder.get(a) ?? 0) - (chunkOrder.get(b) ?? 0);
      return byIndex !== 0 ? byIndex : a.localeCompare(b);
    });
  }

  return { documents, chunkOwners };
}

export function unitIdsOf(doc: ExistingDocument): string[] {
  return doc.wholeId ? [doc.wholeId, ...doc.chunkIds] : [...doc.chunkIds];
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * True when the incoming timestamp is strictly newer than the stored one.
 * A stored document without a timestamp is stale once the source has one.
 */
export function isNewer(incoming: string | undefined, stored: string | undefined): boolean {
  if (!incoming) return false;
  if (!stored) return true;

  const a = Date.parse(incoming);
  const b = Date.parse(stored);
  if (!Number.isNaN(a) && !Number.isNaN(b)) {
    return a > b;
  }
  return incoming > stored;
}

// ============================================================================
// Planning
// ============================================================================

export interface PlannedUpdate {
  document: SourceDocument;
  /** Every unit currently stored for the document */
  staleIds: string[];
}

export interface PlannedDeletion {
  documentId: string;
  ids: string[];
}

export interface DroppedDocument {
  documentId: string;
  reason: "duplicate" | "chunk_id_collision";
  detail?: string;
}

export interface SyncPlan {
  adds: SourceDocument[];
  updates: PlannedUpdate[];
  noops: string[];
  deletions: PlannedDeletion[];
  dropped: DroppedDocument[];
}

export interface PlanOptions {
  /** Only orphans from these resources are deleted */
  resourceIds: string[];
  /** False when the incoming set is known to be partial */
  allowDeletes?: boolean;
  /** Fetched pages that produced no document because of an error; never orphans */
  retainIds?: Iterable<string>;
}

export function planSync(documents: SourceDocument[], existing: ExistingIndex, options: PlanOptions): SyncPlan {
  const plan: SyncPlan = { adds: [], updates: [], noops: [], deletions: [], dropped: [] };
  const seen = new Set<string>();

  for (const doc of documents) {
    if (seen.has(doc.id)) {
      plan.dropped.push({ documentId: doc.id, reason: "duplicate" });
      continue;
    }

    const owner = existing.chunkOwners.get(doc.id);
    if (owner !== undefined && owner !== doc.id) {
      plan.dropped.push({
        documentId: doc.id,
        reason: "chunk_id_collision",
        detail: `id is a stored chunk of ${owner}`,
      });
      continue;
    }
    seen.add(doc.id);

    const stored = existing.documents.get(doc.id);
    if (!stored) {
      plan.adds.push(doc);
    } else if (isNewer(doc.last_modified, stored.lastModified)) {
      plan.updates.push({ document: doc, staleIds: unitIdsOf(stored) });
    } else {
      plan.noops.push(doc.id);
    }
  }

  if (options.allowDeletes === false) {
    return plan;
  }

  const scope = new Set(options.resourceIds);
  const retained = new Set(options.retainIds ?? []);
  for (const stored of existing.documents.values()) {
    if (seen.has(stored.id) || retained.has(stored.id)) continue;
    if (stored.resourceId === undefined || !scope.has(stored.resourceId)) continue;
    plan.deletions.push({ documentId: stored.id, ids: unitIdsOf(stored) });
  }

  return plan;
}

export interface ProtectionResult {
  plan: SyncPlan;
  violations: string[];
}

/**
 * Drop any deletion that would touch a document present in this sync, other
 * than the stale units of its own update
 */
export function protectCurrentDocuments(plan: SyncPlan, incomingIds: Iterable<string>): ProtectionResult {
  const current = new Set(incomingIds);
  const violations: string[] = [];

  const deletions = plan.deletions.filter(deletion => {
    if (current.has(deletion.documentId)) {
      violations.push(`deletion of current document ${deletion.documentId}`);
      return false;
    }
    return true;
  });

  const updates = plan.updates.map(update => {
    const staleIds = update.staleIds.filter(id => {
      if (id !== update.document.id && current.has(id)) {
        violations.push(`stale unit ${id} of ${update.document.id} is a current document`);
        return false;
      }
      return true;
    });
    return { ...update, staleIds };
  });

  return { plan: { ...plan, deletions, updates }, violations };
}
