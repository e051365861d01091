/**
 * NotionRAG: Canonical Data Types
 *
 * These types define the core data structures used throughout the sync
 * pipeline and the retrieval layer.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// SourceDocument - One logical page fetched from the remote source
// ============================================================================

export type MetadataScalar = string | number | boolean;

export interface SourceDocument {
  id: string;                  // Remote page id
  title: string;
  text: string;                // Normalized body (title + tags + flattened fragments)
  last_modified: string;       // ISO8601, source of truth for change detection
  created_time: string;
  tags: string[];
  resource_id: string;         // Sync root this page was fetched under
  parent_page_id?: string;     // Set for pages nested under another page
  url: string;
  public_url?: string;
  extra: Record<string, MetadataScalar | null>;
}

// ============================================================================
// Storage Units - What the vector collection physically holds
// ============================================================================

/**
 * Metadata as written to the collection. Only scalar values survive the
 * store boundary; see cleanMetadata().
 */
export type StoredMetadata = Record<string, MetadataScalar>;

/** Metadata before cleaning: arrays, nulls and dates allowed */
export type RawMetadata = Record<string, unknown>;

/** A unit the planner wants written, before metadata cleaning */
export interface PlannedUnit {
  id: string;
  text: string;
  metadata: RawMetadata;
}

export interface StorageUnit {
  id: string;                  // Document id, or "{doc_id}_chunk_{j}"
  text: string;
  metadata: StoredMetadata;
}

export interface IndexEntry {
  id: string;
  text: string;
  metadata: StoredMetadata;
  embedding: number[];
}

export type WhereFilter = Record<string, MetadataScalar>;

export interface QueryMatch {
  id: string;
  text: string;
  metadata: StoredMetadata;
  distance: number;            // Cosine distance, ascending = closer
}

export interface CollectionManifest {
  name: string;
  embedding_model: string;
  dimensions: number;
  distance: "cosine";
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Sync Results
// ============================================================================

/**
 * Counts are logical documents, never physical chunks.
 */
export interface SyncResult {
  added: number;
  updated: number;
  deleted: number;
  total: number;               // Documents fetched from the source
  skipped: number;             // Documents dropped by per-item failures or duplicates
  run_id?: string;
}

export interface StoreWriteOutcome {
  written: Array<{ id: string; stored_id: string }>;
  dropped: string[];
}

// ============================================================================
// Retrieval Types
// ============================================================================

export interface ConversationMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface RetrievedDocument {
  id: string;
  text: string;
  metadata: StoredMetadata;
  distance: number;
}

export interface ConversationContextResult {
  context: string;
  conversation: ConversationMessage[];
  truncated: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type EmbeddingProviderName = "openai" | "local";

export interface NotionRagConfig {
  version: string;

  storage: {
    data_dir: string;
    collections_dir: string;
    logs_dir: string;
    default_collection: string;
  };

  notion: {
    api_base_url: string;
    api_version: string;
    requests_per_second: number;
    timeout_ms: number;
    max_retries: number;
    page_size: number;
  };

  store: {
    add_batch_size: number;
    update_batch_size: number;
    delete_batch_size: number;
    continue_on_error: boolean;
  };

  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    api_key_env: string;
    dimensions?: number;         // Model default when unset
    batch_size: number;
    timeout_ms: number;
  };
}

export type NotionRagConfigOverrides = {
  storage?: Partial<NotionRagConfig["storage"]>;
  notion?: Partial<NotionRagConfig["notion"]>;
  store?: Partial<NotionRagConfig["store"]>;
  embedding?: Partial<NotionRagConfig["embedding"]>;
};

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "CONFIG_INVALID"
  | "INVALID_RESOURCE"
  | "INVALID_INPUT"
  | "FETCH_FAILED"
  | "FETCH_TIMEOUT"
  | "PARSE_ERROR"
  | "EMBED_ERROR"
  | "ID_EXISTS"
  | "NOT_FOUND"
  | "STORE_UNAVAILABLE"
  | "INVARIANT_VIOLATION"
  | "COLLECTION_NOT_FOUND"
  | "NOT_CONFIRMED"
  | "SYNC_FAILED"
  | "QUERY_FAILED"
  | "SETTINGS_FAILED";

export interface ToolError {
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EventLogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  run_id?: string;
  data?: unknown;
}
