/**
 * NotionRAG: Core Utilities
 *
 * Deterministic utilities for hashing, file operations, ID generation,
 * error formatting, logging and vector math.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import * as fs from "fs/promises";
import * as path from "path";
import { ZodError } from "zod";
import type { EventLogEntry, ErrorCode, LogLevel, ToolError } from "./types.js";
import {
  CollectionNotFoundError,
  ConfigError,
  EmbeddingError,
  InvalidResourceError,
  InvariantError,
  NotionApiError,
  StoreError,
  UnknownSettingError,
} from "./errors.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for sync run IDs
 */
export function generateRunId(): string {
  return uuidv7();
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Write JSONL file (append mode)
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

/**
 * Write JSONL file (overwrite mode). Writes a sibling temp file and renames
 * it over the target so readers never see a half-written file.
 */
export async function writeJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n");
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, lines ? lines + "\n" : "", "utf-8");
  await fs.rename(tmpPath, filePath);
}

/**
 * Read JSONL file
 */
export async function readJsonl<T>(filePath: string): Promise<T[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return content
    .split("\n")
    .filter(line => line.trim())
    .map(line => JSON.parse(line) as T);
}

/**
 * Write JSON file
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Read JSON file
 */
export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content) as T;
}

/**
 * List subdirectories (sorted for determinism)
 */
export async function listDirs(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter(e => e.isDirectory())
    .map(e => e.name)
    .sort();
}

// ============================================================================
// Text Utilities
// ============================================================================

export const ERROR_PREVIEW_CHARS = 100;

/**
 * Normalize text for consistent hashing and chunking
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .replace(/\t/g, "    ")
    .normalize("NFC");
}

/**
 * Shorten an error message for log entries
 *
 * @example
 * truncatePreview("x".repeat(120), 100) // 100 x's followed by "..."
 */
export function truncatePreview(value: unknown, maxChars: number = ERROR_PREVIEW_CHARS): string {
  const text = value instanceof Error ? value.message : String(value);
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Convert "Star Rating" style property names to "star_rating"
 */
export function toSnakeCase(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Map a thrown error onto the tool error taxonomy
 */
export function toToolError(err: unknown, fallback: ErrorCode): ToolError {
  if (err instanceof ConfigError) {
    return createToolError(err.code, err.message, {
      details: { issues: err.issues },
      suggestion: "Check the server environment variables",
    });
  }
  if (err instanceof ZodError) {
    return createToolError("INVALID_INPUT", "Invalid input", {
      details: err.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`),
    });
  }
  if (err instanceof CollectionNotFoundError) {
    return createToolError(err.code, err.message, {
      details: { collection: err.collection },
      suggestion: "Run notionrag_collection_list to see existing collections",
    });
  }
  if (err instanceof InvalidResourceError) {
    return createToolError(err.code, err.message, {
      details: { resource_id: err.resourceId },
      suggestion: "Share the page or database with the integration and check the id",
    });
  }
  if (err instanceof NotionApiError) {
    return createToolError(err.code, err.message, {
      details: { status: err.status },
      recoverable: err.transient,
      suggestion: err.transient ? "Retry later" : undefined,
    });
  }
  if (err instanceof StoreError) {
    return createToolError(err.code, err.message, {
      details: err.ids.length ? { ids: err.ids } : undefined,
      recoverable: err.code === "STORE_UNAVAILABLE",
    });
  }
  if (err instanceof EmbeddingError) {
    return createToolError(err.code, err.message, {
      recoverable: true,
      suggestion: "Check OPENAI_API_KEY and EMBEDDING_MODEL",
    });
  }
  if (err instanceof UnknownSettingError) {
    return createToolError(err.code, err.message, {
      details: { key: err.key },
      suggestion: `Known keys: ${err.known.join(", ")}`,
    });
  }
  if (err instanceof InvariantError) {
    return createToolError(err.code, err.message, { details: err.details });
  }
  return createToolError(fallback, truncatePreview(err, 500), { recoverable: true });
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

export function isToolError(value: unknown): value is ToolError {
  return typeof value === "object" && value !== null && "isError" in value && value.isError === true;
}

// ============================================================================
// Logging
// ============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  data?: unknown,
  runId?: string
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    scope,
    message,
    run_id: runId,
    data,
  };
}

export interface EventLoggerOptions {
  /** Directory for events.ndjson / errors.ndjson; omit to skip file output */
  logsDir?: string;
  /** Minimum level echoed to stderr and written to disk */
  level?: LogLevel;
  /** Echo entries to stderr as JSON lines (stdout belongs to the MCP transport) */
  echo?: boolean;
  runId?: string;
}

/**
 * Structured logger for sync and query operations
 */
export class EventLogger {
  private logsDir?: string;
  private level: LogLevel;
  private echo: boolean;
  private runId?: string;

  constructor(options: EventLoggerOptions = {}) {
    this.logsDir = options.logsDir;
    this.level = options.level ?? "info";
    this.echo = options.echo ?? true;
    this.runId = options.runId;
  }

  async init(): Promise<void> {
    if (this.logsDir) {
      await ensureDir(this.logsDir);
    }
  }

  /**
   * Logger sharing this one's sinks, stamping every entry with a run id
   */
  child(runId: string): EventLogger {
    return new EventLogger({
      logsDir: this.logsDir,
      level: this.level,
      echo: this.echo,
      runId,
    });
  }

  async log(entry: EventLogEntry): Promise<void> {
    if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[this.level]) return;

    if (this.echo) {
      console.error(JSON.stringify(entry));
    }

    if (this.logsDir) {
      const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
      await appendJsonl(path.join(this.logsDir, file), [entry]);
    }
  }

  async debug(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("debug", scope, message, data, this.runId));
  }

  async info(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("info", scope, message, data, this.runId));
  }

  async warn(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("warn", scope, message, data, this.runId));
  }

  async error(scope: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("error", scope, message, data, this.runId));
  }
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Measure execution time
 */
export async function timed<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const start = performance.now();
  const result = await fn();
  const duration_ms = Math.round(performance.now() - start);
  return { result, duration_ms };
}

// ============================================================================
// Batch Processing
// ============================================================================

export interface BatchOptions<T> {
  batchSize: number;
  description: string;
  logger: EventLogger;
  continueOnError: boolean;
  /** Errors for which continueOnError never applies */
  isFatal?: (err: unknown) => boolean;
  onSuccess?: (batch: T[]) => void;
  /** Called for a failed batch that continueOnError lets through */
  onFailure?: (batch: T[], err: unknown) => void;
}

/**
 * Run process over fixed-size slices of items, in order.
 * Returns how many items were in batches that completed.
 */
export async function processInBatches<T>(
  items: T[],
  process: (batch: T[]) => Promise<void>,
  options: BatchOptions<T>
): Promise<number> {
  const { batchSize, description, logger } = options;
  const batchCount = Math.ceil(items.length / batchSize);
  let processed = 0;

  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    const batchNum = Math.floor(i / batchSize) + 1;

    try {
      await process(batch);
      processed += batch.length;
      options.onSuccess?.(batch);
      await logger.debug("batch", `Processed ${description} batch ${batchNum}/${batchCount}`);
    } catch (err) {
      await logger.error("batch", `Error processing ${description} batch ${batchNum}/${batchCount}`, {
        error: truncatePreview(err),
      });
      if (!options.continueOnError || options.isFatal?.(err)) {
        throw err;
      }
      options.onFailure?.(batch, err);
    }
  }

  return processed;
}

// ============================================================================
// Vector Utilities (Embeddings & Similarity)
// ============================================================================

/**
 * Generate a deterministic mock embedding from text content.
 * Uses SHA256 hash as a seed for reproducible pseudo-random generation.
 * The resulting vector is L2 normalized (unit length).
 *
 * @param text - Input text to generate embedding from
 * @param dimension - Vector dimension
 * @returns Normalized embedding vector of specified dimension
 */
export function generateMockEmbedding(text: string, dimension: number = 256): number[] {
  const hash = createHash("sha256").update(text).digest("hex");
  const seed = parseInt(hash.slice(0, 8), 16);

  const embedding: number[] = [];
  let x = seed;
  for (let i = 0; i < dimension; i++) {
    x = (x * 1103515245 + 12345) % (2 ** 31);
    embedding.push((x / (2 ** 31)) * 2 - 1);
  }

  const norm = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
  return embedding.map(v => v / norm);
}

/**
 * Calculate cosine similarity between two vectors.
 * Returns a value between -1 (opposite) and 1 (identical).
 * Returns 0 if vectors have different lengths or zero magnitude.
 *
 * @example
 * cosineSimilarity([1, 0, 0], [1, 0, 0]); // 1.0
 * cosineSimilarity([1, 0, 0], [0, 1, 0]); // 0.0
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Cosine distance as used by the collection index: 1 - similarity
 */
export function cosineDistance(a: number[], b: number[]): number {
  return 1 - cosineSimilarity(a, b);
}
