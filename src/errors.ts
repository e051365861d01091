/**
 * NotionRAG: Error Classes
 *
 * Thrown by library code; tool handlers translate them into ToolError
 * responses with toToolError().
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

/**
 * Missing or malformed environment configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID" as const;
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * The requested sync root is neither a database nor a page the integration
 * can read.
 */
export class InvalidResourceError extends Error {
  readonly code = "INVALID_RESOURCE" as const;
  constructor(readonly resourceId: string, reason: string) {
    super(`Invalid resource ${resourceId}: ${reason}`);
    this.name = "InvalidResourceError";
  }
}

export class NotionApiError extends Error {
  readonly code: "FETCH_FAILED" | "FETCH_TIMEOUT";
  constructor(
    message: string,
    readonly status: number | undefined,
    readonly transient: boolean,
    options?: { timeout?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "NotionApiError";
    this.code = options?.timeout ? "FETCH_TIMEOUT" : "FETCH_FAILED";
  }
}

export type StoreErrorCode = "ID_EXISTS" | "NOT_FOUND" | "STORE_UNAVAILABLE";

export class StoreError extends Error {
  constructor(
    readonly code: StoreErrorCode,
    message: string,
    readonly ids: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "StoreError";
  }
}

/**
 * A sync plan broke one of its own guarantees (duplicate chunk ids, a
 * deletion aimed at a current document).
 */
export class InvariantError extends Error {
  readonly code = "INVARIANT_VIOLATION" as const;
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = "InvariantError";
  }
}

export function isStoreUnavailable(err: unknown): boolean {
  return err instanceof StoreError && err.code === "STORE_UNAVAILABLE";
}

export class EmbeddingError extends Error {
  readonly code = "EMBED_ERROR" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "EmbeddingError";
  }
}

export class CollectionNotFoundError extends Error {
  readonly code = "COLLECTION_NOT_FOUND" as const;
  constructor(readonly collection: string) {
    super(`Collection not found: ${collection}`);
    this.name = "CollectionNotFoundError";
  }
}

export class UnknownSettingError extends Error {
  readonly code = "INVALID_INPUT" as const;
  constructor(readonly key: string, readonly known: string[]) {
    super(`Invalid configuration key: ${key}`);
    this.name = "UnknownSettingError";
  }
}
