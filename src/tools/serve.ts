/**
 * NotionRAG: Serve Tools (Phase 5)
 *
 * Conversational retrieval over a synced collection, plus the REST routes
 * the HTTP transport exposes next to /mcp.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import express, { type Express, type Request, type Response } from "express";
import type {
  ConversationContextResult,
  ConversationMessage,
  ErrorCode,
  RetrievedDocument,
  ToolError,
  WhereFilter,
} from "../types.js";
import { GetContextInputSchema, SyncInputSchema, type GetContextInput } from "../schemas.js";
import type { VectorCollection } from "../vector-store.js";
import type { SettingsStore } from "../settings-store.js";
import { getRuntime } from "../runtime.js";
import { notionSync } from "./sync.js";
import { EventLogger, cosineSimilarity, isToolError, timed, toToolError, truncatePreview } from "../utils.js";

// ============================================================================
// Retriever
// ============================================================================

/** Distance multipliers: lower ranks closer */
export const DIRECT_WEIGHT = 0.7;
export const CONVERSATION_WEIGHT = 1.0;

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export class Retriever {
  constructor(
    private collection: VectorCollection,
    private settings: SettingsStore,
    private logger: EventLogger = new EventLogger({ echo: false })
  ) {}

  async retrieve(query: string, k?: number, where?: WhereFilter): Promise<RetrievedDocument[]> {
    const limit = k ?? await this.settings.get("num_retrieved_results");
    const matches = await this.collection.query(query, limit, where);
    return matches.map(m => ({ id: m.id, text: m.text, metadata: m.metadata, distance: m.distance }));
  }

  /**
   * Merge two result lists by id. The first occurrence wins, so a document
   * found by the direct query keeps its boosted distance.
   */
  mergeAndRerank(current: RetrievedDocument[], conversation: RetrievedDocument[]): RetrievedDocument[] {
    const seen = new Set<string>();
    const merged: RetrievedDocument[] = [];

    const take = (docs: RetrievedDocument[], weight: number) => {
      for (const doc of docs) {
        if (seen.has(doc.id)) continue;
        seen.add(doc.id);
        merged.push({ ...doc, distance: doc.distance * weight });
      }
    };

    take(current, DIRECT_WEIGHT);
    take(conversation, CONVERSATION_WEIGHT);

    // Array.prototype.sort is stable, ties keep merge order
    return merged.sort((a, b) => a.distance - b.distance);
  }

  formatContext(docs: RetrievedDocument[]): string {
    const seenTitles = new Set<string>();
    const blocks: string[] = [];

    for (const doc of docs) {
      const rawTitle = doc.metadata["title"];
      const title = typeof rawTitle === "string" && rawTitle !== "" ? rawTitle : "Untitled";
      if (seenTitles.has(title)) continue;
      seenTitles.add(title);

      const url = doc.metadata["url"] ?? "";
      blocks.push(`Title: ${title}\nURL: ${url}\nContent: ${doc.text}`);
    }

    return blocks.join(CONTEXT_SEPARATOR);
  }

  async getContextForQuery(query: string, history: ConversationMessage[] = [], where?: WhereFilter): Promise<string> {
    const current = await this.retrieve(query, undefined, where);
    if (history.length === 0) {
      return this.formatContext(current);
    }

    const conversationText = history.map(m => m.content).join(" ");
    const fromConversation = await this.retrieve(conversationText, undefined, where);
    return this.formatContext(this.mergeAndRerank(current, fromConversation));
  }

  /**
   * Context for a chat turn: history filtered by similarity to the query,
   * the most recent max_history turns kept, result capped at
   * max_content_chars.
   */
  async getConversationContext(query: string, history: ConversationMessage[] = []): Promise<ConversationContextResult> {
    const settings = await this.settings.getAll();
    let conversation: ConversationMessage[] = [];

    try {
      if (history.length > 0) {
        const [queryEmbedding, ...historyEmbeddings] = await this.collection.embedder.embed([
          query,
          ...history.map(m => m.content),
        ]);
        const relevant = history.filter((_, i) =>
          cosineSimilarity(queryEmbedding, historyEmbeddings[i]) > settings.similarity_threshold
        );
        conversation = settings.max_history > 0 ? relevant.slice(-settings.max_history) : [];
      }
    } catch (err) {
      await this.logger.warn("retrieval", "Error processing conversation history, using the query alone", {
        error: truncatePreview(err),
      });
      const context = await this.getContextForQuery(query);
      return this.truncate(context, settings.max_content_chars, []);
    }

    const context = await this.getContextForQuery(query, conversation);
    return this.truncate(context, settings.max_content_chars, conversation);
  }

  private async truncate(
    context: string,
    maxChars: number,
    conversation: ConversationMessage[]
  ): Promise<ConversationContextResult> {
    if (context.length <= maxChars) {
      return { context, conversation, truncated: false };
    }
    await this.logger.warn("retrieval", `Truncating context from ${context.length} to ${maxChars} characters`);
    return { context: context.slice(0, maxChars) + "...", conversation, truncated: true };
  }
}

// ============================================================================
// Get Context Tool
// ============================================================================

export interface GetContextResult {
  collection: string;
  context: string;
  conversation: ConversationMessage[];
  truncated: boolean;
  duration_ms: number;
}

export async function notionGetContext(input: GetContextInput): Promise<GetContextResult | ToolError> {
  const { manager, settings, logger } = getRuntime();

  try {
    const collection = await manager.resolve(input.collection);
    const retriever = new Retriever(collection, settings, logger);

    const { result, duration_ms } = await timed(async (): Promise<ConversationContextResult> => {
      if (input.conversational) {
        return retriever.getConversationContext(input.query, input.history);
      }
      const context = await retriever.getContextForQuery(input.query, input.history);
      return { context, conversation: input.history, truncated: false };
    });

    return { collection: collection.name, ...result, duration_ms };
  } catch (err) {
    return toToolError(err, "QUERY_FAILED");
  }
}

// ============================================================================
// HTTP Routes
// ============================================================================

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  INVALID_INPUT: 400,
  INVALID_RESOURCE: 400,
  COLLECTION_NOT_FOUND: 404,
  STORE_UNAVAILABLE: 503,
  FETCH_TIMEOUT: 504,
  FETCH_FAILED: 502,
};

export function statusForError(error: ToolError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

function sendResult(res: Response, result: object | ToolError): void {
  if (isToolError(result)) {
    res.status(statusForError(result)).json(result);
    return;
  }
  res.json(result);
}

export async function handleSyncRequest(req: Request, res: Response): Promise<void> {
  const parsed = SyncInputSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    sendResult(res, toToolError(parsed.error, "INVALID_INPUT"));
    return;
  }
  sendResult(res, await notionSync(parsed.data));
}

export async function handleContextRequest(req: Request, res: Response): Promise<void> {
  const parsed = GetContextInputSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    sendResult(res, toToolError(parsed.error, "INVALID_INPUT"));
    return;
  }
  sendResult(res, await notionGetContext(parsed.data));
}

export interface HttpAppInfo {
  name: string;
  version: string;
}

/**
 * Express app with /health, /sync and /context. The MCP endpoint is mounted
 * by the server entry point.
 */
export function createHttpApp(info: HttpAppInfo): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", server: info.name, version: info.version });
  });

  app.post("/sync", (req, res, next) => {
    handleSyncRequest(req, res).catch(next);
  });

  app.post("/context", (req, res, next) => {
    handleContextRequest(req, res).catch(next);
  });

  return app;
}
