/**
 * NotionRAG: Connect (Phase 1)
 *
 * Notion REST client and resource walker. Every request goes through the
 * shared rate limiter, carries a timeout and retries transient failures.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { InvalidResourceError, NotionApiError } from "../errors.js";
import { SlidingWindowRateLimiter } from "../rate-limiter.js";
import { EventLogger, sleep, truncatePreview } from "../utils.js";

// ============================================================================
// Notion Payload Schemas
// ============================================================================

export const RichTextSchema = z.object({
  plain_text: z.string().default(""),
});

const NamedOptionSchema = z.object({ name: z.string() });

export const NotionPropertySchema = z.object({
  type: z.string(),
  title: z.array(RichTextSchema).optional(),
  rich_text: z.array(RichTextSchema).optional(),
  multi_select: z.array(NamedOptionSchema).optional(),
  select: NamedOptionSchema.nullable().optional(),
  status: NamedOptionSchema.nullable().optional(),
  url: z.string().nullable().optional(),
  number: z.number().nullable().optional(),
  checkbox: z.boolean().optional(),
  email: z.string().nullable().optional(),
  phone_number: z.string().nullable().optional(),
});

export const NotionPageSchema = z.object({
  id: z.string().min(1),
  created_time: z.string().default(""),
  last_edited_time: z.string().optional(),
  url: z.string().optional(),
  public_url: z.string().nullable().optional(),
  icon: z.object({ emoji: z.string().optional() }).nullable().optional(),
  parent: z.object({ type: z.string() }).optional(),
  properties: z.record(NotionPropertySchema).default({}),
  archived: z.boolean().optional(),
  in_trash: z.boolean().optional(),
});

export const BlockContentSchema = z.object({
  rich_text: z.array(RichTextSchema).default([]),
  checked: z.boolean().optional(),
  language: z.string().optional(),
  icon: z.object({ emoji: z.string().optional() }).nullable().optional(),
  title: z.string().optional(),
  expression: z.string().optional(),
  url: z.string().optional(),
  caption: z.array(RichTextSchema).optional(),
});

const BlockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().default(false),
  })
  .passthrough();

const ListSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().optional(),
});

const ObjectIdSchema = z.object({ id: z.string() });

export type NotionPage = z.infer<typeof NotionPageSchema>;
export type NotionProperty = z.infer<typeof NotionPropertySchema>;
export type BlockContent = z.infer<typeof BlockContentSchema>;

/**
 * One block of page content with its nested children already loaded
 */
export interface FragmentNode {
  id: string;
  type: string;
  content: BlockContent;
  children: FragmentNode[];
}

// ============================================================================
// Remote Source Interface
// ============================================================================

export type ResourceType = "database" | "page";

export interface PageList {
  items: NotionPage[];
  nextCursor?: string;
}

export interface RemoteSource {
  detectResourceType(id: string): Promise<ResourceType>;
  /** One page of a database query */
  listChildren(databaseId: string, cursor?: string): Promise<PageList>;
  retrievePage(id: string): Promise<NotionPage>;
  getFragments(blockId: string): Promise<FragmentNode[]>;
}

// ============================================================================
// Notion Client
// ============================================================================

export interface NotionClientOptions {
  token: string;
  baseUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
  maxRetries?: number;
  pageSize?: number;
  limiter?: SlidingWindowRateLimiter;
  logger?: EventLogger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/** Statuses meaning "no such object for this integration" */
const MISSING_OBJECT_STATUSES = new Set([400, 403, 404]);

/** Blocks whose children are separate pages, never inline content */
const PAGE_BOUNDARY_TYPES = new Set(["child_page", "child_database"]);

export class NotionClient implements RemoteSource {
  private token: string;
  private baseUrl: string;
  private apiVersion: string;
  private timeoutMs: number;
  private maxRetries: number;
  private pageSize: number;
  private limiter: SlidingWindowRateLimiter;
  private logger: EventLogger;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: NotionClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? "https://api.notion.com/v1").replace(/\/+$/, "");
    this.apiVersion = options.apiVersion ?? "2022-06-28";
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRetries = options.maxRetries ?? 3;
    this.pageSize = options.pageSize ?? 100;
    this.limiter = options.limiter ?? new SlidingWindowRateLimiter(3, 1000);
    this.logger = options.logger ?? new EventLogger({ echo: false });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
  }

  // --------------------------------------------------------------------------
  // RemoteSource
  // --------------------------------------------------------------------------

  async detectResourceType(id: string): Promise<ResourceType> {
    if (await this.resolves(`/databases/${encodeURIComponent(id)}`)) {
      return "database";
    }
    if (await this.resolves(`/pages/${encodeURIComponent(id)}`)) {
      return "page";
    }
    throw new InvalidResourceError(id, "not a database or page shared with this integration");
  }

  async listChildren(databaseId: string, cursor?: string): Promise<PageList> {
    const body: Record<string, unknown> = { page_size: this.pageSize };
    if (cursor) body.start_cursor = cursor;

    const list = await this.request("POST", `/databases/${encodeURIComponent(databaseId)}/query`, ListSchema, body);
    const items: NotionPage[] = [];
    for (const raw of list.results) {
      const parsed = NotionPageSchema.safeParse(raw);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        await this.logger.warn("connect", "Skipping malformed database row", {
          database_id: databaseId,
          error: truncatePreview(parsed.error.message),
        });
      }
    }

    return {
      items,
      nextCursor: list.has_more && list.next_cursor ? list.next_cursor : undefined,
    };
  }

  async retrievePage(id: string): Promise<NotionPage> {
    return this.request("GET", `/pages/${encodeURIComponent(id)}`, NotionPageSchema);
  }

  /**
   * Load a block's children, recursing into nested blocks. A failure loading
   * one block's children is logged and those children are left out.
   */
  async getFragments(blockId: string): Promise<FragmentNode[]> {
    const nodes: FragmentNode[] = [];

    for (const raw of await this.listBlockChildren(blockId)) {
      const block = BlockSchema.safeParse(raw);
      if (!block.success) {
        await this.logger.warn("connect", "Skipping malformed block", { parent_id: blockId });
        continue;
      }

      const content = BlockContentSchema.safeParse(block.data[block.data.type] ?? {});
      const node: FragmentNode = {
        id: block.data.id,
        type: block.data.type,
        content: content.success ? content.data : { rich_text: [] },
        children: [],
      };

      if (block.data.has_children && !PAGE_BOUNDARY_TYPES.has(node.type)) {
        try {
          node.children = await this.getFragments(node.id);
        } catch (err) {
          await this.logger.warn("connect", `Error loading child blocks for ${node.id}, skipping children`, {
            error: truncatePreview(err),
          });
        }
      }

      nodes.push(node);
    }

    return nodes;
  }

  // --------------------------------------------------------------------------
  // HTTP
  // --------------------------------------------------------------------------

  private async listBlockChildren(blockId: string): Promise<unknown[]> {
    const results: unknown[] = [];
    let cursor: string | undefined;

    do {
      const query = new URLSearchParams({ page_size: String(this.pageSize) });
      if (cursor) query.set("start_cursor", cursor);
      const list = await this.request(
        "GET",
        `/blocks/${encodeURIComponent(blockId)}/children?${query.toString()}`,
        ListSchema
      );
      results.push(...list.results);
      cursor = list.has_more && list.next_cursor ? list.next_cursor : undefined;
    } while (cursor);

    return results;
  }

  /**
   * True when the object exists; false when Notion rejects the id itself
   */
  private async resolves(path: string): Promise<boolean> {
    try {
      await this.request("GET", path, ObjectIdSchema);
      return true;
    } catch (err) {
      if (err instanceof NotionApiError && err.status !== undefined && MISSING_OBJECT_STATUSES.has(err.status)) {
        return false;
      }
      throw err;
    }
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      await this.limiter.acquire();
      try {
        const json = await this.send(method, path, body);
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new NotionApiError(`Unexpected response shape from ${method} ${path}`, undefined, false, {
            cause: parsed.error,
          });
        }
        return parsed.data;
      } catch (err) {
        const apiErr = err instanceof NotionApiError
          ? err
          : new NotionApiError(`${method} ${path} failed: ${truncatePreview(err)}`, undefined, true, { cause: err });

        if (!apiErr.transient || attempt === this.maxRetries - 1) {
          throw apiErr;
        }

        const delay = 2 ** attempt * 1000;
        await this.logger.warn("connect", `Transient failure, retrying in ${delay}ms`, {
          path,
          attempt: attempt + 1,
          error: truncatePreview(apiErr),
        });
        await this.sleep(delay);
      }
    }

    throw new NotionApiError(`${method} ${path} failed: no attempts made`, undefined, false);
  }

  private async send(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          "Authorization": `Bearer ${this.token}`,
          "Notion-Version": this.apiVersion,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new NotionApiError(`${method} ${path} timed out after ${this.timeoutMs}ms`, undefined, true, {
          timeout: true,
          cause: err,
        });
      }
      throw new NotionApiError(`${method} ${path} failed: ${truncatePreview(err)}`, undefined, true, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      const transient = response.status === 429 || response.status >= 500;
      throw new NotionApiError(
        `HTTP ${response.status} from ${method} ${path}${detail ? `: ${truncatePreview(detail)}` : ""}`,
        response.status,
        transient
      );
    }

    return response.json();
  }
}

// ============================================================================
// Resource Walk
// ============================================================================

export interface FetchedPage {
  page: NotionPage;
  parentPageId?: string;
  /** Title of the child_page block that linked to this page */
  fallbackTitle?: string;
  /** Present when the walk already loaded the page body */
  fragments?: FragmentNode[];
}

export interface FetchResourceOptions {
  maxPages?: number;
  logger?: EventLogger;
}

export interface FetchResourceResult {
  resourceType: ResourceType;
  pages: FetchedPage[];
}

/**
 * All pages under a database or page tree. Nested failures are logged and
 * skipped; a failure on the root propagates.
 */
export async function fetchResourcePages(
  source: RemoteSource,
  resourceId: string,
  options: FetchResourceOptions = {}
): Promise<FetchResourceResult> {
  const logger = options.logger ?? new EventLogger({ echo: false });
  const limit = options.maxPages ?? Infinity;
  const resourceType = await source.detectResourceType(resourceId);

  if (resourceType === "database") {
    const pages = await collectDatabase(source, resourceId, limit);
    return { resourceType, pages: pages.map(page => ({ page })) };
  }

  const pages: FetchedPage[] = [];
  const visited = new Set<string>();
  const worklist: Array<{
    kind: ResourceType;
    id: string;
    parentPageId?: string;
    fallbackTitle?: string;
    root: boolean;
  }> = [
    { kind: "page", id: resourceId, root: true },
  ];

  while (worklist.length > 0 && pages.length < limit) {
    const item = worklist.shift();
    if (!item || visited.has(item.id)) continue;
    visited.add(item.id);

    try {
      if (item.kind === "database") {
        const rows = await collectDatabase(source, item.id, limit - pages.length);
        for (const row of rows) {
          if (visited.has(row.id)) continue;
          visited.add(row.id);
          pages.push({ page: row, parentPageId: item.parentPageId });
        }
        continue;
      }

      const page = await source.retrievePage(item.id);
      const fragments = await source.getFragments(item.id);
      pages.push({ page, parentPageId: item.parentPageId, fallbackTitle: item.fallbackTitle, fragments });

      for (const child of findChildResources(fragments)) {
        if (!visited.has(child.id)) {
          worklist.push({ kind: child.kind, id: child.id, parentPageId: item.id, fallbackTitle: child.title, root: false });
        }
      }
    } catch (err) {
      if (item.root) throw err;
      await logger.warn("connect", `Skipping nested ${item.kind} ${item.id}`, {
        error: truncatePreview(err),
      });
    }
  }

  return { resourceType, pages: pages.slice(0, limit) };
}

async function collectDatabase(source: RemoteSource, databaseId: string, limit: number): Promise<NotionPage[]> {
  const pages: NotionPage[] = [];
  let cursor: string | undefined;

  do {
    const list = await source.listChildren(databaseId, cursor);
    pages.push(...list.items);
    cursor = list.nextCursor;
  } while (cursor && pages.length < limit);

  return pages.slice(0, limit);
}

/**
 * child_page / child_database blocks anywhere in a fragment tree, in order
 */
export interface ChildResource {
  kind: ResourceType;
  id: string;
  title?: string;
}

export function findChildResources(fragments: FragmentNode[]): ChildResource[] {
  const found: ChildResource[] = [];
  for (const node of fragments) {
    if (node.type === "child_page") {
      found.push({ kind: "page", id: node.id, title: node.content.title });
    } else if (node.type === "child_database") {
      found.push({ kind: "database", id: node.id, title: node.content.title });
    }
    found.push(...findChildResources(node.children));
  }
  return found;
}
