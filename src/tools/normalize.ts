/**
 * NotionRAG: Normalize Tools (Phase 2)
 *
 * Fragment trees become document text, page properties become metadata, and
 * document text is split into storage units. Everything here is pure and
 * deterministic; callers do the logging.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { MetadataScalar, PlannedUnit, SourceDocument } from "../types.js";
import type { FragmentNode, NotionPage, NotionProperty } from "./connect.js";
import { FRAGMENT_HANDLERS, classifyFragment, richText } from "./blocks.js";
import { MAX_CHUNK_CHARS } from "../settings-store.js";
import { sha256, normalizeText, toSnakeCase } from "../utils.js";

const INDENT = "    ";

// ============================================================================
// Fragment Flattening
// ============================================================================

export interface SkippedFragment {
  id: string;
  type: string;
  reason: "unhandled" | "handler_failed";
  error?: string;
}

export interface FlattenResult {
  text: string;
  skipped: SkippedFragment[];
}

/**
 * Depth-first render of a fragment tree. Top-level fragments are separated
 * by a blank line, nested ones by a newline, each nesting level indented by
 * four spaces.
 */
export function flattenFragments(nodes: FragmentNode[]): FlattenResult {
  const skipped: SkippedFragment[] = [];
  const blocks: string[] = [];

  for (const [node, ordinal] of withOrdinals(nodes)) {
    const lines = renderNode(node, 0, ordinal, skipped);
    if (lines.length > 0) blocks.push(lines.join("\n"));
  }

  return { text: blocks.join("\n\n"), skipped };
}

function renderNode(node: FragmentNode, depth: number, ordinal: number, skipped: SkippedFragment[]): string[] {
  const lines: string[] = [];
  const kind = classifyFragment(node.type);

  if (kind.kind === "unhandled") {
    skipped.push({ id: node.id, type: node.type, reason: "unhandled" });
  } else {
    try {
      const own = FRAGMENT_HANDLERS[kind.type](node.content, { ordinal });
      if (own) {
        const pad = INDENT.repeat(depth);
        lines.push(...own.split("\n").map(line => pad + line));
      }
    } catch (err) {
      skipped.push({
        id: node.id,
        type: node.type,
        reason: "handler_failed",
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  for (const [child, childOrdinal] of withOrdinals(node.children)) {
    lines.push(...renderNode(child, depth + 1, childOrdinal, skipped));
  }

  return lines;
}

/**
 * Pair siblings with their position in a run of numbered list items
 */
function withOrdinals(nodes: FragmentNode[]): Array<[FragmentNode, number]> {
  let run = 0;
  return nodes.map(node => {
    run = node.type === "numbered_list_item" ? run + 1 : 0;
    return [node, Math.max(run, 1)];
  });
}

// ============================================================================
// Page Metadata
// ============================================================================

/** Keys the pipeline writes itself; page properties never overwrite them */
export const RESERVED_METADATA_KEYS = new Set([
  "page_id",
  "title",
  "url",
  "public_url",
  "source",
  "last_modified",
  "created_time",
  "tags",
  "resource_id",
  "parent_page_id",
  "content_hash",
  "last_synced",
  "parent_id",
  "chunk_index",
  "chunk_id",
]);

function titleOf(property: NotionProperty | undefined): string {
  if (!property || property.type !== "title") return "";
  return richText(property.title).trim();
}

type TitleStrategy = (page: NotionPage, fallbackTitle?: string) => string;

/** First non-empty result wins */
const TITLE_STRATEGIES: TitleStrategy[] = [
  page => titleOf(page.properties["Name"]),
  page => titleOf(page.properties["Title"]),
  page =>
    titleOf(page.properties["title"]) ||
    Object.values(page.properties).map(titleOf).find(Boolean) ||
    "",
  (page, fallbackTitle) =>
    fallbackTitle ? `${page.icon?.emoji ?? ""} ${fallbackTitle}`.trim() : "",
  page => page.id,
];

export function extractTitle(page: NotionPage, fallbackTitle?: string): string {
  for (const strategy of TITLE_STRATEGIES) {
    const title = strategy(page, fallbackTitle);
    if (title) return title;
  }
  return page.id;
}

/**
 * Option names of every multi_select property, in property order
 */
export function extractTags(page: NotionPage): string[] {
  const tags: string[] = [];
  for (const property of Object.values(page.properties)) {
    if (property.type === "multi_select") {
      tags.push(...(property.multi_select ?? []).map(option => option.name).filter(Boolean));
    }
  }
  return tags;
}

function propertyValue(property: NotionProperty): MetadataScalar | null | undefined {
  switch (property.type) {
    case "url":
      return property.url ?? null;
    case "select":
      return property.select?.name ?? null;
    case "status":
      return property.status?.name ?? null;
    case "number":
      return property.number ?? null;
    case "checkbox":
      return property.checkbox ?? false;
    case "email":
      return property.email ?? null;
    case "phone_number":
      return property.phone_number ?? null;
    default:
      return undefined;
  }
}

/**
 * Scalar page properties keyed by snake_case name ("Star Rating" → star_rating)
 */
export function extractExtras(page: NotionPage): Record<string, MetadataScalar | null> {
  const extras: Record<string, MetadataScalar | null> = {};
  for (const [name, property] of Object.entries(page.properties)) {
    const value = propertyValue(property);
    if (value === undefined) continue;

    const key = toSnakeCase(name);
    if (!key) continue;
    extras[RESERVED_METADATA_KEYS.has(key) ? `prop_${key}` : key] = value;
  }
  return extras;
}

export function canonicalUrl(page: NotionPage): string {
  return page.url || `https://www.notion.so/${page.id.replace(/-/g, "")}`;
}

export function composeDocumentText(title: string, tags: string[], body: string): string {
  return `Title: ${title}\nTags: ${tags.length ? tags.join(", ") : "None"}\nContent:\n${body}`;
}

// ============================================================================
// Normalize Page
// ============================================================================

export interface NormalizePageOptions {
  parentPageId?: string;
  fallbackTitle?: string;
  /** Used when the page carries no last_edited_time */
  now?: () => string;
}

export interface NormalizePageResult {
  /** Null when the page has no body text */
  document: SourceDocument | null;
  skipped: SkippedFragment[];
}

export function normalizePage(
  page: NotionPage,
  fragments: FragmentNode[],
  resourceId: string,
  options: NormalizePageOptions = {}
): NormalizePageResult {
  const { text, skipped } = flattenFragments(fragments);
  const body = normalizeText(text).trim();
  if (!body) {
    return { document: null, skipped };
  }

  const title = extractTitle(page, options.fallbackTitle);
  const tags = extractTags(page);

  return {
    document: {
      id: page.id,
      title,
      text: composeDocumentText(title, tags, body),
      last_modified: page.last_edited_time ?? (options.now ?? (() => new Date().toISOString()))(),
      created_time: page.created_time,
      tags,
      resource_id: resourceId,
      parent_page_id: options.parentPageId,
      url: canonicalUrl(page),
      public_url: page.public_url ?? undefined,
      extra: extractExtras(page),
    },
    skipped,
  };
}

// ============================================================================
// Chunking
// ============================================================================

/**
 * Split text into chunks of at most min(maxChars, 6000) characters.
 * Paragraphs are packed together; an oversized paragraph is packed by
 * sentence; an oversized sentence is cut into fixed-size slices.
 */
export function chunkText(text: string, maxChars: number = MAX_CHUNK_CHARS): string[] {
  const limit = Math.max(1, Math.min(Math.floor(maxChars), MAX_CHUNK_CHARS));
  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) chunks.push(trimmed);
    current = "";
  };

  const append = (piece: string, separator: string) => {
    if (!current) {
      current = piece;
    } else if (current.length + separator.length + piece.length <= limit) {
      current += separator + piece;
    } else {
      flush();
      current = piece;
    }
  };

  for (const para of text.split(/\n\n+/)) {
    const trimmed = para.trim();
    if (!trimmed) continue;

    if (trimmed.length <= limit) {
      append(trimmed, "\n\n");
      continue;
    }

    const sentences = trimmed.split(". ");
    let separator = "\n\n";
    sentences.forEach((raw, i) => {
      const sentence = (i < sentences.length - 1 ? `${raw}.` : raw).trim();
      if (!sentence) return;

      if (sentence.length <= limit) {
        append(sentence, separator);
      } else {
        for (let pos = 0; pos < sentence.length; pos += limit) {
          flush();
          current = sentence.slice(pos, pos + limit);
        }
      }
      separator = " ";
    });
  }

  flush();
  return chunks;
}

export function chunkId(documentId: string, index: number): string {
  return `${documentId}_chunk_${index}`;
}

/**
 * Metadata shared by every unit of a document
 */
export function documentMetadata(document: SourceDocument, syncedAt: string): Record<string, unknown> {
  return {
    ...document.extra,
    page_id: document.id,
    title: document.title,
    url: document.url,
    public_url: document.public_url ?? "",
    source: "notion",
    last_modified: document.last_modified,
    created_time: document.created_time,
    tags: document.tags,
    resource_id: document.resource_id,
    parent_page_id: document.parent_page_id ?? "",
    last_synced: syncedAt,
  };
}

/**
 * Storage units for a document: one whole unit when it fits, otherwise
 * chunks "{id}_chunk_{j}" that point back at the document via parent_id.
 */
export function buildUnits(document: SourceDocument, chunkSize: number, syncedAt: string): PlannedUnit[] {
  const base = documentMetadata(document, syncedAt);
  const limit = Math.min(chunkSize, MAX_CHUNK_CHARS);

  if (document.text.length <= limit) {
    return [{
      id: document.id,
      text: document.text,
      metadata: { ...base, content_hash: sha256(document.text) },
    }];
  }

  return chunkText(document.text, limit).map((text, index) => {
    const id = chunkId(document.id, index);
    return {
      id,
      text,
      metadata: {
        ...base,
        content_hash: sha256(text),
        parent_id: document.id,
        chunk_index: index,
        chunk_id: id,
      },
    };
  });
}
