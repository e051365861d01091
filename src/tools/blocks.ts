/**
 * NotionRAG: Fragment Handlers
 *
 * Closed set of Notion block types rendered to plain text. Anything outside
 * the set classifies as "unhandled" and is skipped by the flattener.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { BlockContent } from "./connect.js";

export const FRAGMENT_TYPES = [
  "paragraph",
  "heading_1",
  "heading_2",
  "heading_3",
  "bulleted_list_item",
  "numbered_list_item",
  "to_do",
  "toggle",
  "code",
  "quote",
  "divider",
  "callout",
  "child_page",
  "child_database",
  "equation",
  "bookmark",
] as const;

export type FragmentType = (typeof FRAGMENT_TYPES)[number];

export type FragmentKind =
  | { kind: "handled"; type: FragmentType }
  | { kind: "unhandled"; type: string };

export interface RenderContext {
  /** 1-based position within a run of numbered_list_item siblings */
  ordinal: number;
}

export type FragmentHandler = (content: BlockContent, ctx: RenderContext) => string;

export function richText(segments: BlockContent["rich_text"] | undefined): string {
  return (segments ?? []).map(s => s.plain_text).join("");
}

function prefixed(prefix: string): FragmentHandler {
  return content => {
    const text = richText(content.rich_text);
    return text ? `${prefix}${text}` : "";
  };
}

export const FRAGMENT_HANDLERS: Record<FragmentType, FragmentHandler> = {
  paragraph: content => richText(content.rich_text),
  heading_1: prefixed("# "),
  heading_2: prefixed("## "),
  heading_3: prefixed("### "),
  bulleted_list_item: prefixed("• "),
  numbered_list_item: (content, ctx) => {
    const text = richText(content.rich_text);
    return text ? `${ctx.ordinal}. ${text}` : "";
  },
  to_do: content => {
    const text = richText(content.rich_text);
    return text ? `${content.checked ? "[x]" : "[ ]"} ${text}` : "";
  },
  toggle: prefixed("▸ "),
  code: content => {
    const text = richText(content.rich_text);
    if (!text) return "";
    const language = content.language && content.language !== "plain text" ? content.language : "";
    return "```" + language + "\n" + text + "\n```";
  },
  quote: prefixed("> "),
  divider: () => "----",
  callout: content => {
    const text = richText(content.rich_text);
    if (!text) return "";
    const emoji = content.icon?.emoji;
    return emoji ? `${emoji} ${text}` : text;
  },
  child_page: content => (content.title ? `Subpage: ${content.title}` : ""),
  child_database: content => (content.title ? `Database: ${content.title}` : ""),
  equation: content => content.expression ?? "",
  bookmark: content => {
    const caption = richText(content.caption);
    if (!content.url) return caption;
    return caption ? `${caption} (${content.url})` : content.url;
  },
};

const KNOWN = new Set<string>(FRAGMENT_TYPES);

function isFragmentType(type: string): type is FragmentType {
  return KNOWN.has(type);
}

export function classifyFragment(type: string): FragmentKind {
  return isFragmentType(type) ? { kind: "handled", type } : { kind: "unhandled", type };
}
