/**
 * NotionRAG: Zod Schemas for Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const CollectionNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]{0,62}$/, "Collection names use letters, digits, _ and -, up to 63 characters")
  .describe("Vector collection name");

export const ResourceIdSchema = z
  .string()
  .trim()
  .min(1)
  .describe("Notion database or page id (with or without dashes)");

export const MessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
}).strict();

// ============================================================================
// Sync Schemas
// ============================================================================

export const SyncInputSchema = z.object({
  resource_id: ResourceIdSchema.optional()
    .describe("Database or page to sync (defaults to NOTION_RESOURCE_ID)"),
  collection: CollectionNameSchema.optional()
    .describe("Target collection (defaults to the active collection)"),
  test_mode: z.boolean().default(false)
    .describe("Sync only the first max_pages pages and skip deletions"),
  max_pages: z.number().int().min(1).max(1000).default(2)
    .describe("Page limit in test mode"),
}).strict();

// ============================================================================
// Retrieval Schemas
// ============================================================================

export const GetContextInputSchema = z.object({
  query: z.string().min(1).describe("User question"),
  history: z.array(MessageSchema).default([])
    .describe("Prior conversation turns, oldest first"),
  collection: CollectionNameSchema.optional(),
  conversational: z.boolean().default(true)
    .describe("Filter history by similarity and truncate to max_content_chars"),
}).strict();

// ============================================================================
// Collection Schemas
// ============================================================================

export const CollectionListInputSchema = z.object({}).strict();

export const CollectionSetInputSchema = z.object({
  collection: CollectionNameSchema,
}).strict();

export const CollectionStatusInputSchema = z.object({
  collection: CollectionNameSchema.optional(),
  peek: z.number().int().min(0).max(50).default(0)
    .describe("Number of entries to include in the response"),
}).strict();

export const CollectionClearInputSchema = z.object({
  collection: CollectionNameSchema,
  confirm: z.boolean().default(false)
    .describe("Must be true; removes every entry"),
}).strict();

// ============================================================================
// Settings Schemas
// ============================================================================

export const SettingsGetInputSchema = z.object({
  key: z.string().optional().describe("Setting key; omit for all settings"),
}).strict();

export const SettingsSetInputSchema = z.object({
  key: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]),
}).strict();

export const SettingsResetInputSchema = z.object({
  key: z.string().optional().describe("Setting key; omit to reset everything"),
}).strict();

// ============================================================================
// Type Exports
// ============================================================================

export type SyncInput = z.infer<typeof SyncInputSchema>;
export type GetContextInput = z.infer<typeof GetContextInputSchema>;
export type CollectionListInput = z.infer<typeof CollectionListInputSchema>;
export type CollectionSetInput = z.infer<typeof CollectionSetInputSchema>;
export type CollectionStatusInput = z.infer<typeof CollectionStatusInputSchema>;
export type CollectionClearInput = z.infer<typeof CollectionClearInputSchema>;
export type SettingsGetInput = z.infer<typeof SettingsGetInputSchema>;
export type SettingsSetInput = z.infer<typeof SettingsSetInputSchema>;
export type SettingsResetInput = z.infer<typeof SettingsResetInputSchema>;
