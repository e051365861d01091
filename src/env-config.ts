/**
 * NotionRAG: Environment Configuration
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { LogLevel, NotionRagConfigOverrides } from "./types.js";
import { ConfigError } from "./errors.js";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

export const EnvSchema = z
  .object({
    NOTION_TOKEN: optionalString,
    NOTION_RESOURCE_ID: optionalString,
    OPENAI_API_KEY: optionalString,
    EMBEDDING_PROVIDER: z.enum(["openai", "local"]).default("openai"),
    EMBEDDING_MODEL: optionalString,
    DATA_DIR: z.string().trim().min(1).default("./data"),
    COLLECTION_NAME: z.string().trim().min(1).default("notion_docs"),
    NOTION_RATE_LIMIT: z.coerce.number().int().positive().default(3),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  })
  .superRefine((env, ctx) => {
    if (!env.NOTION_TOKEN) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["NOTION_TOKEN"], message: "is required" });
    }
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "is required when EMBEDDING_PROVIDER is openai",
      });
    }
  });

export interface EnvConfig {
  notionToken: string;
  defaultResourceId?: string;
  openaiApiKey?: string;
  logLevel: LogLevel;
  transport: "stdio" | "http";
  port: number;
  overrides: NotionRagConfigOverrides;
}

/**
 * Read and validate process configuration. Throws ConfigError listing every
 * problem at once; callers treat that as fatal.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")} ${i.message}`));
  }
  const e = parsed.data;
  if (!e.NOTION_TOKEN) {
    throw new ConfigError(["NOTION_TOKEN is required"]);
  }

  return {
    notionToken: e.NOTION_TOKEN,
    defaultResourceId: e.NOTION_RESOURCE_ID,
    openaiApiKey: e.OPENAI_API_KEY,
    logLevel: e.LOG_LEVEL,
    transport: e.TRANSPORT,
    port: e.PORT,
    overrides: {
      storage: {
        data_dir: e.DATA_DIR,
        default_collection: e.COLLECTION_NAME,
      },
      notion: {
        requests_per_second: e.NOTION_RATE_LIMIT,
      },
      embedding: {
        provider: e.EMBEDDING_PROVIDER,
        ...(e.EMBEDDING_MODEL ? { model: e.EMBEDDING_MODEL } : {}),
      },
    },
  };
}
