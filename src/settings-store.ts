/**
 * NotionRAG: Settings Store
 *
 * Runtime-tunable key/value settings persisted as <data_dir>/settings.json.
 * Only overrides are written; every read falls back to DEFAULT_SETTINGS.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import { z } from "zod";
import { UnknownSettingError } from "./errors.js";
import { EventLogger, ensureDir, isMissingFileError, readJson, truncatePreview, writeJson } from "./utils.js";

export const MAX_CHUNK_CHARS = 6000;

export interface Settings {
  welcome_message: string;
  system_prompt: string;
  similarity_threshold: number;
  max_history: number;
  chunk_size: number;
  message_history_limit: number;
  max_content_chars: number;
  max_tokens: number;
  num_retrieved_results: number;
  llm_model: string;
  embedding_model: string;
}

export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = {
  welcome_message: "Hello! Ask me anything about your Notion content!",
  system_prompt: "You are a helpful assistant answering questions based on the provided context.",
  similarity_threshold: 0.7,
  max_history: 3,
  chunk_size: 2000,
  message_history_limit: 3,
  max_content_chars: 12000,
  max_tokens: 3000,
  num_retrieved_results: 5,
  llm_model: "gpt-5-mini",
  embedding_model: "text-embedding-3-small",
};

export const SETTING_KEYS: SettingKey[] = Object.keys(DEFAULT_SETTINGS).filter(isSettingKey);

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed[0] === trimmed[trimmed.length - 1] && (trimmed[0] === '"' || trimmed[0] === "'")) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

const text = z.coerce.string().transform(stripQuotes);
const count = z.coerce.number().int().min(0);
const positive = z.coerce.number().int().positive();

/** Coerces a stored or user-supplied value to the default's type */
const SettingsSchema = z.object({
  welcome_message: text,
  system_prompt: text,
  similarity_threshold: z.coerce.number().min(0).max(1),
  max_history: count,
  chunk_size: positive.transform(v => Math.min(v, MAX_CHUNK_CHARS)),
  message_history_limit: count,
  max_content_chars: positive,
  max_tokens: positive,
  num_retrieved_results: positive,
  llm_model: text.pipe(z.string().min(1)),
  embedding_model: text.pipe(z.string().min(1)),
});

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

export class SettingsStore {
  readonly filePath: string;
  private logger: EventLogger;

  constructor(dataDir: string, logger: EventLogger = new EventLogger({ echo: false })) {
    this.filePath = path.join(dataDir, "settings.json");
    this.logger = logger;
  }

  async get<K extends SettingKey>(key: K): Promise<Settings[K]> {
    const all = await this.getAll();
    return all[key];
  }

  /**
   * Defaults overlaid with every stored value that still coerces
   */
  async getAll(): Promise<Settings> {
    const stored = await this.readOverrides();
    const merged: Settings = { ...DEFAULT_SETTINGS };

    for (const [key, raw] of Object.entries(stored)) {
      if (!isSettingKey(key)) {
        await this.logger.warn("settings", `Ignoring unknown stored setting: ${key}`);
        continue;
      }
      const parsed = SettingsSchema.shape[key].safeParse(raw);
      if (parsed.success) {
        Object.assign(merged, { [key]: parsed.data });
      } else {
        await this.logger.warn("settings", `Stored value for ${key} is invalid, using default`, {
          value: truncatePreview(JSON.stringify(raw)),
        });
      }
    }

    return merged;
  }

  /**
   * Validate, coerce and persist one setting. Returns the stored value.
   */
  async set(key: string, value: unknown): Promise<Settings[SettingKey]> {
    if (!isSettingKey(key)) {
      throw new UnknownSettingError(key, SETTING_KEYS);
    }
    const coerced = SettingsSchema.shape[key].parse(value);

    const stored = await this.readOverrides();
    stored[key] = coerced;
    await this.writeOverrides(stored);
    await this.logger.info("settings", `Setting updated: ${key}`);
    return coerced;
  }

  /**
   * Reset one key, or every key when none is given
   */
  async reset(key?: string): Promise<void> {
    if (key === undefined) {
      await this.writeOverrides({});
      await this.logger.info("settings", "All settings reset to defaults");
      return;
    }
    if (!isSettingKey(key)) {
      throw new UnknownSettingError(key, SETTING_KEYS);
    }
    const stored = await this.readOverrides();
    delete stored[key];
    await this.writeOverrides(stored);
    await this.logger.info("settings", `Setting reset: ${key}`);
  }

  private async readOverrides(): Promise<Record<string, unknown>> {
    try {
      const data = await readJson<unknown>(this.filePath);
      const parsed = z.record(z.unknown()).safeParse(data);
      if (parsed.success) return parsed.data;
      await this.logger.warn("settings", "Settings file is not an object, using defaults");
      return {};
    } catch (err) {
      if (!isMissingFileError(err)) {
        await this.logger.error("settings", "Failed to read settings, using defaults", {
          error: truncatePreview(err),
        });
      }
      return {};
    }
  }

  private async writeOverrides(values: Record<string, unknown>): Promise<void> {
    await ensureDir(path.dirname(this.filePath));
    await writeJson(this.filePath, values);
  }
}
