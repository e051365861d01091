/**
 * NotionRAG: Embedding Providers
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import OpenAI from "openai";
import type { EmbeddingProviderName } from "./types.js";
import { EmbeddingError } from "./errors.js";
import { generateMockEmbedding } from "./utils.js";

export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

// ============================================================================
// OpenAI
// ============================================================================

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  dimensions?: number;
  batchSize?: number;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai" as const;
  readonly model: string;
  private client: OpenAI;
  private dimensions?: number;
  private batchSize: number;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize ?? 50;
    // maxRetries 1: a 429 gets one wait-and-retry, honoring retry-after
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 30000,
      maxRetries: 1,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      try {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          dimensions: this.dimensions,
        });
        // Sort by index to maintain order
        const sorted = [...response.data].sort((a, b) => a.index - b.index);
        vectors.push(...sorted.map(d => d.embedding));
      } catch (err) {
        throw new EmbeddingError(
          `Embedding request failed for batch ${Math.floor(i / this.batchSize) + 1}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }
    }

    return vectors;
  }
}

// ============================================================================
// Local (deterministic, offline)
// ============================================================================

/**
 * Hash-seeded unit vectors. Identical texts embed identically; distinct texts
 * are close to orthogonal. No network.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "local" as const;
  readonly model: string;

  constructor(readonly dimensions: number = 256) {
    this.model = `local-hash-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => generateMockEmbedding(text, this.dimensions));
  }
}

export function createEmbeddingProvider(options: {
  provider: EmbeddingProviderName;
  model: string;
  apiKey?: string;
  dimensions?: number;
  batchSize?: number;
  timeoutMs?: number;
}): EmbeddingProvider {
  if (options.provider === "local") {
    return new LocalEmbeddingProvider(options.dimensions);
  }
  if (!options.apiKey) {
    throw new EmbeddingError("OpenAI embeddings need an API key");
  }
  return new OpenAIEmbeddingProvider({
    apiKey: options.apiKey,
    model: options.model,
    dimensions: options.dimensions,
    batchSize: options.batchSize,
    timeoutMs: options.timeoutMs,
  });
}
