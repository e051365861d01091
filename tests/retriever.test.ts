/**
 * Retriever Tests
 *
 * Merge weights, context formatting and conversation filtering against a
 * scripted collection so distances and embeddings are exact.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';

import { CONTEXT_SEPARATOR, Retriever } from '../src/tools/serve.js';
import { SettingsStore } from '../src/settings-store.js';
import type { EmbeddingProvider } from '../src/embeddings.js';
import type { VectorCollection } from '../src/vector-store.js';
import type { IndexEntry, QueryMatch, RetrievedDocument, StorageUnit, WhereFilter } from '../src/types.js';

// ============================================================================
// Fakes
// ============================================================================

class ScriptedEmbedder implements EmbeddingProvider {
  readonly name = 'local' as const;
  readonly model = 'scripted';
  failing = false;

  constructor(private vectors: Record<string, number[]>) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (this.failing) throw new Error('embedding service down');
    return texts.map(t => this.vectors[t] ?? [0, 0]);
  }
}

class ScriptedCollection implements VectorCollection {
  readonly name = 'docs';
  queries: Array<{ text: string; k: number; where?: WhereFilter }> = [];

  constructor(readonly embedder: EmbeddingProvider, private results: Record<string, QueryMatch[]>) {}

  async query(text: string, k: number, where?: WhereFilter): Promise<QueryMatch[]> {
    this.queries.push({ text, k, where });
    return (this.results[text] ?? []).slice(0, k);
  }

  async get(): Promise<IndexEntry[]> { return []; }
  async add(_items: StorageUnit[]): Promise<void> {}
  async update(_items: StorageUnit[]): Promise<void> {}
  async delete(_ids: string[]): Promise<void> {}
  async count(): Promise<number> { return 0; }
  async peek(): Promise<IndexEntry[]> { return []; }
  async clear(): Promise<void> {}
}

function match(id: string, distance: number, title?: string, url?: string): QueryMatch {
  const metadata: QueryMatch['metadata'] = {};
  if (title !== undefined) metadata.title = title;
  if (url !== undefined) metadata.url = url;
  return { id, text: `text of ${id}`, metadata, distance };
}

function doc(id: string, distance: number): RetrievedDocument {
  return { id, text: id, metadata: {}, distance };
}

// ============================================================================
// Tests
// ============================================================================

describe('Retriever', () => {
  let tempDir: string;
  let settings: SettingsStore;
  let embedder: ScriptedEmbedder;
  let collection: ScriptedCollection;
  let retriever: Retriever;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'notion-rag-retriever-test-'));
    settings = new SettingsStore(tempDir);
    embedder = new ScriptedEmbedder({
      'q': [1, 0],
      'about q': [1, 0],
      'also about q': [0.9, 0.1],
      'unrelated': [0, 1],
    });
    collection = new ScriptedCollection(embedder, {
      'q': [match('a', 0.2, 'Alpha', 'https://n/a'), match('b', 0.5, 'Beta', 'https://n/b')],
      'about q': [match('c', 0.1, 'Gamma', 'https://n/c'), match('a', 0.05, 'Alpha', 'https://n/a')],
      'about q also about q': [match('c', 0.1, 'Gamma', 'https://n/c')],
    });
    retriever = new Retriever(collection, settings);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('weights direct hits above conversation hits and keeps the first occurrence', () => {
    const merged = retriever.mergeAndRerank(
      [doc('a', 0.5), doc('b', 0.9)],
      [doc('b', 0.1), doc('c', 0.4)],
    );

    expect(merged.map(d => d.id)).toEqual(['a', 'c', 'b']);
    expect(merged[0].distance).toBeCloseTo(0.35, 10);
    expect(merged[1].distance).toBeCloseTo(0.4, 10);
    expect(merged[2].distance).toBeCloseTo(0.63, 10);
  });

  it('keeps merge order for equal distances', () => {
    const merged = retriever.mergeAndRerank([doc('x', 1)], [doc('y', 0.7)]);
    expect(merged.map(d => d.id)).toEqual(['x', 'y']);
  });

  it('formats one block per title', () => {
    const context = retriever.formatContext([
      { id: 'a_0', text: 'one', metadata: { title: 'A', url: 'https://n/a' }, distance: 0 },
      { id: 'a_1', text: 'two', metadata: { title: 'A', url: 'https://n/a' }, distance: 0 },
      { id: 'z', text: 'three', metadata: {}, distance: 0 },
    ]);

    expect(context).toBe(
      'Title: A\nURL: https://n/a\nContent: one' +
      CONTEXT_SEPARATOR +
      'Title: Untitled\nURL: \nContent: three',
    );
  });

  it('retrieves num_retrieved_results for the query alone', async () => {
    await settings.set('num_retrieved_results', 1);

    const context = await retriever.getContextForQuery('q');

    expect(collection.queries).toEqual([{ text: 'q', k: 1, where: undefined }]);
    expect(context).toBe('Title: Alpha\nURL: https://n/a\nContent: text of a');
  });

  it('adds a second retrieval over the joined history', async () => {
    const context = await retriever.getContextForQuery('q', [
      { role: 'user', content: 'about q' },
      { role: 'assistant', content: 'also about q' },
    ], { resource_id: 'db-1' });

    expect(collection.queries.map(c => [c.text, c.where])).toEqual([
      ['q', { resource_id: 'db-1' }],
      ['about q also about q', { resource_id: 'db-1' }],
    ]);
    // a: 0.2 * 0.7 = 0.14, c: 0.1, b: 0.5 * 0.7 = 0.35
    expect(context.split(CONTEXT_SEPARATOR).map(block => block.split('\n')[0])).toEqual([
      'Title: Gamma',
      'Title: Alpha',
      'Title: Beta',
    ]);
  });

  it('keeps only history similar to the query', async () => {
    const result = await retriever.getConversationContext('q', [
      { role: 'user', content: 'unrelated' },
      { role: 'user', content: 'about q' },
    ]);

    expect(result.conversation).toEqual([{ role: 'user', content: 'about q' }]);
    expect(collection.queries.map(c => c.text)).toEqual(['q', 'about q']);
    expect(result.truncated).toBe(false);
  });

  it('keeps the most recent max_history relevant turns', async () => {
    await settings.set('max_history', 1);

    const result = await retriever.getConversationContext('q', [
      { role: 'user', content: 'about q' },
      { role: 'assistant', content: 'also about q' },
    ]);

    expect(result.conversation).toEqual([{ role: 'assistant', content: 'also about q' }]);
  });

  it('drops all history when max_history is 0', async () => {
    await settings.set('max_history', 0);

    const result = await retriever.getConversationContext('q', [{ role: 'user', content: 'about q' }]);

    expect(result.conversation).toEqual([]);
    expect(collection.queries.map(c => c.text)).toEqual(['q']);
  });

  it('truncates context beyond max_content_chars', async () => {
    await settings.set('max_content_chars', 10);

    const result = await retriever.getConversationContext('q');

    expect(result).toEqual({ context: 'Title: Alp...', conversation: [], truncated: true });
  });

  it('falls back to the query alone when history cannot be embedded', async () => {
    embedder.failing = true;

    const result = await retriever.getConversationContext('q', [{ role: 'user', content: 'about q' }]);

    expect(result.conversation).toEqual([]);
    expect(collection.queries.map(c => c.text)).toEqual(['q']);
    expect(result.context).toBe(
      'Title: Alpha\nURL: https://n/a\nContent: text of a' +
      CONTEXT_SEPARATOR +
      'Title: Beta\nURL: https://n/b\nContent: text of b',
    );
  });
});
