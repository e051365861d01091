/**
 * Persistent Store Adapter Tests
 *
 * Runs the adapter against an in-memory collection whose failures the
 * tests script per call.
 */

import { describe, it, expect } from 'vitest';
import { StoreAdapter, cleanMetadata } from '../src/tools/index.js';
import { LocalEmbeddingProvider } from '../src/embeddings.js';
import { InvariantError, StoreError } from '../src/errors.js';
import type { VectorCollection } from '../src/vector-store.js';
import type { IndexEntry, QueryMatch, StorageUnit } from '../src/types.js';

// ============================================================================
// In-memory Collection
// ============================================================================

type Operation = 'add' | 'update' | 'delete';

class MemoryCollection implements VectorCollection {
  readonly name = 'memory';
  readonly embedder = new LocalEmbeddingProvider(8);
  entries = new Map<string, StorageUnit>();
  calls: Array<{ op: Operation; ids: string[] }> = [];
  /** Return an error to fail the call */
  failWith?: (op: Operation, ids: string[]) => Error | undefined;

  async get(ids?: string[]): Promise<IndexEntry[]> {
    const all = [...this.entries.values()].map(e => ({ ...e, embedding: [] }));
    return ids ? all.filter(e => ids.includes(e.id)) : all;
  }

  async add(items: StorageUnit[]): Promise<void> {
    this.record('add', items.map(i => i.id));
    const existing = items.filter(i => this.entries.has(i.id)).map(i => i.id);
    if (existing.length > 0) throw new StoreError('ID_EXISTS', 'exists', existing);
    for (const item of items) this.entries.set(item.id, item);
  }

  async update(items: StorageUnit[]): Promise<void> {
    this.record('update', items.map(i => i.id));
    const missing = items.filter(i => !this.entries.has(i.id)).map(i => i.id);
    if (missing.length > 0) throw new StoreError('NOT_FOUND', 'missing', missing);
    for (const item of items) this.entries.set(item.id, item);
  }

  async delete(ids: string[]): Promise<void> {
    this.record('delete', ids);
    for (const id of ids) this.entries.delete(id);
  }

  async query(): Promise<QueryMatch[]> {
    return [];
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async peek(n: number): Promise<IndexEntry[]> {
    return (await this.get()).slice(0, n);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  private record(op: Operation, ids: string[]): void {
    this.calls.push({ op, ids });
    const err = this.failWith?.(op, ids);
    if (err) throw err;
  }
}

function unit(id: string, text = `text of ${id}`): StorageUnit {
  return { id, text, metadata: {} };
}

function adapterFor(collection: MemoryCollection, options: ConstructorParameters<typeof StoreAdapter>[1] = {}) {
  return new StoreAdapter(collection, { clockSeconds: () => 1700000000, ...options });
}

// ============================================================================
// Metadata Cleaning
// ============================================================================

describe('cleanMetadata', () => {
  it('reduces values to scalars', () => {
    expect(cleanMetadata({
      tags: ['a', 'b'],
      parent_page_id: null,
      missing: undefined,
      chunk_index: 2,
      done: false,
      title: 'T',
      when: new Date('2024-01-02T03:04:05.000Z'),
      nested: { a: 1 },
    })).toEqual({
      tags: 'a, b',
      parent_page_id: '',
      missing: '',
      chunk_index: 2,
      done: false,
      title: 'T',
      when: '2024-01-02T03:04:05.000Z',
      nested: '{"a":1}',
    });
  });

  it('turns an empty tag list into an empty string', () => {
    expect(cleanMetadata({ tags: [] })).toEqual({ tags: '' });
  });
});

// ============================================================================
// Add
// ============================================================================

describe('StoreAdapter.add', () => {
  it('writes in sub-batches', async () => {
    const collection = new MemoryCollection();
    const adapter = adapterFor(collection, { addBatchSize: 2 });

    const outcome = await adapter.add(['a', 'b', 'c'], ['1', '2', '3'], [{}, {}, {}]);

    expect(collection.calls).toEqual([
      { op: 'add', ids: ['a', 'b'] },
      { op: 'add', ids: ['c'] },
    ]);
    expect(outcome.written.map(w => w.stored_id)).toEqual(['a', 'b', 'c']);
    expect(outcome.dropped).toEqual([]);
  });

  it('retries a colliding id under a timestamped alternate', async () => {
    const collection = new MemoryCollection();
    collection.entries.set('a', unit('a', 'old'));
    const adapter = adapterFor(collection);

    const outcome = await adapter.add(['a', 'b'], ['new a', 'new b'], [{}, {}]);

    expect(outcome.written).toEqual([
      { id: 'a', stored_id: 'a_1700000000' },
      { id: 'b', stored_id: 'b' },
    ]);
    expect(collection.entries.get('a')?.text).toBe('old');
    expect(collection.entries.get('a_1700000000')?.text).toBe('new a');
  });

  it('drops an item whose alternate id also collides', async () => {
    const collection = new MemoryCollection();
    collection.entries.set('a', unit('a'));
    collection.entries.set('a_1700000000', unit('a_1700000000'));
    const adapter = adapterFor(collection);

    const outcome = await adapter.add(['a', 'b'], ['x', 'y'], [{}, {}]);

    expect(outcome.dropped).toEqual(['a']);
    expect(outcome.written).toEqual([{ id: 'b', stored_id: 'b' }]);
  });

  it('continues past a failed batch', async () => {
    const collection = new MemoryCollection();
    collection.failWith = (op, ids) => (op === 'add' && ids.includes('a') ? new Error('disk hiccup') : undefined);
    const adapter = adapterFor(collection, { addBatchSize: 1 });

    const outcome = await adapter.add(['a', 'b'], ['1', '2'], [{}, {}]);

    expect(outcome.dropped).toEqual(['a']);
    expect(outcome.written).toEqual([{ id: 'b', stored_id: 'b' }]);
  });

  it('stops on the first failed batch when continueOnError is off', async () => {
    const collection = new MemoryCollection();
    collection.failWith = op => (op === 'add' ? new Error('disk hiccup') : undefined);
    const adapter = adapterFor(collection, { continueOnError: false });

    await expect(adapter.add(['a'], ['1'], [{}])).rejects.toThrow('disk hiccup');
  });

  it('propagates an unreachable store', async () => {
    const collection = new MemoryCollection();
    collection.failWith = () => new StoreError('STORE_UNAVAILABLE', 'gone');
    const adapter = adapterFor(collection);

    await expect(adapter.add(['a'], ['1'], [{}])).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  it('rejects mismatched input lengths', async () => {
    const adapter = adapterFor(new MemoryCollection());
    await expect(adapter.add(['a', 'b'], ['1'], [{}, {}])).rejects.toBeInstanceOf(InvariantError);
  });

  it('cleans metadata before writing', async () => {
    const collection = new MemoryCollection();
    const adapter = adapterFor(collection);

    await adapter.add(['a'], ['1'], [{ tags: ['x', 'y'], parent_page_id: null }]);

    expect(collection.entries.get('a')?.metadata).toEqual({ tags: 'x, y', parent_page_id: '' });
  });
});

// ============================================================================
// Update / Delete
// ============================================================================

describe('StoreAdapter.update', () => {
  it('updates existing items and adds missing ones', async () => {
    const collection = new MemoryCollection();
    collection.entries.set('a', unit('a', 'old'));
    const adapter = adapterFor(collection);

    const outcome = await adapter.update(['a', 'b'], ['new a', 'new b'], [{}, {}]);

    expect(outcome.written).toEqual([
      { id: 'a', stored_id: 'a' },
      { id: 'b', stored_id: 'b' },
    ]);
    expect(collection.entries.get('a')?.text).toBe('new a');
    expect(collection.entries.get('b')?.text).toBe('new b');
  });
});

describe('StoreAdapter.delete', () => {
  it('deletes in sub-batches and reports failures', async () => {
    const collection = new MemoryCollection();
    for (const id of ['a', 'b', 'c', 'd', 'e']) collection.entries.set(id, unit(id));
    collection.failWith = (op, ids) => (op === 'delete' && ids.includes('c') ? new Error('locked') : undefined);
    const adapter = adapterFor(collection, { deleteBatchSize: 2 });

    const outcome = await adapter.delete(['a', 'b', 'c', 'd', 'e']);

    expect(collection.calls.map(c => c.ids)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(outcome).toEqual({ deleted: ['a', 'b', 'e'], failed: ['c', 'd'] });
  });
});
