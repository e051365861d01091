/**
 * Persisted Vector Index Tests
 *
 * JsonlVectorCollection and CollectionManager against temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { mkdtemp, rm, readFile } from 'fs/promises';
import { tmpdir } from 'os';

import { JsonlVectorCollection, matchesWhere } from '../src/vector-store.js';
import { CollectionManager, mergeConfig } from '../src/collection-manager.js';
import { LocalEmbeddingProvider } from '../src/embeddings.js';
import { CollectionNotFoundError, StoreError } from '../src/errors.js';
import type { StorageUnit } from '../src/types.js';

function unit(id: string, text: string, metadata: StorageUnit['metadata'] = {}): StorageUnit {
  return { id, text, metadata };
}

describe('JsonlVectorCollection', () => {
  let tempDir: string;
  let collection: JsonlVectorCollection;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'notion-rag-store-test-'));
    collection = new JsonlVectorCollection(tempDir, 'docs', new LocalEmbeddingProvider(32));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates a manifest on first use', async () => {
    const manifest = await collection.init();

    expect(manifest).toMatchObject({
      name: 'docs',
      embedding_model: 'local-hash-32',
      dimensions: 0,
      distance: 'cosine',
    });
    const onDisk = JSON.parse(await readFile(path.join(tempDir, 'docs', 'collection.json'), 'utf-8'));
    expect(onDisk.name).toBe('docs');
  });

  it('adds entries with embeddings and records the dimensions', async () => {
    await collection.add([unit('a', 'alpha'), unit('b', 'beta')]);

    const entries = await collection.get(['b', 'missing']);
    expect(entries.map(e => e.id)).toEqual(['b']);
    expect(entries[0].embedding).toHaveLength(32);
    expect((await collection.getManifest()).dimensions).toBe(32);
  });

  it('rejects a batch containing an existing id', async () => {
    await collection.add([unit('a', 'alpha')]);

    const attempt = collection.add([unit('b', 'beta'), unit('a', 'again')]);

    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toMatchObject({ code: 'ID_EXISTS', ids: ['a'] });
    expect(await collection.count()).toBe(1);
  });

  it('rejects an update for a missing id', async () => {
    await collection.add([unit('a', 'alpha')]);

    await expect(collection.update([unit('a', 'alpha 2'), unit('z', 'zeta')]))
      .rejects.toMatchObject({ code: 'NOT_FOUND', ids: ['z'] });
    expect((await collection.get(['a']))[0].text).toBe('alpha');
  });

  it('ignores missing ids on delete', async () => {
    await collection.add([unit('a', 'alpha'), unit('b', 'beta')]);

    await collection.delete(['a', 'nope']);

    expect((await collection.get()).map(e => e.id)).toEqual(['b']);
  });

  it('ranks the closest entry first and applies where filters', async () => {
    await collection.add([
      unit('a', 'alpha', { resource_id: 'db-1' }),
      unit('b', 'beta', { resource_id: 'db-1' }),
      unit('c', 'gamma', { resource_id: 'db-2' }),
    ]);

    const matches = await collection.query('beta', 3);
    expect(matches[0].id).toBe('b');
    expect(matches[0].distance).toBeCloseTo(0, 10);
    expect(matches.map(m => m.distance)).toEqual([...matches.map(m => m.distance)].sort((x, y) => x - y));

    const filtered = await collection.query('gamma', 3, { resource_id: 'db-1' });
    expect(filtered.map(m => m.id).sort()).toEqual(['a', 'b']);
  });

  it('persists across instances', async () => {
    await collection.add([unit('a', 'alpha', { title: 'A' })]);

    const reopened = new JsonlVectorCollection(tempDir, 'docs', new LocalEmbeddingProvider(32));
    const entries = await reopened.get();

    expect(entries).toHaveLength(1);
    expect(entries[0].metadata).toEqual({ title: 'A' });
  });

  it('refuses a collection built with another embedding model', async () => {
    await collection.add([unit('a', 'alpha')]);

    const other = new JsonlVectorCollection(tempDir, 'docs', new LocalEmbeddingProvider(64));

    await expect(other.get()).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
  });

  it('clears every entry and peeks in insertion order', async () => {
    await collection.add([unit('a', 'alpha'), unit('b', 'beta'), unit('c', 'gamma')]);

    expect((await collection.peek(2)).map(e => e.id)).toEqual(['a', 'b']);
    await collection.clear();
    expect(await collection.count()).toBe(0);
  });

  it('matches where filters on exact values', () => {
    expect(matchesWhere({ a: 1, b: 'x' }, { a: 1 })).toBe(true);
    expect(matchesWhere({ a: 1 }, { a: '1' })).toBe(false);
    expect(matchesWhere({ a: 1 })).toBe(true);
  });
});

describe('CollectionManager', () => {
  let tempDir: string;
  let manager: CollectionManager;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'notion-rag-manager-test-'));
    manager = new CollectionManager(new LocalEmbeddingProvider(16), {
      storage: { data_dir: tempDir, default_collection: 'main' },
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('merges configuration per section', () => {
    const config = mergeConfig({ store: { add_batch_size: 5 } });
    expect(config.store).toEqual({
      add_batch_size: 5,
      update_batch_size: 20,
      delete_batch_size: 100,
      continue_on_error: true,
    });
    expect(config.notion.requests_per_second).toBe(3);
  });

  it('lists collections and resolves the active one', async () => {
    await manager.openCollection('zeta');
    const active = await manager.resolve();

    expect(active.name).toBe('main');
    expect(await manager.listCollections()).toEqual(['main', 'zeta']);
  });

  it('switches the active collection only to existing ones', async () => {
    await manager.openCollection('other');

    expect(await manager.setActive('other')).toBe('other');
    expect(manager.getActiveName()).toBe('other');
    await expect(manager.setActive('missing')).rejects.toBeInstanceOf(CollectionNotFoundError);
    expect(manager.getActiveName()).toBe('other');
  });

  it('rejects invalid collection names', async () => {
    await expect(manager.openCollection('../escape')).rejects.toThrow();
  });

  it('clears a collection and reports the removed count', async () => {
    const collection = await manager.openCollection('main');
    await collection.add([unit('a', 'alpha'), unit('b', 'beta')]);

    expect(await manager.clear('main')).toBe(2);
    expect(await collection.count()).toBe(0);
  });
});
