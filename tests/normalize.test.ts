/**
 * Content Normalizer and Chunking Engine Tests
 *
 * Covers:
 * 1. Fragment rendering - handled types, nesting, numbered runs, unhandled skips
 * 2. Page metadata - title strategies, tags, scalar extras
 * 3. normalizePage - document text composition and fallbacks
 * 4. chunkText / buildUnits - packing, sentence split, hard cuts, size cap
 */

import { describe, it, expect } from 'vitest';
import {
  NotionPageSchema,
  type FragmentNode,
  type NotionPage,
} from '../src/tools/connect.js';
import { classifyFragment } from '../src/tools/blocks.js';
import {
  buildUnits,
  chunkText,
  extractExtras,
  extractTags,
  extractTitle,
  flattenFragments,
  normalizePage,
} from '../src/tools/normalize.js';
import { sha256 } from '../src/utils.js';
import type { SourceDocument } from '../src/types.js';

// ============================================================================
// Test Helpers
// ============================================================================

let nextId = 0;

function block(
  type: string,
  text: string,
  extra: Partial<FragmentNode['content']> = {},
  children: FragmentNode[] = []
): FragmentNode {
  nextId++;
  return {
    id: `block-${nextId}`,
    type,
    content: { rich_text: text ? [{ plain_text: text }] : [], ...extra },
    children,
  };
}

function page(overrides: Record<string, unknown> = {}): NotionPage {
  return NotionPageSchema.parse({
    id: 'page-1',
    created_time: '2024-01-01T00:00:00.000Z',
    last_edited_time: '2024-02-01T00:00:00.000Z',
    url: 'https://www.notion.so/page-1',
    properties: {},
    ...overrides,
  });
}

function titleProperty(text: string) {
  return { type: 'title', title: [{ plain_text: text }] };
}

function makeDocument(text: string, overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id: 'doc-1',
    title: 'Doc',
    text,
    last_modified: '2024-02-01T00:00:00.000Z',
    created_time: '2024-01-01T00:00:00.000Z',
    tags: ['a', 'b'],
    resource_id: 'db-1',
    url: 'https://www.notion.so/doc1',
    extra: {},
    ...overrides,
  };
}

// ============================================================================
// Fragment Flattening
// ============================================================================

describe('flattenFragments', () => {
  it('renders headings, lists and nesting in document order', () => {
    const { text, skipped } = flattenFragments([
      block('heading_1', 'Intro'),
      block('paragraph', 'Hello'),
      block('bulleted_list_item', 'a', {}, [block('bulleted_list_item', 'b')]),
      block('numbered_list_item', 'one'),
      block('numbered_list_item', 'two'),
      block('paragraph', 'x'),
      block('numbered_list_item', 'again'),
    ]);

    expect(text).toBe('# Intro\n\nHello\n\n• a\n    • b\n\n1. one\n\n2. two\n\nx\n\n1. again');
    expect(skipped).toEqual([]);
  });

  it('skips unhandled fragment types and records them', () => {
    const image = block('image', '');
    const { text, skipped } = flattenFragments([block('paragraph', 'kept'), image]);

    expect(text).toBe('kept');
    expect(skipped).toEqual([{ id: image.id, type: 'image', reason: 'unhandled' }]);
  });

  it('still renders the children of an unhandled fragment', () => {
    const { text } = flattenFragments([
      block('column_list', '', {}, [block('paragraph', 'inside')]),
    ]);

    expect(text).toBe('    inside');
  });

  it('renders code, to-do, callout, bookmark and divider fragments', () => {
    const { text } = flattenFragments([
      block('code', 'print(1)', { language: 'lua' }),
      block('code', 'plain', { language: 'plain text' }),
      block('to_do', 'done', { checked: true }),
      block('to_do', 'open', { checked: false }),
      block('callout', 'Note', { icon: { emoji: '💡' } }),
      block('bookmark', '', { url: 'https://example.com', caption: [{ plain_text: 'Site' }] }),
      block('divider', ''),
      block('child_page', '', { title: 'Sub' }),
    ]);

    expect(text.split('\n\n')).toEqual([
      '```lua\nprint(1)\n```',
      '```\nplain\n```',
      '[x] done',
      '[ ] open',
      '💡 Note',
      'Site (https://example.com)',
      '----',
      'Subpage: Sub',
    ]);
  });

  it('drops fragments with no text', () => {
    const { text } = flattenFragments([block('paragraph', ''), block('paragraph', 'only')]);
    expect(text).toBe('only');
  });

  it('classifies the closed set of fragment types', () => {
    expect(classifyFragment('quote')).toEqual({ kind: 'handled', type: 'quote' });
    expect(classifyFragment('synced_block')).toEqual({ kind: 'unhandled', type: 'synced_block' });
  });
});

// ============================================================================
// Page Metadata
// ============================================================================

describe('page metadata', () => {
  it('prefers the Name property for the title', () => {
    const p = page({ properties: { Name: titleProperty('From Name'), Title: titleProperty('From Title') } });
    expect(extractTitle(p)).toBe('From Name');
  });

  it('falls back to any title-typed property', () => {
    const p = page({ properties: { Task: titleProperty('Ship it') } });
    expect(extractTitle(p)).toBe('Ship it');
  });

  it('uses the icon and fallback title for pages without a title property', () => {
    const p = page({ icon: { emoji: '📘' } });
    expect(extractTitle(p, 'Handbook')).toBe('📘 Handbook');
  });

  it('ends with the page id', () => {
    expect(extractTitle(page())).toBe('page-1');
  });

  it('collects tags from every multi_select property', () => {
    const p = page({
      properties: {
        Tags: { type: 'multi_select', multi_select: [{ name: 'a' }, { name: 'b' }] },
        Area: { type: 'multi_select', multi_select: [{ name: 'ops' }] },
      },
    });
    expect(extractTags(p)).toEqual(['a', 'b', 'ops']);
  });

  it('keys scalar extras by snake_case name and protects reserved keys', () => {
    const p = page({
      properties: {
        'Star Rating': { type: 'select', select: { name: '5' } },
        Link: { type: 'url', url: 'https://example.com/a' },
        URL: { type: 'url', url: 'https://example.com/b' },
        Done: { type: 'checkbox', checkbox: true },
        Owner: { type: 'people' },
      },
    });

    expect(extractExtras(p)).toEqual({
      star_rating: '5',
      link: 'https://example.com/a',
      prop_url: 'https://example.com/b',
      done: true,
    });
  });
});

// ============================================================================
// Normalize Page
// ============================================================================

describe('normalizePage', () => {
  it('composes title, tags and content', () => {
    const p = page({
      properties: {
        Name: titleProperty('Guide'),
        Tags: { type: 'multi_select', multi_select: [{ name: 'a' }, { name: 'b' }] },
      },
    });

    const { document } = normalizePage(p, [block('paragraph', 'Hello')], 'db-1', { parentPageId: 'root' });

    expect(document).toEqual({
      id: 'page-1',
      title: 'Guide',
      text: 'Title: Guide\nTags: a, b\nContent:\nHello',
      last_modified: '2024-02-01T00:00:00.000Z',
      created_time: '2024-01-01T00:00:00.000Z',
      tags: ['a', 'b'],
      resource_id: 'db-1',
      parent_page_id: 'root',
      url: 'https://www.notion.so/page-1',
      public_url: undefined,
      extra: {},
    });
  });

  it('writes Tags: None when the page has no tags', () => {
    const { document } = normalizePage(page(), [block('paragraph', 'Body')], 'db-1');
    expect(document?.text).toBe('Title: page-1\nTags: None\nContent:\nBody');
  });

  it('returns no document for a page without body text', () => {
    const { document } = normalizePage(page(), [block('paragraph', '')], 'db-1');
    expect(document).toBeNull();
  });

  it('fills in the missing edit time and url', () => {
    const p = page({ id: 'ab-cd', last_edited_time: undefined, url: undefined });
    const { document } = normalizePage(p, [block('paragraph', 'Body')], 'db-1', {
      now: () => '2024-03-03T00:00:00.000Z',
    });

    expect(document?.last_modified).toBe('2024-03-03T00:00:00.000Z');
    expect(document?.url).toBe('https://www.notion.so/abcd');
  });
});

// ============================================================================
// Chunking
// ============================================================================

describe('chunkText', () => {
  it('packs paragraphs up to the limit', () => {
    expect(chunkText('aaa\n\nbbb', 10)).toEqual(['aaa\n\nbbb']);
    expect(chunkText('aaaa\n\nbbbb', 8)).toEqual(['aaaa', 'bbbb']);
  });

  it('splits an oversized paragraph by sentence', () => {
    expect(chunkText('Hi\n\nAlpha beta. Gamma delta. Epsilon', 15)).toEqual([
      'Hi\n\nAlpha beta.',
      'Gamma delta.',
      'Epsilon',
    ]);
  });

  it('cuts an oversized sentence into fixed slices', () => {
    const chunks = chunkText('x'.repeat(25), 10);
    expect(chunks.map(c => c.length)).toEqual([10, 10, 5]);
  });

  it('caps the limit at 6000 characters', () => {
    const chunks = chunkText('y'.repeat(7000), 9000);
    expect(chunks.map(c => c.length)).toEqual([6000, 1000]);
  });

  it('is deterministic and respects the size limit', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence ${i} is here. And another one ${i}.`).join('\n\n');
    const first = chunkText(text, 200);

    expect(chunkText(text, 200)).toEqual(first);
    expect(first.every(c => c.length <= 200)).toBe(true);
  });
});

describe('buildUnits', () => {
  it('stores a short document whole under its own id', () => {
    const doc = makeDocument('short text');
    const units = buildUnits(doc, 2000, '2024-05-05T00:00:00.000Z');

    expect(units).toHaveLength(1);
    expect(units[0].id).toBe('doc-1');
    expect(units[0].metadata).toMatchObject({
      page_id: 'doc-1',
      source: 'notion',
      tags: ['a', 'b'],
      content_hash: sha256('short text'),
      last_synced: '2024-05-05T00:00:00.000Z',
      parent_page_id: '',
    });
    expect(units[0].metadata).not.toHaveProperty('parent_id');
  });

  it('chunks a long document with parent links', () => {
    const paragraphs = [998, 998, 998, 998, 998, 998, 1000].map((n, i) => String.fromCharCode(97 + i).repeat(n));
    const doc = makeDocument(paragraphs.join('\n\n'));

    const units = buildUnits(doc, 2000, '2024-05-05T00:00:00.000Z');

    expect(units.map(u => u.id)).toEqual(['doc-1_chunk_0', 'doc-1_chunk_1', 'doc-1_chunk_2', 'doc-1_chunk_3']);
    expect(units.map(u => u.text.length)).toEqual([1998, 1998, 1998, 1000]);
    expect(units[2].metadata).toMatchObject({
      parent_id: 'doc-1',
      chunk_index: 2,
      chunk_id: 'doc-1_chunk_2',
      content_hash: sha256(paragraphs[4] + '\n\n' + paragraphs[5]),
    });
  });
});
