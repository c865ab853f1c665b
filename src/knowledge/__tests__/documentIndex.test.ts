import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DocumentIndexStore,
  parseDocumentRecord,
  parseIndexFile,
  unknownRecordFields,
} from '../documentIndex';
import { CHUNKING_METHOD, type DocumentRecord } from '../types';

function record(name: string, collectionName: string): DocumentRecord {
  return {
    name,
    collectionName,
    sourcePath: `/docs/${name}`,
    fileType: 'txt',
    fileSizeBytes: 10,
    textLength: 10,
    indexedAtTimestamp: '2024-01-01T00:00:00.000Z',
    chunkingMethod: CHUNKING_METHOD,
    chunkCount: 1,
  };
}

let dir: string;
let file: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kb-index-'));
  file = path.join(dir, 'knowledge_base_index.json');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

/* ============= Parsing ============= */

describe('parseDocumentRecord', () => {
  it('reads legacy snake_case fields', () => {
    const parsed = parseDocumentRecord('Policy.pdf', {
      collection_name: 'doc_Policy_ab57b5fa',
      file_path: '/docs/Policy.pdf',
      indexed_at: '1700000000.0',
      file_type: 'pdf',
      file_size: 1234,
      text_length: 500,
    });
    expect(parsed).toEqual({
      name: 'Policy.pdf',
      collectionName: 'doc_Policy_ab57b5fa',
      sourcePath: '/docs/Policy.pdf',
      fileType: 'pdf',
      fileSizeBytes: 1234,
      textLength: 500,
      indexedAtTimestamp: '2023-11-14T22:13:20.000Z',
      chunkingMethod: 'recursive_character',
      chunkCount: 0,
    });
  });

  it('rejects entries without a collection name', () => {
    expect(parseDocumentRecord('x.txt', { file_path: '/x.txt' })).toBeNull();
    expect(parseDocumentRecord('x.txt', 'nope')).toBeNull();
  });
});

describe('parseIndexFile', () => {
  it('treats a current-schema file as not migrated', () => {
    const r = record('a.txt', 'doc_doc_a_1');
    const parsed = parseIndexFile({
      documents: { 'a.txt': r },
      collections: { doc_doc_a_1: 'a.txt' },
    });
    expect(parsed.migrated).toBe(false);
    expect(parsed.data.documents['a.txt']).toEqual(r);
  });

  it('rebuilds an inconsistent reverse map', () => {
    const parsed = parseIndexFile({
      documents: { 'a.txt': record('a.txt', 'doc_doc_a_1') },
      collections: { stale: 'gone.txt' },
    });
    expect(parsed.migrated).toBe(true);
    expect(parsed.data.collections).toEqual({ doc_doc_a_1: 'a.txt' });
  });
});

/* ============= DocumentIndexStore ============= */

describe('DocumentIndexStore', () => {
  it('starts empty when the file does not exist', async () => {
    const store = new DocumentIndexStore(file);
    expect(await store.refresh()).toEqual({ loaded: true, migrated: false });
    expect(store.size()).toBe(0);
  });

  it('migrates the legacy "pdfs" key and rewrites the file', async () => {
    await fs.writeFile(
      file,
      JSON.stringify({
        pdfs: {
          'Policy.pdf': {
            collection_name: 'doc_Policy_ab57b5fa',
            file_path: '/docs/Policy.pdf',
            file_type: 'pdf',
          },
        },
        collections: { doc_Policy_ab57b5fa: 'Policy.pdf' },
        version: 2,
      })
    );

    const store = new DocumentIndexStore(file);
    expect(await store.refresh()).toEqual({ loaded: true, migrated: true });
    expect(store.get('Policy.pdf')?.collectionName).toBe('doc_Policy_ab57b5fa');

    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(onDisk.pdfs).toBeUndefined();
    expect(onDisk.version).toBe(2);
    expect(onDisk.documents['Policy.pdf'].collectionName).toBe('doc_Policy_ab57b5fa');
    expect(onDisk.collections).toEqual({ doc_Policy_ab57b5fa: 'Policy.pdf' });
  });

  it('round-trips records through persist and refresh', async () => {
    const writer = new DocumentIndexStore(file);
    writer.set(record('a.txt', 'doc_doc_a_1'));
    expect(await writer.persist()).toBe(true);

    const reader = new DocumentIndexStore(file);
    await reader.refresh();
    expect(reader.get('a.txt')).toEqual(record('a.txt', 'doc_doc_a_1'));
    expect(reader.nameForCollection('doc_doc_a_1')).toBe('a.txt');
  });

  it('keeps the reverse map consistent on replace and delete', () => {
    const store = new DocumentIndexStore(file);
    store.set(record('a.txt', 'c1'));
    store.set(record('a.txt', 'c2'));
    expect(store.snapshot().collections).toEqual({ c2: 'a.txt' });

    expect(store.delete('a.txt')?.collectionName).toBe('c2');
    expect(store.snapshot()).toEqual({ documents: {}, collections: {} });
    expect(store.delete('a.txt')).toBeUndefined();
  });

  it('keeps the current view when the file is corrupt', async () => {
    const store = new DocumentIndexStore(file);
    store.set(record('a.txt', 'c1'));
    await fs.writeFile(file, '{ not json');
    expect(await store.refresh()).toEqual({ loaded: false, migrated: false });
    expect(store.has('a.txt')).toBe(true);
  });

  it('reports a failed write without throwing', async () => {
    // A directory where the file should be makes the rename fail.
    await fs.mkdir(file);
    const store = new DocumentIndexStore(file);
    store.set(record('a.txt', 'c1'));
    expect(await store.persist()).toBe(false);
    expect(store.has('a.txt')).toBe(true);
  });
});

describe('DocumentIndexStore after a failed write', () => {
  it('keeps the in-memory view on refresh and writes it once possible', async () => {
    await fs.mkdir(file);
    const store = new DocumentIndexStore(file);
    store.set(record('a.txt', 'c1'));
    expect(await store.persist()).toBe(false);

    expect(await store.refresh()).toEqual({ loaded: false, migrated: false });
    expect(store.has('a.txt')).toBe(true);

    await fs.rm(file, { recursive: true });
    expect(await store.refresh()).toEqual({ loaded: true, migrated: false });
    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(Object.keys(onDisk.documents)).toEqual(['a.txt']);
  });
});

describe('DocumentIndexStore refresh racing a local write', () => {
  it('discards a read that overlapped a set()', async () => {
    const other = new DocumentIndexStore(file);
    other.set(record('c.txt', 'doc_doc_c_1'));
    await other.persist();

    const store = new DocumentIndexStore(file);
    const pending = store.refresh();
    store.set(record('a.txt', 'doc_doc_a_1'));

    expect(await pending).toEqual({ loaded: false, migrated: false });
    expect(store.has('a.txt')).toBe(true);

    await store.persist();
    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(Object.keys(onDisk.documents)).toEqual(['a.txt']);
  });

  it('loads normally when nothing changed during the read', async () => {
    const writer = new DocumentIndexStore(file);
    writer.set(record('c.txt', 'doc_doc_c_1'));
    await writer.persist();

    const store = new DocumentIndexStore(file);
    expect(await store.refresh()).toEqual({ loaded: true, migrated: false });
    store.set(record('a.txt', 'doc_doc_a_1'));
    await store.persist();

    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(Object.keys(onDisk.documents).sort()).toEqual(['a.txt', 'c.txt']);
  });
});

describe('DocumentIndexStore unknown record fields', () => {
  it('keeps fields it does not read through migration and rewrite', async () => {
    await fs.writeFile(
      file,
      JSON.stringify({
        pdfs: {
          'Policy.pdf': {
            collection_name: 'doc_Policy_ab57b5fa',
            file_path: '/docs/Policy.pdf',
            page_count: 12,
            tags: ['health'],
          },
        },
      })
    );

    const store = new DocumentIndexStore(file);
    expect(await store.refresh()).toEqual({ loaded: true, migrated: true });

    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    const entry = onDisk.documents['Policy.pdf'];
    expect(entry.page_count).toBe(12);
    expect(entry.tags).toEqual(['health']);
    expect(entry.collectionName).toBe('doc_Policy_ab57b5fa');
    expect(entry.collection_name).toBeUndefined();
  });

  it('drops them with the record', async () => {
    await fs.writeFile(
      file,
      JSON.stringify({
        documents: { 'a.txt': { ...record('a.txt', 'doc_doc_a_1'), owner: 'ops' } },
        collections: { doc_doc_a_1: 'a.txt' },
      })
    );
    const store = new DocumentIndexStore(file);
    await store.refresh();
    store.delete('a.txt');
    store.set(record('a.txt', 'doc_doc_a_1'));
    await store.persist();

    const onDisk = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(onDisk.documents['a.txt'].owner).toBeUndefined();
  });
});

describe('unknownRecordFields', () => {
  it('returns only keys the parser does not read', () => {
    expect(unknownRecordFields({ collection_name: 'c', file_size: 3, page_count: 2 })).toEqual({
      page_count: 2,
    });
    expect(unknownRecordFields('nope')).toEqual({});
  });
});
