import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteChunkSource, applyChunkStoreSchema } from '../sqlite_chunk_source.js';

// ============================================================================
// FIXTURES
// ============================================================================

function seed(db: Database.Database): void {
  applyChunkStoreSchema(db);
  const insertDocument = db.prepare('INSERT INTO documents (id, title, status) VALUES (?, ?, ?)');
  const insertChunk = db.prepare(
    'INSERT INTO chunks (id, document_id, sequence_index, page_number, text, embedding) VALUES (?, ?, ?, ?, ?, ?)'
  );

  insertDocument.run('doc-a', 'Handbook', 'READY');
  insertDocument.run('doc-b', 'Draft', 'PROCESSING');
  insertDocument.run('doc-c', 'Policy', 'READY');

  insertChunk.run('a-1', 'doc-a', 1, 2, 'second chunk', '[0.5,0.5]');
  insertChunk.run('a-0', 'doc-a', 0, 1, 'first chunk', '[1,0]');
  insertChunk.run('b-0', 'doc-b', 0, null, 'not ready yet', '[0,1]');
  insertChunk.run('c-0', 'doc-c', 0, null, 'policy text', 'not-json');
}

describe('SqliteChunkSource', () => {
  let db: Database.Database;
  let source: SqliteChunkSource;

  beforeEach(() => {
    db = new Database(':memory:');
    seed(db);
    source = new SqliteChunkSource(db);
  });

  afterEach(() => {
    source.close();
    db.close();
  });

  it('returns chunks of READY documents in document and sequence order', async () => {
    const chunks = await source.listReadyChunks();

    expect(chunks.map((chunk) => chunk.id)).toEqual(['a-0', 'a-1', 'c-0']);
  });

  it('maps columns onto chunks', async () => {
    const [first] = await source.listReadyChunks({ documentIds: ['doc-a'] });

    expect(first).toEqual({
      id: 'a-0',
      documentId: 'doc-a',
      documentTitle: 'Handbook',
      sequenceIndex: 0,
      pageNumber: 1,
      text: 'first chunk',
      embedding: [1, 0],
    });
  });

  it('filters by document id', async () => {
    const chunks = await source.listReadyChunks({ documentIds: ['doc-c'] });

    expect(chunks.map((chunk) => chunk.id)).toEqual(['c-0']);
  });

  it('excludes documents that are not ready even when requested', async () => {
    await expect(source.listReadyChunks({ documentIds: ['doc-b'] })).resolves.toEqual([]);
  });

  it('returns [] for an empty id filter', async () => {
    await expect(source.listReadyChunks({ documentIds: [] })).resolves.toEqual([]);
  });

  it('turns an unreadable embedding into an empty vector', async () => {
    const [policy] = await source.listReadyChunks({ documentIds: ['doc-c'] });

    expect(policy?.embedding).toEqual([]);
    expect(policy?.pageNumber).toBeNull();
  });

  it('leaves a caller-owned connection open on close', () => {
    source.close();

    expect(db.open).toBe(true);
  });
});
