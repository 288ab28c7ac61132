import { describe, expect, it } from 'vitest';
import { InMemoryChunkSource, type StoredDocument } from '../in_memory_chunk_source.js';

function documents(): StoredDocument[] {
  return [
    {
      id: 'doc-1',
      title: 'Handbook',
      status: 'READY',
      chunks: [
        { id: 'h-1', sequenceIndex: 1, text: 'later', embedding: [0, 1] },
        { id: 'h-0', sequenceIndex: 0, pageNumber: 4, text: 'earlier', embedding: [1, 0] },
      ],
    },
    {
      id: 'doc-2',
      title: 'Upload',
      status: 'PENDING',
      chunks: [{ id: 'u-0', sequenceIndex: 0, text: 'pending', embedding: [1, 1] }],
    },
  ];
}

describe('InMemoryChunkSource', () => {
  it('lists chunks of ready documents in sequence order', async () => {
    const source = new InMemoryChunkSource(documents());

    const chunks = await source.listReadyChunks();

    expect(chunks.map((chunk) => chunk.id)).toEqual(['h-0', 'h-1']);
    expect(chunks[0]).toEqual({
      id: 'h-0',
      documentId: 'doc-1',
      documentTitle: 'Handbook',
      sequenceIndex: 0,
      pageNumber: 4,
      text: 'earlier',
      embedding: [1, 0],
    });
    expect(chunks[1]?.pageNumber).toBeNull();
  });

  it('includes a document once it becomes ready', async () => {
    const source = new InMemoryChunkSource(documents());

    expect(source.setStatus('doc-2', 'READY')).toBe(true);

    await expect(source.listReadyChunks({ documentIds: ['doc-2'] })).resolves.toHaveLength(1);
  });

  it('drops removed documents', async () => {
    const source = new InMemoryChunkSource(documents());

    source.removeDocument('doc-1');

    await expect(source.listReadyChunks()).resolves.toEqual([]);
  });

  it('reports unknown documents when changing status', () => {
    expect(new InMemoryChunkSource().setStatus('missing', 'READY')).toBe(false);
  });
});
