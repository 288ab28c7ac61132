/**
 * @fileoverview Array-backed chunk source
 *
 * Holds documents and their chunks in memory. Used by the evaluation runner
 * for JSON corpora and by tests. Only chunks of READY documents are listed.
 */

import type { Chunk } from '../types.js';
import type { ChunkFilter, ChunkSource, DocumentStatus } from './types.js';

export interface StoredChunk {
  id: string;
  sequenceIndex: number;
  pageNumber?: number | null;
  text: string;
  embedding: readonly number[];
}

export interface StoredDocument {
  id: string;
  title: string;
  status: DocumentStatus;
  chunks: readonly StoredChunk[];
}

export class InMemoryChunkSource implements ChunkSource {
  private readonly documents = new Map<string, StoredDocument>();

  constructor(documents: readonly StoredDocument[] = []) {
    for (const document of documents) {
      this.upsertDocument(document);
    }
  }

  upsertDocument(document: StoredDocument): void {
    this.documents.set(document.id, { ...document, chunks: [...document.chunks] });
  }

  setStatus(documentId: string, status: DocumentStatus): boolean {
    const existing = this.documents.get(documentId);
    if (!existing) return false;
    this.documents.set(documentId, { ...existing, status });
    return true;
  }

  removeDocument(documentId: string): boolean {
    return this.documents.delete(documentId);
  }

  async listReadyChunks(filter: ChunkFilter = {}): Promise<Chunk[]> {
    const wanted = filter.documentIds ? new Set(filter.documentIds) : undefined;
    const chunks: Chunk[] = [];
    for (const document of this.documents.values()) {
      if (document.status !== 'READY') continue;
      if (wanted && !wanted.has(document.id)) continue;
      const ordered = [...document.chunks].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
      for (const chunk of ordered) {
        chunks.push({
          id: chunk.id,
          documentId: document.id,
          documentTitle: document.title,
          sequenceIndex: chunk.sequenceIndex,
          pageNumber: chunk.pageNumber ?? null,
          text: chunk.text,
          embedding: [...chunk.embedding],
        });
      }
    }
    return chunks;
  }
}
