/**
 * @fileoverview SQLite-backed chunk source
 *
 * Reads chunks of READY documents from a database laid out as:
 *
 *   documents(id, title, status)
 *   chunks(id, document_id, sequence_index, page_number, text, embedding)
 *
 * `embedding` holds a JSON array of numbers. Uses better-sqlite3; every call
 * reads a fresh snapshot, nothing is cached between calls.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Chunk } from '../types.js';
import type { ChunkFilter, ChunkSource } from './types.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const CHUNK_STORE_SCHEMA = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'PENDING'
);

CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  sequence_index INTEGER NOT NULL,
  page_number INTEGER,
  text TEXT NOT NULL,
  embedding TEXT NOT NULL,
  UNIQUE (document_id, sequence_index)
);

CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id, sequence_index);
`;

/**
 * Create the tables if they do not exist yet.
 */
export function applyChunkStoreSchema(db: Database.Database): void {
  db.exec(CHUNK_STORE_SCHEMA);
}

const idSchema = z.union([z.string(), z.number()]).transform(String);

const chunkRowSchema = z.object({
  id: idSchema,
  document_id: idSchema,
  document_title: z.string(),
  sequence_index: z.number().int(),
  page_number: z.number().int().nullable(),
  text: z.string(),
  embedding: z.string(),
});

type ChunkRow = z.infer<typeof chunkRowSchema>;

const embeddingSchema = z.array(z.number());

// ============================================================================
// SOURCE
// ============================================================================

export class SqliteChunkSource implements ChunkSource {
  private readonly db: Database.Database;
  private readonly ownsConnection: boolean;

  /**
   * @param database - a path (opened read-only) or an open connection, which
   *   stays owned by the caller
   */
  constructor(database: string | Database.Database) {
    if (typeof database === 'string') {
      this.db = new Database(database, { readonly: true, fileMustExist: true });
      this.db.pragma('busy_timeout = 5000');
      this.ownsConnection = true;
    } else {
      this.db = database;
      this.ownsConnection = false;
    }
  }

  async listReadyChunks(filter: ChunkFilter = {}): Promise<Chunk[]> {
    const documentIds = filter.documentIds;
    if (documentIds && documentIds.length === 0) return [];

    const params: string[] = ['READY'];
    let sql = `
      SELECT c.id, c.document_id, d.title AS document_title, c.sequence_index,
             c.page_number, c.text, c.embedding
      FROM chunks c
      JOIN documents d ON d.id = c.document_id
      WHERE d.status = ?`;
    if (documentIds) {
      sql += ` AND c.document_id IN (${documentIds.map(() => '?').join(', ')})`;
      params.push(...documentIds);
    }
    sql += ' ORDER BY c.document_id, c.sequence_index';

    const rows: unknown[] = this.db.prepare(sql).all(...params);
    const chunks: Chunk[] = [];
    for (const raw of rows) {
      const row = chunkRowSchema.safeParse(raw);
      if (!row.success) {
        logWarning('[sqlite] Skipping malformed chunk row', { issue: row.error.issues[0]?.message });
        continue;
      }
      chunks.push(toChunk(row.data));
    }
    return chunks;
  }

  close(): void {
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}

/**
 * An unreadable embedding becomes `[]`; retrieval then excludes the chunk.
 */
function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    documentTitle: row.document_title,
    sequenceIndex: row.sequence_index,
    pageNumber: row.page_number,
    text: row.text,
    embedding: parseEmbedding(row),
  };
}

function parseEmbedding(row: ChunkRow): number[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(row.embedding);
  } catch (error) {
    logWarning('[sqlite] Chunk embedding is not valid JSON', { chunkId: row.id, error: getErrorMessage(error) });
    return [];
  }
  const parsed = embeddingSchema.safeParse(decoded);
  if (!parsed.success) {
    logWarning('[sqlite] Chunk embedding is not a number array', { chunkId: row.id });
    return [];
  }
  return parsed.data;
}
