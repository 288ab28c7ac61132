/**
 * @fileoverview Provider Module Exports
 *
 * Interfaces the pipeline consumes, plus the bundled implementations.
 *
 * @packageDocumentation
 */

export type {
  EmbeddingProvider,
  CompletionProvider,
  ChunkFilter,
  ChunkSource,
  DocumentStatus,
} from './types.js';

export { OpenAiCompatibleClient, type OpenAiCompatibleConfig } from './openai_compatible.js';
export { InMemoryChunkSource, type StoredChunk, type StoredDocument } from './in_memory_chunk_source.js';
export { SqliteChunkSource, CHUNK_STORE_SCHEMA, applyChunkStoreSchema } from './sqlite_chunk_source.js';
