/**
 * @fileoverview Collaborator interfaces consumed by the pipeline
 *
 * The pipeline never talks to an embedding model, an LLM or a database
 * directly. It is handed implementations of these three interfaces:
 *
 * - {@link EmbeddingProvider}: one call per query, before retrieval
 * - {@link CompletionProvider}: used by the reasoning and utility stages
 * - {@link ChunkSource}: snapshot of chunks belonging to ready documents
 *
 * Retries, rate limiting and caching belong to the implementations, not to
 * the stages that call them.
 *
 * @packageDocumentation
 */

import type { ChatMessage, Chunk } from '../types.js';

// ============================================================================
// EMBEDDING PROVIDER
// ============================================================================

export interface EmbeddingProvider {
  /** Embed one text; the vector length is fixed per provider/model */
  embed(text: string): Promise<number[]>;
}

// ============================================================================
// COMPLETION PROVIDER
// ============================================================================

export interface CompletionProvider {
  /**
   * Complete a prompt. `history` holds earlier conversation turns, oldest
   * first, and is sent ahead of the prompt.
   */
  complete(prompt: string, history?: readonly ChatMessage[]): Promise<string>;
}

// ============================================================================
// CHUNK SOURCE
// ============================================================================

export interface ChunkFilter {
  /** Restrict to these documents; omitted means every ready document */
  documentIds?: readonly string[];
}

export interface ChunkSource {
  /** Chunks of documents in the ready-for-query state */
  listReadyChunks(filter?: ChunkFilter): Promise<Chunk[]>;
}

export type DocumentStatus = 'PENDING' | 'PROCESSING' | 'READY' | 'FAILED';
