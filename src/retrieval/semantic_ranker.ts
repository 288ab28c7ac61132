/**
 * @fileoverview Embedding similarity ranking
 *
 * The query embedding is computed by the caller; this ranker only compares
 * vectors and never calls a provider.
 */

import type { Chunk } from '../types.js';
import { DimensionMismatchError } from '../core/errors.js';
import { cosineSimilarity } from '../utils/math.js';

/**
 * Map cosine similarity from [-1, 1] onto [0, 1].
 */
export function rescaleCosine(similarity: number): number {
  return (similarity + 1) / 2;
}

export class SemanticRanker {
  /**
   * Raw cosine similarity per chunk, in [-1, 1].
   * @throws DimensionMismatchError when a chunk embedding has a different length
   */
  rawScores(queryEmbedding: readonly number[], chunks: readonly Chunk[]): Map<string, number> {
    const scores = new Map<string, number>();
    for (const chunk of chunks) {
      if (chunk.embedding.length !== queryEmbedding.length) {
        throw new DimensionMismatchError(queryEmbedding.length, chunk.embedding.length, chunk.id);
      }
      scores.set(chunk.id, cosineSimilarity(queryEmbedding, chunk.embedding));
    }
    return scores;
  }

  /**
   * Cosine similarity per chunk rescaled to [0, 1].
   * @throws DimensionMismatchError when a chunk embedding has a different length
   */
  score(queryEmbedding: readonly number[], chunks: readonly Chunk[]): Map<string, number> {
    const scores = new Map<string, number>();
    for (const [id, similarity] of this.rawScores(queryEmbedding, chunks)) {
      scores.set(id, rescaleCosine(similarity));
    }
    return scores;
  }
}
