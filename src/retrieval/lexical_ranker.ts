/**
 * @fileoverview Okapi BM25 keyword ranking over a per-query candidate set
 *
 * The candidate chunks passed to {@link LexicalRanker.score} are the whole
 * reference corpus for that call: document frequencies and the average
 * length come from them alone, so the ranker holds no corpus state between
 * calls.
 */

import type { Chunk } from '../types.js';
import { tokenize } from '../utils/text.js';

export interface Bm25Parameters {
  /** Term-frequency saturation */
  k1: number;
  /** Length normalization strength, 0 disables it */
  b: number;
}

export const DEFAULT_BM25: Bm25Parameters = { k1: 1.5, b: 0.75 };

type TokenizedChunk = {
  id: string;
  termCounts: Map<string, number>;
  length: number;
};

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * IDF that stays positive even for terms present in every chunk.
 */
export function inverseDocumentFrequency(totalChunks: number, chunksWithTerm: number): number {
  return Math.log(1 + (totalChunks - chunksWithTerm + 0.5) / (chunksWithTerm + 0.5));
}

export class LexicalRanker {
  private readonly params: Bm25Parameters;

  constructor(params: Partial<Bm25Parameters> = {}) {
    this.params = { ...DEFAULT_BM25, ...params };
  }

  /**
   * Score every chunk against the query. Chunks sharing no term with the
   * query are present with a score of 0.
   */
  score(query: string, chunks: readonly Chunk[]): Map<string, number> {
    const scores = new Map<string, number>();
    if (chunks.length === 0) return scores;

    const queryTerms = Array.from(new Set(tokenize(query)));
    const docs: TokenizedChunk[] = chunks.map((chunk) => {
      const tokens = tokenize(chunk.text);
      return { id: chunk.id, termCounts: countTerms(tokens), length: tokens.length };
    });

    const totalLength = docs.reduce((sum, doc) => sum + doc.length, 0);
    const avgLength = totalLength / docs.length;

    const idf = new Map<string, number>();
    for (const term of queryTerms) {
      let containing = 0;
      for (const doc of docs) {
        if (doc.termCounts.has(term)) containing++;
      }
      idf.set(term, inverseDocumentFrequency(docs.length, containing));
    }

    const { k1, b } = this.params;
    for (const doc of docs) {
      let total = 0;
      const lengthRatio = avgLength > 0 ? doc.length / avgLength : 0;
      for (const term of queryTerms) {
        const tf = doc.termCounts.get(term);
        if (!tf) continue;
        const termIdf = idf.get(term) ?? 0;
        total += termIdf * ((tf * (k1 + 1)) / (tf + k1 * (1 - b + b * lengthRatio)));
      }
      scores.set(doc.id, total);
    }

    return scores;
  }
}
