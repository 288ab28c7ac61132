/**
 * @fileoverview Hybrid lexical + semantic retrieval
 *
 * Pipeline for one query:
 * 1. Drop malformed chunks (blank text, wrong embedding length)
 * 2. Embed the query (the only network call)
 * 3. BM25 scores, min-max scaled over the candidates
 * 4. Cosine scores, rescaled to [0, 1]
 * 5. combined = alpha * semantic + (1 - alpha) * lexical
 * 6. Deterministic sort, then a per-document diversity cap with backfill
 *
 * The candidate array is copied on entry and treated as a snapshot; nothing
 * about the corpus is cached between calls.
 */

import type { Chunk, ScoredChunk } from '../types.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { InvalidArgumentError, RetrievalError } from '../core/errors.js';
import { isTimeoutError, withTimeout } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { clamp01, minMaxNormalize } from '../utils/math.js';
import { DEFAULT_BM25, LexicalRanker, type Bm25Parameters } from './lexical_ranker.js';
import { SemanticRanker, rescaleCosine } from './semantic_ranker.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface HybridRetrieverOptions {
  /** Weight of the semantic score (default 0.7) */
  alpha?: number;
  /** Per-document cap for the diversity pass (default ceil(topK/2)+1) */
  maxPerDocument?: number;
  bm25?: Partial<Bm25Parameters>;
  /** Timeout for the query embedding call; 0 disables it */
  embeddingTimeoutMs?: number;
}

export interface RetrieveOverrides {
  alpha?: number;
  maxPerDocument?: number;
}

export const DEFAULT_ALPHA = 0.7;

function assertAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new InvalidArgumentError('alpha', `must be within [0, 1], got ${alpha}`);
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(name, `must be a positive integer, got ${value}`);
  }
}

// ============================================================================
// ORDERING
// ============================================================================

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Highest combined score first; ties by document id, then position.
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (a.combinedScore !== b.combinedScore) return b.combinedScore - a.combinedScore;
  const byDocument = compareCodeUnits(a.documentId, b.documentId);
  if (byDocument !== 0) return byDocument;
  return a.sequenceIndex - b.sequenceIndex;
}

export function defaultMaxPerDocument(topK: number): number {
  return Math.ceil(topK / 2) + 1;
}

/**
 * Pick `topK` chunks from a sorted list, letting no document take more than
 * `maxPerDocument` slots. When the cap leaves slots empty they are backfilled
 * from the skipped candidates in their sorted order.
 */
export function diversityRerank(
  sorted: readonly ScoredChunk[],
  topK: number,
  maxPerDocument: number
): ScoredChunk[] {
  const selected: ScoredChunk[] = [];
  const skipped: ScoredChunk[] = [];
  const perDocument = new Map<string, number>();

  for (const candidate of sorted) {
    if (selected.length >= topK) break;
    const taken = perDocument.get(candidate.documentId) ?? 0;
    if (taken >= maxPerDocument) {
      skipped.push(candidate);
      continue;
    }
    selected.push(candidate);
    perDocument.set(candidate.documentId, taken + 1);
  }

  for (const candidate of skipped) {
    if (selected.length >= topK) break;
    selected.push(candidate);
  }

  return selected.sort(compareScoredChunks);
}

// ============================================================================
// RETRIEVER
// ============================================================================

export class HybridRetriever {
  private readonly lexical: LexicalRanker;
  private readonly semantic = new SemanticRanker();
  private readonly alpha: number;
  private readonly maxPerDocument?: number;
  private readonly embeddingTimeoutMs: number;

  constructor(
    private readonly embedder: EmbeddingProvider,
    options: HybridRetrieverOptions = {}
  ) {
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    assertAlpha(this.alpha);
    if (options.maxPerDocument !== undefined) {
      assertPositiveInteger('maxPerDocument', options.maxPerDocument);
    }
    this.maxPerDocument = options.maxPerDocument;
    this.lexical = new LexicalRanker({ ...DEFAULT_BM25, ...options.bm25 });
    this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? 0;
  }

  /**
   * Rank `chunks` against `query` and return at most `topK` of them.
   *
   * An empty candidate set is a normal state and yields `[]` without calling
   * the embedding provider.
   *
   * @throws RetrievalError when the query embedding cannot be obtained
   * @throws InvalidArgumentError for a non-positive `topK` or bad overrides
   */
  async retrieve(
    query: string,
    chunks: readonly Chunk[],
    topK: number,
    overrides: RetrieveOverrides = {}
  ): Promise<ScoredChunk[]> {
    assertPositiveInteger('topK', topK);
    const snapshot = [...chunks];
    if (snapshot.length === 0 || !query.trim()) return [];

    const withText = snapshot.filter((chunk) => {
      if (chunk.text.trim()) return true;
      logWarning('[retrieval] Excluding chunk with empty text', { chunkId: chunk.id, documentId: chunk.documentId });
      return false;
    });
    if (withText.length === 0) return [];

    const queryEmbedding = await this.embedQuery(query);
    return this.rank(query, queryEmbedding, withText, topK, overrides);
  }

  /**
   * Synchronous ranking with a precomputed query embedding.
   */
  rank(
    query: string,
    queryEmbedding: readonly number[],
    chunks: readonly Chunk[],
    topK: number,
    overrides: RetrieveOverrides = {}
  ): ScoredChunk[] {
    assertPositiveInteger('topK', topK);
    const alpha = overrides.alpha ?? this.alpha;
    assertAlpha(alpha);
    const maxPerDocument = overrides.maxPerDocument ?? this.maxPerDocument ?? defaultMaxPerDocument(topK);
    assertPositiveInteger('maxPerDocument', maxPerDocument);

    const candidates = chunks.filter((chunk) => {
      if (!chunk.text.trim()) {
        logWarning('[retrieval] Excluding chunk with empty text', { chunkId: chunk.id, documentId: chunk.documentId });
        return false;
      }
      if (chunk.embedding.length === 0 || chunk.embedding.length !== queryEmbedding.length) {
        logWarning('[retrieval] Excluding chunk with mismatched embedding dimension', {
          chunkId: chunk.id,
          documentId: chunk.documentId,
          expected: queryEmbedding.length,
          received: chunk.embedding.length,
        });
        return false;
      }
      return true;
    });
    if (candidates.length === 0) return [];

    const lexicalScores = this.lexical.score(query, candidates);
    const rawSemantic = this.semantic.rawScores(queryEmbedding, candidates);
    const lexicalRaw = candidates.map((chunk) => lexicalScores.get(chunk.id) ?? 0);
    const lexicalNormalized = minMaxNormalize(lexicalRaw);

    const scored: ScoredChunk[] = candidates.map((chunk, idx) => {
      const raw = rawSemantic.get(chunk.id) ?? 0;
      const semanticScore = clamp01(rescaleCosine(raw));
      const lexicalScaled = lexicalNormalized[idx] ?? 0;
      return {
        ...chunk,
        lexicalScore: lexicalRaw[idx] ?? 0,
        lexicalNormalized: lexicalScaled,
        rawSemanticScore: raw,
        semanticScore,
        combinedScore: clamp01(alpha * semanticScore + (1 - alpha) * lexicalScaled),
      };
    });

    scored.sort(compareScoredChunks);
    const results = diversityRerank(scored, topK, maxPerDocument);

    logDebug('[retrieval] Ranked candidates', {
      candidates: candidates.length,
      returned: results.length,
      alpha,
      maxPerDocument,
    });

    return results;
  }

  private async embedQuery(query: string): Promise<number[]> {
    const result = await withTimeout(() => this.embedder.embed(query), this.embeddingTimeoutMs, 'Query embedding');
    if (!result.ok) {
      const timedOut = isTimeoutError(result.error);
      throw new RetrievalError(
        timedOut ? 'timeout' : 'embedding_failed',
        true,
        result.error.message,
        result.error
      );
    }
    if (result.value.length === 0) {
      throw new RetrievalError('embedding_failed', false, 'embedding provider returned an empty vector');
    }
    return result.value;
  }
}
