/**
 * @fileoverview Domain types for the grounded Q&A pipeline
 *
 * Chunks are owned by the storage layer and are read-only here. Everything
 * else is created per request and discarded once the response is built.
 */

// ============================================================================
// CORPUS
// ============================================================================

/**
 * A bounded span of a document's extracted text with its precomputed embedding.
 * `(documentId, sequenceIndex)` is unique across the corpus.
 */
export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly documentTitle: string;
  readonly sequenceIndex: number;
  readonly pageNumber?: number | null;
  readonly text: string;
  readonly embedding: readonly number[];
}

/**
 * A chunk ranked against one query.
 */
export interface ScoredChunk extends Chunk {
  /** Raw BM25 score (>= 0) */
  readonly lexicalScore: number;
  /** Lexical score after min-max scaling over the candidate set */
  readonly lexicalNormalized: number;
  /** Cosine similarity before rescaling, in [-1, 1] */
  readonly rawSemanticScore: number;
  /** Cosine similarity rescaled to [0, 1] */
  readonly semanticScore: number;
  /** Weighted blend of the two, in [0, 1] */
  readonly combinedScore: number;
}

// ============================================================================
// CONVERSATION
// ============================================================================

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

// ============================================================================
// INTENTS
// ============================================================================

export const INTENTS = ['RAG_QUERY', 'SUMMARIZE', 'TRANSLATE', 'CHECKLIST'] as const;

export type Intent = (typeof INTENTS)[number];

export type UtilityAction = Exclude<Intent, 'RAG_QUERY'>;

export const UTILITY_ACTIONS: readonly UtilityAction[] = ['SUMMARIZE', 'TRANSLATE', 'CHECKLIST'];

export function isUtilityAction(intent: Intent): intent is UtilityAction {
  return intent !== 'RAG_QUERY';
}

// ============================================================================
// ANSWERS
// ============================================================================

/**
 * Pointer from a generated answer back to the chunk that grounded it.
 */
export interface Citation {
  readonly documentId: string;
  readonly documentTitle: string;
  readonly pageNumber: number | null;
  readonly sequenceIndex: number;
  readonly snippet: string;
}

// ============================================================================
// PIPELINE METADATA
// ============================================================================

export type PipelineState = 'START' | 'ROUTE' | 'RETRIEVE' | 'REASON' | 'UTILITY' | 'DONE' | 'ERRORED';

export type PipelineStatus = Extract<PipelineState, 'DONE' | 'ERRORED'>;

export type StageName = 'route' | 'retrieve' | 'reason' | 'utility' | 'total';

export type StageTimings = Readonly<Partial<Record<StageName, number>>>;

export interface PipelineMetadata {
  readonly agent: 'reasoning' | 'utility';
  readonly intent: Intent;
  readonly status: PipelineStatus;
  readonly stateTrace: readonly PipelineState[];
  readonly timingsMs: StageTimings;
  readonly retrievedCount: number;
  readonly citationCount: number;
  /** Router keyword behind a utility intent */
  readonly matchedKeyword?: string;
  readonly documentId?: string;
  readonly documentTitle?: string;
  readonly targetLanguage?: string;
}

export interface AnswerResponse {
  readonly answer: string;
  readonly citations: readonly Citation[];
  readonly metadata: PipelineMetadata;
  /** Present when a stage degraded the response */
  readonly error?: string;
}

export interface UtilityResponse {
  readonly outputText: string;
  readonly metadata: PipelineMetadata;
  readonly error?: string;
}
