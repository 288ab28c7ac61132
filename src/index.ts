/**
 * @fileoverview Grounded document question answering
 *
 * Hybrid BM25 + embedding retrieval over pre-chunked documents, a keyword
 * intent router, and an orchestrator that either answers with citations or
 * applies a whole-document utility (summary, translation, checklist).
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Orchestrator, OpenAiCompatibleClient, SqliteChunkSource, loadConfig } from 'docqa-pipeline';
 *
 * const config = loadConfig();
 * const client = new OpenAiCompatibleClient(config.provider);
 * const pipeline = new Orchestrator(
 *   { chunkSource: new SqliteChunkSource('./store.sqlite'), embedder: client, completion: client },
 *   config,
 * );
 *
 * const { answer, citations } = await pipeline.answerQuery('How long is the warranty?');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES
// ============================================================================

export {
  type Chunk,
  type ScoredChunk,
  type ChatRole,
  type ChatMessage,
  type Intent,
  type UtilityAction,
  type Citation,
  type PipelineState,
  type PipelineStatus,
  type StageName,
  type StageTimings,
  type PipelineMetadata,
  type AnswerResponse,
  type UtilityResponse,
  INTENTS,
  UTILITY_ACTIONS,
  isUtilityAction,
} from './types.js';

export * from './core/index.js';

// ============================================================================
// RETRIEVAL
// ============================================================================

export { LexicalRanker, DEFAULT_BM25, inverseDocumentFrequency, type Bm25Parameters } from './retrieval/lexical_ranker.js';
export { SemanticRanker, rescaleCosine } from './retrieval/semantic_ranker.js';
export {
  HybridRetriever,
  DEFAULT_ALPHA,
  compareScoredChunks,
  defaultMaxPerDocument,
  diversityRerank,
  type HybridRetrieverOptions,
  type RetrieveOverrides,
} from './retrieval/hybrid_retriever.js';

// ============================================================================
// ROUTING AND STAGES
// ============================================================================

export { IntentRouter, INTENT_RULES, type IntentRule, type IntentClassification } from './api/query_intent.js';
export {
  ReasoningStage,
  buildReasoningPrompt,
  buildCitations,
  NO_CONTEXT_ANSWER,
  REASONING_FAILURE_ANSWER,
  type ReasoningOptions,
  type ReasoningResult,
} from './api/query_synthesis.js';
export {
  UtilityStage,
  buildUtilityPrompt,
  containsPersian,
  extractTargetLanguage,
  inferTargetLanguage,
  type UtilityOptions,
} from './api/utility_transforms.js';

// ============================================================================
// ORCHESTRATION
// ============================================================================

export {
  Orchestrator,
  UTILITY_FAILURE_ANSWER,
  parseUtilityAction,
  type OrchestratorDependencies,
  type AgentState,
} from './orchestrator/pipeline.js';

// ============================================================================
// PROVIDERS, CONFIG, EVALUATION
// ============================================================================

export * from './providers/index.js';
export {
  loadConfig,
  resolveConfig,
  pipelineConfigSchema,
  DEFAULT_CONFIG,
  type PipelineConfig,
  type LoadConfigOptions,
} from './config/index.js';
export {
  runEvaluation,
  scoreAnswer,
  loadTestQueries,
  parseTestQueries,
  type TestQuery,
  type QueryEvaluation,
  type EvaluationReport,
  type EvaluationOptions,
} from './evaluation/keyword_evaluator.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';
