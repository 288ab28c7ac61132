/**
 * @fileoverview Query orchestrator
 *
 * Drives one request through the stage graph:
 *
 *   chat:      START -> ROUTE -> RETRIEVE -> REASON  -> DONE
 *              START -> ROUTE -> UTILITY             -> DONE
 *   document:  START -> UTILITY                      -> DONE
 *
 * Any stage may end the run in ERRORED instead of DONE; the caller still
 * gets a complete response with `error` set. Stage outputs are folded into
 * a fresh immutable {@link AgentState} at each step, and the orchestrator
 * itself keeps no per-request fields, so concurrent calls share nothing
 * mutable.
 *
 * Absorbed here: RetrievalError (answer from no context), CompletionError
 * (inside the reasoning stage), UtilityError (fallback text). Everything
 * else, including InvalidArgumentError, propagates.
 */

import { performance } from 'node:perf_hooks';
import type {
  AnswerResponse,
  ChatMessage,
  Chunk,
  Citation,
  Intent,
  PipelineMetadata,
  PipelineState,
  ScoredChunk,
  StageName,
  StageTimings,
  UtilityAction,
  UtilityResponse,
} from '../types.js';
import { UTILITY_ACTIONS } from '../types.js';
import type { ChunkSource, CompletionProvider, EmbeddingProvider } from '../providers/types.js';
import { DEFAULT_CONFIG, type PipelineConfig } from '../config/index.js';
import { InvalidArgumentError, RetrievalError, isRetrievalError, isDocQaError, UtilityError } from '../core/errors.js';
import { IntentRouter } from '../api/query_intent.js';
import { ReasoningStage } from '../api/query_synthesis.js';
import {
  UtilityStage,
  extractTargetLanguage,
  inferTargetLanguage,
} from '../api/utility_transforms.js';
import { HybridRetriever } from '../retrieval/hybrid_retriever.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OrchestratorDependencies {
  chunkSource: ChunkSource;
  embedder: EmbeddingProvider;
  completion: CompletionProvider;
  /** Replaces the default keyword router */
  router?: IntentRouter;
}

/**
 * Snapshot of one run. Never mutated; each step produces a new one.
 */
export interface AgentState {
  readonly query: string;
  readonly history: readonly ChatMessage[];
  readonly intent: Intent;
  readonly matchedKeyword?: string;
  readonly trace: readonly PipelineState[];
  readonly timings: StageTimings;
  readonly retrieved: readonly ScoredChunk[];
  readonly output: string;
  readonly citations: readonly Citation[];
  readonly errors: readonly string[];
}

export const UTILITY_FAILURE_ANSWER = 'I encountered an error processing your request. Please try again.';

// ============================================================================
// STATE HELPERS
// ============================================================================

function initialState(query: string, history: readonly ChatMessage[], intent: Intent): AgentState {
  return {
    query,
    history,
    intent,
    trace: ['START'],
    timings: {},
    retrieved: [],
    output: '',
    citations: [],
    errors: [],
  };
}

function advance(state: AgentState, step: PipelineState, patch: Partial<AgentState> = {}): AgentState {
  return { ...state, ...patch, trace: [...state.trace, step] };
}

function withTiming(state: AgentState, stage: StageName, startedAt: number): AgentState {
  return { ...state, timings: { ...state.timings, [stage]: Math.round(performance.now() - startedAt) } };
}

function finish(state: AgentState, startedAt: number): AgentState {
  const terminal: PipelineState = state.errors.length > 0 ? 'ERRORED' : 'DONE';
  return withTiming(advance(state, terminal), 'total', startedAt);
}

function statusOf(state: AgentState): PipelineMetadata['status'] {
  return state.trace[state.trace.length - 1] === 'ERRORED' ? 'ERRORED' : 'DONE';
}

function errorOf(state: AgentState): string | undefined {
  return state.errors.length > 0 ? state.errors.join('; ') : undefined;
}

/**
 * Most recent assistant message, the text chat-side utilities operate on.
 */
export function latestAssistantMessage(history: readonly ChatMessage[]): string | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message && message.role === 'assistant' && message.content.trim()) {
      return message.content;
    }
  }
  return undefined;
}

/**
 * Case-insensitive action name to {@link UtilityAction}.
 * @throws InvalidArgumentError for anything else
 */
export function parseUtilityAction(action: string): UtilityAction {
  const normalized = action.trim().toUpperCase();
  const match = UTILITY_ACTIONS.find((candidate) => candidate === normalized);
  if (!match) {
    throw new InvalidArgumentError(
      'action',
      `unknown action "${action}" (expected one of: ${UTILITY_ACTIONS.map((a) => a.toLowerCase()).join(', ')})`
    );
  }
  return match;
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class Orchestrator {
  private readonly chunkSource: ChunkSource;
  private readonly router: IntentRouter;
  private readonly retriever: HybridRetriever;
  private readonly reasoning: ReasoningStage;
  private readonly utility: UtilityStage;
  private readonly topK: number;

  constructor(deps: OrchestratorDependencies, config: PipelineConfig = DEFAULT_CONFIG) {
    this.chunkSource = deps.chunkSource;
    this.router = deps.router ?? new IntentRouter();
    this.topK = config.retrieval.topK;
    this.retriever = new HybridRetriever(deps.embedder, {
      alpha: config.retrieval.alpha,
      maxPerDocument: config.retrieval.maxPerDocument,
      bm25: config.retrieval.bm25,
      embeddingTimeoutMs: config.timeouts.embeddingMs,
    });
    this.reasoning = new ReasoningStage(deps.completion, {
      historyTurns: config.reasoning.historyTurns,
      snippetLength: config.reasoning.snippetLength,
      completionTimeoutMs: config.timeouts.completionMs,
    });
    this.utility = new UtilityStage(deps.completion, {
      summarySentences: config.utility.summarySentences,
      completionTimeoutMs: config.timeouts.completionMs,
    });
  }

  /**
   * Answer a chat message.
   *
   * @throws InvalidArgumentError for a blank query
   */
  async answerQuery(query: string, chatHistory: readonly ChatMessage[] = []): Promise<AnswerResponse> {
    if (!query.trim()) {
      throw new InvalidArgumentError('query', 'must not be empty');
    }
    const startedAt = performance.now();

    let state = this.route(initialState(query, [...chatHistory], 'RAG_QUERY'));
    if (state.intent === 'RAG_QUERY') {
      state = await this.retrieve(state);
      state = await this.reason(state);
    } else {
      state = await this.runChatUtility(state, state.intent);
    }
    state = finish(state, startedAt);

    const error = errorOf(state);
    return {
      answer: state.output,
      citations: state.citations,
      metadata: this.metadataFor(state, state.intent === 'RAG_QUERY' ? 'reasoning' : 'utility'),
      ...(error ? { error } : {}),
    };
  }

  /**
   * Apply a utility action to one whole document, bypassing the router.
   *
   * @throws InvalidArgumentError for an unknown action, or a document that is
   *   missing, not ready, or has no text
   */
  async runUtility(documentId: string, action: string, targetLanguage?: string): Promise<UtilityResponse> {
    const parsedAction = parseUtilityAction(action);
    if (!documentId.trim()) {
      throw new InvalidArgumentError('documentId', 'must not be empty');
    }
    const startedAt = performance.now();

    const chunks = (await this.chunkSource.listReadyChunks({ documentIds: [documentId] }))
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    const first = chunks[0];
    if (!first) {
      throw new InvalidArgumentError('documentId', `document ${documentId} was not found or is not ready`);
    }
    const fullText = joinDocumentText(chunks);
    if (!fullText.trim()) {
      throw new InvalidArgumentError('documentId', `document ${documentId} has no extractable text`);
    }

    const language = parsedAction === 'TRANSLATE'
      ? targetLanguage?.trim() || inferTargetLanguage(fullText)
      : undefined;

    let state: AgentState = { ...initialState('', [], parsedAction), trace: ['START', 'UTILITY'] };
    const utilityStart = performance.now();
    state = await this.applyUtility(state, parsedAction, fullText, language);
    state = finish(withTiming(state, 'utility', utilityStart), startedAt);

    const error = errorOf(state);
    return {
      outputText: state.output,
      metadata: {
        ...this.metadataFor(state, 'utility'),
        documentId,
        documentTitle: first.documentTitle,
        ...(language ? { targetLanguage: language } : {}),
      },
      ...(error ? { error } : {}),
    };
  }

  // --------------------------------------------------------------------------
  // Stages
  // --------------------------------------------------------------------------

  private route(state: AgentState): AgentState {
    const startedAt = performance.now();
    const classification = this.router.classifyWithTrace(state.query);
    logInfo('[pipeline] Routed query', {
      intent: classification.intent,
      keyword: classification.matchedKeyword,
    });
    return withTiming(
      advance(state, 'ROUTE', {
        intent: classification.intent,
        matchedKeyword: classification.matchedKeyword,
      }),
      'route',
      startedAt
    );
  }

  private async retrieve(state: AgentState): Promise<AgentState> {
    const startedAt = performance.now();
    try {
      const candidates = await this.listCandidates();
      const retrieved = await this.retriever.retrieve(state.query, candidates, this.topK);
      return withTiming(advance(state, 'RETRIEVE', { retrieved }), 'retrieve', startedAt);
    } catch (error) {
      if (!isRetrievalError(error)) throw error;
      logWarning('[pipeline] Retrieval failed, answering without context', { error: error.message });
      return withTiming(
        advance(state, 'RETRIEVE', { retrieved: [], errors: [...state.errors, error.message] }),
        'retrieve',
        startedAt
      );
    }
  }

  private async reason(state: AgentState): Promise<AgentState> {
    const startedAt = performance.now();
    const result = await this.reasoning.reason(state.query, state.retrieved, state.history);
    return withTiming(
      advance(state, 'REASON', {
        output: result.answer,
        citations: result.citations,
        errors: result.error ? [...state.errors, result.error] : state.errors,
      }),
      'reason',
      startedAt
    );
  }

  private async runChatUtility(state: AgentState, action: UtilityAction): Promise<AgentState> {
    const startedAt = performance.now();
    const text = latestAssistantMessage(state.history) ?? state.query;
    const language = action === 'TRANSLATE'
      ? extractTargetLanguage(state.query) ?? inferTargetLanguage(text)
      : undefined;
    const next = await this.applyUtility(advance(state, 'UTILITY'), action, text, language);
    return withTiming(next, 'utility', startedAt);
  }

  private async applyUtility(
    state: AgentState,
    action: UtilityAction,
    text: string,
    language: string | undefined
  ): Promise<AgentState> {
    try {
      const output = await this.utility.execute(action, text, language);
      return { ...state, output, citations: [] };
    } catch (error) {
      if (!(error instanceof UtilityError)) throw error;
      logWarning('[pipeline] Utility action failed, returning fallback text', { action, error: error.message });
      return { ...state, output: UTILITY_FAILURE_ANSWER, citations: [], errors: [...state.errors, error.message] };
    }
  }

  private async listCandidates(): Promise<Chunk[]> {
    try {
      return await this.chunkSource.listReadyChunks();
    } catch (error) {
      if (isDocQaError(error)) throw error;
      const cause = error instanceof Error ? error : undefined;
      throw new RetrievalError('source_failed', true, getErrorMessage(error), cause);
    }
  }

  private metadataFor(state: AgentState, agent: PipelineMetadata['agent']): PipelineMetadata {
    return {
      agent,
      intent: state.intent,
      status: statusOf(state),
      stateTrace: state.trace,
      timingsMs: state.timings,
      retrievedCount: state.retrieved.length,
      citationCount: state.citations.length,
      ...(state.matchedKeyword ? { matchedKeyword: state.matchedKeyword } : {}),
    };
  }
}

/**
 * Document text in reading order, chunks separated by a blank line.
 */
export function joinDocumentText(chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => chunk.text).join('\n\n');
}
