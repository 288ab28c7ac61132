/**
 * @fileoverview Grounded answer synthesis
 *
 * Builds a prompt from the retrieved chunks (numbered `[Source N]` blocks in
 * rank order) plus a bounded slice of the conversation, asks the completion
 * provider for an answer, and maps the `[Source N]` markers in that answer
 * back to citations.
 *
 * Failures never escape this stage: an empty context produces a fixed
 * "nothing found" answer without calling the provider, and a provider error
 * or timeout produces an apology with `error` set.
 */

import type { ChatMessage, Chunk, Citation } from '../types.js';
import type { CompletionProvider } from '../providers/types.js';
import { CompletionError } from '../core/errors.js';
import { Err, Ok, isTimeoutError, withTimeout, type Result } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { makeSnippet } from '../utils/text.js';

// Types

export interface ReasoningOptions {
  /** Conversation exchanges (user + assistant) forwarded with the prompt */
  historyTurns?: number;
  /** Characters kept in each citation snippet */
  snippetLength?: number;
  /** 0 disables the timeout */
  completionTimeoutMs?: number;
}

export interface ReasoningResult {
  readonly answer: string;
  readonly citations: readonly Citation[];
  readonly error?: string;
}

export const DEFAULT_HISTORY_TURNS = 2;
export const DEFAULT_SNIPPET_LENGTH = 200;

export const NO_CONTEXT_ANSWER =
  "I couldn't find relevant information in the available documents to answer your question. " +
  'Could you rephrase it or ask about something else?';

export const REASONING_FAILURE_ANSWER =
  'I encountered an error while generating the answer. Please try again in a moment.';

// Prompt construction

const REASONING_INSTRUCTIONS = [
  'Answer the question using ONLY the information in the sources above.',
  'If the sources do not contain enough information, say so explicitly instead of guessing.',
  'Cite the sources that support each statement with markers such as [Source 1] or [Source 2].',
  'Be concise and direct.',
];

function describePage(chunk: Chunk): string {
  return typeof chunk.pageNumber === 'number' ? `page ${chunk.pageNumber}` : 'page n/a';
}

/**
 * Numbered context blocks in the order given (rank order).
 */
export function formatContextBlocks(chunks: readonly Chunk[]): string {
  return chunks
    .map((chunk, idx) => `[Source ${idx + 1}] ${chunk.documentTitle} (${describePage(chunk)})\n${chunk.text.trim()}`)
    .join('\n\n');
}

export function buildReasoningPrompt(query: string, chunks: readonly Chunk[]): string {
  const parts: string[] = [];

  parts.push('You are an assistant that answers questions strictly from the provided document excerpts.');
  parts.push('');
  parts.push('SOURCES:');
  parts.push('');
  parts.push(formatContextBlocks(chunks));
  parts.push('');
  parts.push(`QUESTION: ${query.trim()}`);
  parts.push('');
  parts.push('INSTRUCTIONS:');
  REASONING_INSTRUCTIONS.forEach((line, idx) => parts.push(`${idx + 1}. ${line}`));

  return parts.join('\n');
}

/**
 * The most recent `turns` exchanges, i.e. at most `turns * 2` messages.
 */
export function selectHistory(history: readonly ChatMessage[], turns: number): ChatMessage[] {
  if (turns <= 0 || history.length === 0) return [];
  return history.slice(-turns * 2);
}

// Citations

const SOURCE_MARKER = /\[Source\s+(\d+)\]/gi;

/**
 * 1-based source numbers referenced by the answer, deduplicated, ascending,
 * ignoring numbers with no matching source.
 */
export function extractSourceReferences(answer: string, sourceCount: number): number[] {
  const seen = new Set<number>();
  for (const match of answer.matchAll(SOURCE_MARKER)) {
    const value = Number(match[1]);
    if (Number.isInteger(value) && value >= 1 && value <= sourceCount) {
      seen.add(value);
    }
  }
  return Array.from(seen).sort((a, b) => a - b);
}

export function toCitation(chunk: Chunk, snippetLength: number): Citation {
  return {
    documentId: chunk.documentId,
    documentTitle: chunk.documentTitle,
    pageNumber: chunk.pageNumber ?? null,
    sequenceIndex: chunk.sequenceIndex,
    snippet: makeSnippet(chunk.text, snippetLength),
  };
}

/**
 * One citation per referenced source; every retrieved chunk when the answer
 * carries no usable marker.
 */
export function buildCitations(answer: string, chunks: readonly Chunk[], snippetLength: number): Citation[] {
  const references = extractSourceReferences(answer, chunks.length);
  const cited = references.length > 0
    ? references.flatMap((ref) => {
        const chunk = chunks[ref - 1];
        return chunk ? [chunk] : [];
      })
    : chunks;
  return cited.map((chunk) => toCitation(chunk, snippetLength));
}

// Stage

export class ReasoningStage {
  private readonly historyTurns: number;
  private readonly snippetLength: number;
  private readonly completionTimeoutMs: number;

  constructor(
    private readonly completion: CompletionProvider,
    options: ReasoningOptions = {}
  ) {
    this.historyTurns = options.historyTurns ?? DEFAULT_HISTORY_TURNS;
    this.snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
    this.completionTimeoutMs = options.completionTimeoutMs ?? 0;
  }

  async reason(
    query: string,
    chunks: readonly Chunk[],
    chatHistory: readonly ChatMessage[] = []
  ): Promise<ReasoningResult> {
    if (chunks.length === 0) {
      logDebug('[reasoning] No context chunks, skipping completion');
      return { answer: NO_CONTEXT_ANSWER, citations: [] };
    }

    const prompt = buildReasoningPrompt(query, chunks);
    const history = selectHistory(chatHistory, this.historyTurns);
    const completed = await this.requestAnswer(prompt, history);
    if (!completed.ok) {
      logWarning('[reasoning] Completion failed, returning fallback answer', { error: completed.error.message });
      return { answer: REASONING_FAILURE_ANSWER, citations: [], error: completed.error.message };
    }

    const answer = completed.value;
    const citations = buildCitations(answer, chunks, this.snippetLength);
    logDebug('[reasoning] Answer generated', { sources: chunks.length, citations: citations.length });
    return { answer, citations };
  }

  private async requestAnswer(
    prompt: string,
    history: readonly ChatMessage[]
  ): Promise<Result<string, CompletionError>> {
    const result = await withTimeout(
      () => this.completion.complete(prompt, history),
      this.completionTimeoutMs,
      'Answer completion'
    );
    if (!result.ok) {
      const reason = isTimeoutError(result.error) ? 'timeout' : 'provider_error';
      return Err(new CompletionError(reason, true, result.error.message, result.error));
    }
    const answer = result.value.trim();
    if (!answer) {
      return Err(new CompletionError('empty_response', true, 'provider returned an empty answer'));
    }
    return Ok(answer);
  }
}
