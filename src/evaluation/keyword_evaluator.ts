/**
 * @fileoverview Keyword-based answer evaluation
 *
 * Runs a fixed set of test queries through the pipeline and scores each
 * answer by the fraction of expected keywords it contains. Crude, but cheap
 * enough to run after every configuration change to catch regressions in
 * routing, retrieval or prompting.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { AnswerResponse, ChatMessage, Intent } from '../types.js';
import { ConfigurationError } from '../core/errors.js';
import { logError, logInfo } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TEST QUERY FILE
// ============================================================================

export const testQuerySchema = z.object({
  id: z.string().min(1).optional(),
  query: z.string().min(1),
  /** Matched case-insensitively as substrings of the answer */
  expectedKeywords: z.array(z.string()).default([]),
  language: z.string().default('en'),
  category: z.string().optional(),
  active: z.boolean().default(true),
});

export const testQueryFileSchema = z.object({
  queries: z.array(testQuerySchema),
});

export type TestQuery = z.infer<typeof testQuerySchema>;
export type TestQueryInput = z.input<typeof testQuerySchema>;

/**
 * Parse a test query file (`{ "queries": [...] }`).
 * @throws ConfigurationError when the file is unreadable or invalid
 */
export async function loadTestQueries(filePath: string): Promise<TestQuery[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(filePath, `cannot read test queries: ${getErrorMessage(error)}`);
  }
  return parseTestQueries(raw, filePath);
}

export function parseTestQueries(raw: string, source = 'test queries'): TestQuery[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(source, `invalid JSON: ${getErrorMessage(error)}`);
  }
  const parsed = testQueryFileSchema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(source, `${issue?.message ?? 'invalid test queries'}${where}`);
  }
  return parsed.data.queries;
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Fraction of `keywords` present in `answer`, rounded to two decimals.
 * No keywords means nothing to check, which scores 1.
 */
export function scoreAnswer(answer: string, keywords: readonly string[]): number {
  if (keywords.length === 0) return 1;
  const haystack = answer.toLowerCase();
  const matches = keywords.filter((keyword) => haystack.includes(keyword.toLowerCase())).length;
  return Math.round((matches / keywords.length) * 100) / 100;
}

// ============================================================================
// RUNNER
// ============================================================================

export interface AnswerPipeline {
  answerQuery(query: string, chatHistory?: readonly ChatMessage[]): Promise<AnswerResponse>;
}

export interface QueryEvaluation {
  queryId: string;
  query: string;
  answer: string;
  score: number;
  citationCount: number;
  intent?: Intent;
  /** Pipeline error, either reported in the response or thrown */
  error?: string;
}

export interface EvaluationReport {
  startedAt: string;
  completedAt: string;
  totalQueries: number;
  averageScore: number;
  minScore: number;
  maxScore: number;
  results: QueryEvaluation[];
}

export interface EvaluationOptions {
  /** Called after each scored query */
  onProgress?: (completed: number, total: number, result: QueryEvaluation) => void;
}

export async function runEvaluation(
  pipeline: AnswerPipeline,
  testQueries: readonly TestQuery[],
  options: EvaluationOptions = {}
): Promise<EvaluationReport> {
  const startedAt = new Date().toISOString();
  const active = testQueries.filter((testQuery) => testQuery.active);
  const results: QueryEvaluation[] = [];

  for (const [index, testQuery] of active.entries()) {
    const queryId = testQuery.id ?? `q${index + 1}`;
    try {
      const response = await pipeline.answerQuery(testQuery.query, []);
      results.push({
        queryId,
        query: testQuery.query,
        answer: response.answer,
        score: scoreAnswer(response.answer, testQuery.expectedKeywords),
        citationCount: response.citations.length,
        intent: response.metadata.intent,
        ...(response.error ? { error: response.error } : {}),
      });
    } catch (error) {
      const message = getErrorMessage(error);
      logError('[evaluation] Query failed', { queryId, error: message });
      results.push({
        queryId,
        query: testQuery.query,
        answer: 'ERROR',
        score: 0,
        citationCount: 0,
        error: message,
      });
    }
    const latest = results[results.length - 1];
    if (latest) options.onProgress?.(results.length, active.length, latest);
  }

  const scores = results.map((result) => result.score);
  const report: EvaluationReport = {
    startedAt,
    completedAt: new Date().toISOString(),
    totalQueries: results.length,
    averageScore: scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : 0,
    minScore: scores.length > 0 ? Math.min(...scores) : 0,
    maxScore: scores.length > 0 ? Math.max(...scores) : 0,
    results,
  };

  logInfo('[evaluation] Run complete', {
    totalQueries: report.totalQueries,
    averageScore: report.averageScore,
  });
  return report;
}
