/**
 * @fileoverview Query intent classification
 *
 * Routes a chat query to one of four intents:
 *
 * - 'CHECKLIST': extract action items from the conversation / document
 * - 'TRANSLATE': translate the conversation / document
 * - 'SUMMARIZE': summarize the conversation / document
 * - 'RAG_QUERY': everything else, answered from retrieved chunks
 *
 * Rules are evaluated in table order and the first match wins, so a query
 * such as "make a checklist summary" is a CHECKLIST. Keywords are listed
 * for English and Persian; matching runs on normalized text and only needs
 * the keyword to start at a word boundary, so it works for both scripts.
 */

import type { Intent, UtilityAction } from '../types.js';
import { normalizeText } from '../utils/text.js';

// ============================================================================
// TYPES
// ============================================================================

export interface IntentRule {
  readonly intent: UtilityAction;
  readonly keywords: readonly string[];
}

export interface IntentClassification {
  intent: Intent;
  /** Keyword (as written in the rule table) that selected the intent */
  matchedKeyword?: string;
}

// ============================================================================
// RULE TABLE
// ============================================================================

/**
 * Ordered by priority. Persian entries carry both the ZWNJ and the spaced
 * spelling where writers use either.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'CHECKLIST',
    keywords: [
      'checklist',
      'check list',
      'action items',
      'todo',
      'task list',
      'چک\u200cلیست',
      'چک لیست',
      'فهرست کارها',
      'کارها',
    ],
  },
  {
    intent: 'TRANSLATE',
    keywords: ['translate', 'translation', 'ترجمه', 'به انگلیسی', 'به فارسی'],
  },
  {
    intent: 'SUMMARIZE',
    keywords: ['summarize', 'summarise', 'summary', 'tl;dr', 'tldr', 'خلاصه'],
  },
];

// ============================================================================
// ROUTER
// ============================================================================

type CompiledRule = {
  intent: UtilityAction;
  keywords: Array<{ original: string; needle: string }>;
};

export class IntentRouter {
  private readonly rules: CompiledRule[];

  constructor(rules: readonly IntentRule[] = INTENT_RULES) {
    this.rules = rules.map((rule) => ({
      intent: rule.intent,
      keywords: rule.keywords
        .map((keyword) => ({ original: keyword, needle: ` ${normalizeText(keyword)}` }))
        .filter((entry) => entry.needle.trim().length > 0),
    }));
  }

  /**
   * Classify a query. Never throws; unknown or empty input is a RAG_QUERY.
   */
  classify(query: string): Intent {
    return this.classifyWithTrace(query).intent;
  }

  classifyWithTrace(query: string): IntentClassification {
    const haystack = ` ${normalizeText(query)} `;
    if (!haystack.trim()) return { intent: 'RAG_QUERY' };

    for (const rule of this.rules) {
      const hit = rule.keywords.find((keyword) => haystack.includes(keyword.needle));
      if (hit) {
        return { intent: rule.intent, matchedKeyword: hit.original };
      }
    }
    return { intent: 'RAG_QUERY' };
  }
}
