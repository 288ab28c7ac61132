/**
 * @fileoverview Whole-text utility transforms
 *
 * Summarize, translate or turn a text into a checklist with one completion
 * call. The stage never retrieves: callers hand it the full text (a whole
 * document, or a message from the conversation).
 */

import type { UtilityAction } from '../types.js';
import type { CompletionProvider } from '../providers/types.js';
import { InvalidArgumentError, UtilityError } from '../core/errors.js';
import { withTimeout } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface UtilityOptions {
  /** Target length of a summary, in sentences */
  summarySentences?: number;
  /** 0 disables the timeout */
  completionTimeoutMs?: number;
}

export const DEFAULT_SUMMARY_SENTENCES = 5;

// ============================================================================
// LANGUAGE DETECTION
// ============================================================================

const PERSIAN_SCRIPT = /[\u0600-\u06FF\uFB50-\uFDFF\uFE70-\uFEFC]/;

const LANGUAGE_NAMES = [
  'Arabic',
  'Chinese',
  'Dutch',
  'English',
  'Farsi',
  'French',
  'German',
  'Hindi',
  'Italian',
  'Japanese',
  'Korean',
  'Persian',
  'Polish',
  'Portuguese',
  'Russian',
  'Spanish',
  'Swedish',
  'Turkish',
  'Ukrainian',
  'Urdu',
];

const LANGUAGE_BY_LOWERCASE = new Map(LANGUAGE_NAMES.map((name) => [name.toLowerCase(), name]));

const PERSIAN_TARGET_PHRASES: ReadonlyArray<readonly [string, string]> = [
  ['به انگلیسی', 'English'],
  ['به فارسی', 'Persian'],
];

const EXPLICIT_TARGET = /\b(?:to|into|in)\s+([a-z]+)\b/gi;

export function containsPersian(text: string): boolean {
  return PERSIAN_SCRIPT.test(text);
}

/**
 * Language named in a request such as "translate this into French" or
 * "به انگلیسی ترجمه کن"; undefined when none is recognized.
 */
export function extractTargetLanguage(request: string): string | undefined {
  for (const [phrase, language] of PERSIAN_TARGET_PHRASES) {
    if (request.includes(phrase)) return language;
  }
  for (const match of request.matchAll(EXPLICIT_TARGET)) {
    const language = LANGUAGE_BY_LOWERCASE.get((match[1] ?? '').toLowerCase());
    if (language) return language;
  }
  return undefined;
}

/**
 * Persian text goes to English; anything else goes to Persian.
 */
export function inferTargetLanguage(text: string): string {
  return containsPersian(text) ? 'English' : 'Persian';
}

// ============================================================================
// PROMPTS
// ============================================================================

export interface UtilityPromptOptions {
  summarySentences: number;
  targetLanguage?: string;
}

export function buildUtilityPrompt(
  action: UtilityAction,
  text: string,
  options: UtilityPromptOptions
): string {
  const parts: string[] = [];

  switch (action) {
    case 'SUMMARIZE':
      parts.push(`Summarize the following text in at most ${options.summarySentences} sentences.`);
      parts.push('Write the summary in the same language as the text and keep only the key points.');
      break;
    case 'TRANSLATE':
      parts.push(`Translate the following text into ${options.targetLanguage ?? 'English'}.`);
      parts.push('Preserve the meaning and the formatting (headings, lists, line breaks). Return only the translation.');
      break;
    case 'CHECKLIST':
      parts.push('Extract the action items from the following text as a Markdown checklist.');
      parts.push('Write one item per line in the form "- [ ] item". Return only the checklist.');
      break;
  }

  parts.push('');
  parts.push('TEXT:');
  parts.push(text.trim());

  return parts.join('\n');
}

// ============================================================================
// STAGE
// ============================================================================

export class UtilityStage {
  private readonly summarySentences: number;
  private readonly completionTimeoutMs: number;

  constructor(
    private readonly completion: CompletionProvider,
    options: UtilityOptions = {}
  ) {
    this.summarySentences = options.summarySentences ?? DEFAULT_SUMMARY_SENTENCES;
    this.completionTimeoutMs = options.completionTimeoutMs ?? 0;
  }

  /**
   * Run one transform over `fullText`.
   *
   * @throws InvalidArgumentError for blank text, or TRANSLATE without a target language
   * @throws UtilityError when the completion fails, times out or comes back empty
   */
  async execute(action: UtilityAction, fullText: string, targetLanguage?: string): Promise<string> {
    if (!fullText.trim()) {
      throw new InvalidArgumentError('fullText', 'text to transform is empty');
    }
    const language = targetLanguage?.trim();
    if (action === 'TRANSLATE' && !language) {
      throw new InvalidArgumentError('targetLanguage', 'required for TRANSLATE');
    }

    const prompt = buildUtilityPrompt(action, fullText, {
      summarySentences: this.summarySentences,
      targetLanguage: language,
    });

    const result = await withTimeout(
      () => this.completion.complete(prompt),
      this.completionTimeoutMs,
      `${action} completion`
    );
    if (!result.ok) {
      throw new UtilityError(action, true, result.error.message, result.error);
    }

    const output = result.value.trim();
    if (!output) {
      throw new UtilityError(action, true, 'provider returned an empty response');
    }

    logDebug('[utility] Transform complete', {
      action,
      inputChars: fullText.length,
      outputChars: output.length,
    });
    return output;
  }
}
