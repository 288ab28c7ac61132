/**
 * @fileoverview Text normalization shared by ranking, routing and citations.
 */

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;
const NON_WORD = /[^\p{L}\p{M}\p{N}\s]+/gu;
const WHITESPACE = /\s+/;

/**
 * Lowercase, turn punctuation, symbols and zero-width joiners into spaces, and
 * collapse whitespace. Letters and digits of every script survive.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(ZERO_WIDTH, ' ')
    .replace(NON_WORD, ' ')
    .split(WHITESPACE)
    .filter(Boolean)
    .join(' ');
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(' ') : [];
}

/**
 * Leading excerpt with whitespace collapsed; `...` marks truncation.
 */
export function makeSnippet(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) return collapsed;
  return `${collapsed.slice(0, maxLength).trimEnd()}...`;
}
