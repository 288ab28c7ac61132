import { describe, it, expect } from 'vitest';
import { makeSnippet, normalizeText, tokenize } from '../text.js';
import { clamp01, cosineSimilarity, minMaxNormalize } from '../math.js';

describe('normalizeText', () => {
  it('lowercases and turns punctuation into spaces', () => {
    expect(normalizeText('  Invoice #42: TOTAL, due!  ')).toBe('invoice 42 total due');
  });

  it('keeps letters of every script and splits on zero-width joiners', () => {
    expect(normalizeText('چک\u200cلیست (فوری)')).toBe('چک لیست فوری');
  });
});

describe('tokenize', () => {
  it('returns no tokens for punctuation-only text', () => {
    expect(tokenize('?!...')).toEqual([]);
    expect(tokenize('Due: $500')).toEqual(['due', '500']);
  });
});

describe('makeSnippet', () => {
  it('collapses whitespace and marks truncation', () => {
    expect(makeSnippet('a  b\n c', 10)).toBe('a b c');
    expect(makeSnippet('abcdef ghij', 7)).toBe('abcdef...');
  });
});

describe('scoring math', () => {
  it('computes cosine similarity and treats zero vectors as 0', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('min-max scales, mapping a flat set to 0', () => {
    expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
    expect(minMaxNormalize([3, 3])).toEqual([0, 0]);
    expect(minMaxNormalize([])).toEqual([]);
  });

  it('clamps into [0, 1]', () => {
    expect(clamp01(1.0000001)).toBe(1);
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.3)).toBe(0.3);
  });
});
