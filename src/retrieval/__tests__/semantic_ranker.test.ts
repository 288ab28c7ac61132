import { describe, it, expect } from 'vitest';
import { SemanticRanker, rescaleCosine } from '../semantic_ranker.js';
import { DimensionMismatchError } from '../../core/errors.js';
import { makeChunk } from '../../__tests__/pipeline_fixtures.js';

describe('rescaleCosine', () => {
  it('maps [-1, 1] onto [0, 1]', () => {
    expect(rescaleCosine(-1)).toBe(0);
    expect(rescaleCosine(0)).toBe(0.5);
    expect(rescaleCosine(1)).toBe(1);
  });
});

describe('SemanticRanker', () => {
  const ranker = new SemanticRanker();
  const chunks = [
    makeChunk({ id: 'same', documentId: 'd1', text: 'a', embedding: [1, 0] }),
    makeChunk({ id: 'orthogonal', documentId: 'd1', text: 'b', embedding: [0, 1] }),
    makeChunk({ id: 'opposite', documentId: 'd2', text: 'c', embedding: [-1, 0] }),
    makeChunk({ id: 'zero', documentId: 'd2', text: 'd', embedding: [0, 0] }),
  ];

  it('returns raw cosine similarity', () => {
    const raw = ranker.rawScores([2, 0], chunks);

    expect(raw.get('same')).toBe(1);
    expect(raw.get('orthogonal')).toBe(0);
    expect(raw.get('opposite')).toBe(-1);
    expect(raw.get('zero')).toBe(0);
  });

  it('returns rescaled scores', () => {
    const scores = ranker.score([2, 0], chunks);

    expect(scores.get('same')).toBe(1);
    expect(scores.get('orthogonal')).toBe(0.5);
    expect(scores.get('opposite')).toBe(0);
    expect(scores.get('zero')).toBe(0.5);
  });

  it('rejects embeddings of a different length', () => {
    const bad = [makeChunk({ id: 'wide', documentId: 'd1', text: 'x', embedding: [1, 0, 0] })];

    expect(() => ranker.score([1, 0], bad)).toThrow(DimensionMismatchError);
  });
});
