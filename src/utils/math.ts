/**
 * @fileoverview Math utilities for scoring
 */

/**
 * Clamp a value to [0, 1].
 * Float error in weighted sums can land a hair outside the range.
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Cosine similarity of two equal-length vectors.
 * Returns 0 when either vector has zero magnitude. Callers check lengths.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Min-max scale values into [0, 1].
 * When every value is equal there is no spread to scale, so all become 0.
 */
export function minMaxNormalize(values: readonly number[]): number[] {
  if (values.length === 0) return [];

  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  if (max === min) return values.map(() => 0);

  const range = max - min;
  return values.map((v) => (v - min) / range);
}
