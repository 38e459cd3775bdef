/**
 * Cosine distance utilities for embedding comparison.
 *
 * Cosine distance = 1 - cosine_similarity, in [0, 2].
 * 0 = identical direction, 1 = orthogonal, 2 = opposite.
 * The retrieval layer reports `similarity = 1 - distance`.
 */

export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 * A zero vector has similarity 0 with everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to absorb floating point drift
  return Math.max(-1, Math.min(1, dot(a, b) / (na * nb)));
}

/**
 * Cosine distance between two vectors. Returns [0, 2].
 */
export function cosineDistance(a: number[], b: number[]): number {
  return 1 - cosineSimilarity(a, b);
}
