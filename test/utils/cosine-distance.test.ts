import { describe, it, expect } from 'vitest';
import { cosineDistance, cosineSimilarity, dot, norm } from '../../src/utils/cosine-distance.js';

describe('cosine-distance', () => {
  it('computes dot product and norm', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(norm([3, 4])).toBe(5);
  });

  it('is 0 for identical direction regardless of magnitude', () => {
    expect(cosineDistance([1, 2], [2, 4])).toBeCloseTo(0, 10);
  });

  it('is 1 for orthogonal vectors', () => {
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it('is 2 for opposite vectors', () => {
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it('treats a zero vector as orthogonal', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });
});
