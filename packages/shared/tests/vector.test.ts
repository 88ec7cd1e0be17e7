import { describe, it, expect } from 'vitest';
import { vectorAdd, vectorScale, computeCentroid, cosineSimilarity, isVector } from '../src/utils/vector.js';

describe('Vector utilities', () => {
  describe('vectorAdd', () => {
    it('adds element-wise', () => {
      expect(vectorAdd([1, 2, 3], [4, 5, 6])).toEqual([5, 7, 9]);
    });

    it('treats an empty or absent side as identity', () => {
      expect(vectorAdd([], [1, 2])).toEqual([1, 2]);
      expect(vectorAdd([1, 2], undefined)).toEqual([1, 2]);
      expect(vectorAdd(undefined, undefined)).toEqual([]);
    });

    it('returns the left operand on length mismatch', () => {
      expect(vectorAdd([1, 2], [1, 2, 3])).toEqual([1, 2]);
    });

    it('does not alias its inputs', () => {
      const b = [1, 2];
      const sum = vectorAdd([], b);
      sum[0] = 99;
      expect(b).toEqual([1, 2]);
    });
  });

  it('vectorScale multiplies each component', () => {
    expect(vectorScale([2, 4], 0.5)).toEqual([1, 2]);
    expect(vectorScale(undefined, 3)).toEqual([]);
  });

  describe('computeCentroid', () => {
    it('averages vectors', () => {
      expect(computeCentroid([[1, 0], [0, 1]])).toEqual([0.5, 0.5]);
    });

    it('returns empty for no input', () => {
      expect(computeCentroid([])).toEqual([]);
    });

    it('ignores vectors with a different dimension than the first', () => {
      expect(computeCentroid([[2, 2], [1, 1, 1], [0, 0]])).toEqual([1, 1]);
    });
  });

  describe('cosineSimilarity', () => {
    it('is 1 for parallel vectors', () => {
      expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    });

    it('is 0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('is 0 for the zero vector, empty input and mismatched lengths', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
      expect(cosineSimilarity([], [])).toBe(0);
      expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
      expect(cosineSimilarity(undefined, [1])).toBe(0);
    });
  });

  it('isVector accepts finite number arrays only', () => {
    expect(isVector([1, 2.5])).toBe(true);
    expect(isVector([1, 'a'])).toBe(false);
    expect(isVector([Number.NaN])).toBe(false);
    expect(isVector('1,2')).toBe(false);
  });
});
