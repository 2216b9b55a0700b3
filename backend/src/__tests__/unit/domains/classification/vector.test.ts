/**
 * Unit Tests - Vector helpers
 *
 * @module __tests__/unit/domains/classification/vector
 */

import { describe, it, expect } from 'vitest';
import { argmax, dot, l2Norm, normalize, softmax } from '@/domains/classification/vector';
import { NumericError } from '@/domains/classification/errors';

describe('vector helpers', () => {
  describe('l2Norm', () => {
    it('should compute the euclidean length', () => {
      expect(l2Norm([3, 4])).toBe(5);
    });
  });

  describe('normalize', () => {
    it('should scale to unit length', () => {
      const result = normalize([3, 4], 'v');

      expect(result[0]).toBeCloseTo(0.6, 12);
      expect(result[1]).toBeCloseTo(0.8, 12);
    });

    it('should reject an empty vector', () => {
      expect(() => normalize([], 'v')).toThrow(new NumericError('v is empty'));
    });

    it('should reject a zero vector', () => {
      expect(() => normalize([0, 0, 0], 'v')).toThrow('v has zero norm');
    });

    it('should reject non-finite values', () => {
      expect(() => normalize([1, Number.NaN], 'v')).toThrow('v contains non-finite values');
      expect(() => normalize([Infinity, 1], 'v')).toThrow(NumericError);
    });
  });

  describe('dot', () => {
    it('should sum elementwise products', () => {
      expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    });

    it('should reject mismatched dimensions', () => {
      expect(() => dot([1, 2], [1, 2, 3])).toThrow('Dimension mismatch: 2 vs 3');
    });
  });

  describe('softmax', () => {
    it('should return a probability distribution', () => {
      const result = softmax([1, 0]);

      expect(result[0]).toBeCloseTo(0.7310585786, 10);
      expect(result[1]).toBeCloseTo(0.2689414214, 10);
    });

    it('should not overflow on large logits', () => {
      expect(softmax([1000, 1000])).toEqual([0.5, 0.5]);
    });

    it('should handle more logits than fit in one call frame', () => {
      const result = softmax(new Array<number>(200_000).fill(0));

      expect(result).toHaveLength(200_000);
      expect(result[0]).toBeCloseTo(0.000005, 12);
    });

    it('should return an empty array for no logits', () => {
      expect(softmax([])).toEqual([]);
    });
  });

  describe('argmax', () => {
    it('should pick the first index on ties', () => {
      expect(argmax([1, 3, 3])).toBe(1);
    });

    it('should return -1 for an empty input', () => {
      expect(argmax([])).toBe(-1);
    });

    it('should handle all-negative values', () => {
      expect(argmax([-5, -1, -3])).toBe(1);
    });
  });
});
