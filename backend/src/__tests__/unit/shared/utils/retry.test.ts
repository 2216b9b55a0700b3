/**
 * Retry Utility Unit Tests
 *
 * Behavior (attempt counts, predicates, callbacks) with zero delays; the
 * delay formula is checked separately with jitter turned off.
 */

import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, retryWithBackoff } from '@/shared/utils/retry';

describe('Retry Utility', () => {
  // ==========================================================================
  // retryWithBackoff
  // ==========================================================================

  describe('retryWithBackoff', () => {
    it('should succeed after retries', async () => {
      let attempts = 0;
      const fn = vi.fn(async () => {
        attempts++;
        if (attempts < 3) {
          throw new Error('Transient error');
        }
        return 'success';
      });

      const result = await retryWithBackoff(fn, { maxRetries: 3, baseDelay: 0 });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3); // Initial + 2 retries
    });

    it('should throw the last error once retries are exhausted', async () => {
      let attempts = 0;
      const fn = vi.fn(async () => {
        attempts++;
        throw new Error(`failure ${attempts}`);
      });

      await expect(retryWithBackoff(fn, { maxRetries: 2, baseDelay: 0 })).rejects.toThrow('failure 3');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should stop at the first non-retryable error', async () => {
      const fn = vi.fn(async () => {
        throw new Error('Unauthorized');
      });

      await expect(
        retryWithBackoff(fn, { maxRetries: 5, baseDelay: 0, isRetryable: () => false })
      ).rejects.toThrow('Unauthorized');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should report each retry', async () => {
      const onRetry = vi.fn();
      const fn = vi.fn(async () => {
        throw new Error('down');
      });

      await expect(retryWithBackoff(fn, { maxRetries: 2, baseDelay: 0, onRetry })).rejects.toThrow('down');

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.objectContaining({ message: 'down' }), 0);
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.objectContaining({ message: 'down' }), 0);
    });

    it('should wrap non-Error rejections', async () => {
      const fn = (): Promise<never> => Promise.reject('plain string');

      await expect(retryWithBackoff(fn, { maxRetries: 0 })).rejects.toThrow(new Error('plain string'));
    });
  });

  // ==========================================================================
  // computeBackoffDelay
  // ==========================================================================

  describe('computeBackoffDelay', () => {
    it('should grow exponentially', () => {
      expect(computeBackoffDelay(0, { jitter: 0 })).toBe(1000);
      expect(computeBackoffDelay(3, { jitter: 0 })).toBe(8000);
      expect(computeBackoffDelay(2, { baseDelay: 500, jitter: 0 })).toBe(2000);
    });

    it('should cap at maxDelay', () => {
      expect(computeBackoffDelay(5, { jitter: 0 })).toBe(10000);
      expect(computeBackoffDelay(10, { baseDelay: 500, maxDelay: 8000, jitter: 0 })).toBe(8000);
    });

    it('should stay within the jitter band', () => {
      for (let i = 0; i < 20; i++) {
        const delay = computeBackoffDelay(0, { jitter: 0.1 });
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
      }
    });
  });
});
