/**
 * Tests for agent-call retry logic.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  validateRetryConfig,
  withRetry,
  type RetryAttemptInfo,
} from './retry.js';
import type { AttemptResult } from './types.js';

const noSleep = (): Promise<void> => Promise.resolve();

function timedOut(): AttemptResult<string> {
  return { success: false, failure: { kind: 'timed_out', message: 'deadline', retryable: true } };
}

describe('retry module', () => {
  describe('validateRetryConfig', () => {
    it('should return defaults when no config provided', () => {
      expect(validateRetryConfig()).toEqual(DEFAULT_RETRY_CONFIG);
    });

    it('should reject more than one retry', () => {
      expect(() => validateRetryConfig({ maxRetries: 2 })).toThrow(
        'maxRetries must be an integer between 0 and 1, got: 2'
      );
    });

    it('should reject maxDelayMs below baseDelayMs', () => {
      expect(() => validateRetryConfig({ baseDelayMs: 500, maxDelayMs: 100 })).toThrow(
        'maxDelayMs (100) must be >= baseDelayMs (500)'
      );
    });

    it('should reject jitter outside [0, 1]', () => {
      expect(() => validateRetryConfig({ jitterFactor: 1.5 })).toThrow(
        'jitterFactor must be between 0 and 1, got: 1.5'
      );
    });
  });

  describe('calculateBackoffDelay', () => {
    const config = validateRetryConfig({ baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2 });

    it('should return the base delay when jitter is centred', () => {
      expect(calculateBackoffDelay(0, config, () => 0.5)).toBe(100);
    });

    it('should apply the jitter bounds', () => {
      expect(calculateBackoffDelay(0, config, () => 0)).toBe(80);
      expect(calculateBackoffDelay(0, config, () => 1)).toBe(120);
    });

    it('should cap at maxDelayMs', () => {
      expect(calculateBackoffDelay(10, config, () => 0.5)).toBe(1000);
    });
  });

  describe('withRetry', () => {
    it('should return the first success without retrying', async () => {
      const operation = vi.fn(
        (): Promise<AttemptResult<string>> => Promise.resolve({ success: true, output: 'ok' })
      );

      const result = await withRetry(operation, { sleep: noSleep });

      expect(result).toEqual({ success: true, output: 'ok', attempts: 1 });
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry a retryable failure exactly once', async () => {
      const operation = vi.fn((): Promise<AttemptResult<string>> => Promise.resolve(timedOut()));

      const result = await withRetry(operation, { sleep: noSleep });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(2);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should succeed on the retry', async () => {
      const results: AttemptResult<string>[] = [timedOut(), { success: true, output: 'second' }];
      const operation = vi.fn(
        (attempt: number): Promise<AttemptResult<string>> =>
          Promise.resolve(results[attempt - 1] ?? timedOut())
      );

      const result = await withRetry(operation, { sleep: noSleep });

      expect(result).toEqual({ success: true, output: 'second', attempts: 2 });
    });

    it('should not retry a non-retryable failure', async () => {
      const operation = vi.fn(
        (): Promise<AttemptResult<string>> =>
          Promise.resolve({
            success: false,
            failure: { kind: 'failed', message: 'not installed', retryable: false },
          })
      );

      const result = await withRetry(operation, { sleep: noSleep });

      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should not retry when maxRetries is 0', async () => {
      const operation = vi.fn((): Promise<AttemptResult<string>> => Promise.resolve(timedOut()));

      const result = await withRetry(operation, { config: { maxRetries: 0 }, sleep: noSleep });

      expect(result.attempts).toBe(1);
    });

    it('should report the retry and sleep for the computed delay', async () => {
      const infos: RetryAttemptInfo[] = [];
      const sleep = vi.fn(noSleep);

      await withRetry(() => Promise.resolve(timedOut()), {
        sleep,
        random: () => 0.5,
        onRetry: (info) => infos.push(info),
      });

      expect(infos).toEqual([
        {
          attempt: 2,
          totalAttempts: 2,
          delayMs: 100,
          previousFailure: { kind: 'timed_out', message: 'deadline', retryable: true },
        },
      ]);
      expect(sleep).toHaveBeenCalledWith(100);
    });
  });
});
