/**
 * Retry logic for agent calls.
 *
 * An attempt that fails with a retryable {@link AttemptFailure} is repeated
 * after a short, jittered backoff, up to `maxRetries` more times. Agent calls
 * allow at most one retry, so a call makes at most two attempts.
 *
 * @packageDocumentation
 */

import type { AttemptFailure, AttemptResult } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts, 0 or 1 (default: 1). */
  maxRetries: number;
  /** Base delay in milliseconds before a retry (default: 100). */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 1000). */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomizing delays (default: 0.2). */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 1,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  jitterFactor: 0.2,
} as const;

/**
 * Upper bound on retries for a single agent call.
 */
export const MAX_AGENT_RETRIES = 1;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (!Number.isInteger(maxRetries) || maxRetries < 0 || maxRetries > MAX_AGENT_RETRIES) {
    throw new Error(
      `maxRetries must be an integer between 0 and ${String(MAX_AGENT_RETRIES)}, got: ${String(maxRetries)}`
    );
  }

  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }

  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxRetries, baseDelayMs, maxDelayMs, jitterFactor };
}

/**
 * Calculates the delay before a retry using exponential backoff with jitter.
 *
 * The delay is: min(maxDelayMs, baseDelayMs * 2^attempt) * (1 ± jitter)
 *
 * @param attempt - The retry number (0-indexed).
 * @param config - Retry configuration.
 * @param random - Random function for jitter (injectable for testing).
 * @returns Delay in milliseconds.
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const cappedDelay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;
  return Math.round(cappedDelay * jitterMultiplier);
}

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt about to run (1-indexed). */
  attempt: number;
  /** Total attempts that will be made (initial + retries). */
  totalAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** The failure of the previous attempt. */
  previousFailure: AttemptFailure;
}

/**
 * Callback type for retry attempt notifications.
 */
export type RetryCallback = (info: RetryAttemptInfo) => void;

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  /** Retry configuration (uses defaults if not provided). */
  config?: Partial<RetryConfig>;
  /** Callback invoked before each retry attempt. */
  onRetry?: RetryCallback;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
  /** Random function for jitter (injectable for testing). */
  random?: () => number;
}

/**
 * Outcome of {@link withRetry}: the last attempt's result and the attempt count.
 */
export type RetriedResult<O> = AttemptResult<O> & { readonly attempts: number };

/**
 * Default sleep implementation using setTimeout.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an attempt, repeating it while it fails retryably and retries remain.
 *
 * @param operation - Runs one attempt; receives the 1-indexed attempt number.
 * @param options - Retry options.
 * @returns The first success, or the last failure.
 *
 * @example
 * ```typescript
 * const result = await withRetry((attempt) => runAgentOnce(attempt), {
 *   config: { maxRetries: 1 },
 *   onRetry: (info) => logger.warn('agent_call_retry', { attempt: info.attempt }),
 * });
 * ```
 */
export async function withRetry<O>(
  operation: (attempt: number) => Promise<AttemptResult<O>>,
  options: WithRetryOptions = {}
): Promise<RetriedResult<O>> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const totalAttempts = config.maxRetries + 1;

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);

    if (result.success || !result.failure.retryable || attempt >= totalAttempts) {
      return { ...result, attempts: attempt };
    }

    const delayMs = calculateBackoffDelay(attempt - 1, config, random);
    options.onRetry?.({
      attempt: attempt + 1,
      totalAttempts,
      delayMs,
      previousFailure: result.failure,
    });
    await sleep(delayMs);
    attempt += 1;
  }
}
