/**
 * Agent-call policy decorator.
 *
 * Wraps any {@link Agent} with a deadline and the retry-once rule and turns
 * every outcome into an {@link AgentCallResult}. On expiry the call's
 * AbortSignal fires and whatever the agent produces afterwards is dropped.
 *
 * @packageDocumentation
 */

import type { Agent } from '../agents/types.js';
import type { Snippet } from '../knowledge/types.js';
import { describeError, type Logger } from '../utils/logger.js';
import { withRetry, type WithRetryOptions } from './retry.js';
import { BackendError, type AgentCallResult, type AttemptResult } from './types.js';

/**
 * Options for {@link AgentCallPolicy}.
 */
export interface AgentCallPolicyOptions {
  /** Deadline per attempt in milliseconds. */
  readonly timeoutMs: number;
  /** 0 or 1. */
  readonly maxRetries: number;
  readonly logger: Logger;
  /** Delay before a retry (injectable for testing). */
  readonly sleep?: WithRetryOptions['sleep'];
  /** Base backoff delay in milliseconds. */
  readonly retryDelayMs?: number;
}

/**
 * Runs a single attempt under a deadline.
 */
async function attemptWithDeadline<I, O>(
  agent: Agent<I, O>,
  input: I,
  snippets: readonly Snippet[],
  timeoutMs: number
): Promise<AttemptResult<O>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<AttemptResult<O>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        success: false,
        failure: {
          kind: 'timed_out',
          message: `${agent.name} did not answer within ${String(timeoutMs)}ms`,
          retryable: true,
        },
      });
    }, timeoutMs);
  });

  const call = agent.generate(input, { signal: controller.signal, snippets }).then(
    (outcome): AttemptResult<O> =>
      outcome.kind === 'ok'
        ? { success: true, output: outcome.output }
        : {
            success: false,
            failure: { kind: 'malformed', message: outcome.reason, retryable: true },
          },
    (error: unknown): AttemptResult<O> => ({
      success: false,
      failure: {
        kind: 'failed',
        message: describeError(error),
        // A missing backend executable will not appear between attempts.
        retryable: !(error instanceof BackendError && error.errorType === 'not_found'),
      },
    })
  );

  try {
    return await Promise.race([call, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Timeout and retry-once decorator for agent calls.
 *
 * @example
 * ```typescript
 * const policy = new AgentCallPolicy({ timeoutMs: 30000, maxRetries: 1, logger });
 * const result = await policy.call(agents.evaluator, input, snippets);
 * if (!result.success) {
 *   console.log(result.failure.kind); // 'timed_out' | 'malformed' | 'failed'
 * }
 * ```
 */
export class AgentCallPolicy {
  /** Deadline per attempt; knowledge retrieval before the call shares it. */
  readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly logger: Logger;
  private readonly sleep: WithRetryOptions['sleep'];
  private readonly retryDelayMs: number | undefined;

  constructor(options: AgentCallPolicyOptions) {
    if (!Number.isInteger(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new Error(`timeoutMs must be a positive integer, got: ${String(options.timeoutMs)}`);
    }
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.logger = options.logger;
    this.sleep = options.sleep;
    this.retryDelayMs = options.retryDelayMs;
  }

  /**
   * Calls `agent` with at most `1 + maxRetries` attempts.
   */
  async call<I, O>(
    agent: Agent<I, O>,
    input: I,
    snippets: readonly Snippet[] = []
  ): Promise<AgentCallResult<O>> {
    const startedAt = Date.now();
    const retryOptions: WithRetryOptions = {
      config:
        this.retryDelayMs !== undefined
          ? {
              maxRetries: this.maxRetries,
              baseDelayMs: this.retryDelayMs,
              maxDelayMs: this.retryDelayMs * 4,
            }
          : { maxRetries: this.maxRetries },
      onRetry: (info) => {
        this.logger.warn('agent_call_retry', {
          agent: agent.name,
          attempt: info.attempt,
          totalAttempts: info.totalAttempts,
          delayMs: info.delayMs,
          previousFailure: info.previousFailure.kind,
          reason: info.previousFailure.message,
        });
      },
    };
    if (this.sleep !== undefined) {
      retryOptions.sleep = this.sleep;
    }

    const result = await withRetry(
      () => attemptWithDeadline(agent, input, snippets, this.timeoutMs),
      retryOptions
    );
    const durationMs = Date.now() - startedAt;

    if (result.success) {
      this.logger.info('agent_call_completed', {
        agent: agent.name,
        attempts: result.attempts,
        durationMs,
      });
      return { success: true, output: result.output, attempts: result.attempts };
    }

    this.logger.warn('agent_call_failed', {
      agent: agent.name,
      kind: result.failure.kind,
      reason: result.failure.message,
      attempts: result.attempts,
      durationMs,
    });
    return {
      success: false,
      failure: {
        agent: agent.name,
        kind: result.failure.kind,
        message: result.failure.message,
        attempts: result.attempts,
      },
    };
  }
}
