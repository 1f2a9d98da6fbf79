/**
 * Types for agent calls and the text-generation backend behind them.
 *
 * Every agent call resolves to an {@link AgentCallResult}: the output, or a
 * typed failure. Nothing above the policy layer sees a raw backend error.
 *
 * @packageDocumentation
 */

/**
 * Limits passed to the backend with every request.
 */
export interface GenerationConstraints {
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature: number;
}

/**
 * One request to the text-generation backend.
 */
export interface BackendRequest {
  /** Instructions for the model. */
  readonly system: string;
  /** The structured input, serialized. */
  readonly payload: string;
  readonly constraints: GenerationConstraints;
  /** Aborted when the caller's deadline expires. */
  readonly signal: AbortSignal;
}

/**
 * External text-generation service consumed at its boundary.
 */
export interface TextGenerationBackend {
  /**
   * Produces raw text for a request.
   *
   * @throws BackendError when the backend cannot produce text.
   */
  generate(request: BackendRequest): Promise<string>;
}

/**
 * Error categories for backend failures.
 */
export type BackendErrorType = 'not_found' | 'exit_error' | 'timeout' | 'aborted' | 'spawn_error';

/**
 * Error thrown by a {@link TextGenerationBackend}.
 */
export class BackendError extends Error {
  public readonly errorType: BackendErrorType;
  public readonly details: string | undefined;
  public override readonly cause: Error | undefined;

  /**
   * @param message - Human-readable message.
   * @param errorType - Failure category.
   * @param details - Extra context such as captured stderr.
   * @param cause - Underlying error, if any.
   */
  constructor(message: string, errorType: BackendErrorType, details?: string, cause?: Error) {
    super(message);
    this.name = 'BackendError';
    this.errorType = errorType;
    this.details = details;
    this.cause = cause;
  }
}

/**
 * How an agent call failed.
 *
 * - `timed_out`: the deadline expired; the call was aborted and any late result discarded
 * - `malformed`: the agent produced output that violates its contract
 * - `failed`: the backend threw
 */
export type AgentCallFailureKind = 'timed_out' | 'malformed' | 'failed';

/**
 * Failure of a single attempt.
 */
export interface AttemptFailure {
  readonly kind: AgentCallFailureKind;
  readonly message: string;
  readonly retryable: boolean;
}

/**
 * Result of a single attempt.
 */
export type AttemptResult<O> =
  | { readonly success: true; readonly output: O }
  | { readonly success: false; readonly failure: AttemptFailure };

/**
 * Final failure of an agent call after the retry policy gave up.
 */
export interface AgentCallFailure {
  readonly agent: string;
  readonly kind: AgentCallFailureKind;
  readonly message: string;
  /** Attempts made, including the first. */
  readonly attempts: number;
}

/**
 * Result of an agent call through the policy decorator.
 */
export type AgentCallResult<O> =
  | { readonly success: true; readonly output: O; readonly attempts: number }
  | { readonly success: false; readonly failure: AgentCallFailure };
