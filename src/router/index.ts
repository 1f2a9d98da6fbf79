/**
 * Agent-call policy and text-generation backends.
 *
 * @packageDocumentation
 */

export type {
  AgentCallFailure,
  AgentCallFailureKind,
  AgentCallResult,
  AttemptFailure,
  AttemptResult,
  BackendErrorType,
  BackendRequest,
  GenerationConstraints,
  TextGenerationBackend,
} from './types.js';
export { BackendError } from './types.js';

export {
  DEFAULT_RETRY_CONFIG,
  MAX_AGENT_RETRIES,
  calculateBackoffDelay,
  defaultSleep,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type {
  RetriedResult,
  RetryAttemptInfo,
  RetryCallback,
  RetryConfig,
  WithRetryOptions,
} from './retry.js';

export { AgentCallPolicy } from './policy.js';
export type { AgentCallPolicyOptions } from './policy.js';

export { CommandBackend, createCommandBackend } from './command-backend.js';
export type { CommandBackendOptions } from './command-backend.js';
