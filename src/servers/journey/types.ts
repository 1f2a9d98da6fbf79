/**
 * Types for the waypoint journey server.
 *
 * @packageDocumentation
 */

import type { Logger } from '../../utils/logger.js';
import type { CreateUserResult, Orchestrator } from '../../workflow/orchestrator.js';
import type {
  ArtifactKind,
  ArtifactRecord,
  ConversationLogEntry,
  UserState,
} from '../../workflow/types.js';

export const SERVER_NAME = 'waypoint-journey-server';
export const SERVER_VERSION = '0.1.0';

/**
 * Tools the server exposes.
 */
export const JOURNEY_TOOLS = [
  'converse',
  'create_user',
  'get_state',
  'get_active_artifact',
  'get_history',
] as const;

export type JourneyTool = (typeof JOURNEY_TOOLS)[number];

/**
 * Configuration for {@link createJourneyServer}.
 */
export interface JourneyServerConfig {
  readonly orchestrator: Orchestrator;
  /** Defaults to a stderr logger named after the server. */
  readonly logger?: Logger;
  readonly debug?: boolean;
}

/**
 * Entries `get_history` returns when no limit is given.
 */
export const DEFAULT_HISTORY_LIMIT = 50;

/**
 * Arguments naming only a user.
 */
export interface UserRef {
  readonly user_id: string;
}

/**
 * Arguments of `get_active_artifact`.
 */
export interface UserQuery {
  readonly user_id: string;
  readonly kind?: ArtifactKind;
}

/**
 * Arguments of `get_history`.
 */
export interface HistoryQuery {
  readonly user_id: string;
  /** Most recent entries to return (default: 50). */
  readonly limit?: number;
}

export interface CreateUserToolResult {
  readonly user_id: string;
  readonly status: CreateUserResult['status'];
  readonly current_state: UserState['current_state'];
}

export interface GetStateResult {
  readonly state: UserState;
}

export interface GetActiveArtifactResult {
  /** Null when the user has not produced the artifact yet. */
  readonly artifact: ArtifactRecord | null;
}

export interface GetHistoryResult {
  readonly entries: readonly ConversationLogEntry[];
}

/**
 * Error thrown when a read-only tool names a user with no state.
 */
export class UserNotFoundError extends Error {
  public readonly userId: string;

  constructor(userId: string) {
    super(`Unknown user: ${userId}`);
    this.name = 'UserNotFoundError';
    this.userId = userId;
  }
}

/**
 * Error thrown for an unrecognised tool name.
 */
export class UnknownToolError extends Error {
  public readonly tool: string;

  constructor(tool: string) {
    super(`Unknown tool: ${tool}`);
    this.name = 'UnknownToolError';
    this.tool = tool;
  }
}
