/**
 * Waypoint journey MCP server.
 *
 * @packageDocumentation
 */

export { createJourneyServer, startJourneyServer, type StartJourneyServerOptions } from './server.js';
export {
  DEFAULT_HISTORY_LIMIT,
  JOURNEY_TOOLS,
  SERVER_NAME,
  SERVER_VERSION,
  UnknownToolError,
  UserNotFoundError,
  type CreateUserToolResult,
  type GetActiveArtifactResult,
  type GetHistoryResult,
  type GetStateResult,
  type HistoryQuery,
  type JourneyServerConfig,
  type JourneyTool,
  type UserQuery,
  type UserRef,
} from './types.js';
