/**
 * Waypoint
 *
 * A conversational orchestrator that walks a learner from a target role to
 * a finished portfolio project and resume package.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Orchestrator, state machine and persistence
export * from './workflow/index.js';

// Agents and the text they produce
export * from './agents/index.js';

// Agent invocation
export * from './router/index.js';

// Knowledge retrieval
export * from './knowledge/index.js';

// Configuration
export * from './config/index.js';

// MCP surface
export {
  JOURNEY_TOOLS,
  createJourneyServer,
  startJourneyServer,
  type JourneyServerConfig,
  type StartJourneyServerOptions,
} from './servers/journey/index.js';

export { Logger, describeError, type LogLevel, type LoggerOptions } from './utils/logger.js';
