/**
 * Waypoint journey server - MCP surface of the orchestrator.
 *
 * Exposes the conversational operation, explicit user creation and the
 * read-only auxiliaries as tools. Logs go to stderr so stdout carries only JSON-RPC.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from '../../config/loader.js';
import { Logger, describeError } from '../../utils/logger.js';
import { createSchemaCheck, type SchemaCheck } from '../../utils/schema.js';
import { createOrchestrator } from '../../workflow/factory.js';
import { ARTIFACT_KINDS } from '../../workflow/types.js';
import {
  DEFAULT_HISTORY_LIMIT,
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
  type UserQuery,
  type UserRef,
} from './types.js';

const checkUserRef = createSchemaCheck<UserRef>('user-ref');
const checkUserQuery = createSchemaCheck<UserQuery>('user-query');
const checkHistoryQuery = createSchemaCheck<HistoryQuery>('history-query');

const USER_ID_PROPERTY = {
  type: 'string',
  description: 'Identifier of the learner (letters, digits, "_" and "-")',
} as const;

function jsonResult(value: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
  return isError ? { ...result, isError: true } : result;
}

function parseArgs<T>(
  check: (data: unknown) => SchemaCheck<T>,
  args: Record<string, unknown>
): T {
  const result = check(args);
  if (!result.valid) {
    throw new Error(`Invalid arguments: ${result.errors.join('; ')}`);
  }
  return result.value;
}

/**
 * Creates the journey server over an orchestrator.
 *
 * Uses the low-level Server class so every tool call goes through one
 * dispatch function.
 */
export function createJourneyServer(config: JourneyServerConfig): Server {
  const { orchestrator } = config;
  const logger =
    config.logger ?? new Logger({ component: 'journey-server', debugMode: config.debug ?? false });

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: { listChanged: true } } }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => {
    return Promise.resolve({
      tools: [
        {
          name: 'converse',
          description:
            'Sends one learner message and returns the reply and the journey phase after it. ' +
            'Messages for the same learner are processed one at a time.',
          inputSchema: {
            type: 'object',
            properties: {
              user_id: USER_ID_PROPERTY,
              message: { type: 'string', description: 'The learner message' },
              request_id: {
                type: 'string',
                description: 'Optional: client request id; a repeat while in flight is answered once',
              },
            },
            required: ['user_id', 'message'],
          },
        },
        {
          name: 'create_user',
          description:
            'Creates a learner at the start of onboarding. Reports "exists" for a known learner ' +
            'and leaves their journey untouched.',
          inputSchema: {
            type: 'object',
            properties: { user_id: USER_ID_PROPERTY },
            required: ['user_id'],
          },
        },
        {
          name: 'get_state',
          description: "Returns the learner's journey state record.",
          inputSchema: {
            type: 'object',
            properties: { user_id: USER_ID_PROPERTY },
            required: ['user_id'],
          },
        },
        {
          name: 'get_active_artifact',
          description:
            'Returns the newest version of the artifact the current phase works on, ' +
            'or of the given kind.',
          inputSchema: {
            type: 'object',
            properties: {
              user_id: USER_ID_PROPERTY,
              kind: {
                type: 'string',
                enum: [...ARTIFACT_KINDS],
                description: 'Optional: artifact kind to return instead of the current one',
              },
            },
            required: ['user_id'],
          },
        },
        {
          name: 'get_history',
          description:
            "Returns the most recent entries of the learner's conversation log, oldest first.",
          inputSchema: {
            type: 'object',
            properties: {
              user_id: USER_ID_PROPERTY,
              limit: {
                type: 'integer',
                minimum: 1,
                maximum: 1000,
                description: `Optional: entries to return (default: ${String(DEFAULT_HISTORY_LIMIT)})`,
              },
            },
            required: ['user_id'],
          },
        },
      ],
    });
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};

    logger.debug('tool_call', { name, args });

    try {
      switch (name) {
        case 'converse': {
          const result = await orchestrator.converse(args);
          if (result.success) {
            return jsonResult(result.reply);
          }
          return jsonResult(
            result.reply !== undefined
              ? { error: result.error, reply: result.reply }
              : { error: result.error },
            true
          );
        }

        case 'create_user': {
          const { user_id: userId } = parseArgs(checkUserRef, args);
          const created = await orchestrator.createUser(userId);
          const result: CreateUserToolResult = {
            user_id: userId,
            status: created.status,
            current_state: created.state.current_state,
          };
          return jsonResult(result);
        }

        case 'get_state': {
          const { user_id: userId } = parseArgs(checkUserRef, args);
          const state = await orchestrator.getState(userId);
          if (state === undefined) {
            throw new UserNotFoundError(userId);
          }
          const result: GetStateResult = { state };
          return jsonResult(result);
        }

        case 'get_active_artifact': {
          const query = parseArgs(checkUserQuery, args);
          const artifact = await orchestrator.getActiveArtifact(query.user_id, query.kind);
          const result: GetActiveArtifactResult = { artifact: artifact ?? null };
          return jsonResult(result);
        }

        case 'get_history': {
          const query = parseArgs(checkHistoryQuery, args);
          const entries = await orchestrator.getHistory(
            query.user_id,
            query.limit ?? DEFAULT_HISTORY_LIMIT
          );
          const result: GetHistoryResult = { entries };
          return jsonResult(result);
        }

        default:
          throw new UnknownToolError(name);
      }
    } catch (error) {
      logger.warn('tool_call_failed', { name, error: describeError(error) });
      return jsonResult({ error: describeError(error) }, true);
    }
  });

  return server;
}

/**
 * Options for {@link startJourneyServer}.
 */
export interface StartJourneyServerOptions {
  /** Path of waypoint.toml. */
  readonly configPath?: string;
  /** Forces debug logging on. */
  readonly debug?: boolean;
}

/**
 * Loads configuration, builds the orchestrator and serves over stdio.
 */
export async function startJourneyServer(options: StartJourneyServerOptions = {}): Promise<void> {
  const loaded = await loadConfig(options.configPath);
  const config =
    options.debug === true ? { ...loaded, logging: { ...loaded.logging, debug: true } } : loaded;
  const logger = new Logger({ component: 'journey-server', debugMode: config.logging.debug });

  const orchestrator = await createOrchestrator(config, { logger: logger.child('orchestrator') });
  const server = createJourneyServer({ orchestrator, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('server_started', {
    storage: config.storage.dir,
    busy_policy: config.orchestrator.busy_policy,
  });
}
