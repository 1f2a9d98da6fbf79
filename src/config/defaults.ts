/**
 * Default configuration values for waypoint.toml.
 *
 * @packageDocumentation
 */

import type {
  AgentSettings,
  Config,
  KnowledgeConfig,
  LoggingConfig,
  OrchestratorSettings,
  StorageConfig,
} from './types.js';

/**
 * Default agent settings: a 30 second deadline and one retry.
 */
export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  timeout_ms: 30000,
  max_retries: 1,
  backend_command: 'claude',
  backend_args: ['-p', '--output-format', 'text'],
  model: 'claude-sonnet-4-5',
  max_tokens: 2000,
  temperature: 0.7,
  temperature_flag: '',
};

/**
 * Default storage location relative to the working directory.
 */
export const DEFAULT_STORAGE: StorageConfig = {
  dir: '.waypoint/users',
};

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  auto_create_users: true,
  busy_policy: 'queue',
};

export const DEFAULT_KNOWLEDGE: KnowledgeConfig = {
  path: '',
  max_results: 3,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  agents: DEFAULT_AGENT_SETTINGS,
  storage: DEFAULT_STORAGE,
  orchestrator: DEFAULT_ORCHESTRATOR_SETTINGS,
  knowledge: DEFAULT_KNOWLEDGE,
  logging: DEFAULT_LOGGING,
};
