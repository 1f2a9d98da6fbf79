/**
 * Configuration module for waypoint.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  assertAgentSettingsValid,
  getDefaultConfig,
  parseConfig,
} from './parser.js';
export type {
  AgentSettings,
  BusyPolicy,
  Config,
  KnowledgeConfig,
  LoggingConfig,
  OrchestratorSettings,
  PartialConfig,
  StorageConfig,
} from './types.js';
export {
  DEFAULT_AGENT_SETTINGS,
  DEFAULT_CONFIG,
  DEFAULT_KNOWLEDGE,
  DEFAULT_LOGGING,
  DEFAULT_ORCHESTRATOR_SETTINGS,
  DEFAULT_STORAGE,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { DEFAULT_CONFIG_FILE, loadConfig } from './loader.js';
