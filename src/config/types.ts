/**
 * Configuration types for waypoint.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Agent invocation settings.
 */
export interface AgentSettings {
  /** Deadline for one agent call in milliseconds (default: 30000). */
  timeout_ms: number;
  /** Retries after a timed-out or malformed call. Must be 0 or 1 (default: 1). */
  max_retries: number;
  /** Executable of the command-line text-generation backend. */
  backend_command: string;
  /** Extra arguments passed before the prompt on every backend call. */
  backend_args: string[];
  /** Model identifier passed to the backend. */
  model: string;
  /** Output token cap passed to the backend. */
  max_tokens: number;
  /** Sampling temperature passed to the backend. */
  temperature: number;
  /**
   * Backend flag carrying the temperature, e.g. "--temperature". Empty omits
   * it, for CLIs that take no sampling option.
   */
  temperature_flag: string;
}

/**
 * Storage settings.
 */
export interface StorageConfig {
  /** Root directory for per-user state and logs. */
  dir: string;
}

/**
 * What to do with a second request for a user whose previous request is still running.
 */
export type BusyPolicy = 'queue' | 'reject';

/**
 * Orchestrator behaviour.
 */
export interface OrchestratorSettings {
  /** Create unknown users on first contact. When false, unknown users are rejected. */
  auto_create_users: boolean;
  busy_policy: BusyPolicy;
}

/**
 * Knowledge retrieval settings.
 */
export interface KnowledgeConfig {
  /** Path of the JSON knowledge base. Empty disables retrieval. */
  path: string;
  /** Snippets passed to an agent per call. */
  max_results: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from waypoint.toml.
 */
export interface Config {
  agents: AgentSettings;
  storage: StorageConfig;
  orchestrator: OrchestratorSettings;
  knowledge: KnowledgeConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export interface PartialConfig {
  agents?: Partial<AgentSettings>;
  storage?: Partial<StorageConfig>;
  orchestrator?: Partial<OrchestratorSettings>;
  knowledge?: Partial<KnowledgeConfig>;
  logging?: Partial<LoggingConfig>;
}
