/**
 * TOML configuration parser for waypoint.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_AGENT_SETTINGS,
  DEFAULT_KNOWLEDGE,
  DEFAULT_LOGGING,
  DEFAULT_ORCHESTRATOR_SETTINGS,
  DEFAULT_STORAGE,
} from './defaults.js';
import type {
  AgentSettings,
  Config,
  KnowledgeConfig,
  LoggingConfig,
  OrchestratorSettings,
  StorageConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an optional sub-table.
 *
 * @throws ConfigParseError if the value exists but is not a table.
 */
function readTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table`);
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates a number that must be a finite positive integer.
 */
function validatePositiveInteger(value: unknown, fieldPath: string): number {
  const num = validateNumber(value, fieldPath);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a positive integer, got ${String(num)}`
    );
  }
  return num;
}

/**
 * Checks cross-field constraints shared by the file parser and env overrides.
 *
 * @throws ConfigParseError if a value is out of range.
 */
export function assertAgentSettingsValid(settings: AgentSettings): void {
  if (!Number.isInteger(settings.timeout_ms) || settings.timeout_ms <= 0) {
    throw new ConfigParseError(
      `Invalid value for 'agents.timeout_ms': must be a positive integer, got ${String(settings.timeout_ms)}`
    );
  }
  if (settings.max_retries !== 0 && settings.max_retries !== 1) {
    throw new ConfigParseError(
      `Invalid value for 'agents.max_retries': expected 0 or 1, got ${String(settings.max_retries)}`
    );
  }
  if (settings.temperature < 0 || settings.temperature > 2) {
    throw new ConfigParseError(
      `Invalid value for 'agents.temperature': must be between 0 and 2, got ${String(settings.temperature)}`
    );
  }
}

function parseAgents(raw: Table | undefined): AgentSettings {
  const result: AgentSettings = {
    ...DEFAULT_AGENT_SETTINGS,
    backend_args: [...DEFAULT_AGENT_SETTINGS.backend_args],
  };
  if (raw === undefined) {
    return result;
  }

  if ('timeout_ms' in raw) {
    result.timeout_ms = validatePositiveInteger(raw.timeout_ms, 'agents.timeout_ms');
  }
  if ('max_retries' in raw) {
    result.max_retries = validateNumber(raw.max_retries, 'agents.max_retries');
  }
  if ('backend_command' in raw) {
    result.backend_command = validateString(raw.backend_command, 'agents.backend_command');
  }
  if ('backend_args' in raw) {
    result.backend_args = validateStringArray(raw.backend_args, 'agents.backend_args');
  }
  if ('model' in raw) {
    result.model = validateString(raw.model, 'agents.model');
  }
  if ('max_tokens' in raw) {
    result.max_tokens = validatePositiveInteger(raw.max_tokens, 'agents.max_tokens');
  }
  if ('temperature' in raw) {
    result.temperature = validateNumber(raw.temperature, 'agents.temperature');
  }
  if ('temperature_flag' in raw) {
    result.temperature_flag = validateString(raw.temperature_flag, 'agents.temperature_flag');
  }

  assertAgentSettingsValid(result);
  return result;
}

function parseStorage(raw: Table | undefined): StorageConfig {
  const result: StorageConfig = { ...DEFAULT_STORAGE };
  if (raw === undefined) {
    return result;
  }

  if ('dir' in raw) {
    result.dir = validateString(raw.dir, 'storage.dir');
    if (result.dir.trim() === '') {
      throw new ConfigParseError(`Invalid value for 'storage.dir': must not be empty`);
    }
  }

  return result;
}

function parseOrchestrator(raw: Table | undefined): OrchestratorSettings {
  const result: OrchestratorSettings = { ...DEFAULT_ORCHESTRATOR_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('auto_create_users' in raw) {
    result.auto_create_users = validateBoolean(
      raw.auto_create_users,
      'orchestrator.auto_create_users'
    );
  }
  if ('busy_policy' in raw) {
    const policy = validateString(raw.busy_policy, 'orchestrator.busy_policy');
    if (policy !== 'queue' && policy !== 'reject') {
      throw new ConfigParseError(
        `Invalid value for 'orchestrator.busy_policy': expected 'queue' or 'reject', got '${policy}'`
      );
    }
    result.busy_policy = policy;
  }

  return result;
}

function parseKnowledge(raw: Table | undefined): KnowledgeConfig {
  const result: KnowledgeConfig = { ...DEFAULT_KNOWLEDGE };
  if (raw === undefined) {
    return result;
  }

  if ('path' in raw) {
    result.path = validateString(raw.path, 'knowledge.path');
  }
  if ('max_results' in raw) {
    result.max_results = validatePositiveInteger(raw.max_results, 'knowledge.max_results');
  }

  return result;
}

function parseLogging(raw: Table | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Validated configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [agents]
 * timeout_ms = 10000
 *
 * [orchestrator]
 * busy_policy = "reject"
 * `);
 * console.log(config.agents.timeout_ms); // 10000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    agents: parseAgents(readTable(parsed.agents, 'agents')),
    storage: parseStorage(readTable(parsed.storage, 'storage')),
    orchestrator: parseOrchestrator(readTable(parsed.orchestrator, 'orchestrator')),
    knowledge: parseKnowledge(readTable(parsed.knowledge, 'knowledge')),
    logging: parseLogging(readTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
