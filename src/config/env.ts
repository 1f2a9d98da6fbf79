/**
 * Environment variable overrides for configuration.
 *
 * WAYPOINT_<SECTION>_<FIELD> variables override values from waypoint.toml.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { assertAgentSettingsValid, ConfigParseError } from './parser.js';
import type { BusyPolicy, Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ?? `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'string' | 'number' | 'boolean' | 'list' | 'busy_policy';

interface EnvMapping {
  readonly description: string;
  readonly type: EnvValueType;
  readonly apply: (overrides: PartialConfig, value: string | number | boolean | string[]) => void;
}

function asString(value: string | number | boolean | string[]): string {
  return typeof value === 'string' ? value : String(value);
}

function asNumber(value: string | number | boolean | string[]): number {
  return typeof value === 'number' ? value : Number(value);
}

function asBoolean(value: string | number | boolean | string[]): boolean {
  return value === true;
}

function asList(value: string | number | boolean | string[]): string[] {
  return Array.isArray(value) ? value : [asString(value)];
}

function asBusyPolicy(value: string | number | boolean | string[]): BusyPolicy {
  return value === 'reject' ? 'reject' : 'queue';
}

/**
 * Supported environment variables and where each one lands in the config.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  [
    'WAYPOINT_AGENTS_TIMEOUT_MS',
    {
      description: 'Deadline for one agent call in milliseconds',
      type: 'number',
      apply: (o, v) => {
        o.agents = { ...o.agents, timeout_ms: asNumber(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_MAX_RETRIES',
    {
      description: 'Retries after a timed-out or malformed agent call (0 or 1)',
      type: 'number',
      apply: (o, v) => {
        o.agents = { ...o.agents, max_retries: asNumber(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_BACKEND_COMMAND',
    {
      description: 'Executable of the text-generation backend',
      type: 'string',
      apply: (o, v) => {
        o.agents = { ...o.agents, backend_command: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_BACKEND_ARGS',
    {
      description: 'Space-separated extra backend arguments',
      type: 'list',
      apply: (o, v) => {
        o.agents = { ...o.agents, backend_args: asList(v) };
      },
    },
  ],
  [
    'WAYPOINT_MODEL',
    {
      description: 'Model identifier passed to the backend (shortcut for WAYPOINT_AGENTS_MODEL)',
      type: 'string',
      apply: (o, v) => {
        o.agents = { ...o.agents, model: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_MODEL',
    {
      description: 'Model identifier passed to the backend',
      type: 'string',
      apply: (o, v) => {
        o.agents = { ...o.agents, model: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_MAX_TOKENS',
    {
      description: 'Output token cap passed to the backend',
      type: 'number',
      apply: (o, v) => {
        o.agents = { ...o.agents, max_tokens: asNumber(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_TEMPERATURE',
    {
      description: 'Sampling temperature passed to the backend',
      type: 'number',
      apply: (o, v) => {
        o.agents = { ...o.agents, temperature: asNumber(v) };
      },
    },
  ],
  [
    'WAYPOINT_AGENTS_TEMPERATURE_FLAG',
    {
      description: 'Backend flag carrying the temperature (empty omits it)',
      type: 'string',
      apply: (o, v) => {
        o.agents = { ...o.agents, temperature_flag: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_STORAGE_DIR',
    {
      description: 'Root directory for per-user state and logs',
      type: 'string',
      apply: (o, v) => {
        o.storage = { ...o.storage, dir: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_ORCHESTRATOR_AUTO_CREATE_USERS',
    {
      description: 'Create unknown users on first contact (true/false)',
      type: 'boolean',
      apply: (o, v) => {
        o.orchestrator = { ...o.orchestrator, auto_create_users: asBoolean(v) };
      },
    },
  ],
  [
    'WAYPOINT_ORCHESTRATOR_BUSY_POLICY',
    {
      description: "Handling of a second in-flight request per user ('queue' or 'reject')",
      type: 'busy_policy',
      apply: (o, v) => {
        o.orchestrator = { ...o.orchestrator, busy_policy: asBusyPolicy(v) };
      },
    },
  ],
  [
    'WAYPOINT_KNOWLEDGE_PATH',
    {
      description: 'Path of the JSON knowledge base',
      type: 'string',
      apply: (o, v) => {
        o.knowledge = { ...o.knowledge, path: asString(v) };
      },
    },
  ],
  [
    'WAYPOINT_KNOWLEDGE_MAX_RESULTS',
    {
      description: 'Snippets passed to an agent per call',
      type: 'number',
      apply: (o, v) => {
        o.knowledge = { ...o.knowledge, max_results: asNumber(v) };
      },
    },
  ],
  [
    'WAYPOINT_DEBUG',
    {
      description: 'Emit debug log entries (true/false)',
      type: 'boolean',
      apply: (o, v) => {
        o.logging = { ...o.logging, debug: asBoolean(v) };
      },
    },
  ],
]);

function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isFinite(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitively.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(
  value: string,
  type: EnvValueType,
  envVar: string
): string | number | boolean | string[] {
  switch (type) {
    case 'string':
      return value;
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
    case 'list':
      return value.split(/\s+/).filter((part) => part !== '');
    case 'busy_policy': {
      const policy = value.trim().toLowerCase();
      if (policy !== 'queue' && policy !== 'reject') {
        throw new EnvCoercionError(envVar, value, "'queue' or 'reject'");
      }
      return policy;
    }
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in mapping order. */
  appliedVars: string[];
  /** Coercion errors, when collected. */
  errors: EnvCoercionError[];
}

/**
 * Reads WAYPOINT_* environment variables into a partial configuration.
 *
 * @param env - The environment to read (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns The overrides, the applied variable names and any collected errors.
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, coerceValue(value, mapping.type, envVar));
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    agents: { ...base.agents, ...partial.agents },
    storage: { ...base.storage, ...partial.storage },
    orchestrator: { ...base.orchestrator, ...partial.orchestrator },
    knowledge: { ...base.knowledge, ...partial.knowledge },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration.
 * @param env - The environment to read (defaults to process.env).
 * @returns The configuration with overrides applied.
 * @throws EnvCoercionError if a variable cannot be coerced.
 * @throws ConfigParseError if an overridden value is out of range.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(toml), { WAYPOINT_AGENTS_TIMEOUT_MS: '5000' });
 * console.log(config.agents.timeout_ms); // 5000
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  const merged = mergeConfig(config, overrides);

  assertAgentSettingsValid(merged.agents);
  if (merged.storage.dir.trim() === '') {
    throw new ConfigParseError(`Invalid value for 'storage.dir': must not be empty`);
  }

  return merged;
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
