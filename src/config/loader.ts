/**
 * Loads the effective configuration: waypoint.toml, then environment overrides.
 *
 * @packageDocumentation
 */

import { safeReadFileIfExists } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { parseConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Default config file name, resolved against the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'waypoint.toml';

/**
 * Reads and parses the config file (a missing file means defaults) and
 * applies WAYPOINT_* overrides.
 *
 * @param configPath - Path of the TOML file.
 * @param env - Environment to read overrides from.
 * @throws ConfigParseError for invalid TOML or out-of-range values.
 * @throws EnvCoercionError for environment values of the wrong type.
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  env: EnvRecord = process.env
): Promise<Config> {
  const content = await safeReadFileIfExists(configPath);
  return applyEnvOverrides(parseConfig(content ?? ''), env);
}
