#!/usr/bin/env node
/**
 * CLI entry point for the waypoint journey server.
 *
 * Usage:
 *   node dist/servers/journey/cli.js [--config <path>] [--debug]
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { Logger, describeError } from '../../utils/logger.js';
import { startJourneyServer } from './server.js';

const HELP_TEXT = `
waypoint-server - MCP server for guided portfolio-project journeys

Usage:
  waypoint-server [options]

Options:
  --config, -c <path>  Path of waypoint.toml (default: ./waypoint.toml)
  --debug, -d          Enable debug logging
  --help, -h           Show this help message

Tools provided:
  - converse: Sends one learner message and returns the reply
  - create_user: Creates a learner (needed when auto_create_users is off)
  - get_state: Returns the learner's journey state
  - get_active_artifact: Returns the artifact the current phase works on
  - get_history: Returns the most recent conversation log entries
`;

function parseArgs(): { configPath: string | undefined; debug: boolean } {
  const args = process.argv.slice(2);
  let configPath: string | undefined;
  let debug = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      const next = args[i + 1];
      if (next !== undefined) {
        configPath = path.resolve(next);
        i++;
      }
    } else if (arg === '--debug' || arg === '-d') {
      debug = true;
    } else if (arg === '--help' || arg === '-h') {
      process.stdout.write(HELP_TEXT);
      process.exit(0);
    }
  }

  return { configPath, debug };
}

const { configPath, debug } = parseArgs();
const logger = new Logger({ component: 'journey-server', debugMode: debug });

logger.debug('server_start', { configPath: configPath ?? null });

startJourneyServer({ ...(configPath !== undefined ? { configPath } : {}), debug }).catch(
  (err: unknown) => {
    logger.error('startup_failed', { error: describeError(err) });
    process.exit(1);
  }
);
