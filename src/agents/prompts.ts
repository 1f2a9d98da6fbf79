/**
 * System instructions for the model-backed agents, read from `data/prompts.json`.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { createSchemaCheck } from '../utils/schema.js';

/**
 * One instruction text per agent and mode.
 */
export interface AgentPrompts {
  readonly relay: string;
  readonly generator: string;
  readonly evaluator_problem: string;
  readonly evaluator_solution: string;
  readonly progress_plan: string;
  readonly progress_update: string;
  readonly reviewer_review: string;
  readonly reviewer_resume: string;
}

export const DEFAULT_PROMPTS_URL = new URL('../../data/prompts.json', import.meta.url);

const checkPrompts = createSchemaCheck<AgentPrompts>('prompts');

/**
 * Error thrown when the prompt file cannot be used.
 */
export class PromptLoadError extends Error {
  public override readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'PromptLoadError';
    this.cause = cause;
  }
}

/**
 * Reads and validates a prompt file.
 *
 * @throws PromptLoadError if the file is unreadable or lacks a prompt.
 */
export function loadAgentPrompts(location: URL | string = DEFAULT_PROMPTS_URL): AgentPrompts {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(location, 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new PromptLoadError(`Cannot read agent prompts: ${cause.message}`, cause);
  }
  const result = checkPrompts(parsed);
  if (!result.valid) {
    throw new PromptLoadError(`Invalid agent prompts: ${result.errors.join('; ')}`);
  }
  return result.value;
}
