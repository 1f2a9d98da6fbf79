/**
 * Base class for agents backed by a text-generation model.
 *
 * A model agent serializes its structured input (plus any knowledge
 * snippets) as the request payload, sends it with the agent's system
 * instructions, and checks the JSON it gets back against a schema. Contract
 * violations come back as `malformed`; backend errors propagate.
 *
 * @packageDocumentation
 */

import type { Snippet } from '../knowledge/types.js';
import type { GenerationConstraints, TextGenerationBackend } from '../router/types.js';
import type { SchemaCheck } from '../utils/schema.js';
import { parseModelOutput } from './output.js';
import type { AgentPrompts } from './prompts.js';
import type { Agent, AgentCapability, AgentContext, AgentOutcome } from './types.js';

/**
 * Dependencies shared by every model agent.
 */
export interface ModelAgentOptions {
  readonly backend: TextGenerationBackend;
  readonly prompts: AgentPrompts;
  readonly constraints: GenerationConstraints;
}

/**
 * Serializes an agent input and its reference snippets.
 *
 * @example
 * ```typescript
 * buildPayload({ lens: 'problem' }, []); // '{\n  "input": {\n    "lens": "problem"\n  }\n}'
 * ```
 */
export function buildPayload(input: unknown, snippets: readonly Snippet[]): string {
  if (snippets.length === 0) {
    return JSON.stringify({ input }, null, 2);
  }
  const reference = snippets.map((snippet) => ({ source: snippet.source, text: snippet.text }));
  return JSON.stringify({ input, reference }, null, 2);
}

export abstract class ModelAgent<I, O> implements Agent<I, O> {
  abstract readonly name: string;
  abstract readonly capability: AgentCapability;

  protected readonly backend: TextGenerationBackend;
  protected readonly prompts: AgentPrompts;
  protected readonly constraints: GenerationConstraints;

  constructor(options: ModelAgentOptions) {
    this.backend = options.backend;
    this.prompts = options.prompts;
    this.constraints = options.constraints;
  }

  abstract generate(input: I, context: AgentContext): Promise<AgentOutcome<O>>;

  /**
   * Sends one request and parses the reply against `check`.
   */
  protected async request<T>(
    system: string,
    input: unknown,
    context: AgentContext,
    check: (data: unknown) => SchemaCheck<T>,
    label: string
  ): Promise<AgentOutcome<T>> {
    const text = await this.backend.generate({
      system,
      payload: buildPayload(input, context.snippets),
      constraints: this.constraints,
      signal: context.signal,
    });
    return parseModelOutput(text, check, label);
  }
}
