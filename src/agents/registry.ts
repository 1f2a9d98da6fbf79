/**
 * Agent registry: which capability serves which journey phase, and the
 * construction of the default agent set.
 *
 * @packageDocumentation
 */

import type { AgentSettings } from '../config/types.js';
import type { TextGenerationBackend } from '../router/types.js';
import type { JourneyPhase } from '../workflow/types.js';
import { SubmissionEvaluator } from './evaluator.js';
import { ProjectGenerator } from './generator.js';
import type { ModelAgentOptions } from './model-agent.js';
import { ModelRelay } from './model-relay.js';
import { ProgressCoach } from './progress.js';
import { loadAgentPrompts, type AgentPrompts } from './prompts.js';
import { WorkReviewer } from './reviewer.js';
import { TemplateRelay } from './template-relay.js';
import { MessageCatalog } from './templates.js';
import type { AgentCapability, AgentSet, EvaluationLens } from './types.js';

/**
 * The single capability each phase may invoke.
 */
export const PHASE_CAPABILITY: ReadonlyMap<JourneyPhase, AgentCapability> = new Map([
  ['onboarding', 'relay'],
  ['project_generation', 'generator'],
  ['problem_definition', 'evaluator'],
  ['solution_design', 'evaluator'],
  ['execution', 'progress'],
  ['review', 'reviewer'],
  ['completed', 'relay'],
]);

/**
 * Evaluation lens of the phases served by the evaluator.
 */
export const PHASE_LENS: ReadonlyMap<JourneyPhase, EvaluationLens> = new Map([
  ['problem_definition', 'problem'],
  ['solution_design', 'solution'],
]);

/**
 * Error thrown when a phase has no capability assigned.
 */
export class CapabilityNotFoundError extends Error {
  public readonly phase: string;

  constructor(phase: string) {
    super(`No agent capability is assigned to phase '${phase}'`);
    this.name = 'CapabilityNotFoundError';
    this.phase = phase;
  }
}

/**
 * Gets the capability a phase invokes.
 *
 * @throws CapabilityNotFoundError if the table has no entry for `phase`.
 */
export function getPhaseCapability(phase: JourneyPhase): AgentCapability {
  const capability = PHASE_CAPABILITY.get(phase);
  if (capability === undefined) {
    throw new CapabilityNotFoundError(phase);
  }
  return capability;
}

/**
 * Gets every phase served by a capability, in table order.
 */
export function getPhasesForCapability(capability: AgentCapability): readonly JourneyPhase[] {
  return [...PHASE_CAPABILITY.entries()]
    .filter(([, assigned]) => assigned === capability)
    .map(([phase]) => phase);
}

/**
 * How the relay produces its text.
 *
 * - template: deterministic rendering of the catalog's relay templates
 * - model: the backend phrases each message
 */
export type RelayMode = 'template' | 'model';

/**
 * Options for {@link createAgentSet}.
 */
export interface CreateAgentSetOptions {
  readonly backend: TextGenerationBackend;
  readonly settings: AgentSettings;
  readonly catalog: MessageCatalog;
  /** Defaults to the bundled `data/prompts.json`. */
  readonly prompts?: AgentPrompts;
  /** Default: 'template'. */
  readonly relayMode?: RelayMode;
}

/**
 * Builds one agent per capability over a shared backend.
 *
 * @example
 * ```typescript
 * const agents = createAgentSet({
 *   backend: createCommandBackend(config.agents),
 *   settings: config.agents,
 *   catalog: MessageCatalog.fromDefaultFile(),
 * });
 * ```
 */
export function createAgentSet(options: CreateAgentSetOptions): AgentSet {
  const modelOptions: ModelAgentOptions = {
    backend: options.backend,
    prompts: options.prompts ?? loadAgentPrompts(),
    constraints: {
      model: options.settings.model,
      maxTokens: options.settings.max_tokens,
      temperature: options.settings.temperature,
    },
  };

  return {
    relay:
      options.relayMode === 'model'
        ? new ModelRelay(modelOptions)
        : new TemplateRelay(options.catalog),
    generator: new ProjectGenerator(modelOptions),
    evaluator: new SubmissionEvaluator(modelOptions),
    progress: new ProgressCoach(modelOptions),
    reviewer: new WorkReviewer(modelOptions),
  };
}
