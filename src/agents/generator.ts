/**
 * Project generator agent.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { normalizeForComparison } from './evidence.js';
import { ModelAgent } from './model-agent.js';
import type { AgentContext, AgentOutcome, GeneratorInput, ProjectProposal } from './types.js';

const checkProposal = createSchemaCheck<ProjectProposal>('project-proposal');

/**
 * Proposes a portfolio project fitted to the learner's profile. A proposal
 * reusing the title of one the user rejected is malformed.
 */
export class ProjectGenerator extends ModelAgent<GeneratorInput, ProjectProposal> {
  readonly name = 'project_generator';
  readonly capability = 'generator' as const;

  async generate(
    input: GeneratorInput,
    context: AgentContext
  ): Promise<AgentOutcome<ProjectProposal>> {
    const outcome = await this.request(
      this.prompts.generator,
      input,
      context,
      checkProposal,
      'project proposal'
    );
    if (outcome.kind === 'malformed') {
      return outcome;
    }

    const title = normalizeForComparison(outcome.output.title);
    if (input.rejected_titles.some((rejected) => normalizeForComparison(rejected) === title)) {
      return {
        kind: 'malformed',
        reason: `project proposal: repeats rejected title '${outcome.output.title}'`,
      };
    }
    return outcome;
  }
}
