/**
 * Model-backed relay agent.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { ModelAgent } from './model-agent.js';
import type { AgentContext, AgentOutcome, RelayInput, RelayOutput } from './types.js';

const checkRelayOutput = createSchemaCheck<RelayOutput>('relay-output');

/**
 * Relay that asks the model to phrase the templated message. Only the wording
 * differs from the template relay; the orchestrator's decisions do not depend
 * on it.
 */
export class ModelRelay extends ModelAgent<RelayInput, RelayOutput> {
  readonly name = 'model_relay';
  readonly capability = 'relay' as const;

  generate(input: RelayInput, context: AgentContext): Promise<AgentOutcome<RelayOutput>> {
    return this.request(this.prompts.relay, input, context, checkRelayOutput, 'relay output');
  }
}
