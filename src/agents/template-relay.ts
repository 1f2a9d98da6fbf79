/**
 * Deterministic relay agent.
 *
 * @packageDocumentation
 */

import type { AgentContext, AgentOutcome, RelayAgent, RelayInput, RelayOutput } from './types.js';
import type { MessageCatalog } from './templates.js';

/**
 * Relay that renders the catalog's relay templates without calling a model.
 * The same input always yields the same text.
 */
export class TemplateRelay implements RelayAgent {
  readonly name = 'template_relay';
  readonly capability = 'relay' as const;

  private readonly catalog: MessageCatalog;

  constructor(catalog: MessageCatalog) {
    this.catalog = catalog;
  }

  generate(input: RelayInput, context: AgentContext): Promise<AgentOutcome<RelayOutput>> {
    if (context.signal.aborted) {
      return Promise.reject(new Error('Relay call aborted'));
    }
    return Promise.resolve({
      kind: 'ok',
      output: { text: this.catalog.relay(input.template, input.variables) },
    });
  }
}
