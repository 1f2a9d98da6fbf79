/**
 * Message templates.
 *
 * All user-facing text lives in `data/templates.json`, split into relay
 * templates (rendered by the relay agent) and the orchestrator's own
 * responses. Placeholders are written `{{name}}`.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { createSchemaCheck } from '../utils/schema.js';
import { RELAY_TEMPLATES, type RelayTemplate } from './types.js';

/**
 * Keys of the orchestrator's own response templates.
 */
export type ResponseTemplate =
  | 'project_proposal'
  | 'project_approval_reprompt'
  | 'project_approved'
  | 'problem_reprompt'
  | 'problem_needs_revision'
  | 'problem_approved'
  | 'solution_reprompt'
  | 'solution_needs_revision'
  | 'solution_revisit_problem'
  | 'solution_approved'
  | 'milestone_plan'
  | 'progress_reprompt'
  | 'progress_feedback'
  | 'milestone_completed'
  | 'stagnation_note'
  | 'stagnation_reason'
  | 'tips_note'
  | 'execution_complete'
  | 'artifacts_reprompt'
  | 'review_summary'
  | 'resume_declined'
  | 'resume_approval_reprompt'
  | 'resume_ready'
  | 'transition_blocked'
  | 'agent_failure'
  | 'persistence_failure'
  | 'busy'
  | 'unknown_user';

export const RESPONSE_TEMPLATES = [
  'project_proposal',
  'project_approval_reprompt',
  'project_approved',
  'problem_reprompt',
  'problem_needs_revision',
  'problem_approved',
  'solution_reprompt',
  'solution_needs_revision',
  'solution_revisit_problem',
  'solution_approved',
  'milestone_plan',
  'progress_reprompt',
  'progress_feedback',
  'milestone_completed',
  'stagnation_note',
  'stagnation_reason',
  'tips_note',
  'execution_complete',
  'artifacts_reprompt',
  'review_summary',
  'resume_declined',
  'resume_approval_reprompt',
  'resume_ready',
  'transition_blocked',
  'agent_failure',
  'persistence_failure',
  'busy',
  'unknown_user',
] as const satisfies readonly ResponseTemplate[];

/**
 * The template file's shape.
 */
export interface MessageTemplates {
  readonly relay: Readonly<Record<string, string>>;
  readonly responses: Readonly<Record<string, string>>;
}

export type TemplateVariables = Readonly<Record<string, string | number>>;

/**
 * Error thrown when the template file is unreadable or incomplete.
 */
export class TemplateError extends Error {
  public readonly missingKeys: readonly string[];
  public override readonly cause: Error | undefined;

  constructor(message: string, missingKeys: readonly string[] = [], cause?: Error) {
    super(message);
    this.name = 'TemplateError';
    this.missingKeys = missingKeys;
    this.cause = cause;
  }
}

export const DEFAULT_TEMPLATES_URL = new URL('../../data/templates.json', import.meta.url);

const checkTemplates = createSchemaCheck<MessageTemplates>('templates');

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

/**
 * Substitutes `{{name}}` placeholders. Unknown placeholders are left as written.
 *
 * @example
 * ```typescript
 * renderTemplate('Great, {{role}}.', { role: 'Product Manager' }); // 'Great, Product Manager.'
 * ```
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (match, name: string) => {
    const value = variables[name];
    return value === undefined ? match : String(value);
  });
}

/**
 * Checks that a template set defines every relay and response key.
 *
 * @throws TemplateError naming the missing keys.
 */
export function validateTemplates(data: unknown): MessageTemplates {
  const result = checkTemplates(data);
  if (!result.valid) {
    throw new TemplateError(`Invalid message templates: ${result.errors.join('; ')}`);
  }
  const missing = [
    ...RELAY_TEMPLATES.filter((key) => !(key in result.value.relay)).map((key) => `relay.${key}`),
    ...RESPONSE_TEMPLATES.filter((key) => !(key in result.value.responses)).map(
      (key) => `responses.${key}`
    ),
  ];
  if (missing.length > 0) {
    throw new TemplateError(`Missing message templates: ${missing.join(', ')}`, missing);
  }
  return result.value;
}

/**
 * Reads and validates a template file.
 */
export function loadMessageTemplates(location: URL | string = DEFAULT_TEMPLATES_URL): MessageTemplates {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(location, 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new TemplateError(`Cannot read message templates: ${cause.message}`, [], cause);
  }
  return validateTemplates(parsed);
}

/**
 * Renders templates by key.
 */
export class MessageCatalog {
  private readonly templates: MessageTemplates;

  constructor(templates: MessageTemplates) {
    this.templates = validateTemplates(templates);
  }

  /**
   * Catalog over the bundled `data/templates.json`.
   */
  static fromDefaultFile(): MessageCatalog {
    return new MessageCatalog(loadMessageTemplates());
  }

  relay(key: RelayTemplate, variables: TemplateVariables = {}): string {
    return renderTemplate(this.lookup(this.templates.relay, `relay.${key}`, key), variables);
  }

  response(key: ResponseTemplate, variables: TemplateVariables = {}): string {
    return renderTemplate(
      this.lookup(this.templates.responses, `responses.${key}`, key),
      variables
    );
  }

  private lookup(table: Readonly<Record<string, string>>, path: string, key: string): string {
    const template = table[key];
    if (template === undefined) {
      throw new TemplateError(`Missing message template: ${path}`, [path]);
    }
    return template;
  }
}

/**
 * Formats items as a numbered list, one per line.
 */
export function numberedList(items: readonly string[]): string {
  return items.map((item, index) => `${String(index + 1)}. ${item}`).join('\n');
}

/**
 * Formats items as a bulleted list, one per line.
 */
export function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}
