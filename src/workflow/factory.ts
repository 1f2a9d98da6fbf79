/**
 * Builds an orchestrator from configuration.
 *
 * @packageDocumentation
 */

import { createAgentSet, type RelayMode } from '../agents/registry.js';
import { MessageCatalog } from '../agents/templates.js';
import type { AgentSet } from '../agents/types.js';
import type { Config } from '../config/types.js';
import { KeywordRetriever } from '../knowledge/keyword-retriever.js';
import type { KnowledgeRetriever } from '../knowledge/types.js';
import { createCommandBackend } from '../router/command-backend.js';
import { AgentCallPolicy } from '../router/policy.js';
import type { TextGenerationBackend } from '../router/types.js';
import { Logger } from '../utils/logger.js';
import { Orchestrator } from './orchestrator.js';
import { FileJourneyStore, type JourneyStore } from './persistence.js';

/**
 * Replacements for the collaborators {@link createOrchestrator} would build
 * from configuration.
 */
export interface OrchestratorOverrides {
  readonly store?: JourneyStore;
  readonly backend?: TextGenerationBackend;
  readonly agents?: AgentSet;
  readonly catalog?: MessageCatalog;
  readonly retriever?: KnowledgeRetriever;
  readonly logger?: Logger;
  readonly relayMode?: RelayMode;
  readonly now?: () => Date;
  readonly newId?: (prefix: string) => string;
}

/**
 * Creates an orchestrator over a file store, the command-line backend and
 * the configured knowledge base.
 *
 * @throws KnowledgeBaseError if `knowledge.path` is set but unreadable.
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const orchestrator = await createOrchestrator(config);
 * await orchestrator.converse({ user_id: 'u1', message: 'Data Analyst' });
 * ```
 */
export async function createOrchestrator(
  config: Config,
  overrides: OrchestratorOverrides = {}
): Promise<Orchestrator> {
  const logger =
    overrides.logger ?? new Logger({ component: 'orchestrator', debugMode: config.logging.debug });
  const catalog = overrides.catalog ?? MessageCatalog.fromDefaultFile();
  const agents =
    overrides.agents ??
    createAgentSet({
      backend: overrides.backend ?? createCommandBackend(config.agents),
      settings: config.agents,
      catalog,
      relayMode: overrides.relayMode ?? 'template',
    });

  let retriever = overrides.retriever;
  if (retriever === undefined && config.knowledge.path !== '') {
    retriever = await KeywordRetriever.fromFile(config.knowledge.path, config.knowledge.max_results);
  }

  logger.debug('orchestrator_configured', {
    storage: config.storage.dir,
    busy_policy: config.orchestrator.busy_policy,
    knowledge: retriever !== undefined,
  });

  return new Orchestrator({
    store: overrides.store ?? new FileJourneyStore(config.storage.dir),
    agents,
    catalog,
    policy: new AgentCallPolicy({
      timeoutMs: config.agents.timeout_ms,
      maxRetries: config.agents.max_retries,
      logger: logger.child('agent-policy'),
    }),
    logger,
    settings: config.orchestrator,
    ...(retriever !== undefined ? { retriever } : {}),
    ...(overrides.now !== undefined ? { now: overrides.now } : {}),
    ...(overrides.newId !== undefined ? { newId: overrides.newId } : {}),
  });
}
