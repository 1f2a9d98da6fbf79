/**
 * Conversation orchestrator.
 *
 * The only component that reads and writes journey state. Each request runs
 * under a per-user lock: load (or create) the user, run the phase handler,
 * ask the state machine about any proposed transition, then commit state,
 * transition, artifacts and conversation entries before replying.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { getPhaseCapability } from '../agents/registry.js';
import type { MessageCatalog } from '../agents/templates.js';
import type { AgentSet } from '../agents/types.js';
import type { OrchestratorSettings } from '../config/types.js';
import type { KnowledgeRetriever, Snippet } from '../knowledge/types.js';
import type { AgentCallPolicy } from '../router/policy.js';
import { KeyedMutex, SingleFlight } from '../utils/keyed-mutex.js';
import { describeError, type Logger } from '../utils/logger.js';
import { createSchemaCheck } from '../utils/schema.js';
import { createArtifactReader, type ArtifactDraft } from './artifacts.js';
import { PHASE_HANDLERS, type HandlerContext, type HandlerOutcome } from './handlers.js';
import { JourneyPersistenceError, type JourneyStore } from './persistence.js';
import { apply, isRevisionTransition } from './transitions.js';
import type {
  ArtifactKind,
  ArtifactRecord,
  ConversationLogEntry,
  JourneyPhase,
  StateTransition,
  UserState,
} from './types.js';

/**
 * Inbound conversational request.
 */
export interface ConverseRequest {
  readonly user_id: string;
  readonly message: string;
  /** Client-chosen id; a repeat of an in-flight id joins that request. */
  readonly request_id?: string;
}

export interface ConverseReply {
  readonly user_id: string;
  readonly response_text: string;
  readonly current_state: JourneyPhase;
}

/**
 * Failure kinds a caller can see. A refused transition is not among them:
 * it becomes a successful reply carrying a re-prompt.
 */
export type OrchestratorErrorKind =
  | 'UnknownUser'
  | 'RecoverableAgentFailure'
  | 'PersistenceFailure'
  | 'ValidationFailure'
  | 'Busy';

export interface OrchestratorError {
  readonly kind: OrchestratorErrorKind;
  readonly message: string;
  readonly retryable: boolean;
}

/**
 * Result of {@link Orchestrator.createUser}.
 */
export interface CreateUserResult {
  readonly status: 'created' | 'exists';
  readonly state: UserState;
}

export type ConverseResult =
  | { readonly success: true; readonly reply: ConverseReply }
  | {
      readonly success: false;
      readonly error: OrchestratorError;
      /** User-facing text, when there is something to say. */
      readonly reply?: ConverseReply;
    };

/**
 * Collaborators of the orchestrator.
 */
export interface OrchestratorDependencies {
  readonly store: JourneyStore;
  readonly agents: AgentSet;
  readonly catalog: MessageCatalog;
  readonly policy: AgentCallPolicy;
  readonly logger: Logger;
  readonly settings: OrchestratorSettings;
  /** Absent: agents run without knowledge snippets. */
  readonly retriever?: KnowledgeRetriever;
  /** Clock (injectable for testing). */
  readonly now?: () => Date;
  /** Artifact id generator (injectable for testing). */
  readonly newId?: (prefix: string) => string;
}

/**
 * Artifact kind each phase works on, for {@link Orchestrator.getActiveArtifact}.
 */
export const PHASE_ARTIFACT: ReadonlyMap<JourneyPhase, ArtifactKind> = new Map([
  ['project_generation', 'project'],
  ['problem_definition', 'problem_definition'],
  ['solution_design', 'solution_design'],
  ['execution', 'milestone_plan'],
  ['review', 'artifact_review'],
  ['completed', 'resume_package'],
]);

const checkConverseRequest = createSchemaCheck<ConverseRequest>('converse-request');

function defaultNewId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

/**
 * Coalescing key: an explicit request id, else the message itself.
 */
function flightKey(request: ConverseRequest): string {
  const discriminator =
    request.request_id !== undefined ? `id:${request.request_id}` : `message:${request.message}`;
  return `${request.user_id}\u0000${discriminator}`;
}

/**
 * Coordinates one conversational turn at a time per user.
 *
 * @example
 * ```typescript
 * const result = await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });
 * if (result.success) {
 *   console.log(result.reply.response_text);
 * }
 * ```
 */
export class Orchestrator {
  private readonly store: JourneyStore;
  private readonly agents: AgentSet;
  private readonly catalog: MessageCatalog;
  private readonly policy: AgentCallPolicy;
  private readonly logger: Logger;
  private readonly settings: OrchestratorSettings;
  private readonly retriever: KnowledgeRetriever | undefined;
  private readonly now: () => Date;
  private readonly newId: (prefix: string) => string;
  private readonly locks = new KeyedMutex();
  private readonly inFlight = new SingleFlight<ConverseResult>();

  constructor(dependencies: OrchestratorDependencies) {
    this.store = dependencies.store;
    this.agents = dependencies.agents;
    this.catalog = dependencies.catalog;
    this.policy = dependencies.policy;
    this.logger = dependencies.logger;
    this.settings = dependencies.settings;
    this.retriever = dependencies.retriever;
    this.now = dependencies.now ?? ((): Date => new Date());
    this.newId = dependencies.newId ?? defaultNewId;
  }

  /**
   * Handles one user message.
   *
   * Never rejects: every failure is reported as a {@link ConverseResult}.
   */
  async converse(request: unknown): Promise<ConverseResult> {
    const check = checkConverseRequest(request);
    if (!check.valid) {
      this.logger.warn('converse_request_invalid', { errors: check.errors });
      return {
        success: false,
        error: {
          kind: 'ValidationFailure',
          message: `Invalid request: ${check.errors.join('; ')}`,
          retryable: false,
        },
      };
    }

    const valid = check.value;
    const { promise, joined } = this.inFlight.run(flightKey(valid), () => this.serialize(valid));
    if (joined) {
      this.logger.info('converse_request_coalesced', {
        user_id: valid.user_id,
        request_id: valid.request_id,
      });
    }
    return promise;
  }

  /**
   * The user's state record, or undefined for an unknown user.
   */
  async getState(userId: string): Promise<UserState | undefined> {
    return this.store.get(userId);
  }

  /**
   * The newest version of `kind`, or of the artifact the user's current
   * phase works on when no kind is given.
   */
  async getActiveArtifact(userId: string, kind?: ArtifactKind): Promise<ArtifactRecord | undefined> {
    let target = kind;
    if (target === undefined) {
      const state = await this.store.get(userId);
      if (state === undefined) {
        return undefined;
      }
      target = PHASE_ARTIFACT.get(state.current_state);
    }
    if (target === undefined) {
      return undefined;
    }
    const records = await this.store.listArtifacts(userId, target);
    return records[records.length - 1];
  }

  /**
   * Creates the user's state record unless it exists already. Runs under the
   * user's lock so it cannot race a message creating the same user.
   */
  async createUser(userId: string): Promise<CreateUserResult> {
    return this.locks.runExclusive(userId, async () => {
      const existing = await this.store.get(userId);
      if (existing !== undefined) {
        return { status: 'exists', state: existing };
      }
      const state = await this.store.create(userId, this.now());
      this.logger.info('user_created', { user_id: userId, explicit: true });
      return { status: 'created', state };
    });
  }

  /**
   * The user's conversation log, oldest first. With `limit`, only the most
   * recent `limit` entries.
   */
  async getHistory(userId: string, limit?: number): Promise<readonly ConversationLogEntry[]> {
    const entries = await this.store.listConversation(userId);
    return limit === undefined ? entries : entries.slice(-limit);
  }

  /**
   * Every transition proposed for the user, accepted or not.
   */
  async getTransitions(userId: string): Promise<readonly StateTransition[]> {
    return this.store.listTransitions(userId);
  }

  // -------------------------------------------------------------------------
  // Request pipeline
  // -------------------------------------------------------------------------

  private async serialize(request: ConverseRequest): Promise<ConverseResult> {
    if (this.settings.busy_policy === 'reject') {
      const release = this.locks.tryAcquire(request.user_id);
      if (release === undefined) {
        this.logger.info('converse_request_busy', { user_id: request.user_id });
        return {
          success: false,
          error: { kind: 'Busy', message: this.catalog.response('busy'), retryable: true },
        };
      }
      try {
        return await this.handle(request);
      } finally {
        release();
      }
    }
    return this.locks.runExclusive(request.user_id, () => this.handle(request));
  }

  private async handle(request: ConverseRequest): Promise<ConverseResult> {
    const startedAt = this.now();

    let state: UserState;
    try {
      const existing = await this.store.get(request.user_id);
      if (existing === undefined) {
        if (!this.settings.auto_create_users) {
          this.logger.info('unknown_user_rejected', { user_id: request.user_id });
          return {
            success: false,
            error: {
              kind: 'UnknownUser',
              message: this.catalog.response('unknown_user'),
              retryable: false,
            },
          };
        }
        state = await this.store.create(request.user_id, startedAt);
        this.logger.info('user_created', { user_id: request.user_id });
      } else {
        state = existing;
      }
    } catch (error) {
      return this.fatal(request, error, undefined);
    }

    let outcome: HandlerOutcome;
    let agentName: string | undefined;
    try {
      outcome = await PHASE_HANDLERS[state.current_state](
        this.createContext(state, request.message, (name) => {
          agentName = name;
        })
      );
    } catch (error) {
      return this.fatal(request, error, state.current_state);
    }

    if (outcome.kind === 'agent_failure') {
      return this.recordAgentFailure(request, state, outcome);
    }
    return this.commit(request, state, outcome, agentName ?? 'orchestrator');
  }

  private createContext(
    state: UserState,
    message: string,
    onInvoke: (agentName: string) => void
  ): HandlerContext {
    let invoked = false;
    return {
      state,
      message,
      catalog: this.catalog,
      agents: this.agents,
      artifacts: createArtifactReader(this.store, state.user_id),
      newId: this.newId,
      invoke: async (agent, input, query) => {
        if (invoked) {
          throw new Error(
            `Handler for '${state.current_state}' attempted a second agent call (${agent.name})`
          );
        }
        const allowed = getPhaseCapability(state.current_state);
        if (agent.capability !== allowed) {
          throw new Error(
            `Handler for '${state.current_state}' called ${agent.name} (${agent.capability}); the phase uses ${allowed}`
          );
        }
        invoked = true;
        onInvoke(agent.name);
        const snippets = query === undefined ? [] : await this.retrieve(query, state.target_domain);
        return this.policy.call(agent, input, snippets);
      },
    };
  }

  /**
   * Searches the knowledge base under the agent deadline. A search that fails
   * or outlives the deadline yields no snippets.
   */
  private async retrieve(query: string, domain: string | null): Promise<readonly Snippet[]> {
    if (this.retriever === undefined) {
      return [];
    }
    const timeoutMs = this.policy.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => {
        resolve(undefined);
      }, timeoutMs);
    });
    try {
      const snippets = await Promise.race([
        this.retriever.search(query, domain ?? undefined),
        deadline,
      ]);
      if (snippets === undefined) {
        this.logger.warn('knowledge_search_timed_out', { timeout_ms: timeoutMs });
        return [];
      }
      return snippets;
    } catch (error) {
      this.logger.warn('knowledge_search_failed', { error: describeError(error) });
      return [];
    } finally {
      clearTimeout(timer);
    }
  }

  private async commit(
    request: ConverseRequest,
    state: UserState,
    outcome: Exclude<HandlerOutcome, { kind: 'agent_failure' }>,
    agentName: string
  ): Promise<ConverseResult> {
    const now = this.now();
    const timestamp = now.toISOString();
    const from = state.current_state;
    const touched: UserState = { ...state, last_activity_at: timestamp, version: state.version + 1 };

    let next: UserState = { ...touched, ...outcome.updates };
    let artifacts: readonly ArtifactDraft[] = outcome.artifacts;
    let response = outcome.response;
    let transition: StateTransition | undefined;

    if (outcome.kind === 'advance') {
      const result = apply(next, outcome.to, { now });
      if (result.success) {
        next = result.state;
        transition = {
          user_id: state.user_id,
          from_state: from,
          to_state: outcome.to,
          timestamp,
          accepted: true,
          reason: isRevisionTransition(from, outcome.to)
            ? 'Revision requested by the evaluator'
            : 'Exit requirements met',
        };
      } else {
        this.logger.warn('transition_rejected', {
          user_id: state.user_id,
          from,
          to: outcome.to,
          code: result.error.code,
          reason: result.error.message,
        });
        next = touched;
        artifacts = [];
        response = outcome.fallback;
        transition = {
          user_id: state.user_id,
          from_state: from,
          to_state: outcome.to,
          timestamp,
          accepted: false,
          reason: result.error.message,
        };
      }
    }

    try {
      await this.store.save(next);
      if (transition !== undefined) {
        await this.store.appendTransition(transition);
      }
      for (const draft of artifacts) {
        await this.store.appendArtifact({ ...draft, user_id: state.user_id, created_at: timestamp });
      }
      await this.store.appendConversation(state.user_id, {
        timestamp,
        actor: 'user',
        kind: 'message',
        payload: request.message,
        state_at_time: from,
      });
      await this.store.appendConversation(state.user_id, {
        timestamp,
        actor: 'agent',
        agent_name: agentName,
        kind: 'response',
        payload: response,
        state_at_time: next.current_state,
      });
    } catch (error) {
      return this.fatal(request, error, from);
    }

    this.logger.info('converse_completed', {
      user_id: state.user_id,
      from,
      to: next.current_state,
      version: next.version,
      agent: agentName,
      artifacts: artifacts.length,
    });
    return {
      success: true,
      reply: { user_id: state.user_id, response_text: response, current_state: next.current_state },
    };
  }

  private async recordAgentFailure(
    request: ConverseRequest,
    state: UserState,
    outcome: Extract<HandlerOutcome, { kind: 'agent_failure' }>
  ): Promise<ConverseResult> {
    const { failure } = outcome;
    const timestamp = this.now().toISOString();
    try {
      await this.store.appendConversation(state.user_id, {
        timestamp,
        actor: 'user',
        kind: 'message',
        payload: request.message,
        state_at_time: state.current_state,
      });
      await this.store.appendConversation(state.user_id, {
        timestamp,
        actor: 'agent',
        agent_name: failure.agent,
        kind: 'agent_failure',
        payload: `${failure.kind} after ${String(failure.attempts)} attempt(s): ${failure.message}`,
        state_at_time: state.current_state,
      });
    } catch (error) {
      return this.fatal(request, error, state.current_state);
    }

    this.logger.warn('agent_failure_recorded', {
      user_id: state.user_id,
      agent: failure.agent,
      kind: failure.kind,
      attempts: failure.attempts,
      state: state.current_state,
    });
    return {
      success: false,
      error: {
        kind: 'RecoverableAgentFailure',
        message: `${failure.agent} did not produce a usable answer (${failure.kind})`,
        retryable: true,
      },
      reply: {
        user_id: state.user_id,
        response_text: this.catalog.response('agent_failure'),
        current_state: state.current_state,
      },
    };
  }

  /**
   * Translates an error raised while reading, handling or committing into
   * the fatal failure the caller sees.
   */
  private fatal(
    request: ConverseRequest,
    error: unknown,
    phase: JourneyPhase | undefined
  ): ConverseResult {
    this.logger.error('converse_failed', {
      user_id: request.user_id,
      request_id: request.request_id,
      phase,
      error: describeError(error),
      errorType: error instanceof JourneyPersistenceError ? error.errorType : 'internal',
      operator_alert: true,
    });
    const responseText = this.catalog.response('persistence_failure');
    return {
      success: false,
      error: { kind: 'PersistenceFailure', message: responseText, retryable: false },
      ...(phase !== undefined
        ? { reply: { user_id: request.user_id, response_text: responseText, current_state: phase } }
        : {}),
    };
  }
}
