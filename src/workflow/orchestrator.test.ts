/**
 * Tests for the conversation orchestrator.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  PROPOSAL,
  SUBMITTED_WORK,
  planReply,
  problemEvaluationReply,
  proposalReply,
  resumeReply,
  reviewReply,
  solutionEvaluationReply,
  updateReply,
} from '../testing/fixtures.js';
import {
  TEST_NOW,
  createTestOrchestrator,
  delay,
  seedExecution,
  seedProblemDefinition,
  seedUser,
} from '../testing/harness.js';
import { HangingBackend, ScriptedBackend } from '../testing/scripted-backend.js';
import type { KnowledgeRetriever, Snippet } from '../knowledge/types.js';
import { PHASE_HANDLERS } from './handlers.js';
import { InMemoryJourneyStore, JourneyPersistenceError } from './persistence.js';
import type { ConversationLogEntry } from './types.js';

const PROBLEM_STATEMENT = 'Small fintech apps lose subscribers without knowing why they leave.';
const SOLUTION_APPROACH = 'Combine cancellation survey answers with usage data to rank churn drivers.';

function parseLogLines(lines: readonly string[]): { event: string; data?: Record<string, unknown> }[] {
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null || !('event' in parsed)) {
      throw new Error(`Unexpected log line: ${line}`);
    }
    const event = typeof parsed.event === 'string' ? parsed.event : '';
    if ('data' in parsed && typeof parsed.data === 'object' && parsed.data !== null) {
      return { event, data: { ...parsed.data } };
    }
    return { event };
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Orchestrator.converse', () => {
  describe('onboarding', () => {
    it('records the target role and asks for the domain', async () => {
      const { orchestrator } = createTestOrchestrator();

      const result = await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });

      expect(result).toEqual({
        success: true,
        reply: {
          user_id: 'u1',
          response_text:
            'Great, Product Manager. Which industry or domain interests you? (for example, FinTech or healthcare)',
          current_state: 'onboarding',
        },
      });
      const state = await orchestrator.getState('u1');
      expect(state?.current_state).toBe('onboarding');
      expect(state?.target_role).toBe('Product Manager');
      expect(state?.awaiting).toBe('domain');
      expect(state?.version).toBe(1);
    });

    it('re-prompts with the welcome text when the role is too short', async () => {
      const { orchestrator, catalog } = createTestOrchestrator();

      const result = await orchestrator.converse({ user_id: 'u1', message: 'PM' });

      expect(result.success && result.reply.response_text).toBe(catalog.relay('ask_role'));
      expect((await orchestrator.getState('u1'))?.target_role).toBeNull();
    });

    it('collects the profile and advances to project generation', async () => {
      const { orchestrator } = createTestOrchestrator();

      for (const message of ['Product Manager', 'FinTech', 'skip']) {
        await orchestrator.converse({ user_id: 'u1', message });
      }
      const result = await orchestrator.converse({ user_id: 'u1', message: 'payments' });

      expect(result).toEqual({
        success: true,
        reply: {
          user_id: 'u1',
          response_text:
            'Thanks! You are aiming for Product Manager in FinTech. Reply when you are ready and I will propose a project.',
          current_state: 'project_generation',
        },
      });
      const state = await orchestrator.getState('u1');
      expect(state?.background).toBeNull();
      expect(state?.interests).toBe('payments');
      expect(state?.previous_state).toBe('onboarding');
      expect(await orchestrator.getTransitions('u1')).toEqual([
        {
          user_id: 'u1',
          from_state: 'onboarding',
          to_state: 'project_generation',
          timestamp: TEST_NOW.toISOString(),
          accepted: true,
          reason: 'Exit requirements met',
        },
      ]);
    });
  });

  describe('submission evaluation', () => {
    it('approves a problem statement meeting both thresholds and advances', async () => {
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 }),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result).toEqual({
        success: true,
        reply: {
          user_id: 'u1',
          response_text:
            'Your problem statement is approved (7/10).\n\nClear statement of the problem.\n\nNext, describe your solution approach.',
          current_state: 'solution_design',
        },
      });
      const state = await orchestrator.getState('u1');
      expect(state?.problem_approved).toBe(true);
      expect(state?.problem_id).toBe('problem_1');
      expect(state?.awaiting).toBe('solution_submission');

      const transitions = await orchestrator.getTransitions('u1');
      expect(transitions.map((t) => [t.from_state, t.to_state, t.accepted])).toEqual([
        ['problem_definition', 'solution_design', true],
      ]);
    });

    it('keeps the user in the phase and counts a revision when the mean is below 7', async () => {
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 5, clarity: 7, feasibility: 8 }),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result.success && result.reply.current_state).toBe('problem_definition');
      expect(result.success && result.reply.response_text).toBe(
        'Your problem statement scored 6.67/10.\n\nClear statement of the problem.\n\n' +
          'Suggestions:\n- Quantify the impact\n\nPlease revise it and send it again.'
      );
      const state = await orchestrator.getState('u1');
      expect(state?.revisions.problem_definition).toBe(1);
      expect(state?.awaiting_feedback).toBe(true);
      expect(state?.problem_approved).toBe(false);
      expect(await orchestrator.getTransitions('u1')).toEqual([]);

      const stored = await store.listArtifacts('u1', 'problem_definition');
      expect(stored).toHaveLength(1);
      expect(stored[0]?.revision_cycle).toBe(0);
    });

    it('stores a revised submission as the next version of the same artifact', async () => {
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 5, clarity: 7, feasibility: 8 }),
        problemEvaluationReply({ market_relevance: 8, clarity: 8, feasibility: 7 }),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });
      await orchestrator.converse({ user_id: 'u1', message: `${PROBLEM_STATEMENT} Churn costs 4% a month.` });

      const stored = await store.listArtifacts('u1', 'problem_definition');
      expect(stored.map((record) => [record.artifact_id, record.version, record.revision_cycle])).toEqual([
        ['problem_1', 1, 0],
        ['problem_1', 2, 1],
      ]);
      expect((await orchestrator.getState('u1'))?.awaiting_feedback).toBe(false);
    });

    it('re-prompts a submission that is too short without calling the evaluator', async () => {
      const backend = new ScriptedBackend();
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: 'churn' });

      expect(result.success && result.reply.response_text).toBe(
        'Please describe the problem your project addresses in a few sentences (at least 20 characters).'
      );
      expect(backend.requests).toHaveLength(0);
    });

    it('follows the revision edge back to the problem when the evaluator asks for it', async () => {
      const backend = new ScriptedBackend([
        solutionEvaluationReply(
          { logical_coherence: 4, innovation: 5, implementation_feasibility: 6, impact_potential: 5 },
          { revisitProblem: true }
        ),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');
      const seeded = await store.get('u1');
      if (seeded === undefined) {
        throw new Error('seed failed');
      }
      await store.save({
        ...seeded,
        current_state: 'solution_design',
        previous_state: 'problem_definition',
        problem_id: 'problem_0',
        problem_approved: true,
        awaiting: 'solution_submission',
        version: seeded.version + 1,
      });

      const result = await orchestrator.converse({ user_id: 'u1', message: SOLUTION_APPROACH });

      expect(result.success && result.reply.current_state).toBe('problem_definition');
      const state = await orchestrator.getState('u1');
      expect(state?.problem_approved).toBe(false);
      expect(state?.solution_approved).toBe(false);
      expect(state?.revision_unlocked).toBeNull();
      expect(state?.revisions.solution_design).toBe(1);
      expect(state?.awaiting).toBe('problem_submission');
      expect(await orchestrator.getTransitions('u1')).toEqual([
        {
          user_id: 'u1',
          from_state: 'solution_design',
          to_state: 'problem_definition',
          timestamp: TEST_NOW.toISOString(),
          accepted: true,
          reason: 'Revision requested by the evaluator',
        },
      ]);
    });
  });

  describe('refused transitions', () => {
    it('replies with the fallback and records the refusal without merging updates', async () => {
      const { orchestrator, store } = createTestOrchestrator();
      await seedUser(store, 'u1', { target_role: 'Product Manager', awaiting: 'interests' });

      const result = await orchestrator.converse({ user_id: 'u1', message: 'payments' });

      expect(result).toEqual({
        success: true,
        reply: {
          user_id: 'u1',
          response_text:
            'We cannot move on yet: your target role and domain are still needed. Please continue with the current step.',
          current_state: 'onboarding',
        },
      });
      const state = await orchestrator.getState('u1');
      expect(state?.interests).toBeNull();
      expect(state?.awaiting).toBe('interests');
      expect(state?.version).toBe(2);
      expect(await orchestrator.getTransitions('u1')).toEqual([
        {
          user_id: 'u1',
          from_state: 'onboarding',
          to_state: 'project_generation',
          timestamp: TEST_NOW.toISOString(),
          accepted: false,
          reason: "Cannot leave 'onboarding': missing target_domain",
        },
      ]);
    });
  });

  describe('agent failures', () => {
    it('leaves state unchanged and records one failure entry after a timeout and its retry', async () => {
      const backend = new HangingBackend();
      const { orchestrator, store, catalog } = createTestOrchestrator({ backend, timeoutMs: 20 });
      const seeded = await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'RecoverableAgentFailure',
          message: 'submission_evaluator did not produce a usable answer (timed_out)',
          retryable: true,
        },
        reply: {
          user_id: 'u1',
          response_text: catalog.response('agent_failure'),
          current_state: 'problem_definition',
        },
      });
      expect(backend.calls).toBe(2);
      expect(await store.get('u1')).toEqual(seeded);
      expect(await store.listArtifacts('u1', 'problem_definition')).toEqual([]);

      const history = await orchestrator.getHistory('u1');
      const failures = history.filter((entry) => entry.kind === 'agent_failure');
      expect(failures).toEqual([
        {
          timestamp: TEST_NOW.toISOString(),
          actor: 'agent',
          agent_name: 'submission_evaluator',
          kind: 'agent_failure',
          payload:
            'timed_out after 2 attempt(s): submission_evaluator did not answer within 20ms',
          state_at_time: 'problem_definition',
        },
      ]);
      expect(history.map((entry) => entry.kind)).toEqual(['message', 'agent_failure']);
    });

    it('recovers on the retry when the first answer is malformed', async () => {
      const backend = new ScriptedBackend([
        'not json at all',
        problemEvaluationReply({ market_relevance: 8, clarity: 8, feasibility: 8 }),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result.success && result.reply.current_state).toBe('solution_design');
      expect(backend.requests).toHaveLength(2);
    });
  });

  describe('single flight', () => {
    it('never runs two agent calls for one user at the same time', async () => {
      let active = 0;
      let peak = 0;
      const slowReply = async (): Promise<string> => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(5);
        active -= 1;
        return problemEvaluationReply({ market_relevance: 5, clarity: 7, feasibility: 8 });
      };
      const backend = new ScriptedBackend([slowReply, slowReply, slowReply, slowReply, slowReply]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const results = await Promise.all(
        [1, 2, 3, 4, 5].map((n) =>
          orchestrator.converse({ user_id: 'u1', message: `${PROBLEM_STATEMENT} Draft ${String(n)}.` })
        )
      );

      expect(results.every((result) => result.success)).toBe(true);
      expect(peak).toBe(1);
      const state = await orchestrator.getState('u1');
      expect(state?.revisions.problem_definition).toBe(5);
      expect(state?.version).toBe(6);

      const history = await orchestrator.getHistory('u1');
      expect(history.map((entry) => entry.kind)).toEqual([
        'message',
        'response',
        'message',
        'response',
        'message',
        'response',
        'message',
        'response',
        'message',
        'response',
      ]);
    });

    it('runs requests of different users in parallel', async () => {
      let active = 0;
      let peak = 0;
      const slowReply = async (): Promise<string> => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(10);
        active -= 1;
        return problemEvaluationReply({ market_relevance: 5, clarity: 7, feasibility: 8 });
      };
      const backend = new ScriptedBackend([slowReply, slowReply]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');
      await seedProblemDefinition(store, 'u2');

      await Promise.all([
        orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT }),
        orchestrator.converse({ user_id: 'u2', message: PROBLEM_STATEMENT }),
      ]);

      expect(peak).toBe(2);
    });

    it('coalesces a duplicate request id into one transition', async () => {
      const backend = new ScriptedBackend([
        async (): Promise<string> => {
          await delay(5);
          return problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 });
        },
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      const request = { user_id: 'u1', message: PROBLEM_STATEMENT, request_id: 'req-1' };
      const [first, second] = await Promise.all([
        orchestrator.converse(request),
        orchestrator.converse(request),
      ]);

      expect(second).toEqual(first);
      expect(backend.requests).toHaveLength(1);
      expect(await orchestrator.getTransitions('u1')).toHaveLength(1);
      expect((await orchestrator.getState('u1'))?.version).toBe(2);
    });

    it('coalesces an identical message sent without a request id', async () => {
      const backend = new ScriptedBackend([
        async (): Promise<string> => {
          await delay(5);
          return problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 });
        },
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend });
      await seedProblemDefinition(store, 'u1');

      await Promise.all([
        orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT }),
        orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT }),
      ]);

      expect(await orchestrator.getTransitions('u1')).toHaveLength(1);
      expect(await orchestrator.getHistory('u1')).toHaveLength(2);
    });

    it('rejects a concurrent request as busy under the reject policy', async () => {
      const backend = new ScriptedBackend([
        async (): Promise<string> => {
          await delay(10);
          return problemEvaluationReply({ market_relevance: 5, clarity: 7, feasibility: 8 });
        },
      ]);
      const { orchestrator, store } = createTestOrchestrator({
        backend,
        settings: { busy_policy: 'reject' },
      });
      await seedProblemDefinition(store, 'u1');

      const [first, second] = await Promise.all([
        orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT }),
        orchestrator.converse({ user_id: 'u1', message: `${PROBLEM_STATEMENT} Second draft.` }),
      ]);

      expect(first.success).toBe(true);
      expect(second).toEqual({
        success: false,
        error: {
          kind: 'Busy',
          message: 'A previous message is still being processed. Please wait for its reply.',
          retryable: true,
        },
      });
    });
  });

  describe('request handling', () => {
    it('rejects a malformed request before touching state', async () => {
      const { orchestrator, store } = createTestOrchestrator();

      const result = await orchestrator.converse({ user_id: 'u1' });

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'ValidationFailure',
          message: "Invalid request: /: must have required property 'message'",
          retryable: false,
        },
      });
      expect(await store.get('u1')).toBeUndefined();
    });

    it('names an invalid user id', async () => {
      const { orchestrator } = createTestOrchestrator();

      const result = await orchestrator.converse({ user_id: '../etc', message: 'hello' });

      expect(result.success).toBe(false);
      expect(!result.success && result.error.message).toBe(
        'Invalid request: /user_id: must match pattern "^[A-Za-z0-9_-]{1,128}$"'
      );
    });

    it('rejects unknown users when users are not created automatically', async () => {
      const { orchestrator, store } = createTestOrchestrator({
        settings: { auto_create_users: false },
      });

      const result = await orchestrator.converse({ user_id: 'u9', message: 'Product Manager' });

      expect(result).toEqual({
        success: false,
        error: { kind: 'UnknownUser', message: 'Unknown user.', retryable: false },
      });
      expect(await store.get('u9')).toBeUndefined();
    });

    it('logs the inbound message and the response before replying', async () => {
      const { orchestrator } = createTestOrchestrator();

      const result = await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });
      const history = await orchestrator.getHistory('u1');

      const expected: ConversationLogEntry[] = [
        {
          timestamp: TEST_NOW.toISOString(),
          actor: 'user',
          kind: 'message',
          payload: 'Product Manager',
          state_at_time: 'onboarding',
        },
        {
          timestamp: TEST_NOW.toISOString(),
          actor: 'agent',
          agent_name: 'template_relay',
          kind: 'response',
          payload: result.success ? result.reply.response_text : '',
          state_at_time: 'onboarding',
        },
      ];
      expect(history).toEqual(expected);
    });

    it('reports a failed write as a persistence failure and alerts the operator', async () => {
      class FailingStore extends InMemoryJourneyStore {
        override appendConversation(): Promise<void> {
          return Promise.reject(new JourneyPersistenceError('Disk full', 'io_error'));
        }
      }
      const { orchestrator, catalog, logLines } = createTestOrchestrator({
        store: new FailingStore(),
      });

      const result = await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'PersistenceFailure',
          message: catalog.response('persistence_failure'),
          retryable: false,
        },
        reply: {
          user_id: 'u1',
          response_text: catalog.response('persistence_failure'),
          current_state: 'onboarding',
        },
      });
      const failure = parseLogLines(logLines).find((line) => line.event === 'converse_failed');
      expect(failure?.data).toMatchObject({
        user_id: 'u1',
        error: 'Disk full',
        errorType: 'io_error',
        operator_alert: true,
      });
    });

    it('refuses a second agent call from one handler', async () => {
      vi.spyOn(PHASE_HANDLERS, 'completed').mockImplementation(async (context) => {
        const input = { template: 'journey_complete' as const, variables: {} };
        await context.invoke(context.agents.relay, input);
        await context.invoke(context.agents.relay, input);
        return { kind: 'stay', updates: {}, artifacts: [], response: 'unreachable' };
      });
      const { orchestrator, store, logLines } = createTestOrchestrator();
      await seedUser(store, 'u1', { current_state: 'completed' });

      const result = await orchestrator.converse({ user_id: 'u1', message: 'hello again' });

      expect(!result.success && result.error.kind).toBe('PersistenceFailure');
      const failure = parseLogLines(logLines).find((line) => line.event === 'converse_failed');
      expect(failure?.data?.['error']).toBe(
        "Handler for 'completed' attempted a second agent call (template_relay)"
      );
      expect((await store.get('u1'))?.version).toBe(1);
    });

    it('refuses an agent outside the phase capability', async () => {
      vi.spyOn(PHASE_HANDLERS, 'completed').mockImplementation(async (context) => {
        await context.invoke(context.agents.generator, {
          profile: {
            target_role: 'Product Manager',
            target_domain: 'FinTech',
            background: null,
            interests: null,
          },
          rejected_titles: [],
        });
        return { kind: 'stay', updates: {}, artifacts: [], response: 'unreachable' };
      });
      const { orchestrator, store, logLines } = createTestOrchestrator();
      await seedUser(store, 'u1', { current_state: 'completed' });

      const result = await orchestrator.converse({ user_id: 'u1', message: 'hello again' });

      expect(!result.success && result.error.kind).toBe('PersistenceFailure');
      const failure = parseLogLines(logLines).find((line) => line.event === 'converse_failed');
      expect(failure?.data?.['error']).toBe(
        "Handler for 'completed' called project_generator (generator); the phase uses relay"
      );
    });

    it('passes snippets from the user domain to the agent', async () => {
      const queries: [string, string | undefined][] = [];
      const retriever: KnowledgeRetriever = {
        search(query: string, domainFilter?: string): Promise<readonly Snippet[]> {
          queries.push([query, domainFilter]);
          return Promise.resolve([
            { text: 'Churn: measure it monthly.', source: 'kb:churn', relevance_score: 1 },
          ]);
        },
      };
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 }),
      ]);
      const { orchestrator, store } = createTestOrchestrator({ backend, retriever });
      await seedProblemDefinition(store, 'u1');

      await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(queries).toEqual([[PROBLEM_STATEMENT, 'FinTech']]);
      expect(backend.requests[0]?.payload).toContain('"source": "kb:churn"');
    });

    it('runs the agent without snippets when retrieval fails', async () => {
      const retriever: KnowledgeRetriever = {
        search: () => Promise.reject(new Error('index unavailable')),
      };
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 }),
      ]);
      const { orchestrator, store, logLines } = createTestOrchestrator({ backend, retriever });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result.success).toBe(true);
      expect(backend.requests[0]?.payload).not.toContain('"reference"');
      const warning = parseLogLines(logLines).find((line) => line.event === 'knowledge_search_failed');
      expect(warning?.data).toEqual({ error: 'index unavailable' });
    });

    it('runs the agent without snippets when retrieval outlives the deadline', async () => {
      const retriever: KnowledgeRetriever = {
        search: () => new Promise<readonly Snippet[]>(() => undefined),
      };
      const backend = new ScriptedBackend([
        problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 6 }),
      ]);
      const { orchestrator, store, logLines } = createTestOrchestrator({
        backend,
        retriever,
        timeoutMs: 20,
      });
      await seedProblemDefinition(store, 'u1');

      const result = await orchestrator.converse({ user_id: 'u1', message: PROBLEM_STATEMENT });

      expect(result.success && result.reply.current_state).toBe('solution_design');
      expect(backend.requests[0]?.payload).not.toContain('"reference"');
      const warning = parseLogLines(logLines).find(
        (line) => line.event === 'knowledge_search_timed_out'
      );
      expect(warning?.data).toEqual({ timeout_ms: 20 });
    });
  });
});

describe('execution coaching', () => {
  it('adds the stagnation reason and tips around the next action', async () => {
    const backend = new ScriptedBackend([
      updateReply('in_progress', 'Write up the findings', {
        stagnation_detected: true,
        stagnation_reason: 'Same update as last week.',
        tips: ['Timebox one hour', 'Ask a peer'],
      }),
    ]);
    const { orchestrator, store } = createTestOrchestrator({ backend });
    await seedExecution(store, 'u1', 2);

    const result = await orchestrator.converse({ user_id: 'u1', message: 'Still cleaning the data.' });

    expect(result.success && result.reply.response_text).toBe(
      'Good progress.\n\nIt looks like you might be stuck: Same update as last week.\n' +
        "Let's get you moving again.\n\nNext action: Write up the findings\n\n" +
        'Tips:\n- Timebox one hour\n- Ask a peer'
    );
    expect((await store.get('u1'))?.current_milestone_id).toBe('ms_1');
  });

  it('adds the stagnation note without a reason to a completed milestone', async () => {
    const backend = new ScriptedBackend([
      updateReply('completed', 'Write up the findings', { stagnation_detected: true }),
    ]);
    const { orchestrator, store } = createTestOrchestrator({ backend });
    await seedExecution(store, 'u1', 2);

    const result = await orchestrator.converse({ user_id: 'u1', message: 'Finally pulled the data.' });

    expect(result.success && result.reply.response_text).toBe(
      "Good progress.\n\nIt looks like you might be stuck. Let's get you moving again.\n\n" +
        'Milestone 1 is complete (1/2). Next up: Milestone 2.\n\nNext action: Write up the findings'
    );
    const state = await store.get('u1');
    expect(state?.current_milestone_id).toBe('ms_2');
    expect(state?.milestones_completed).toBe(1);
  });

  it('retries an update whose status is not a milestone status', async () => {
    const skipped = JSON.stringify({
      feedback: 'Ok.',
      next_action: 'Move on',
      milestone_status: 'skipped',
    });
    const backend = new ScriptedBackend([skipped, updateReply('in_progress')]);
    const { orchestrator, store } = createTestOrchestrator({ backend });
    await seedExecution(store, 'u1', 2);

    const result = await orchestrator.converse({ user_id: 'u1', message: 'Skipping the survey part.' });

    expect(result.success && result.reply.response_text).toBe(
      'Good progress.\n\nNext action: Write up the findings'
    );
    expect(backend.requests).toHaveLength(2);
  });
});

describe('Orchestrator user records', () => {
  it('creates a user once and reports an existing one', async () => {
    const { orchestrator } = createTestOrchestrator();

    const created = await orchestrator.createUser('u1');
    const again = await orchestrator.createUser('u1');

    expect(created.status).toBe('created');
    expect(created.state.current_state).toBe('onboarding');
    expect(created.state.version).toBe(0);
    expect(again.status).toBe('exists');
    expect(again.state).toEqual(created.state);
  });

  it('lets an explicitly created user converse when users are not created automatically', async () => {
    const { orchestrator } = createTestOrchestrator({ settings: { auto_create_users: false } });
    await orchestrator.createUser('u1');

    const result = await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });

    expect(result).toEqual({
      success: true,
      reply: {
        user_id: 'u1',
        response_text:
          'Great, Product Manager. Which industry or domain interests you? (for example, FinTech or healthcare)',
        current_state: 'onboarding',
      },
    });
  });

  it('returns only the most recent history entries under a limit', async () => {
    const { orchestrator } = createTestOrchestrator();
    await orchestrator.converse({ user_id: 'u1', message: 'Product Manager' });
    await orchestrator.converse({ user_id: 'u1', message: 'FinTech' });

    const recent = await orchestrator.getHistory('u1', 2);

    expect(await orchestrator.getHistory('u1')).toHaveLength(4);
    expect(recent).toHaveLength(2);
    expect(recent[0]).toMatchObject({ actor: 'user', kind: 'message', payload: 'FinTech' });
    expect(recent[1]).toMatchObject({ actor: 'agent', kind: 'response' });
  });
});

describe('a full journey', () => {
  it('walks from onboarding to completion', async () => {
    const backend = new ScriptedBackend([
      proposalReply(),
      proposalReply('Subscription Pricing Study'),
      problemEvaluationReply({ market_relevance: 8, clarity: 7, feasibility: 7 }),
      solutionEvaluationReply({
        logical_coherence: 8,
        innovation: 7,
        implementation_feasibility: 7,
        impact_potential: 8,
      }),
      planReply(3),
      updateReply('completed'),
      updateReply('completed'),
      updateReply('completed'),
      reviewReply(8),
      resumeReply(),
    ]);
    const { orchestrator } = createTestOrchestrator({ backend });
    const send = async (message: string): Promise<string> => {
      const result = await orchestrator.converse({ user_id: 'u1', message });
      if (!result.success) {
        throw new Error(`${message}: ${result.error.message}`);
      }
      return result.reply.response_text;
    };

    for (const message of ['Product Manager', 'FinTech', 'skip', 'skip']) {
      await send(message);
    }

    const proposal = await send('ready');
    expect(proposal.startsWith(`Here is a project idea for you:\n\n${PROPOSAL.title}\n`)).toBe(true);
    await send('no, something different');
    expect((await orchestrator.getState('u1'))?.revisions.project_generation).toBe(1);
    expect(await send('maybe')).toBe(
      'Please reply yes to go ahead with "Subscription Pricing Study", or no for a different idea.'
    );
    await send('yes, looks good');

    await send(PROBLEM_STATEMENT);
    await send(SOLUTION_APPROACH);
    expect((await orchestrator.getState('u1'))?.current_state).toBe('execution');

    expect(await send('ready')).toBe(
      'Here is your milestone plan:\n1. Milestone 1\n2. Milestone 2\n3. Milestone 3\n\n' +
        'Start with milestone 1: Milestone 1. Send me a progress update whenever you make progress.'
    );
    expect(await send('Pulled and cleaned the subscription data.')).toBe(
      'Good progress.\n\nMilestone 1 is complete (1/3). Next up: Milestone 2.\n\nNext action: Write up the findings'
    );
    await send('Ran the churn driver analysis.');
    await send('Built the stakeholder dashboard.');
    expect((await orchestrator.getState('u1'))?.current_state).toBe('review');

    await send(SUBMITTED_WORK);
    expect((await orchestrator.getState('u1'))?.awaiting).toBe('resume_approval');
    const resume = await send('yes');
    expect(resume.startsWith('Churn Insights Dashboard\nFound what drives subscription churn.')).toBe(true);

    expect(await send('thanks!')).toBe(
      'You have completed the journey for "Subscription Pricing Study". Your resume content is saved. ' +
        'Good luck with your Product Manager applications!'
    );

    const transitions = await orchestrator.getTransitions('u1');
    expect(transitions.map((t) => t.to_state)).toEqual([
      'project_generation',
      'problem_definition',
      'solution_design',
      'execution',
      'review',
      'completed',
    ]);
    expect(transitions.every((t) => t.accepted)).toBe(true);

    const state = await orchestrator.getState('u1');
    expect(state?.milestones_completed).toBe(3);
    expect(state?.resume_id).not.toBeNull();
    expect((await orchestrator.getActiveArtifact('u1'))?.kind).toBe('resume_package');

    const plan = await orchestrator.getActiveArtifact('u1', 'milestone_plan');
    expect(plan?.version).toBe(4);
    expect(backend.remaining).toBe(0);
  });
});
