/**
 * Tests for the model-backed agents against a scripted backend.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_AGENT_SETTINGS } from '../config/index.js';
import { BackendError } from '../router/types.js';
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
import { ScriptedBackend } from '../testing/scripted-backend.js';
import { SubmissionEvaluator } from './evaluator.js';
import { ProjectGenerator } from './generator.js';
import { buildPayload, type ModelAgentOptions } from './model-agent.js';
import { ProgressCoach } from './progress.js';
import { loadAgentPrompts } from './prompts.js';
import { WorkReviewer } from './reviewer.js';
import type { ArtifactReview, LearnerProfile, Milestone } from './types.js';

const profile: LearnerProfile = {
  target_role: 'Product Manager',
  target_domain: 'FinTech',
  background: null,
  interests: null,
};

const context = { signal: new AbortController().signal, snippets: [] };

function options(backend: ScriptedBackend): ModelAgentOptions {
  return {
    backend,
    prompts: loadAgentPrompts(),
    constraints: {
      model: DEFAULT_AGENT_SETTINGS.model,
      maxTokens: DEFAULT_AGENT_SETTINGS.max_tokens,
      temperature: DEFAULT_AGENT_SETTINGS.temperature,
    },
  };
}

describe('buildPayload', () => {
  it('serializes the input alone when there are no snippets', () => {
    expect(JSON.parse(buildPayload({ lens: 'problem' }, []))).toEqual({ input: { lens: 'problem' } });
  });

  it('attaches snippets as reference material', () => {
    const payload = buildPayload({ a: 1 }, [
      { text: 'Churn is costly', source: 'kb:churn', relevance_score: 0.5 },
    ]);
    expect(JSON.parse(payload)).toEqual({
      input: { a: 1 },
      reference: [{ source: 'kb:churn', text: 'Churn is costly' }],
    });
  });
});

describe('ProjectGenerator', () => {
  it('returns a checked proposal and sends the generator prompt', async () => {
    const backend = new ScriptedBackend([proposalReply()]);
    const generator = new ProjectGenerator(options(backend));

    const outcome = await generator.generate({ profile, rejected_titles: [] }, context);

    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok') {
      expect(outcome.output.title).toBe('Churn Insights Dashboard');
      expect(outcome.output.feasibility.difficulty).toBe('intermediate');
    }
    expect(backend.requests[0]?.system).toBe(loadAgentPrompts().generator);
    expect(JSON.parse(backend.requests[0]?.payload ?? '')).toEqual({
      input: { profile, rejected_titles: [] },
    });
  });

  it('accepts a proposal wrapped in a fenced block', async () => {
    const backend = new ScriptedBackend([`Here you go:\n\`\`\`json\n${proposalReply()}\n\`\`\``]);
    const outcome = await new ProjectGenerator(options(backend)).generate(
      { profile, rejected_titles: [] },
      context
    );
    expect(outcome.kind).toBe('ok');
  });

  it('treats a repeated rejected title as malformed', async () => {
    const backend = new ScriptedBackend([proposalReply('Churn Insights Dashboard')]);
    const outcome = await new ProjectGenerator(options(backend)).generate(
      { profile, rejected_titles: ['churn insights  dashboard'] },
      context
    );
    expect(outcome).toEqual({
      kind: 'malformed',
      reason: "project proposal: repeats rejected title 'Churn Insights Dashboard'",
    });
  });

  it('reports schema violations as malformed', async () => {
    const backend = new ScriptedBackend(['{"title": "Only a title"}']);
    const outcome = await new ProjectGenerator(options(backend)).generate(
      { profile, rejected_titles: [] },
      context
    );
    expect(outcome.kind).toBe('malformed');
    if (outcome.kind === 'malformed') {
      expect(outcome.reason).toContain("must have required property 'summary'");
    }
  });

  it('propagates backend errors', async () => {
    const backend = new ScriptedBackend([new BackendError('boom', 'exit_error')]);
    await expect(
      new ProjectGenerator(options(backend)).generate({ profile, rejected_titles: [] }, context)
    ).rejects.toThrow('boom');
  });
});

describe('SubmissionEvaluator', () => {
  const base = {
    profile,
    project_title: 'Churn Insights Dashboard',
    problem_statement: null,
  };

  it('computes the verdict from the scores, not from the model', async () => {
    const reply = JSON.stringify({
      scores: { market_relevance: 8, clarity: 7, feasibility: 6 },
      feedback: 'Good.',
      suggestions: [],
      verdict: 'NEEDS_REVISION',
    });
    const evaluator = new SubmissionEvaluator(options(new ScriptedBackend([reply])));

    const outcome = await evaluator.generate(
      { ...base, lens: 'problem', submission: 'Small banks lose customers.' },
      context
    );

    expect(outcome).toEqual({
      kind: 'ok',
      output: {
        verdict: 'APPROVED',
        scores: { market_relevance: 8, clarity: 7, feasibility: 6 },
        mean_score: 7,
        feedback: 'Good.',
        suggestions: [],
        revisit_problem: false,
      },
    });
  });

  it('clamps scores and rejects when one score is below the floor', async () => {
    const backend = new ScriptedBackend([
      problemEvaluationReply({ market_relevance: 12, clarity: 9, feasibility: 5 }),
    ]);
    const outcome = await new SubmissionEvaluator(options(backend)).generate(
      { ...base, lens: 'problem', submission: 'Small banks lose customers.' },
      context
    );

    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok') {
      expect(outcome.output.scores).toEqual({ market_relevance: 10, clarity: 9, feasibility: 5 });
      expect(outcome.output.mean_score).toBe(8);
      expect(outcome.output.verdict).toBe('NEEDS_REVISION');
    }
  });

  it('uses the solution rubric and carries revisit_problem', async () => {
    const backend = new ScriptedBackend([
      solutionEvaluationReply(
        { logical_coherence: 4, innovation: 6, implementation_feasibility: 5, impact_potential: 5 },
        { revisitProblem: true }
      ),
    ]);
    const outcome = await new SubmissionEvaluator(options(backend)).generate(
      { ...base, lens: 'solution', submission: 'Build a dashboard.', problem_statement: 'Churn.' },
      context
    );

    expect(backend.requests[0]?.system).toBe(loadAgentPrompts().evaluator_solution);
    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok') {
      expect(outcome.output.verdict).toBe('NEEDS_REVISION');
      expect(outcome.output.revisit_problem).toBe(true);
      expect(outcome.output.mean_score).toBe(5);
    }
  });

  it('ignores revisit_problem under the problem lens', async () => {
    const reply = JSON.stringify({
      scores: { market_relevance: 3, clarity: 3, feasibility: 3 },
      feedback: 'Vague.',
      suggestions: [],
      revisit_problem: true,
    });
    const outcome = await new SubmissionEvaluator(options(new ScriptedBackend([reply]))).generate(
      { ...base, lens: 'problem', submission: 'Something about banks.' },
      context
    );
    expect(outcome.kind === 'ok' && outcome.output.revisit_problem).toBe(false);
  });

  it('treats scores from the wrong rubric as malformed', async () => {
    const backend = new ScriptedBackend([
      problemEvaluationReply({ market_relevance: 8, clarity: 8, feasibility: 8 }),
    ]);
    const outcome = await new SubmissionEvaluator(options(backend)).generate(
      { ...base, lens: 'solution', submission: 'Build it.', problem_statement: 'Churn.' },
      context
    );
    expect(outcome).toEqual({
      kind: 'malformed',
      reason:
        'solution evaluation: missing solution scores: logical_coherence, innovation, implementation_feasibility, impact_potential',
    });
  });
});

describe('ProgressCoach', () => {
  const project = PROPOSAL;

  it('assigns ids, order and initial status to planned milestones', async () => {
    const coach = new ProgressCoach(options(new ScriptedBackend([planReply(3)])));
    const outcome = await coach.generate(
      { mode: 'plan', profile, project, solution_approach: 'Interview then analyse.' },
      context
    );

    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok' && outcome.output.mode === 'plan') {
      expect(outcome.output.milestones.map((m) => [m.id, m.order, m.status])).toEqual([
        ['ms_1', 1, 'not_started'],
        ['ms_2', 2, 'not_started'],
        ['ms_3', 3, 'not_started'],
      ]);
    }
  });

  it('rejects plans outside 3 to 7 milestones', async () => {
    const coach = new ProgressCoach(options(new ScriptedBackend([planReply(2), planReply(8)])));
    const input = { mode: 'plan', profile, project, solution_approach: 'x' } as const;

    const tooFew = await coach.generate(input, context);
    const tooMany = await coach.generate(input, context);

    expect(tooFew).toEqual({
      kind: 'malformed',
      reason: 'milestone plan: /milestones: must NOT have fewer than 3 items',
    });
    expect(tooMany).toEqual({
      kind: 'malformed',
      reason: 'milestone plan: /milestones: must NOT have more than 7 items',
    });
  });

  const milestone: Milestone = {
    id: 'ms_1',
    title: 'Milestone 1',
    description: 'Work package 1',
    deliverable: 'Deliverable 1',
    order: 1,
    status: 'in_progress',
    estimated_days: 3,
  };

  it('returns one trimmed next action for an update', async () => {
    const coach = new ProgressCoach(
      options(new ScriptedBackend([updateReply('completed', '  Share the notebook  ')]))
    );
    const outcome = await coach.generate(
      { mode: 'update', project_title: 'Churn', milestone, update_text: 'Finished the analysis.' },
      context
    );
    expect(outcome).toEqual({
      kind: 'ok',
      output: {
        mode: 'update',
        feedback: 'Good progress.',
        next_action: 'Share the notebook',
        milestone_status: 'completed',
        stagnation_detected: false,
        stagnation_reason: null,
        tips: [],
      },
    });
  });

  it('keeps the stagnation reason and non-blank tips trimmed', async () => {
    const reply = updateReply('in_progress', 'Timebox the cleanup', {
      stagnation_detected: true,
      stagnation_reason: '  No change since the last update. ',
      tips: [' Pair with a colleague ', '   '],
    });
    const coach = new ProgressCoach(options(new ScriptedBackend([reply])));
    const outcome = await coach.generate(
      { mode: 'update', project_title: 'Churn', milestone, update_text: 'Still cleaning.' },
      context
    );
    expect(outcome).toEqual({
      kind: 'ok',
      output: {
        mode: 'update',
        feedback: 'Good progress.',
        next_action: 'Timebox the cleanup',
        milestone_status: 'in_progress',
        stagnation_detected: true,
        stagnation_reason: 'No change since the last update.',
        tips: ['Pair with a colleague'],
      },
    });
  });

  it('rejects a status outside the milestone statuses', async () => {
    const reply = JSON.stringify({ feedback: 'Ok.', next_action: 'Move on', milestone_status: 'skipped' });
    const coach = new ProgressCoach(options(new ScriptedBackend([reply])));
    const outcome = await coach.generate(
      { mode: 'update', project_title: 'Churn', milestone, update_text: 'Skipping it.' },
      context
    );
    expect(outcome).toEqual({
      kind: 'malformed',
      reason: 'progress update: /milestone_status: must be equal to one of the allowed values',
    });
  });

  it('treats a list of next actions or a blank one as malformed', async () => {
    const listReply = JSON.stringify({
      feedback: 'Ok.',
      next_action: ['a', 'b'],
      milestone_status: 'in_progress',
    });
    const coach = new ProgressCoach(
      options(new ScriptedBackend([listReply, updateReply('in_progress', '   ')]))
    );
    const input = { mode: 'update', project_title: 'Churn', milestone, update_text: 'x' } as const;

    expect(await coach.generate(input, context)).toEqual({
      kind: 'malformed',
      reason: 'progress update: /next_action: must be string',
    });
    expect(await coach.generate(input, context)).toEqual({
      kind: 'malformed',
      reason: 'progress update: /next_action: must match pattern "\\S"',
    });
  });
});

describe('WorkReviewer', () => {
  const project = PROPOSAL;

  it('clamps review scores', async () => {
    const reviewer = new WorkReviewer(options(new ScriptedBackend([reviewReply(11)])));
    const outcome = await reviewer.generate(
      { mode: 'review', profile, project, submitted_text: SUBMITTED_WORK },
      context
    );
    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok' && outcome.output.mode === 'review') {
      expect(outcome.output.overall_score).toBe(10);
      expect(outcome.output.criterion_scores).toEqual({ depth: 8, communication: 7 });
    }
  });

  const review: ArtifactReview = {
    overall_score: 8,
    overall_feedback: 'Solid.',
    criterion_scores: {},
    strengths: [],
    areas_for_improvement: [],
    skills_demonstrated: [],
  };

  it('accepts resume bullets backed by the submitted work', async () => {
    const reviewer = new WorkReviewer(options(new ScriptedBackend([resumeReply()])));
    const outcome = await reviewer.generate(
      { mode: 'resume', profile, project, review, submitted_text: SUBMITTED_WORK },
      context
    );
    expect(outcome.kind).toBe('ok');
    if (outcome.kind === 'ok' && outcome.output.mode === 'resume') {
      expect(outcome.output.bullets).toHaveLength(3);
    }
  });

  it('treats an unsupported bullet as malformed', async () => {
    const reviewer = new WorkReviewer(
      options(
        new ScriptedBackend([
          resumeReply([
            'built a churn dashboard in Metabase',
            'interviewed 12 customers about cancellations',
            'grew revenue by 40%',
          ]),
        ])
      )
    );
    const outcome = await reviewer.generate(
      { mode: 'resume', profile, project, review, submitted_text: SUBMITTED_WORK },
      context
    );
    expect(outcome).toEqual({
      kind: 'malformed',
      reason: 'resume package: 1 bullet(s) cite evidence not found in the submitted work',
    });
  });
});
