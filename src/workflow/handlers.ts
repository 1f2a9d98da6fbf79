/**
 * Phase handlers.
 *
 * One handler per journey phase, selected by `current_state` alone. A handler
 * reads the user's state and artifacts, makes at most one agent call through
 * {@link HandlerContext.invoke}, and proposes an outcome. It never writes:
 * the orchestrator commits (or discards) what the handler proposes.
 *
 * @packageDocumentation
 */

import type { MessageCatalog } from '../agents/templates.js';
import { bulletList, numberedList } from '../agents/templates.js';
import type {
  Agent,
  AgentSet,
  ArtifactReview,
  Evaluation,
  LearnerProfile,
  Milestone,
  MilestoneStatus,
  ProgressOutput,
  RelayTemplate,
} from '../agents/types.js';
import type { AgentCallFailure, AgentCallResult } from '../router/types.js';
import type { ArtifactDraft, ArtifactReader } from './artifacts.js';
import { nextVersionOf } from './artifacts.js';
import type { JourneyPhase, RevisionCounters, UserState, UserStateUpdates } from './types.js';

/**
 * What a handler can see and do during one request.
 */
export interface HandlerContext {
  /** The state record as loaded at the start of the request. */
  readonly state: UserState;
  readonly message: string;
  readonly catalog: MessageCatalog;
  readonly agents: AgentSet;
  readonly artifacts: ArtifactReader;
  /** Generates a fresh artifact id. */
  newId(prefix: string): string;
  /**
   * Calls an agent through the timeout and retry policy, with knowledge
   * snippets for `query` when one is given. A second call in the same
   * request rejects.
   */
  invoke<I, O>(agent: Agent<I, O>, input: I, query?: string): Promise<AgentCallResult<O>>;
}

/**
 * What a handler proposes.
 *
 * - stay: merge `updates`, store `artifacts`, remain in the phase
 * - advance: the same, then ask the state machine for `to`; if it refuses,
 *   nothing is merged or stored and `fallback` is the reply
 * - agent_failure: the agent call failed after its retry; nothing changes
 */
export type HandlerOutcome =
  | {
      readonly kind: 'stay';
      readonly updates: UserStateUpdates;
      readonly artifacts: readonly ArtifactDraft[];
      readonly response: string;
    }
  | {
      readonly kind: 'advance';
      readonly to: JourneyPhase;
      readonly updates: UserStateUpdates;
      readonly artifacts: readonly ArtifactDraft[];
      readonly response: string;
      readonly fallback: string;
    }
  | { readonly kind: 'agent_failure'; readonly failure: AgentCallFailure };

export type PhaseHandler = (context: HandlerContext) => Promise<HandlerOutcome>;

// ---------------------------------------------------------------------------
// Input rules
// ---------------------------------------------------------------------------

export const ROLE_LENGTH = { min: 3, max: 200 } as const;
export const DOMAIN_LENGTH = { min: 2, max: 200 } as const;
/** Minimum length of a problem statement, solution approach or work description. */
export const MIN_SUBMISSION_LENGTH = 20;
export const MIN_UPDATE_LENGTH = 5;

const APPROVAL_PHRASES = [
  'yes',
  'approve',
  'looks good',
  'proceed',
  'confirm',
  'sounds good',
  'ok',
  'sure',
] as const;
const REJECTION_PHRASES = ['no', 'nope', 'different', 'another', 'reject'] as const;

/**
 * A yes/no reply, or undefined when the message is neither (or both).
 */
export type Approval = 'yes' | 'no' | undefined;

function containsPhrase(words: string, phrase: string): boolean {
  return ` ${words} `.includes(` ${phrase} `);
}

/**
 * Reads a yes/no answer from free text by whole-word keyword match.
 *
 * @example
 * ```typescript
 * parseApproval('Yes, looks good!'); // 'yes'
 * parseApproval('Something different please'); // 'no'
 * parseApproval('maybe'); // undefined
 * ```
 */
export function parseApproval(message: string): Approval {
  const words = message
    .toLowerCase()
    .replace(/[^a-z\s]/g, ' ')
    .split(/\s+/)
    .filter((word) => word !== '')
    .join(' ');
  const yes = APPROVAL_PHRASES.some((phrase) => containsPhrase(words, phrase));
  const no = REJECTION_PHRASES.some((phrase) => containsPhrase(words, phrase));
  if (yes === no) {
    return undefined;
  }
  return yes ? 'yes' : 'no';
}

function isSkip(text: string): boolean {
  return text === '' || text.toLowerCase() === 'skip';
}

function withinLength(text: string, bounds: { readonly min: number; readonly max: number }): boolean {
  return text.length >= bounds.min && text.length <= bounds.max;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Reply used when the state machine refuses to leave a phase.
 */
const EXIT_REQUIREMENTS: Readonly<Record<JourneyPhase, string>> = {
  onboarding: 'your target role and domain are still needed',
  project_generation: 'a project has to be approved first',
  problem_definition: 'the problem statement has to be approved first',
  solution_design: 'the solution approach has to be approved first',
  execution: 'every milestone has to be completed first',
  review: 'the review and resume content have to be finished first',
  completed: 'the journey is already complete',
};

function blocked(context: HandlerContext): string {
  return context.catalog.response('transition_blocked', {
    reason: EXIT_REQUIREMENTS[context.state.current_state],
  });
}

function profileOf(state: UserState): LearnerProfile {
  return {
    target_role: state.target_role ?? '',
    target_domain: state.target_domain ?? '',
    background: state.background,
    interests: state.interests,
  };
}

function bumpRevision(state: UserState, phase: JourneyPhase): RevisionCounters {
  return { ...state.revisions, [phase]: state.revisions[phase] + 1 };
}

function agentFailure(failure: AgentCallFailure): HandlerOutcome {
  return { kind: 'agent_failure', failure };
}

/**
 * Failure for an agent answering in a mode other than the one requested.
 */
function wrongMode(agent: string, expected: string, attempts: number): HandlerOutcome {
  return agentFailure({
    agent,
    kind: 'malformed',
    message: `${agent} answered with a result other than ${expected}`,
    attempts,
  });
}

function stay(
  response: string,
  updates: UserStateUpdates = {},
  artifacts: readonly ArtifactDraft[] = []
): HandlerOutcome {
  return { kind: 'stay', updates, artifacts, response };
}

// ---------------------------------------------------------------------------
// onboarding
// ---------------------------------------------------------------------------

interface OnboardingStep {
  readonly template: RelayTemplate;
  readonly variables: Readonly<Record<string, string>>;
  readonly updates: UserStateUpdates;
  readonly complete: boolean;
}

function nextOnboardingStep(state: UserState, text: string): OnboardingStep {
  switch (state.awaiting) {
    case 'domain':
      if (!withinLength(text, DOMAIN_LENGTH)) {
        return { template: 'domain_reprompt', variables: {}, updates: {}, complete: false };
      }
      return {
        template: 'ask_background',
        variables: {},
        updates: { target_domain: text, awaiting: 'background' },
        complete: false,
      };
    case 'background':
      return {
        template: 'ask_interests',
        variables: {},
        updates: { background: isSkip(text) ? null : text, awaiting: 'interests' },
        complete: false,
      };
    case 'interests':
      return {
        template: 'onboarding_complete',
        variables: { role: state.target_role ?? '', domain: state.target_domain ?? '' },
        updates: { interests: isSkip(text) ? null : text, awaiting: null },
        complete: true,
      };
    default:
      if (!withinLength(text, ROLE_LENGTH)) {
        return { template: 'ask_role', variables: {}, updates: {}, complete: false };
      }
      return {
        template: 'ask_domain',
        variables: { role: text },
        updates: { target_role: text, awaiting: 'domain' },
        complete: false,
      };
  }
}

const handleOnboarding: PhaseHandler = async (context) => {
  const step = nextOnboardingStep(context.state, context.message.trim());
  const result = await context.invoke(context.agents.relay, {
    template: step.template,
    variables: step.variables,
  });
  if (!result.success) {
    return agentFailure(result.failure);
  }
  if (!step.complete) {
    return stay(result.output.text, step.updates);
  }
  return {
    kind: 'advance',
    to: 'project_generation',
    updates: step.updates,
    artifacts: [],
    response: result.output.text,
    fallback: blocked(context),
  };
};

// ---------------------------------------------------------------------------
// project_generation
// ---------------------------------------------------------------------------

async function proposeProject(context: HandlerContext, regenerate: boolean): Promise<HandlerOutcome> {
  const { state } = context;
  const earlier = await context.artifacts.all('project');
  const profile = profileOf(state);
  const query = [profile.target_role, profile.target_domain, profile.interests ?? '', 'project']
    .filter((part) => part !== '')
    .join(' ');

  const result = await context.invoke(
    context.agents.generator,
    { profile, rejected_titles: earlier.map((record) => record.content.title) },
    query
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }

  const proposal = result.output;
  const revisions = regenerate ? bumpRevision(state, 'project_generation') : state.revisions;
  const draft: ArtifactDraft = {
    kind: 'project',
    artifact_id: context.newId('project'),
    version: 1,
    revision_cycle: revisions.project_generation,
    content: proposal,
  };

  return stay(
    context.catalog.response('project_proposal', {
      title: proposal.title,
      summary: proposal.summary,
      deliverables: bulletList(proposal.deliverables),
      weeks: proposal.feasibility.estimated_weeks,
      difficulty: proposal.feasibility.difficulty,
    }),
    {
      project_id: draft.artifact_id,
      project_approved: false,
      awaiting: 'project_approval',
      revisions,
    },
    [draft]
  );
}

const handleProjectGeneration: PhaseHandler = async (context) => {
  const { state } = context;
  const current = await context.artifacts.latest('project');
  if (state.awaiting !== 'project_approval' || current === undefined) {
    return proposeProject(context, false);
  }

  const title = current.content.title;
  switch (parseApproval(context.message)) {
    case 'yes':
      return {
        kind: 'advance',
        to: 'problem_definition',
        updates: { project_approved: true, awaiting: 'problem_submission' },
        artifacts: [],
        response: context.catalog.response('project_approved', { title }),
        fallback: blocked(context),
      };
    case 'no':
      return proposeProject(context, true);
    default:
      return stay(context.catalog.response('project_approval_reprompt', { title }));
  }
};

// ---------------------------------------------------------------------------
// problem_definition / solution_design
// ---------------------------------------------------------------------------

function evaluationVariables(evaluation: Evaluation): Record<string, string | number> {
  return {
    mean: evaluation.mean_score,
    feedback: evaluation.feedback,
    suggestions: bulletList(evaluation.suggestions),
  };
}

const handleProblemDefinition: PhaseHandler = async (context) => {
  const { state, catalog } = context;
  const statement = context.message.trim();
  if (statement.length < MIN_SUBMISSION_LENGTH) {
    return stay(catalog.response('problem_reprompt', { min_length: MIN_SUBMISSION_LENGTH }));
  }

  const project = await context.artifacts.latest('project');
  const result = await context.invoke(
    context.agents.evaluator,
    {
      lens: 'problem',
      submission: statement,
      profile: profileOf(state),
      project_title: project?.content.title ?? '',
      problem_statement: null,
    },
    statement
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }

  const evaluation = result.output;
  const previous = await context.artifacts.latest('problem_definition');
  const draft: ArtifactDraft = {
    kind: 'problem_definition',
    ...nextVersionOf(previous, () => context.newId('problem')),
    revision_cycle: state.revisions.problem_definition,
    content: { statement, evaluation },
  };
  const variables = evaluationVariables(evaluation);

  if (evaluation.verdict === 'APPROVED') {
    return {
      kind: 'advance',
      to: 'solution_design',
      updates: {
        problem_id: draft.artifact_id,
        problem_approved: true,
        awaiting_feedback: false,
        awaiting: 'solution_submission',
      },
      artifacts: [draft],
      response: catalog.response('problem_approved', variables),
      fallback: blocked(context),
    };
  }

  return stay(
    catalog.response('problem_needs_revision', variables),
    {
      revisions: bumpRevision(state, 'problem_definition'),
      awaiting_feedback: true,
      awaiting: 'problem_submission',
    },
    [draft]
  );
};

const handleSolutionDesign: PhaseHandler = async (context) => {
  const { state, catalog } = context;
  const approach = context.message.trim();
  if (approach.length < MIN_SUBMISSION_LENGTH) {
    return stay(catalog.response('solution_reprompt', { min_length: MIN_SUBMISSION_LENGTH }));
  }

  const project = await context.artifacts.latest('project');
  const problem = await context.artifacts.latest('problem_definition');
  const result = await context.invoke(
    context.agents.evaluator,
    {
      lens: 'solution',
      submission: approach,
      profile: profileOf(state),
      project_title: project?.content.title ?? '',
      problem_statement: problem?.content.statement ?? null,
    },
    approach
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }

  const evaluation = result.output;
  const previous = await context.artifacts.latest('solution_design');
  const draft: ArtifactDraft = {
    kind: 'solution_design',
    ...nextVersionOf(previous, () => context.newId('solution')),
    revision_cycle: state.revisions.solution_design,
    content: { approach, evaluation },
  };
  const variables = evaluationVariables(evaluation);

  if (evaluation.verdict === 'APPROVED') {
    return {
      kind: 'advance',
      to: 'execution',
      updates: {
        solution_id: draft.artifact_id,
        solution_approved: true,
        awaiting_feedback: false,
        awaiting: null,
      },
      artifacts: [draft],
      response: catalog.response('solution_approved', variables),
      fallback: blocked(context),
    };
  }

  const revisionUpdates: UserStateUpdates = {
    revisions: bumpRevision(state, 'solution_design'),
    awaiting_feedback: true,
  };

  if (evaluation.revisit_problem) {
    return {
      kind: 'advance',
      to: 'problem_definition',
      updates: {
        ...revisionUpdates,
        revision_unlocked: { from: 'solution_design', to: 'problem_definition' },
        problem_approved: false,
        solution_approved: false,
        awaiting: 'problem_submission',
      },
      artifacts: [draft],
      response: catalog.response('solution_revisit_problem', variables),
      fallback: catalog.response('solution_needs_revision', variables),
    };
  }

  return stay(
    catalog.response('solution_needs_revision', variables),
    { ...revisionUpdates, awaiting: 'solution_submission' },
    [draft]
  );
};

// ---------------------------------------------------------------------------
// execution
// ---------------------------------------------------------------------------

function withStatus(
  milestones: readonly Milestone[],
  changes: ReadonlyMap<string, MilestoneStatus>
): Milestone[] {
  return milestones.map((milestone) => {
    const status = changes.get(milestone.id);
    return status === undefined ? milestone : { ...milestone, status };
  });
}

async function planMilestones(context: HandlerContext): Promise<HandlerOutcome> {
  const { state } = context;
  const project = await context.artifacts.latest('project');
  const solution = await context.artifacts.latest('solution_design');
  if (project === undefined) {
    return stay(blocked(context));
  }

  const approach = solution?.content.approach ?? '';
  const result = await context.invoke(
    context.agents.progress,
    { mode: 'plan', profile: profileOf(state), project: project.content, solution_approach: approach },
    `${project.content.title} ${approach}`
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }
  if (result.output.mode !== 'plan') {
    return wrongMode(context.agents.progress.name, 'a milestone plan', result.attempts);
  }

  const planned = result.output.milestones;
  const first = planned[0];
  if (first === undefined) {
    return wrongMode(context.agents.progress.name, 'a non-empty milestone plan', result.attempts);
  }
  const milestones = withStatus(planned, new Map<string, MilestoneStatus>([[first.id, 'in_progress']]));
  const draft: ArtifactDraft = {
    kind: 'milestone_plan',
    artifact_id: context.newId('plan'),
    version: 1,
    revision_cycle: state.revisions.execution,
    content: { milestones },
  };

  return stay(
    context.catalog.response('milestone_plan', {
      milestones: numberedList(milestones.map((milestone) => milestone.title)),
      current: first.title,
    }),
    {
      milestone_plan_id: draft.artifact_id,
      current_milestone_id: first.id,
      milestones_completed: 0,
      total_milestones: milestones.length,
      awaiting: 'progress_update',
    },
    [draft]
  );
}

type ProgressUpdate = Extract<ProgressOutput, { readonly mode: 'update' }>;

/**
 * Stagnation and tips sections of a progress reply. Each is empty or starts
 * with a blank line.
 */
export function coachingNotes(
  catalog: MessageCatalog,
  update: ProgressUpdate
): { readonly stagnation: string; readonly tips: string } {
  let stagnation = '';
  if (update.stagnation_detected) {
    const note =
      update.stagnation_reason === null
        ? catalog.response('stagnation_note')
        : catalog.response('stagnation_reason', { reason: update.stagnation_reason });
    stagnation = `\n\n${note}`;
  }
  const tips =
    update.tips.length === 0
      ? ''
      : `\n\n${catalog.response('tips_note', { tips: bulletList(update.tips) })}`;
  return { stagnation, tips };
}

const handleExecution: PhaseHandler = async (context) => {
  const { state, catalog } = context;
  const plan = await context.artifacts.latest('milestone_plan');
  if (state.milestone_plan_id === null || plan === undefined) {
    return planMilestones(context);
  }

  const milestones = plan.content.milestones;
  const current =
    milestones.find((milestone) => milestone.id === state.current_milestone_id) ??
    milestones.find((milestone) => milestone.status !== 'completed');
  if (current === undefined) {
    return {
      kind: 'advance',
      to: 'review',
      updates: { current_milestone_id: null, awaiting: 'artifacts' },
      artifacts: [],
      response: catalog.response('artifacts_reprompt', { min_length: MIN_SUBMISSION_LENGTH }),
      fallback: blocked(context),
    };
  }

  const update = context.message.trim();
  if (update.length < MIN_UPDATE_LENGTH) {
    return stay(catalog.response('progress_reprompt', { current: current.title }));
  }

  const project = await context.artifacts.latest('project');
  const result = await context.invoke(
    context.agents.progress,
    {
      mode: 'update',
      project_title: project?.content.title ?? '',
      milestone: current,
      update_text: update,
    },
    `${current.title} ${update}`
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }
  if (result.output.mode !== 'update') {
    return wrongMode(context.agents.progress.name, 'a progress update', result.attempts);
  }

  const { feedback, next_action: nextAction, milestone_status: status } = result.output;
  const notes = coachingNotes(catalog, result.output);
  const nextVersion = nextVersionOf(plan, () => context.newId('plan'));

  if (status !== 'completed') {
    const reply = catalog.response('progress_feedback', {
      feedback,
      next_action: nextAction,
      ...notes,
    });
    if (status === current.status) {
      return stay(reply);
    }
    return stay(
      reply,
      {},
      [
        {
          kind: 'milestone_plan',
          ...nextVersion,
          revision_cycle: state.revisions.execution,
          content: { milestones: withStatus(milestones, new Map<string, MilestoneStatus>([[current.id, status]])) },
        },
      ]
    );
  }

  const following = milestones
    .filter((milestone) => milestone.order > current.order && milestone.status !== 'completed')
    .sort((a, b) => a.order - b.order)[0];
  const changes = new Map<string, MilestoneStatus>([[current.id, 'completed']]);
  if (following !== undefined) {
    changes.set(following.id, 'in_progress');
  }
  const draft: ArtifactDraft = {
    kind: 'milestone_plan',
    ...nextVersion,
    revision_cycle: state.revisions.execution,
    content: { milestones: withStatus(milestones, changes) },
  };
  const completed = state.milestones_completed + 1;

  if (following !== undefined) {
    return stay(
      catalog.response('milestone_completed', {
        feedback,
        order: current.order,
        completed,
        total: state.total_milestones,
        next_title: following.title,
        next_action: nextAction,
        ...notes,
      }),
      {
        current_milestone_id: following.id,
        milestones_completed: completed,
        awaiting: 'progress_update',
      },
      [draft]
    );
  }

  return {
    kind: 'advance',
    to: 'review',
    updates: { current_milestone_id: null, milestones_completed: completed, awaiting: 'artifacts' },
    artifacts: [draft],
    response: catalog.response('execution_complete', { feedback, total: state.total_milestones }),
    fallback: blocked(context),
  };
};

// ---------------------------------------------------------------------------
// review
// ---------------------------------------------------------------------------

function toReview(source: ArtifactReview): ArtifactReview {
  return {
    overall_score: source.overall_score,
    overall_feedback: source.overall_feedback,
    criterion_scores: source.criterion_scores,
    strengths: source.strengths,
    areas_for_improvement: source.areas_for_improvement,
    skills_demonstrated: source.skills_demonstrated,
  };
}

async function reviewWork(context: HandlerContext): Promise<HandlerOutcome> {
  const { state, catalog } = context;
  const submitted = context.message.trim();
  if (submitted.length < MIN_SUBMISSION_LENGTH) {
    return stay(catalog.response('artifacts_reprompt', { min_length: MIN_SUBMISSION_LENGTH }));
  }

  const project = await context.artifacts.latest('project');
  if (project === undefined) {
    return stay(blocked(context));
  }
  const result = await context.invoke(
    context.agents.reviewer,
    { mode: 'review', profile: profileOf(state), project: project.content, submitted_text: submitted },
    `${project.content.title} ${submitted}`
  );
  if (!result.success) {
    return agentFailure(result.failure);
  }
  if (result.output.mode !== 'review') {
    return wrongMode(context.agents.reviewer.name, 'a review', result.attempts);
  }

  const review = toReview(result.output);
  const previous = await context.artifacts.latest('artifact_review');
  const draft: ArtifactDraft = {
    kind: 'artifact_review',
    ...nextVersionOf(previous, () => context.newId('review')),
    revision_cycle: state.revisions.review,
    content: { ...review, submitted_text: submitted },
  };

  return stay(
    catalog.response('review_summary', {
      score: review.overall_score,
      feedback: review.overall_feedback,
      strengths: bulletList(review.strengths),
      improvements: bulletList(review.areas_for_improvement),
    }),
    { review_id: draft.artifact_id, awaiting: 'resume_approval' },
    [draft]
  );
}

async function writeResume(context: HandlerContext): Promise<HandlerOutcome> {
  const { state, catalog } = context;
  const project = await context.artifacts.latest('project');
  const reviewed = await context.artifacts.latest('artifact_review');
  if (project === undefined || reviewed === undefined) {
    return stay(blocked(context));
  }

  const { submitted_text: submittedText } = reviewed.content;
  const result = await context.invoke(context.agents.reviewer, {
    mode: 'resume',
    profile: profileOf(state),
    project: project.content,
    review: toReview(reviewed.content),
    submitted_text: submittedText,
  });
  if (!result.success) {
    return agentFailure(result.failure);
  }
  if (result.output.mode !== 'resume') {
    return wrongMode(context.agents.reviewer.name, 'resume content', result.attempts);
  }

  const resume = result.output;
  const draft: ArtifactDraft = {
    kind: 'resume_package',
    artifact_id: context.newId('resume'),
    version: 1,
    revision_cycle: state.revisions.review,
    content: {
      title: resume.title,
      one_liner: resume.one_liner,
      bullets: resume.bullets,
      suggested_skills: resume.suggested_skills,
      talking_points: resume.talking_points,
    },
  };

  return {
    kind: 'advance',
    to: 'completed',
    updates: { resume_id: draft.artifact_id, awaiting: null },
    artifacts: [draft],
    response: catalog.response('resume_ready', {
      title: resume.title,
      one_liner: resume.one_liner,
      bullets: bulletList(resume.bullets.map((bullet) => bullet.text)),
      talking_points: bulletList(resume.talking_points),
    }),
    fallback: blocked(context),
  };
}

const handleReview: PhaseHandler = async (context) => {
  if (context.state.awaiting !== 'resume_approval' || context.state.review_id === null) {
    return reviewWork(context);
  }
  switch (parseApproval(context.message)) {
    case 'yes':
      return writeResume(context);
    case 'no':
      return stay(context.catalog.response('resume_declined'));
    default:
      return stay(context.catalog.response('resume_approval_reprompt'));
  }
};

// ---------------------------------------------------------------------------
// completed
// ---------------------------------------------------------------------------

const handleCompleted: PhaseHandler = async (context) => {
  const project = await context.artifacts.latest('project');
  const result = await context.invoke(context.agents.relay, {
    template: 'journey_complete',
    variables: {
      title: project?.content.title ?? '',
      role: context.state.target_role ?? '',
    },
  });
  if (!result.success) {
    return agentFailure(result.failure);
  }
  return stay(result.output.text);
};

/**
 * The handler of each phase. Selection depends on the phase only, never on
 * message content.
 */
export const PHASE_HANDLERS: Readonly<Record<JourneyPhase, PhaseHandler>> = {
  onboarding: handleOnboarding,
  project_generation: handleProjectGeneration,
  problem_definition: handleProblemDefinition,
  solution_design: handleSolutionDesign,
  execution: handleExecution,
  review: handleReview,
  completed: handleCompleted,
};
