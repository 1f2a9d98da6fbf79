/**
 * Agent capability contracts.
 *
 * Five stateless agents, each a typed transformation from structured input
 * to structured output. The orchestrator selects one by phase through a
 * static table; nothing here inspects types at run time to dispatch.
 *
 * @packageDocumentation
 */

import type { Snippet } from '../knowledge/types.js';

/**
 * The closed set of agent capabilities.
 *
 * @remarks
 * - relay: renders the conversational text of onboarding and completion
 * - generator: proposes a portfolio project
 * - evaluator: scores a problem statement or solution approach
 * - progress: plans milestones and coaches progress updates
 * - reviewer: reviews submitted work and writes resume content
 */
export type AgentCapability = 'relay' | 'generator' | 'evaluator' | 'progress' | 'reviewer';

export const AGENT_CAPABILITIES = [
  'relay',
  'generator',
  'evaluator',
  'progress',
  'reviewer',
] as const satisfies readonly AgentCapability[];

/**
 * Per-call context supplied by the policy decorator.
 */
export interface AgentContext {
  /** Aborted when the call's deadline expires. */
  readonly signal: AbortSignal;
  /** Knowledge snippets retrieved for this call (may be empty). */
  readonly snippets: readonly Snippet[];
}

/**
 * What a single agent invocation produced.
 */
export type AgentOutcome<O> =
  | { readonly kind: 'ok'; readonly output: O }
  | { readonly kind: 'malformed'; readonly reason: string };

/**
 * The one capability interface every agent implements.
 */
export interface Agent<I, O> {
  /** Stable name, recorded in the conversation log. */
  readonly name: string;
  readonly capability: AgentCapability;
  generate(input: I, context: AgentContext): Promise<AgentOutcome<O>>;
}

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

/**
 * What the user told us during onboarding.
 */
export interface LearnerProfile {
  readonly target_role: string;
  readonly target_domain: string;
  readonly background: string | null;
  readonly interests: string | null;
}

// ---------------------------------------------------------------------------
// Relay
// ---------------------------------------------------------------------------

/**
 * Message templates the relay can render.
 */
export type RelayTemplate =
  | 'ask_role'
  | 'role_reprompt'
  | 'ask_domain'
  | 'domain_reprompt'
  | 'ask_background'
  | 'ask_interests'
  | 'onboarding_complete'
  | 'journey_complete';

export const RELAY_TEMPLATES = [
  'ask_role',
  'role_reprompt',
  'ask_domain',
  'domain_reprompt',
  'ask_background',
  'ask_interests',
  'onboarding_complete',
  'journey_complete',
] as const satisfies readonly RelayTemplate[];

export interface RelayInput {
  readonly template: RelayTemplate;
  /** Values substituted for `{{name}}` placeholders. */
  readonly variables: Readonly<Record<string, string>>;
}

export interface RelayOutput {
  readonly text: string;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export interface GeneratorInput {
  readonly profile: LearnerProfile;
  /** Titles of proposals the user already turned down. */
  readonly rejected_titles: readonly string[];
}

export type ProjectDifficulty = 'beginner' | 'intermediate' | 'advanced';

export interface ProjectFeasibility {
  readonly estimated_weeks: number;
  readonly difficulty: ProjectDifficulty;
  readonly required_skills: readonly string[];
}

/**
 * A proposed portfolio project.
 */
export interface ProjectProposal {
  readonly title: string;
  readonly summary: string;
  readonly deliverables: readonly string[];
  readonly feasibility: ProjectFeasibility;
  readonly success_criteria: readonly string[];
}

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

/**
 * Which submission is being evaluated. Each lens has its own rubric.
 */
export type EvaluationLens = 'problem' | 'solution';

export type Verdict = 'APPROVED' | 'NEEDS_REVISION';

export interface EvaluatorInput {
  readonly lens: EvaluationLens;
  readonly submission: string;
  readonly profile: LearnerProfile;
  readonly project_title: string;
  /** The approved problem statement, for the solution lens. */
  readonly problem_statement: string | null;
}

/**
 * A scored submission. The verdict is derived from the scores by the core,
 * never taken from the model.
 */
export interface Evaluation {
  readonly verdict: Verdict;
  /** Rubric key to score, each clamped to [0, 10]. */
  readonly scores: Readonly<Record<string, number>>;
  readonly mean_score: number;
  readonly feedback: string;
  readonly suggestions: readonly string[];
  /** Solution lens only: the problem statement itself needs rework. */
  readonly revisit_problem: boolean;
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export type MilestoneStatus = 'not_started' | 'in_progress' | 'completed' | 'blocked';

export interface Milestone {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly deliverable: string;
  /** 1-based position in the plan. */
  readonly order: number;
  readonly status: MilestoneStatus;
  readonly estimated_days: number;
}

export const MIN_MILESTONES = 3;
export const MAX_MILESTONES = 7;

export type ProgressInput =
  | {
      readonly mode: 'plan';
      readonly profile: LearnerProfile;
      readonly project: ProjectProposal;
      readonly solution_approach: string;
    }
  | {
      readonly mode: 'update';
      readonly project_title: string;
      readonly milestone: Milestone;
      readonly update_text: string;
    };

export type ProgressOutput =
  | { readonly mode: 'plan'; readonly milestones: readonly Milestone[] }
  | {
      readonly mode: 'update';
      readonly feedback: string;
      /** Exactly one concrete next step. */
      readonly next_action: string;
      readonly milestone_status: MilestoneStatus;
      /** Set when the update shows no movement since the last one. */
      readonly stagnation_detected: boolean;
      readonly stagnation_reason: string | null;
      readonly tips: readonly string[];
    };

// ---------------------------------------------------------------------------
// Reviewer
// ---------------------------------------------------------------------------

export interface ArtifactReview {
  readonly overall_score: number;
  readonly overall_feedback: string;
  readonly criterion_scores: Readonly<Record<string, number>>;
  readonly strengths: readonly string[];
  readonly areas_for_improvement: readonly string[];
  readonly skills_demonstrated: readonly string[];
}

export interface ResumeBullet {
  readonly text: string;
  readonly skills: readonly string[];
  /** A passage of the submitted work that supports the bullet. */
  readonly evidence: string;
}

export interface ResumePackage {
  readonly title: string;
  readonly one_liner: string;
  readonly bullets: readonly ResumeBullet[];
  readonly suggested_skills: readonly string[];
  readonly talking_points: readonly string[];
}

export const MIN_RESUME_BULLETS = 3;
export const MAX_RESUME_BULLETS = 5;

export type ReviewerInput =
  | {
      readonly mode: 'review';
      readonly profile: LearnerProfile;
      readonly project: ProjectProposal;
      readonly submitted_text: string;
    }
  | {
      readonly mode: 'resume';
      readonly profile: LearnerProfile;
      readonly project: ProjectProposal;
      readonly review: ArtifactReview;
      readonly submitted_text: string;
    };

export type ReviewerOutput =
  | ({ readonly mode: 'review' } & ArtifactReview)
  | ({ readonly mode: 'resume' } & ResumePackage);

// ---------------------------------------------------------------------------
// Agent set
// ---------------------------------------------------------------------------

export type RelayAgent = Agent<RelayInput, RelayOutput>;
export type GeneratorAgent = Agent<GeneratorInput, ProjectProposal>;
export type EvaluatorAgent = Agent<EvaluatorInput, Evaluation>;
export type ProgressAgent = Agent<ProgressInput, ProgressOutput>;
export type ReviewerAgent = Agent<ReviewerInput, ReviewerOutput>;

/**
 * One implementation per capability.
 */
export interface AgentSet {
  readonly relay: RelayAgent;
  readonly generator: GeneratorAgent;
  readonly evaluator: EvaluatorAgent;
  readonly progress: ProgressAgent;
  readonly reviewer: ReviewerAgent;
}
