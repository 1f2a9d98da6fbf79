/**
 * Journey state types for the conversation orchestrator.
 *
 * Defines the seven journey phases, the per-user state record, and the
 * immutable audit records (transitions, conversation entries, artifacts).
 * Persisted records use snake_case field names.
 *
 * @packageDocumentation
 */

/**
 * All journey phases in execution order.
 *
 * @remarks
 * - onboarding: collecting target role, domain, background and interests
 * - project_generation: proposing a portfolio project and awaiting approval
 * - problem_definition: the user writes the problem statement, the evaluator scores it
 * - solution_design: the user writes the solution approach, the evaluator scores it
 * - execution: working through a milestone plan
 * - review: reviewing submitted work and producing resume content
 * - completed: terminal
 */
export type JourneyPhase =
  | 'onboarding'
  | 'project_generation'
  | 'problem_definition'
  | 'solution_design'
  | 'execution'
  | 'review'
  | 'completed';

/**
 * Array of all journey phases in execution order.
 */
export const JOURNEY_PHASES = [
  'onboarding',
  'project_generation',
  'problem_definition',
  'solution_design',
  'execution',
  'review',
  'completed',
] as const satisfies readonly JourneyPhase[];

/**
 * The initial phase of every new user.
 */
export const INITIAL_PHASE: JourneyPhase = 'onboarding';

/**
 * Which user input the current phase expects next.
 */
export type PendingInput =
  | 'role'
  | 'domain'
  | 'background'
  | 'interests'
  | 'project_approval'
  | 'problem_submission'
  | 'solution_submission'
  | 'progress_update'
  | 'artifacts'
  | 'resume_approval';

/**
 * A backward edge permitted only after a NEEDS_REVISION verdict.
 */
export interface RevisionEdge {
  readonly from: JourneyPhase;
  readonly to: JourneyPhase;
}

/**
 * Revision counter per phase.
 */
export type RevisionCounters = Readonly<Record<JourneyPhase, number>>;

/**
 * The per-user state record. Owned and mutated only by the orchestrator.
 */
export interface UserState {
  readonly user_id: string;
  readonly current_state: JourneyPhase;
  readonly previous_state: JourneyPhase | null;
  /** ISO 8601 timestamp of the last committed transition (or creation). */
  readonly state_entered_at: string;
  readonly last_activity_at: string;

  readonly target_role: string | null;
  readonly target_domain: string | null;
  readonly background: string | null;
  readonly interests: string | null;

  readonly project_id: string | null;
  readonly project_approved: boolean;
  readonly problem_id: string | null;
  readonly problem_approved: boolean;
  readonly solution_id: string | null;
  readonly solution_approved: boolean;
  readonly milestone_plan_id: string | null;
  readonly current_milestone_id: string | null;
  readonly milestones_completed: number;
  readonly total_milestones: number;
  readonly review_id: string | null;
  readonly resume_id: string | null;

  /** True after a NEEDS_REVISION verdict, until the next evaluated submission. */
  readonly awaiting_feedback: boolean;
  readonly awaiting: PendingInput | null;
  readonly revisions: RevisionCounters;
  readonly revision_unlocked: RevisionEdge | null;

  /** Incremented on every committed mutation. */
  readonly version: number;
}

/**
 * Fields a handler may change. Identity, phase bookkeeping and the version
 * counter are reserved for the state machine and the orchestrator.
 */
export type UserStateUpdates = Partial<
  Omit<
    UserState,
    'user_id' | 'current_state' | 'previous_state' | 'state_entered_at' | 'version'
  >
>;

/**
 * Immutable record of a proposed transition.
 */
export interface StateTransition {
  readonly user_id: string;
  readonly from_state: JourneyPhase;
  readonly to_state: JourneyPhase;
  readonly timestamp: string;
  readonly accepted: boolean;
  readonly reason: string;
}

/**
 * What a conversation entry records.
 */
export type ConversationEntryKind = 'message' | 'response' | 'agent_failure' | 'system_failure';

/**
 * Append-only conversation log entry.
 */
export interface ConversationLogEntry {
  readonly timestamp: string;
  readonly actor: 'user' | 'agent';
  readonly agent_name?: string;
  readonly kind: ConversationEntryKind;
  readonly payload: string;
  readonly state_at_time: JourneyPhase;
}

/**
 * Kinds of durable domain artifact.
 */
export type ArtifactKind =
  | 'project'
  | 'problem_definition'
  | 'solution_design'
  | 'milestone_plan'
  | 'artifact_review'
  | 'resume_package';

export const ARTIFACT_KINDS = [
  'project',
  'problem_definition',
  'solution_design',
  'milestone_plan',
  'artifact_review',
  'resume_package',
] as const satisfies readonly ArtifactKind[];

/**
 * One stored version of a domain artifact. Later versions supersede
 * earlier ones; nothing is deleted.
 */
export interface ArtifactRecord<C = unknown> {
  readonly artifact_id: string;
  readonly user_id: string;
  readonly kind: ArtifactKind;
  readonly version: number;
  /** Value of the owning phase's revision counter when this version was produced. */
  readonly revision_cycle: number;
  readonly created_at: string;
  readonly content: C;
}

/**
 * Checks if a value is a valid journey phase.
 *
 * @param value - Value to check.
 * @returns True if the value is a JourneyPhase.
 */
export function isJourneyPhase(value: unknown): value is JourneyPhase {
  return JOURNEY_PHASES.some((phase) => phase === value);
}

/**
 * Checks if a value is a valid artifact kind.
 */
export function isArtifactKind(value: unknown): value is ArtifactKind {
  return ARTIFACT_KINDS.some((kind) => kind === value);
}

/**
 * Gets the position of a phase in the journey.
 */
export function getPhaseIndex(phase: JourneyPhase): number {
  return JOURNEY_PHASES.indexOf(phase);
}

/**
 * Creates a revision counter record with every phase at zero.
 */
export function createRevisionCounters(): RevisionCounters {
  return {
    onboarding: 0,
    project_generation: 0,
    problem_definition: 0,
    solution_design: 0,
    execution: 0,
    review: 0,
    completed: 0,
  };
}

/**
 * Creates the state record of a user on first contact.
 *
 * @param userId - The user's id.
 * @param now - Creation time.
 * @returns A new record in the initial phase, awaiting the target role.
 */
export function createUserState(userId: string, now: Date = new Date()): UserState {
  const timestamp = now.toISOString();
  return {
    user_id: userId,
    current_state: INITIAL_PHASE,
    previous_state: null,
    state_entered_at: timestamp,
    last_activity_at: timestamp,
    target_role: null,
    target_domain: null,
    background: null,
    interests: null,
    project_id: null,
    project_approved: false,
    problem_id: null,
    problem_approved: false,
    solution_id: null,
    solution_approved: false,
    milestone_plan_id: null,
    current_milestone_id: null,
    milestones_completed: 0,
    total_milestones: 0,
    review_id: null,
    resume_id: null,
    awaiting_feedback: false,
    awaiting: 'role',
    revisions: createRevisionCounters(),
    revision_unlocked: null,
    version: 0,
  };
}
