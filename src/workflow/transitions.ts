/**
 * Journey state machine.
 *
 * Pure decision logic over {@link UserState}:
 * - the fixed forward sequence onboarding → ... → completed
 * - a closed table of revision (backward) edges, legal only once unlocked by
 *   a NEEDS_REVISION verdict
 * - the fields that must be populated before a phase may be left
 *
 * Nothing here performs I/O. {@link apply} returns a new record or an error
 * and never mutates its input.
 *
 * @packageDocumentation
 */

import {
  JOURNEY_PHASES,
  type JourneyPhase,
  type RevisionEdge,
  type UserState,
} from './types.js';

/**
 * Valid forward transitions. Each phase has exactly one successor except the
 * terminal phase, which has none.
 */
export const FORWARD_TRANSITIONS: ReadonlyMap<JourneyPhase, JourneyPhase> = new Map([
  ['onboarding', 'project_generation'],
  ['project_generation', 'problem_definition'],
  ['problem_definition', 'solution_design'],
  ['solution_design', 'execution'],
  ['execution', 'review'],
  ['review', 'completed'],
]);

/**
 * Declared revision edges. The table is closed: only a solution that the
 * evaluator sends back can reopen the problem definition.
 */
export const REVISION_TRANSITIONS: ReadonlyMap<JourneyPhase, readonly JourneyPhase[]> = new Map([
  ['solution_design', ['problem_definition']],
]);

/**
 * Names of state fields that gate forward transitions.
 */
export type RequiredField =
  | 'target_role'
  | 'target_domain'
  | 'project_id'
  | 'project_approved'
  | 'problem_id'
  | 'problem_approved'
  | 'solution_id'
  | 'solution_approved'
  | 'milestone_plan_id'
  | 'milestones_completed'
  | 'review_id'
  | 'resume_id';

/**
 * Fields that must be populated before leaving each phase.
 */
export const REQUIRED_FIELDS: ReadonlyMap<JourneyPhase, readonly RequiredField[]> = new Map([
  ['onboarding', ['target_role', 'target_domain']],
  ['project_generation', ['project_id', 'project_approved']],
  ['problem_definition', ['problem_id', 'problem_approved']],
  ['solution_design', ['solution_id', 'solution_approved']],
  ['execution', ['milestone_plan_id', 'milestones_completed']],
  ['review', ['review_id', 'resume_id']],
  ['completed', []],
]);

/**
 * Error codes for transition failures.
 */
export type TransitionErrorCode =
  | 'INVALID_TRANSITION' // (from, to) is not a declared edge
  | 'MISSING_REQUIRED_FIELDS' // forward edge, but required fields are unpopulated
  | 'REVISION_NOT_UNLOCKED' // declared revision edge without a NEEDS_REVISION unlock
  | 'ALREADY_COMPLETE' // the record is in the terminal phase
  | 'SAME_STATE'; // from === to

/**
 * Error returned when a transition is rejected.
 */
export interface TransitionError {
  readonly code: TransitionErrorCode;
  readonly message: string;
  readonly fromPhase: JourneyPhase;
  readonly toPhase: JourneyPhase;
  readonly missingFields?: readonly RequiredField[];
}

/**
 * Result of a transition attempt.
 */
export type TransitionResult =
  | { readonly success: true; readonly state: UserState }
  | { readonly success: false; readonly error: TransitionError };

/**
 * Options for {@link apply}.
 */
export interface ApplyOptions {
  /** Commit time, recorded as `state_entered_at`. */
  readonly now?: Date;
}

function createTransitionError(
  code: TransitionErrorCode,
  message: string,
  fromPhase: JourneyPhase,
  toPhase: JourneyPhase,
  missingFields?: readonly RequiredField[]
): TransitionError {
  if (missingFields !== undefined) {
    return { code, message, fromPhase, toPhase, missingFields };
  }
  return { code, message, fromPhase, toPhase };
}

/**
 * Fields that must be populated before leaving `state`.
 *
 * @param state - The phase being left.
 */
export function requiredFields(state: JourneyPhase): ReadonlySet<RequiredField> {
  return new Set(REQUIRED_FIELDS.get(state) ?? []);
}

/**
 * Whether a required field counts as populated on `record`.
 *
 * Strings must be non-empty, flags must be true. `milestones_completed` is
 * populated once every milestone of a non-empty plan is complete.
 */
export function isFieldPopulated(record: UserState, field: RequiredField): boolean {
  switch (field) {
    case 'project_approved':
    case 'problem_approved':
    case 'solution_approved':
      return record[field];
    case 'milestones_completed':
      return record.total_milestones > 0 && record.milestones_completed >= record.total_milestones;
    default: {
      const value = record[field];
      return value !== null && value !== '';
    }
  }
}

/**
 * Required fields of `state` that are not populated on `record`.
 */
export function missingFields(record: UserState, state: JourneyPhase): readonly RequiredField[] {
  return [...requiredFields(state)].filter((field) => !isFieldPopulated(record, field));
}

/**
 * Checks if `(from, to)` is the declared forward edge.
 */
export function isForwardTransition(from: JourneyPhase, to: JourneyPhase): boolean {
  return FORWARD_TRANSITIONS.get(from) === to;
}

/**
 * Checks if `(from, to)` is a declared revision edge.
 */
export function isRevisionTransition(from: JourneyPhase, to: JourneyPhase): boolean {
  return REVISION_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * Checks whether a transition is structurally permitted.
 *
 * @param from - Source phase.
 * @param to - Target phase.
 * @param unlocked - The revision edge opened by the last NEEDS_REVISION verdict, if any.
 * @returns True for a declared forward edge, or for a declared revision edge equal to `unlocked`.
 */
export function canTransition(
  from: JourneyPhase,
  to: JourneyPhase,
  unlocked?: RevisionEdge | null
): boolean {
  if (isForwardTransition(from, to)) {
    return true;
  }
  return (
    isRevisionTransition(from, to) &&
    unlocked !== undefined &&
    unlocked !== null &&
    unlocked.from === from &&
    unlocked.to === to
  );
}

/**
 * Applies a transition to a state record.
 *
 * Forward edges require every field in `requiredFields(current_state)` to be
 * populated. Revision edges require the record's `revision_unlocked` to name
 * the edge; the unlock is consumed by the transition.
 *
 * @param record - Current state record (not modified).
 * @param to - Target phase.
 * @param options - Apply options.
 * @returns The new record, or the reason the transition was rejected.
 *
 * @example
 * ```typescript
 * const result = apply(state, 'project_generation');
 * if (!result.success) {
 *   console.log(result.error.missingFields); // ['target_domain']
 * }
 * ```
 */
export function apply(
  record: UserState,
  to: JourneyPhase,
  options: ApplyOptions = {}
): TransitionResult {
  const from = record.current_state;

  if (from === 'completed') {
    return {
      success: false,
      error: createTransitionError(
        'ALREADY_COMPLETE',
        'The journey is already complete',
        from,
        to
      ),
    };
  }

  if (from === to) {
    return {
      success: false,
      error: createTransitionError('SAME_STATE', `Already in phase '${from}'`, from, to),
    };
  }

  if (isForwardTransition(from, to)) {
    const missing = missingFields(record, from);
    if (missing.length > 0) {
      return {
        success: false,
        error: createTransitionError(
          'MISSING_REQUIRED_FIELDS',
          `Cannot leave '${from}': missing ${missing.join(', ')}`,
          from,
          to,
          missing
        ),
      };
    }
  } else if (isRevisionTransition(from, to)) {
    if (!canTransition(from, to, record.revision_unlocked)) {
      return {
        success: false,
        error: createTransitionError(
          'REVISION_NOT_UNLOCKED',
          `Revision '${from}' -> '${to}' requires a NEEDS_REVISION verdict`,
          from,
          to
        ),
      };
    }
  } else {
    return {
      success: false,
      error: createTransitionError(
        'INVALID_TRANSITION',
        getInvalidTransitionMessage(from, to),
        from,
        to
      ),
    };
  }

  const now = (options.now ?? new Date()).toISOString();
  return {
    success: true,
    state: {
      ...record,
      current_state: to,
      previous_state: from,
      state_entered_at: now,
      last_activity_at: now,
      revision_unlocked: null,
    },
  };
}

/**
 * Gets phases reachable from `phase`, forward edge first.
 *
 * @param phase - Source phase.
 * @param unlocked - Currently unlocked revision edge, if any.
 */
export function getValidTransitions(
  phase: JourneyPhase,
  unlocked?: RevisionEdge | null
): readonly JourneyPhase[] {
  return JOURNEY_PHASES.filter((candidate) => canTransition(phase, candidate, unlocked));
}

/**
 * Gets the forward successor of a phase.
 *
 * @returns The next phase, or undefined for the terminal phase.
 */
export function getNextPhase(phase: JourneyPhase): JourneyPhase | undefined {
  return FORWARD_TRANSITIONS.get(phase);
}

/**
 * Checks if a phase has no outgoing edges.
 */
export function isTerminal(phase: JourneyPhase): boolean {
  return getNextPhase(phase) === undefined && (REVISION_TRANSITIONS.get(phase) ?? []).length === 0;
}

/**
 * Builds a message describing an undeclared transition.
 */
export function getInvalidTransitionMessage(from: JourneyPhase, to: JourneyPhase): string {
  const next = getNextPhase(from);
  const reachable = next !== undefined ? `'${next}'` : 'no phase';
  return `Invalid transition from '${from}' to '${to}'; '${from}' can only advance to ${reachable}`;
}
