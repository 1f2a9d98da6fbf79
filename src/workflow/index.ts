/**
 * Journey workflow: state machine, persistence, phase handlers and the
 * orchestrator.
 *
 * @packageDocumentation
 */

export type {
  ArtifactKind,
  ArtifactRecord,
  ConversationEntryKind,
  ConversationLogEntry,
  JourneyPhase,
  PendingInput,
  RevisionCounters,
  RevisionEdge,
  StateTransition,
  UserState,
  UserStateUpdates,
} from './types.js';
export {
  ARTIFACT_KINDS,
  INITIAL_PHASE,
  JOURNEY_PHASES,
  createRevisionCounters,
  createUserState,
  getPhaseIndex,
  isArtifactKind,
  isJourneyPhase,
} from './types.js';

export type {
  ApplyOptions,
  RequiredField,
  TransitionError,
  TransitionErrorCode,
  TransitionResult,
} from './transitions.js';
export {
  FORWARD_TRANSITIONS,
  REQUIRED_FIELDS,
  REVISION_TRANSITIONS,
  apply,
  canTransition,
  getNextPhase,
  getValidTransitions,
  isFieldPopulated,
  isTerminal,
  missingFields,
  requiredFields,
} from './transitions.js';

export type {
  AuditLog,
  JourneyPersistenceErrorType,
  JourneyStore,
  StateStore,
} from './persistence.js';
export {
  FileJourneyStore,
  InMemoryJourneyStore,
  JourneyPersistenceError,
  STATE_FILE_VERSION,
  deserializeUserState,
  serializeUserState,
} from './persistence.js';

export type {
  ArtifactContentMap,
  ArtifactDraft,
  ArtifactReader,
  ArtifactReviewContent,
  MilestonePlanContent,
  ProblemDefinitionContent,
  SolutionDesignContent,
} from './artifacts.js';
export { createArtifactReader, hasContentOf, nextVersionOf } from './artifacts.js';

export type { Approval, HandlerContext, HandlerOutcome, PhaseHandler } from './handlers.js';
export { PHASE_HANDLERS, parseApproval } from './handlers.js';

export type {
  ConverseReply,
  ConverseRequest,
  ConverseResult,
  CreateUserResult,
  OrchestratorDependencies,
  OrchestratorError,
  OrchestratorErrorKind,
} from './orchestrator.js';
export { Orchestrator, PHASE_ARTIFACT } from './orchestrator.js';

export type { OrchestratorOverrides } from './factory.js';
export { createOrchestrator } from './factory.js';
