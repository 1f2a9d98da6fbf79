/**
 * Agent contracts and implementations.
 *
 * @packageDocumentation
 */

// Contracts
export type {
  Agent,
  AgentCapability,
  AgentContext,
  AgentOutcome,
  AgentSet,
  ArtifactReview,
  Evaluation,
  EvaluationLens,
  EvaluatorAgent,
  EvaluatorInput,
  GeneratorAgent,
  GeneratorInput,
  LearnerProfile,
  Milestone,
  MilestoneStatus,
  ProgressAgent,
  ProgressInput,
  ProgressOutput,
  ProjectDifficulty,
  ProjectFeasibility,
  ProjectProposal,
  RelayAgent,
  RelayInput,
  RelayOutput,
  RelayTemplate,
  ResumeBullet,
  ResumePackage,
  ReviewerAgent,
  ReviewerInput,
  ReviewerOutput,
  Verdict,
} from './types.js';
export {
  AGENT_CAPABILITIES,
  MAX_MILESTONES,
  MAX_RESUME_BULLETS,
  MIN_MILESTONES,
  MIN_RESUME_BULLETS,
  RELAY_TEMPLATES,
} from './types.js';

// Scoring and checks
export {
  APPROVAL_MEAN_THRESHOLD,
  APPROVAL_MIN_THRESHOLD,
  LENS_CRITERIA,
  clampScore,
  decideVerdict,
  meanScore,
  normalizeLensScores,
  roundScore,
} from './evaluation.js';
export { findUnsupportedClaims, isSupportedBy, normalizeForComparison } from './evidence.js';
export { extractJson, parseModelOutput } from './output.js';

// Text
export type { MessageTemplates, ResponseTemplate, TemplateVariables } from './templates.js';
export {
  MessageCatalog,
  RESPONSE_TEMPLATES,
  TemplateError,
  bulletList,
  loadMessageTemplates,
  numberedList,
  renderTemplate,
} from './templates.js';
export type { AgentPrompts } from './prompts.js';
export { PromptLoadError, loadAgentPrompts } from './prompts.js';

// Implementations
export type { ModelAgentOptions } from './model-agent.js';
export { ModelAgent, buildPayload } from './model-agent.js';
export { TemplateRelay } from './template-relay.js';
export { ModelRelay } from './model-relay.js';
export { ProjectGenerator } from './generator.js';
export { SubmissionEvaluator } from './evaluator.js';
export { ProgressCoach, toMilestones } from './progress.js';
export { WorkReviewer } from './reviewer.js';

// Registry
export type { CreateAgentSetOptions, RelayMode } from './registry.js';
export {
  CapabilityNotFoundError,
  PHASE_CAPABILITY,
  PHASE_LENS,
  createAgentSet,
  getPhaseCapability,
  getPhasesForCapability,
} from './registry.js';
