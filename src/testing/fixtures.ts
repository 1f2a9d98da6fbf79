/**
 * Model replies used across tests, as the JSON text a backend would return.
 *
 * @packageDocumentation
 */

import type { MilestoneStatus, ProjectProposal } from '../agents/types.js';

export const PROPOSAL: ProjectProposal = {
  title: 'Churn Insights Dashboard',
  summary: 'Analyse subscription churn for a small fintech app and present the drivers.',
  deliverables: ['Problem brief', 'Churn analysis notebook', 'Stakeholder dashboard'],
  feasibility: {
    estimated_weeks: 4,
    difficulty: 'intermediate',
    required_skills: ['SQL', 'product analytics'],
  },
  success_criteria: ['Top three churn drivers identified'],
};

export function proposalReply(title = PROPOSAL.title): string {
  return JSON.stringify({ ...PROPOSAL, title });
}

export interface EvaluationReplyOptions {
  readonly feedback?: string;
  readonly suggestions?: readonly string[];
  readonly revisitProblem?: boolean;
}

export function problemEvaluationReply(
  scores: { market_relevance: number; clarity: number; feasibility: number },
  options: EvaluationReplyOptions = {}
): string {
  return JSON.stringify({
    scores,
    feedback: options.feedback ?? 'Clear statement of the problem.',
    suggestions: options.suggestions ?? ['Quantify the impact'],
  });
}

export function solutionEvaluationReply(
  scores: {
    logical_coherence: number;
    innovation: number;
    implementation_feasibility: number;
    impact_potential: number;
  },
  options: EvaluationReplyOptions = {}
): string {
  return JSON.stringify({
    scores,
    feedback: options.feedback ?? 'The approach follows from the problem.',
    suggestions: options.suggestions ?? ['Name a success metric'],
    revisit_problem: options.revisitProblem ?? false,
  });
}

export function planReply(count = 3): string {
  return JSON.stringify({
    milestones: Array.from({ length: count }, (_, index) => ({
      title: `Milestone ${String(index + 1)}`,
      description: `Work package ${String(index + 1)}`,
      deliverable: `Deliverable ${String(index + 1)}`,
      estimated_days: 3,
    })),
  });
}

export function updateReply(
  status: MilestoneStatus,
  nextAction = 'Write up the findings',
  coaching: Readonly<Record<string, unknown>> = {}
): string {
  return JSON.stringify({
    feedback: 'Good progress.',
    next_action: nextAction,
    milestone_status: status,
    ...coaching,
  });
}

export function reviewReply(overallScore = 8): string {
  return JSON.stringify({
    overall_score: overallScore,
    overall_feedback: 'Solid, well-documented work.',
    criterion_scores: { depth: 8, communication: 7 },
    strengths: ['Clear metrics'],
    areas_for_improvement: ['Add a retention experiment'],
    skills_demonstrated: ['SQL', 'storytelling'],
  });
}

/**
 * Submitted work whose sentences back the bullets of {@link resumeReply}.
 */
export const SUBMITTED_WORK =
  'I built a churn dashboard in Metabase. I interviewed 12 customers about cancellations. ' +
  'I reduced the weekly reporting time from 3 hours to 20 minutes.';

export function resumeReply(evidence: readonly string[] = [
  'built a churn dashboard in Metabase',
  'interviewed 12 customers about cancellations',
  'reduced the weekly reporting time from 3 hours to 20 minutes',
]): string {
  return JSON.stringify({
    title: 'Churn Insights Dashboard',
    one_liner: 'Found what drives subscription churn.',
    bullets: evidence.map((passage, index) => ({
      text: `Bullet ${String(index + 1)}`,
      skills: ['analytics'],
      evidence: passage,
    })),
    suggested_skills: ['Metabase'],
    talking_points: ['How the interviews shaped the dashboard'],
  });
}
