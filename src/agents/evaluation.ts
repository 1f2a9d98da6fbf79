/**
 * Evaluation rubrics and the approval rule.
 *
 * The verdict is always derived here from the sub-scores. A submission is
 * approved when the mean score is at least 7.0 and no single score is below 6.0.
 *
 * @packageDocumentation
 */

import type { AgentOutcome, EvaluationLens, Verdict } from './types.js';

/**
 * Rubric keys scored by each lens.
 */
export const LENS_CRITERIA: Readonly<Record<EvaluationLens, readonly string[]>> = {
  problem: ['market_relevance', 'clarity', 'feasibility'],
  solution: ['logical_coherence', 'innovation', 'implementation_feasibility', 'impact_potential'],
};

export const APPROVAL_MEAN_THRESHOLD = 7.0;
export const APPROVAL_MIN_THRESHOLD = 6.0;
export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

/**
 * Clamps a score into [0, 10].
 */
export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

/**
 * Arithmetic mean of the scores, or 0 for an empty record.
 */
export function meanScore(scores: Readonly<Record<string, number>>): number {
  const values = Object.values(scores);
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Applies the approval rule.
 *
 * The mean is compared after {@link roundScore}, the same value stored and
 * shown to the user, so a decimal mean of 7.0 is never lost to float error.
 *
 * @example
 * ```typescript
 * decideVerdict({ market_relevance: 8, clarity: 7, feasibility: 6 }); // 'APPROVED'
 * decideVerdict({ market_relevance: 5, clarity: 7, feasibility: 8 }); // 'NEEDS_REVISION'
 * ```
 */
export function decideVerdict(scores: Readonly<Record<string, number>>): Verdict {
  const values = Object.values(scores);
  if (values.length === 0) {
    return 'NEEDS_REVISION';
  }
  const approved =
    roundScore(meanScore(scores)) >= APPROVAL_MEAN_THRESHOLD &&
    Math.min(...values) >= APPROVAL_MIN_THRESHOLD;
  return approved ? 'APPROVED' : 'NEEDS_REVISION';
}

/**
 * Picks the lens's rubric keys out of raw model scores and clamps them.
 * Keys outside the rubric are dropped.
 *
 * @returns The rubric scores, or malformed when a rubric key is missing or not finite.
 */
export function normalizeLensScores(
  lens: EvaluationLens,
  rawScores: Readonly<Record<string, number>>
): AgentOutcome<Readonly<Record<string, number>>> {
  const scores: Record<string, number> = {};
  const missing: string[] = [];

  for (const criterion of LENS_CRITERIA[lens]) {
    const value = rawScores[criterion];
    if (value === undefined || !Number.isFinite(value)) {
      missing.push(criterion);
    } else {
      scores[criterion] = clampScore(value);
    }
  }

  if (missing.length > 0) {
    return { kind: 'malformed', reason: `missing ${lens} scores: ${missing.join(', ')}` };
  }
  return { kind: 'ok', output: scores };
}

/**
 * Rounds a mean for display and storage.
 */
export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}
