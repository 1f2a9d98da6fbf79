/**
 * Reviewer agent: scores submitted work and writes resume content from it.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { clampScore, roundScore } from './evaluation.js';
import { findUnsupportedClaims } from './evidence.js';
import { ModelAgent } from './model-agent.js';
import type {
  AgentContext,
  AgentOutcome,
  ArtifactReview,
  ResumePackage,
  ReviewerInput,
  ReviewerOutput,
} from './types.js';

const checkReview = createSchemaCheck<ArtifactReview>('artifact-review-output');
const checkResume = createSchemaCheck<ResumePackage>('resume-output');

function clampScores(scores: Readonly<Record<string, number>>): Record<string, number> {
  return Object.fromEntries(
    Object.entries(scores).map(([criterion, score]) => [criterion, clampScore(score)])
  );
}

export class WorkReviewer extends ModelAgent<ReviewerInput, ReviewerOutput> {
  readonly name = 'work_reviewer';
  readonly capability = 'reviewer' as const;

  async generate(
    input: ReviewerInput,
    context: AgentContext
  ): Promise<AgentOutcome<ReviewerOutput>> {
    if (input.mode === 'review') {
      const review = await this.request(
        this.prompts.reviewer_review,
        input,
        context,
        checkReview,
        'artifact review'
      );
      if (review.kind === 'malformed') {
        return review;
      }
      return {
        kind: 'ok',
        output: {
          mode: 'review',
          ...review.output,
          overall_score: roundScore(clampScore(review.output.overall_score)),
          criterion_scores: clampScores(review.output.criterion_scores),
        },
      };
    }

    const resume = await this.request(
      this.prompts.reviewer_resume,
      input,
      context,
      checkResume,
      'resume package'
    );
    if (resume.kind === 'malformed') {
      return resume;
    }

    // No inflation: each bullet must be backed by the user's own words.
    const unsupported = findUnsupportedClaims(resume.output.bullets, input.submitted_text);
    if (unsupported.length > 0) {
      return {
        kind: 'malformed',
        reason: `resume package: ${String(unsupported.length)} bullet(s) cite evidence not found in the submitted work`,
      };
    }
    return { kind: 'ok', output: { mode: 'resume', ...resume.output } };
  }
}
