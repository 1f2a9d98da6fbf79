/**
 * Evaluator agent for problem statements and solution approaches.
 *
 * The model supplies rubric scores and prose; the verdict is computed from
 * the scores by {@link decideVerdict}, whatever the model says.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { decideVerdict, meanScore, normalizeLensScores, roundScore } from './evaluation.js';
import { ModelAgent } from './model-agent.js';
import type { AgentContext, AgentOutcome, Evaluation, EvaluatorInput } from './types.js';

interface RawEvaluation {
  readonly scores: Readonly<Record<string, number>>;
  readonly feedback: string;
  readonly suggestions: readonly string[];
  readonly revisit_problem?: boolean;
}

const checkEvaluation = createSchemaCheck<RawEvaluation>('evaluation-output');

export class SubmissionEvaluator extends ModelAgent<EvaluatorInput, Evaluation> {
  readonly name = 'submission_evaluator';
  readonly capability = 'evaluator' as const;

  async generate(input: EvaluatorInput, context: AgentContext): Promise<AgentOutcome<Evaluation>> {
    const system =
      input.lens === 'problem' ? this.prompts.evaluator_problem : this.prompts.evaluator_solution;
    const outcome = await this.request(
      system,
      input,
      context,
      checkEvaluation,
      `${input.lens} evaluation`
    );
    if (outcome.kind === 'malformed') {
      return outcome;
    }

    const scores = normalizeLensScores(input.lens, outcome.output.scores);
    if (scores.kind === 'malformed') {
      return { kind: 'malformed', reason: `${input.lens} evaluation: ${scores.reason}` };
    }

    return {
      kind: 'ok',
      output: {
        verdict: decideVerdict(scores.output),
        scores: scores.output,
        mean_score: roundScore(meanScore(scores.output)),
        feedback: outcome.output.feedback,
        suggestions: outcome.output.suggestions,
        // Only a solution can send the user back to the problem statement.
        revisit_problem: input.lens === 'solution' && outcome.output.revisit_problem === true,
      },
    };
  }
}
