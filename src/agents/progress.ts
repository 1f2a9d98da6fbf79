/**
 * Progress agent: milestone planning and coaching.
 *
 * @packageDocumentation
 */

import { createSchemaCheck } from '../utils/schema.js';
import { ModelAgent } from './model-agent.js';
import type {
  AgentContext,
  AgentOutcome,
  Milestone,
  MilestoneStatus,
  ProgressInput,
  ProgressOutput,
} from './types.js';

export interface RawMilestone {
  readonly title: string;
  readonly description: string;
  readonly deliverable: string;
  readonly estimated_days: number;
}

interface RawPlan {
  readonly milestones: readonly RawMilestone[];
}

interface RawUpdate {
  readonly feedback: string;
  readonly next_action: string;
  readonly milestone_status: MilestoneStatus;
  readonly stagnation_detected?: boolean;
  readonly stagnation_reason?: string;
  readonly tips?: readonly string[];
}

function nonBlank(text: string | undefined): string | null {
  const trimmed = text?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

const checkPlan = createSchemaCheck<RawPlan>('milestone-plan-output');
const checkUpdate = createSchemaCheck<RawUpdate>('progress-update-output');

/**
 * Gives planned milestones their ids, order and initial status.
 */
export function toMilestones(raw: readonly RawMilestone[]): readonly Milestone[] {
  return raw.map(
    (milestone, index): Milestone => ({
      id: `ms_${String(index + 1)}`,
      title: milestone.title,
      description: milestone.description,
      deliverable: milestone.deliverable,
      order: index + 1,
      status: 'not_started',
      estimated_days: milestone.estimated_days,
    })
  );
}

export class ProgressCoach extends ModelAgent<ProgressInput, ProgressOutput> {
  readonly name = 'progress_coach';
  readonly capability = 'progress' as const;

  async generate(
    input: ProgressInput,
    context: AgentContext
  ): Promise<AgentOutcome<ProgressOutput>> {
    if (input.mode === 'plan') {
      const plan = await this.request(
        this.prompts.progress_plan,
        input,
        context,
        checkPlan,
        'milestone plan'
      );
      if (plan.kind === 'malformed') {
        return plan;
      }
      return {
        kind: 'ok',
        output: { mode: 'plan', milestones: toMilestones(plan.output.milestones) },
      };
    }

    const update = await this.request(
      this.prompts.progress_update,
      input,
      context,
      checkUpdate,
      'progress update'
    );
    if (update.kind === 'malformed') {
      return update;
    }
    return {
      kind: 'ok',
      output: {
        mode: 'update',
        feedback: update.output.feedback,
        next_action: update.output.next_action.trim(),
        milestone_status: update.output.milestone_status,
        stagnation_detected: update.output.stagnation_detected ?? false,
        stagnation_reason: nonBlank(update.output.stagnation_reason),
        tips: (update.output.tips ?? []).map((tip) => tip.trim()).filter((tip) => tip.length > 0),
      },
    };
  }
}
