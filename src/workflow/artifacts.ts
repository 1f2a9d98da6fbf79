/**
 * Domain artifact contents and typed access to their latest versions.
 *
 * @packageDocumentation
 */

import type {
  ArtifactReview,
  Evaluation,
  Milestone,
  ProjectProposal,
  ResumePackage,
} from '../agents/types.js';
import type { AuditLog } from './persistence.js';
import { JourneyPersistenceError } from './persistence.js';
import type { ArtifactKind, ArtifactRecord } from './types.js';

export interface ProblemDefinitionContent {
  readonly statement: string;
  readonly evaluation: Evaluation;
}

export interface SolutionDesignContent {
  readonly approach: string;
  readonly evaluation: Evaluation;
}

export interface MilestonePlanContent {
  readonly milestones: readonly Milestone[];
}

export interface ArtifactReviewContent extends ArtifactReview {
  /** The work text the review scored; resume evidence is checked against it. */
  readonly submitted_text: string;
}

/**
 * Content type stored under each artifact kind.
 */
export interface ArtifactContentMap {
  project: ProjectProposal;
  problem_definition: ProblemDefinitionContent;
  solution_design: SolutionDesignContent;
  milestone_plan: MilestonePlanContent;
  artifact_review: ArtifactReviewContent;
  resume_package: ResumePackage;
}

/**
 * An artifact version a handler wants stored. The orchestrator adds the
 * owner and the timestamp when it commits.
 */
export type ArtifactDraft = {
  [K in ArtifactKind]: {
    readonly kind: K;
    readonly artifact_id: string;
    readonly version: number;
    readonly revision_cycle: number;
    readonly content: ArtifactContentMap[K];
  };
}[ArtifactKind];

// ---------------------------------------------------------------------------
// Content guards
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isEvaluation(value: unknown): value is Evaluation {
  return (
    isRecord(value) &&
    (value['verdict'] === 'APPROVED' || value['verdict'] === 'NEEDS_REVISION') &&
    isRecord(value['scores']) &&
    typeof value['mean_score'] === 'number' &&
    typeof value['feedback'] === 'string' &&
    isStringArray(value['suggestions'])
  );
}

function isMilestone(value: unknown): value is Milestone {
  return (
    isRecord(value) &&
    typeof value['id'] === 'string' &&
    typeof value['title'] === 'string' &&
    typeof value['order'] === 'number' &&
    typeof value['status'] === 'string'
  );
}

const CONTENT_GUARDS: {
  readonly [K in ArtifactKind]: (value: unknown) => value is ArtifactContentMap[K];
} = {
  project: (value): value is ProjectProposal =>
    isRecord(value) &&
    typeof value['title'] === 'string' &&
    typeof value['summary'] === 'string' &&
    isStringArray(value['deliverables']) &&
    isRecord(value['feasibility']),
  problem_definition: (value): value is ProblemDefinitionContent =>
    isRecord(value) && typeof value['statement'] === 'string' && isEvaluation(value['evaluation']),
  solution_design: (value): value is SolutionDesignContent =>
    isRecord(value) && typeof value['approach'] === 'string' && isEvaluation(value['evaluation']),
  milestone_plan: (value): value is MilestonePlanContent => {
    if (!isRecord(value)) {
      return false;
    }
    const milestones = value['milestones'];
    return Array.isArray(milestones) && milestones.every(isMilestone);
  },
  artifact_review: (value): value is ArtifactReviewContent =>
    isRecord(value) &&
    typeof value['overall_score'] === 'number' &&
    typeof value['submitted_text'] === 'string',
  resume_package: (value): value is ResumePackage =>
    isRecord(value) && typeof value['title'] === 'string' && Array.isArray(value['bullets']),
};

/**
 * Whether a stored record's content has the shape of its kind.
 */
export function hasContentOf<K extends ArtifactKind>(
  kind: K,
  record: ArtifactRecord
): record is ArtifactRecord<ArtifactContentMap[K]> {
  return record.kind === kind && CONTENT_GUARDS[kind](record.content);
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/**
 * Read access to a user's artifacts, as handlers see it.
 */
export interface ArtifactReader {
  /** The newest version of `kind`, or undefined if none was produced. */
  latest<K extends ArtifactKind>(
    kind: K
  ): Promise<ArtifactRecord<ArtifactContentMap[K]> | undefined>;
  /** Every version of `kind`, oldest first. */
  all<K extends ArtifactKind>(kind: K): Promise<readonly ArtifactRecord<ArtifactContentMap[K]>[]>;
}

/**
 * Creates a reader over one user's audit log.
 *
 * @throws JourneyPersistenceError with `corruption_error` when a stored record
 * does not match its kind.
 */
export function createArtifactReader(log: AuditLog, userId: string): ArtifactReader {
  const all = async <K extends ArtifactKind>(
    kind: K
  ): Promise<readonly ArtifactRecord<ArtifactContentMap[K]>[]> => {
    const records = await log.listArtifacts(userId, kind);
    return records.map((record) => {
      if (!hasContentOf(kind, record)) {
        const label = `${kind} artifact "${record.artifact_id}" v${String(record.version)}`;
        throw new JourneyPersistenceError(
          `Stored ${label} has an unexpected shape`,
          'corruption_error'
        );
      }
      return record;
    });
  };

  return {
    all,
    latest: async <K extends ArtifactKind>(
      kind: K
    ): Promise<ArtifactRecord<ArtifactContentMap[K]> | undefined> => {
      const records = await all(kind);
      return records[records.length - 1];
    },
  };
}

/**
 * Id and version for the next stored version of an artifact: the latest
 * record's id one version up, or a fresh id at version 1.
 */
export function nextVersionOf(
  latest: ArtifactRecord | undefined,
  newId: () => string
): { readonly artifact_id: string; readonly version: number } {
  if (latest === undefined) {
    return { artifact_id: newId(), version: 1 };
  }
  return { artifact_id: latest.artifact_id, version: latest.version + 1 };
}
