/**
 * No-inflation check for generated resume content.
 *
 * Every resume bullet cites a passage of the user's submitted work as its
 * evidence. A bullet whose evidence does not occur in that work is an
 * unsupported claim.
 *
 * @packageDocumentation
 */

import type { ResumeBullet } from './types.js';

/**
 * Lower-cases and collapses runs of whitespace to single spaces.
 */
export function normalizeForComparison(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Whether `evidence` occurs in `sourceText`, ignoring case and whitespace differences.
 */
export function isSupportedBy(evidence: string, sourceText: string): boolean {
  const needle = normalizeForComparison(evidence);
  return needle !== '' && normalizeForComparison(sourceText).includes(needle);
}

/**
 * Bullets whose evidence is not found in the submitted work.
 */
export function findUnsupportedClaims(
  bullets: readonly ResumeBullet[],
  sourceText: string
): readonly ResumeBullet[] {
  return bullets.filter((bullet) => !isSupportedBy(bullet.evidence, sourceText));
}
