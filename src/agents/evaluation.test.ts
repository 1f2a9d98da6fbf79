import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  LENS_CRITERIA,
  clampScore,
  decideVerdict,
  meanScore,
  normalizeLensScores,
  roundScore,
} from './evaluation.js';

describe('evaluation', () => {
  describe('decideVerdict', () => {
    it('should approve a mean of exactly 7.0 with a minimum of 6', () => {
      expect(decideVerdict({ market_relevance: 8, clarity: 7, feasibility: 6 })).toBe('APPROVED');
    });

    it('should ask for revision when the mean is below 7.0', () => {
      expect(decideVerdict({ market_relevance: 5, clarity: 7, feasibility: 8 })).toBe(
        'NEEDS_REVISION'
      );
    });

    it('should ask for revision when one score is below 6 despite a high mean', () => {
      expect(decideVerdict({ a: 10, b: 10, c: 5.5 })).toBe('NEEDS_REVISION');
    });

    it('should approve decimal scores whose mean is exactly 7.0', () => {
      const scores = {
        logical_coherence: 6,
        innovation: 6.1,
        implementation_feasibility: 8.2,
        impact_potential: 7.7,
      };

      expect(meanScore(scores)).toBeLessThan(7);
      expect(roundScore(meanScore(scores))).toBe(7);
      expect(decideVerdict(scores)).toBe('APPROVED');
    });

    it('should approve every tenth-step set with a decimal mean of 7.0 and a minimum of 6', () => {
      fc.assert(
        fc.property(
          fc.array(fc.integer({ min: 60, max: 100 }), { minLength: 3, maxLength: 3 }),
          (tenths) => {
            const fourth = 280 - tenths.reduce((a, b) => a + b, 0);
            fc.pre(fourth >= 60 && fourth <= 100);
            const values = [...tenths, fourth].map((value) => value / 10);
            const scores = Object.fromEntries(values.map((value, index) => [`k${String(index)}`, value]));
            expect(decideVerdict(scores)).toBe('APPROVED');
          }
        )
      );
    });

    it('should never approve empty scores', () => {
      expect(decideVerdict({})).toBe('NEEDS_REVISION');
    });

    it('should approve iff mean >= 7 and min >= 6 (property-based)', () => {
      fc.assert(
        fc.property(fc.array(fc.integer({ min: 0, max: 10 }), { minLength: 1, maxLength: 4 }), (values) => {
          const scores = Object.fromEntries(values.map((value, index) => [`k${String(index)}`, value]));
          const mean = values.reduce((a, b) => a + b, 0) / values.length;
          const expected = mean >= 7 && Math.min(...values) >= 6 ? 'APPROVED' : 'NEEDS_REVISION';
          expect(decideVerdict(scores)).toBe(expected);
        })
      );
    });
  });

  describe('clampScore', () => {
    it('should clamp into [0, 10]', () => {
      expect(clampScore(-3)).toBe(0);
      expect(clampScore(14)).toBe(10);
      expect(clampScore(6.5)).toBe(6.5);
    });
  });

  describe('meanScore', () => {
    it('should average the values', () => {
      expect(roundScore(meanScore({ a: 5, b: 7, c: 8 }))).toBe(6.67);
    });
  });

  describe('normalizeLensScores', () => {
    it('should keep rubric keys, clamp them and drop extras', () => {
      const result = normalizeLensScores('problem', {
        market_relevance: 12,
        clarity: 7,
        feasibility: 6,
        vibes: 9,
      });

      expect(result).toEqual({
        kind: 'ok',
        output: { market_relevance: 10, clarity: 7, feasibility: 6 },
      });
    });

    it('should report missing rubric keys as malformed', () => {
      const result = normalizeLensScores('solution', { logical_coherence: 8, innovation: 7 });

      expect(result).toEqual({
        kind: 'malformed',
        reason: 'missing solution scores: implementation_feasibility, impact_potential',
      });
    });

    it('should use four criteria for the solution lens', () => {
      expect(LENS_CRITERIA.solution).toHaveLength(4);
    });
  });
});
