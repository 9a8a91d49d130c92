/**
 * Property 1: Weighted Score Is the Domain-Weighted Sum
 *
 * For any intervention with scores in [1, 5] and any weight vector summing to
 * 1, the weighted score SHALL equal Σ(score × weight) in canonical domain
 * order and SHALL lie inside [1, 5]. Raising any domain score SHALL never
 * lower the weighted score.
 *
 * @file src/backend/mcda-engine/src/scoring/weighted-scorer.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  DEFAULT_WEIGHTING_SCHEMES,
  DOMAINS,
  SchemaError,
  weightsFromVector,
  type DomainScores,
  type DomainWeights,
} from '@geromcda/shared';
import {
  computeWeightedScore,
  scoreInterventions,
} from '../../src/backend/mcda-engine/src/scoring/weighted-scorer.js';
import { loadDomainScoreTable } from '../../src/backend/mcda-engine/src/tables/score-table.js';
import { loadWeightingScheme } from '../../src/backend/mcda-engine/src/tables/weighting-table.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const scoreArb = fc.double({ min: 1, max: 5, noNaN: true });

const domainScoresArb: fc.Arbitrary<DomainScores> = fc.record({
  lifespan_efficacy: scoreArb,
  healthspan_efficacy: scoreArb,
  mechanism_conservation: scoreArb,
  human_trial_evidence: scoreArb,
  safety_tolerability: scoreArb,
  cost_accessibility: scoreArb,
});

const domainWeightsArb: fc.Arbitrary<DomainWeights> = fc
  .array(fc.double({ min: 0.01, max: 1, noNaN: true }), { minLength: 6, maxLength: 6 })
  .map((raw) => {
    const total = raw.reduce((sum, value) => sum + value, 0);
    return weightsFromVector(raw.map((value) => value / total));
  });

function uniformScores(value: number): DomainScores {
  return {
    lifespan_efficacy: value,
    healthspan_efficacy: value,
    mechanism_conservation: value,
    human_trial_evidence: value,
    safety_tolerability: value,
    cost_accessibility: value,
  };
}

describe('Property 1: Weighted Score Is the Domain-Weighted Sum', () => {
  describe('Definition', () => {
    it('SHALL equal the sum of score × weight over all six domains', () => {
      fc.assert(
        fc.property(domainScoresArb, domainWeightsArb, (scores, weights) => {
          const expected = DOMAINS.reduce((sum, domain) => sum + scores[domain] * weights[domain], 0);
          expect(computeWeightedScore(scores, weights)).toBeCloseTo(expected, 10);
        }),
        propertyConfig
      );
    });

    it('computes the baseline score of a concrete intervention', () => {
      const scores: DomainScores = {
        lifespan_efficacy: 5,
        healthspan_efficacy: 4,
        mechanism_conservation: 3,
        human_trial_evidence: 2,
        safety_tolerability: 1,
        cost_accessibility: 5,
      };

      // 1.5 + 0.4 + 0.3 + 0.4 + 0.2 + 0.5
      expect(computeWeightedScore(scores, DEFAULT_WEIGHTING_SCHEMES.baseline)).toBeCloseTo(3.3, 10);
    });
  });

  describe('Bounds', () => {
    it('SHALL lie within [1, 5] for valid scores and weights', () => {
      fc.assert(
        fc.property(domainScoresArb, domainWeightsArb, (scores, weights) => {
          const score = computeWeightedScore(scores, weights);
          expect(score).toBeGreaterThanOrEqual(1 - 1e-9);
          expect(score).toBeLessThanOrEqual(5 + 1e-9);
        }),
        propertyConfig
      );
    });

    it('SHALL equal the common score when every domain has the same score', () => {
      fc.assert(
        fc.property(scoreArb, domainWeightsArb, (value, weights) => {
          expect(computeWeightedScore(uniformScores(value), weights)).toBeCloseTo(value, 9);
        }),
        propertyConfig
      );
    });

    it('SHALL ignore domains whose weight is zero', () => {
      const regulator = DEFAULT_WEIGHTING_SCHEMES.regulator_focused;
      fc.assert(
        fc.property(domainScoresArb, scoreArb, (scores, conservation) => {
          const changed = { ...scores, mechanism_conservation: conservation };
          expect(computeWeightedScore(changed, regulator)).toBe(computeWeightedScore(scores, regulator));
        }),
        propertyConfig
      );
    });
  });

  describe('Monotonicity', () => {
    it('SHALL score a componentwise-dominating intervention at least as high', () => {
      const incrementsArb = fc.array(fc.double({ min: 0, max: 4, noNaN: true }), { minLength: 6, maxLength: 6 });

      fc.assert(
        fc.property(domainScoresArb, incrementsArb, domainWeightsArb, (lower, increments, weights) => {
          const higher: DomainScores = {
            lifespan_efficacy: Math.min(5, lower.lifespan_efficacy + increments[0]),
            healthspan_efficacy: Math.min(5, lower.healthspan_efficacy + increments[1]),
            mechanism_conservation: Math.min(5, lower.mechanism_conservation + increments[2]),
            human_trial_evidence: Math.min(5, lower.human_trial_evidence + increments[3]),
            safety_tolerability: Math.min(5, lower.safety_tolerability + increments[4]),
            cost_accessibility: Math.min(5, lower.cost_accessibility + increments[5]),
          };

          expect(computeWeightedScore(higher, weights)).toBeGreaterThanOrEqual(computeWeightedScore(lower, weights));
        }),
        propertyConfig
      );
    });

    it('raises the score when a weighted domain improves', () => {
      const lower = uniformScores(3);
      const higher = { ...lower, human_trial_evidence: 5 };

      // 3 + 2 × 0.2
      expect(computeWeightedScore(higher, DEFAULT_WEIGHTING_SCHEMES.baseline)).toBeCloseTo(3.4, 10);
      expect(computeWeightedScore(lower, DEFAULT_WEIGHTING_SCHEMES.baseline)).toBeCloseTo(3, 10);
    });
  });

  describe('Validation', () => {
    it('SHALL reject a non-numeric domain score', () => {
      const scores = { ...uniformScores(3), cost_accessibility: Number.NaN };

      expect(() => computeWeightedScore(scores, DEFAULT_WEIGHTING_SCHEMES.baseline)).toThrow(SchemaError);
    });

    it('SHALL reject a non-numeric weight', () => {
      const weights = { ...DEFAULT_WEIGHTING_SCHEMES.baseline, safety_tolerability: Number.POSITIVE_INFINITY };

      expect(() => computeWeightedScore(uniformScores(3), weights)).toThrow(/safety_tolerability/);
    });
  });

  describe('Scheme Scoring', () => {
    it('SHALL return one result per intervention in input order', () => {
      fc.assert(
        fc.property(fc.array(domainScoresArb, { minLength: 1, maxLength: 8 }), domainWeightsArb, (rows, weights) => {
          const table = loadDomainScoreTable(rows.map((scores, i) => ({ id: `I${i}`, scores })));
          const scheme = loadWeightingScheme('generated', weights);
          const results = scoreInterventions(table, scheme);

          expect(results.map((result) => result.intervention)).toEqual(table.map((row) => row.id));
          results.forEach((result, i) => {
            expect(result.score).toBe(computeWeightedScore(table[i].scores, weights));
          });
        }),
        propertyConfig
      );
    });

    it('SHALL not mutate the input tables', () => {
      const table = loadDomainScoreTable([{ id: 'A', scores: uniformScores(4) }]);
      const scheme = loadWeightingScheme('baseline', DEFAULT_WEIGHTING_SCHEMES.baseline);

      scoreInterventions(table, scheme);

      expect(table[0].scores).toEqual(uniformScores(4));
      expect(scheme.weights).toEqual(DEFAULT_WEIGHTING_SCHEMES.baseline);
    });
  });
});
