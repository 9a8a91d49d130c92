/**
 * Monte Carlo Score Intervals
 *
 * Quantifies how per-domain score uncertainty moves weighted scores. Each
 * trial draws every domain score of every intervention uniformly from
 * [score − J, score + J], applies the boundary policy and recomputes the
 * weighted score. Per intervention the N trial scores reduce to a mean and a
 * 2.5th–97.5th percentile interval.
 *
 * Draw order is fixed (trial, then intervention in input order, then domain in
 * canonical order) and one RandomSource serves the whole run, so a given seed
 * reproduces the same table exactly.
 *
 * @tested tests/property/score-intervals.property.test.ts
 */

import {
  DOMAIN_COUNT,
  SCORE_RANGE,
  toDomainVector,
  type IntervalSummary,
  type WeightingScheme,
} from '@geromcda/shared';

import {
  JitterBoundary,
  ScoreIntervalParamsSchema,
  parseParameters,
  type ScoreIntervalParamsInput,
} from '../config/analysis-config.js';
import type { RandomSource } from '../random/seeded-random.js';
import { weightedScoreFromVectors } from '../scoring/weighted-scorer.js';
import { summarizeSample } from '../statistics/summary-statistics.js';
import type { DomainScoreTable } from '../tables/score-table.js';

/**
 * Draws one jittered score under the boundary policy
 */
export function sampleJitteredScore(
  score: number,
  jitter: number,
  boundary: JitterBoundary,
  random: RandomSource
): number {
  const sampled = random.uniform(score - jitter, score + jitter);
  if (boundary === JitterBoundary.CLAMP) {
    return Math.min(SCORE_RANGE.max, Math.max(SCORE_RANGE.min, sampled));
  }
  return sampled;
}

/**
 * Fills `out` with one jittered draw per domain of `scores`
 */
export function drawJitteredScores(
  scores: Float64Array,
  jitter: number,
  boundary: JitterBoundary,
  random: RandomSource,
  out: Float64Array
): Float64Array {
  for (let d = 0; d < DOMAIN_COUNT; d++) {
    out[d] = sampleJitteredScore(scores[d], jitter, boundary, random);
  }
  return out;
}

/**
 * Trial weighted scores, one buffer per intervention in input order
 */
export function simulateJitteredScores(
  table: DomainScoreTable,
  scheme: WeightingScheme,
  params: ScoreIntervalParamsInput,
  random: RandomSource
): Float64Array[] {
  const { trials, jitter, boundary } = parseParameters(ScoreIntervalParamsSchema, params, 'score interval parameters');

  const weights = toDomainVector(scheme.weights);
  const baseScores = table.map((intervention) => toDomainVector(intervention.scores));
  const samples = table.map(() => new Float64Array(trials));
  const jittered = new Float64Array(DOMAIN_COUNT);

  for (let t = 0; t < trials; t++) {
    for (let i = 0; i < baseScores.length; i++) {
      drawJitteredScores(baseScores[i], jitter, boundary, random, jittered);
      samples[i][t] = weightedScoreFromVectors(jittered, weights);
    }
  }

  return samples;
}

/**
 * Estimates a 95% credible interval of the weighted score per intervention
 *
 * @returns one summary per intervention, in input order
 * @throws ConfigurationError on invalid trial count or jitter
 */
export function estimateScoreIntervals(
  table: DomainScoreTable,
  scheme: WeightingScheme,
  params: ScoreIntervalParamsInput,
  random: RandomSource
): IntervalSummary[] {
  const samples = simulateJitteredScores(table, scheme, params, random);

  return table.map((intervention, index) => {
    const summary = summarizeSample(samples[index]);
    return {
      intervention: intervention.id,
      mean: summary.mean,
      p2_5: summary.lower,
      p97_5: summary.upper,
    };
  });
}
