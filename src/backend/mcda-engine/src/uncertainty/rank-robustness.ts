/**
 * Ranking Robustness under Weight Perturbation
 *
 * Each trial multiplies every baseline weight by an independent factor drawn
 * uniformly from [1 − P, 1 + P], renormalizes the vector to sum to 1, rescores
 * all interventions with their unperturbed domain scores and ranks them
 * (ordinal, ties by input order). Per intervention the M trial ranks reduce to
 * a mean rank, a 2.5th–97.5th percentile rank interval and the fractions of
 * trials ranked first and in the top three.
 *
 * A zero weight stays zero under multiplicative perturbation.
 *
 * @tested tests/property/rank-robustness.property.test.ts
 */

import {
  DOMAIN_COUNT,
  toDomainVector,
  type RobustnessSummary,
  type WeightingScheme,
} from '@geromcda/shared';

import {
  RankRobustnessParamsSchema,
  parseParameters,
  type RankRobustnessParams,
} from '../config/analysis-config.js';
import type { RandomSource } from '../random/seeded-random.js';
import { rankInto, weightedScoreFromVectors } from '../scoring/weighted-scorer.js';
import { summarizeSample } from '../statistics/summary-statistics.js';
import type { DomainScoreTable } from '../tables/score-table.js';

/**
 * Fills `out` with a perturbed, renormalized copy of `weights`
 */
export function perturbWeights(
  weights: Float64Array,
  perturbation: number,
  random: RandomSource,
  out: Float64Array
): Float64Array {
  let total = 0;
  for (let d = 0; d < DOMAIN_COUNT; d++) {
    out[d] = weights[d] * random.uniform(1 - perturbation, 1 + perturbation);
    total += out[d];
  }
  for (let d = 0; d < DOMAIN_COUNT; d++) {
    out[d] /= total;
  }
  return out;
}

/**
 * Trial ranks, one buffer per intervention in input order
 */
export function simulatePerturbedRanks(
  table: DomainScoreTable,
  scheme: WeightingScheme,
  params: RankRobustnessParams,
  random: RandomSource
): Float64Array[] {
  const { trials, perturbation } = parseParameters(RankRobustnessParamsSchema, params, 'rank robustness parameters');

  const baseWeights = toDomainVector(scheme.weights);
  const scoreVectors = table.map((intervention) => toDomainVector(intervention.scores));
  const ranks = table.map(() => new Float64Array(trials));

  const weights = new Float64Array(DOMAIN_COUNT);
  const trialScores = new Float64Array(table.length);
  const trialRanks = new Float64Array(table.length);
  const order: number[] = [];

  for (let m = 0; m < trials; m++) {
    perturbWeights(baseWeights, perturbation, random, weights);
    for (let i = 0; i < scoreVectors.length; i++) {
      trialScores[i] = weightedScoreFromVectors(scoreVectors[i], weights);
    }
    rankInto(trialScores, order, trialRanks, 'ordinal');
    for (let i = 0; i < trialRanks.length; i++) {
      ranks[i][m] = trialRanks[i];
    }
  }

  return ranks;
}

function fractionAtMost(ranks: Float64Array, limit: number): number {
  let count = 0;
  for (let i = 0; i < ranks.length; i++) {
    if (ranks[i] <= limit) count++;
  }
  return count / ranks.length;
}

/**
 * Analyzes rank stability of every intervention under weight perturbation
 *
 * @returns one summary per intervention, in input order
 * @throws ConfigurationError on invalid trial count or perturbation fraction
 */
export function analyzeRankRobustness(
  table: DomainScoreTable,
  scheme: WeightingScheme,
  params: RankRobustnessParams,
  random: RandomSource
): RobustnessSummary[] {
  const ranks = simulatePerturbedRanks(table, scheme, params, random);
  const baseWeights = toDomainVector(scheme.weights);

  return table.map((intervention, index) => {
    const summary = summarizeSample(ranks[index]);
    return {
      intervention: intervention.id,
      baseWeightedScore: weightedScoreFromVectors(toDomainVector(intervention.scores), baseWeights),
      meanRank: summary.mean,
      rankP2_5: summary.lower,
      rankP97_5: summary.upper,
      pTop1: fractionAtMost(ranks[index], 1),
      pTop3: fractionAtMost(ranks[index], 3),
    };
  });
}
