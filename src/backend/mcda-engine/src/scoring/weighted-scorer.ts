/**
 * Weighted Scorer
 *
 * Computes Σ(score × weight) over the six canonical domains in fixed domain
 * order, and turns a set of weighted scores into rankings.
 *
 * Tie-breaking: scores within TIE_TOLERANCE of each other are tied. Ordinal
 * ranking then puts the intervention that came first in the input table ahead;
 * competition ("min") ranking gives every tied intervention the best rank of
 * its group.
 *
 * @tested tests/property/weighted-scoring.property.test.ts
 * @tested tests/property/tie-breaking.property.test.ts
 */

import {
  DOMAINS,
  DOMAIN_COUNT,
  SchemaError,
  toDomainVector,
  type DomainValues,
  type WeightingScheme,
} from '@geromcda/shared';

import type { DomainScoreTable } from '../tables/score-table.js';

/**
 * Two scores closer than this are treated as tied
 */
export const TIE_TOLERANCE = 1e-9;

/**
 * - ordinal: distinct ranks 1..n, ties broken by input order
 * - min: tied scores share the lowest rank of their group
 */
export type RankMethod = 'ordinal' | 'min';

/**
 * Weighted score and rank of one intervention under one scheme
 */
export interface ScoredIntervention {
  intervention: string;
  score: number;
  rank: number;
}

function domainVectorOf(values: DomainValues, kind: 'score' | 'weight'): Float64Array {
  const missing = DOMAINS.filter((domain) => {
    const value: unknown = values[domain];
    return typeof value !== 'number' || !Number.isFinite(value);
  });

  if (missing.length > 0) {
    throw new SchemaError(
      `Missing or non-numeric ${kind} for domain(s): ${missing.join(', ')}`,
      missing.map((domain) => ({ path: domain, message: `A numeric ${kind} is required` }))
    );
  }

  return toDomainVector(values);
}

/**
 * Weighted score from two vectors in canonical domain order
 */
export function weightedScoreFromVectors(scores: ArrayLike<number>, weights: ArrayLike<number>): number {
  let total = 0;
  for (let d = 0; d < DOMAIN_COUNT; d++) {
    total += scores[d] * weights[d];
  }
  return total;
}

/**
 * Computes the weighted score of one intervention under one weight vector
 *
 * @throws SchemaError when a score or weight is missing or non-numeric
 */
export function computeWeightedScore(scores: DomainValues, weights: DomainValues): number {
  return weightedScoreFromVectors(domainVectorOf(scores, 'score'), domainVectorOf(weights, 'weight'));
}

/**
 * Orders indices by descending score. Sort is stable, so tied indices keep
 * ascending (input) order.
 */
export function compareByScore(scores: ArrayLike<number>): (a: number, b: number) => number {
  return (a, b) => {
    const diff = scores[b] - scores[a];
    if (Math.abs(diff) > TIE_TOLERANCE) {
      return diff;
    }
    return a - b;
  };
}

/**
 * Writes 1-based ranks for `scores` into `ranks`, reusing `order` as scratch.
 * Used inside trial loops to avoid allocating per trial.
 */
export function rankInto(
  scores: ArrayLike<number>,
  order: number[],
  ranks: { [index: number]: number },
  method: RankMethod = 'ordinal'
): void {
  const n = scores.length;
  order.length = n;
  for (let i = 0; i < n; i++) {
    order[i] = i;
  }
  order.sort(compareByScore(scores));

  let groupRank = 1;
  let groupScore = Number.NaN;
  for (let position = 0; position < n; position++) {
    const index = order[position];
    if (method === 'ordinal') {
      ranks[index] = position + 1;
      continue;
    }
    if (position === 0 || Math.abs(scores[index] - groupScore) > TIE_TOLERANCE) {
      groupRank = position + 1;
      groupScore = scores[index];
    }
    ranks[index] = groupRank;
  }
}

/**
 * Ranks scores, rank 1 = highest
 */
export function rankScores(scores: ArrayLike<number>, method: RankMethod = 'ordinal'): number[] {
  const ranks = new Array<number>(scores.length).fill(0);
  rankInto(scores, [], ranks, method);
  return ranks;
}

/**
 * Scores and ranks every intervention under one scheme, in input order
 */
export function scoreInterventions(
  table: DomainScoreTable,
  scheme: WeightingScheme,
  method: RankMethod = 'ordinal'
): ScoredIntervention[] {
  const weights = domainVectorOf(scheme.weights, 'weight');
  const scores = table.map((intervention) =>
    weightedScoreFromVectors(domainVectorOf(intervention.scores, 'score'), weights)
  );
  const ranks = rankScores(scores, method);

  return table.map((intervention, index) => ({
    intervention: intervention.id,
    score: scores[index],
    rank: ranks[index],
  }));
}

/**
 * Sorts scored interventions best first
 */
export function sortByRank(scored: ReadonlyArray<ScoredIntervention>): ScoredIntervention[] {
  return [...scored].sort((a, b) => a.rank - b.rank);
}
