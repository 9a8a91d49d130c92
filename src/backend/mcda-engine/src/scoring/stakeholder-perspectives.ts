/**
 * Stakeholder Perspectives
 *
 * Scores the same interventions under every scheme of a weighting table and
 * enriches each row with derived evidence metrics and a category. Scheme
 * semantics live entirely in the weight vectors and categories in the
 * assignment mapping; this module only reads them.
 *
 * @tested tests/integration/perspective-rankings.integration.test.ts
 */

import {
  DEFAULT_CATEGORY_ASSIGNMENTS,
  categorizeIntervention,
  type CategoryAssignments,
  type DerivedMetrics,
  type DomainValues,
  type PerspectiveRanking,
  type SchemeStanding,
  type WeightingScheme,
} from '@geromcda/shared';

import type { DomainScoreTable } from '../tables/score-table.js';
import type { WeightingSchemeTable } from '../tables/weighting-table.js';
import { scoreInterventions, type ScoredIntervention } from './weighted-scorer.js';

/**
 * Rounds half to even (2.5 → 2, 3.5 → 4)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Derived evidence metrics for one intervention
 */
export function computeDerivedMetrics(scores: DomainValues): DerivedMetrics {
  return {
    translationalReadiness: roundHalfEven((scores.human_trial_evidence + scores.safety_tolerability) / 2),
    agingImpact: (scores.lifespan_efficacy * 3 + scores.healthspan_efficacy + scores.mechanism_conservation) / 5,
  };
}

/**
 * Scores every scheme, in scheme order. Ranks use the competition method so
 * tied interventions share a rank.
 */
export function scoreAllPerspectives(
  table: DomainScoreTable,
  schemes: WeightingSchemeTable | ReadonlyArray<WeightingScheme>
): Map<string, ScoredIntervention[]> {
  return new Map(
    [...schemes.values()].map((scheme) => [scheme.name, scoreInterventions(table, scheme, 'min')] as const)
  );
}

/**
 * Builds one enriched ranking row per intervention, in input order
 */
export function buildPerspectiveRankings(
  table: DomainScoreTable,
  schemes: WeightingSchemeTable | ReadonlyArray<WeightingScheme>,
  categories: CategoryAssignments = DEFAULT_CATEGORY_ASSIGNMENTS
): PerspectiveRanking[] {
  const perspectives = scoreAllPerspectives(table, schemes);

  return table.map((intervention, index) => {
    const standings: Record<string, SchemeStanding> = {};
    for (const [name, scored] of perspectives) {
      standings[name] = { score: scored[index].score, rank: scored[index].rank };
    }

    return {
      intervention: intervention.id,
      standings,
      ...computeDerivedMetrics(intervention.scores),
      category: categorizeIntervention(intervention.id, categories),
    };
  });
}
