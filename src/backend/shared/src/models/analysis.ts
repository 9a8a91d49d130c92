/**
 * Analysis Output Models
 *
 * Output entities produced once per analysis run, plus the column-named
 * record schemas used when the tables are handed to a persistence layer.
 */

import { z } from 'zod';

/**
 * Monte Carlo score interval for one intervention
 */
export interface IntervalSummary {
  readonly intervention: string;
  readonly mean: number;
  /** 2.5th percentile of the trial weighted scores */
  readonly p2_5: number;
  /** 97.5th percentile of the trial weighted scores */
  readonly p97_5: number;
}

/**
 * Rank distribution under weight perturbation for one intervention
 */
export interface RobustnessSummary {
  readonly intervention: string;
  readonly baseWeightedScore: number;
  readonly meanRank: number;
  readonly rankP2_5: number;
  readonly rankP97_5: number;
  /** Fraction of trials ranked first */
  readonly pTop1: number;
  /** Fraction of trials ranked in the top three */
  readonly pTop3: number;
}

/**
 * Derived evidence metrics for one intervention
 */
export interface DerivedMetrics {
  /** Rounded mean of human trial evidence and safety */
  readonly translationalReadiness: number;
  /** (3 × lifespan + healthspan + conservation) / 5 */
  readonly agingImpact: number;
}

/**
 * Score and competition rank for one intervention under one scheme
 */
export interface SchemeStanding {
  readonly score: number;
  readonly rank: number;
}

/**
 * Enriched per-scheme ranking row for one intervention
 */
export interface PerspectiveRanking extends DerivedMetrics {
  readonly intervention: string;
  readonly standings: Readonly<Record<string, SchemeStanding>>;
  /** Mechanism category; "Other" when the intervention is unmapped */
  readonly category: string;
}

/**
 * Interval Summary table row with canonical column names
 */
export const IntervalRecordSchema = z.object({
  Intervention: z.string().min(1),
  WeightedScore_Mean: z.number().finite(),
  WeightedScore_P2_5: z.number().finite(),
  WeightedScore_P97_5: z.number().finite(),
});

export type IntervalRecord = z.infer<typeof IntervalRecordSchema>;

export const INTERVAL_COLUMNS = [
  'Intervention',
  'WeightedScore_Mean',
  'WeightedScore_P2_5',
  'WeightedScore_P97_5',
] as const satisfies ReadonlyArray<keyof IntervalRecord>;

/**
 * Robustness Summary table row with canonical column names
 */
export const RobustnessRecordSchema = z.object({
  Intervention: z.string().min(1),
  BaseWeightedScore: z.number().finite(),
  MeanRank: z.number().min(1),
  Rank_P2_5: z.number().min(1),
  Rank_P97_5: z.number().min(1),
  P_Top1: z.number().min(0).max(1),
  P_Top3: z.number().min(0).max(1),
});

export type RobustnessRecord = z.infer<typeof RobustnessRecordSchema>;

export const ROBUSTNESS_COLUMNS = [
  'Intervention',
  'BaseWeightedScore',
  'MeanRank',
  'Rank_P2_5',
  'Rank_P97_5',
  'P_Top1',
  'P_Top3',
] as const satisfies ReadonlyArray<keyof RobustnessRecord>;
