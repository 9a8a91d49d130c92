/**
 * Analysis Pipeline
 *
 * Runs a full analysis from raw inputs: validates the configuration and both
 * tables, scores every target scheme, estimates score intervals and ranking
 * robustness, and builds the enriched perspective table. All validation
 * happens before the first trial, so a rejected input produces no output.
 *
 * Each target scheme gets fresh random sources seeded from the configuration,
 * so a scheme's results do not depend on which other schemes run with it.
 *
 * @tested tests/integration/pipeline.integration.test.ts
 * @tested tests/e2e/analysis-flow.e2e.test.ts
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AnalysisStage,
  createMetricsCollector,
  getLogger,
  isAnalysisError,
  type IntervalSummary,
  type Logger,
  type MetricsCollector,
  type PerspectiveRanking,
  type RobustnessSummary,
} from '@geromcda/shared';

import { resolveAnalysisConfig, type AnalysisConfig } from '../config/analysis-config.js';
import { createSeededRandom, type RandomSource } from '../random/seeded-random.js';
import { buildPerspectiveRankings } from '../scoring/stakeholder-perspectives.js';
import { scoreInterventions, sortByRank, type ScoredIntervention } from '../scoring/weighted-scorer.js';
import { resolveCategoryAssignments } from '../tables/category-table.js';
import { loadDomainScoreTable, type DomainScoreTable } from '../tables/score-table.js';
import {
  defaultWeightingSchemeTable,
  loadWeightingSchemeTable,
  requireScheme,
  type WeightingSchemeTable,
} from '../tables/weighting-table.js';
import { analyzeRankRobustness } from '../uncertainty/rank-robustness.js';
import { estimateScoreIntervals } from '../uncertainty/score-intervals.js';

/**
 * Raw analysis inputs
 */
export interface AnalysisInput {
  /** `{ id, scores }` records or an identifier → scores mapping */
  scores: unknown;
  /** Scheme name → weights; the built-in stakeholder schemes when omitted */
  schemes?: unknown;
  /** Intervention → category; the preset mechanism groups when omitted */
  categories?: unknown;
}

/**
 * Collaborators injected into a run
 */
export interface AnalysisDependencies {
  logger?: Logger;
  metrics?: MetricsCollector;
  createRandom?: (seed: number) => RandomSource;
  runId?: string;
}

/**
 * Results for one target scheme
 */
export interface SchemeAnalysis {
  scheme: string;
  /** Deterministic scores, best first */
  baseline: ScoredIntervention[];
  /** Sorted by mean weighted score, descending */
  intervals: IntervalSummary[];
  /** Sorted by mean rank ascending, then base weighted score descending */
  robustness: RobustnessSummary[];
}

export interface AnalysisResult {
  runId: string;
  config: AnalysisConfig;
  interventionCount: number;
  schemes: SchemeAnalysis[];
  /** One row per intervention in input order, covering every loaded scheme */
  perspectives: PerspectiveRanking[];
  processingTimeMs: number;
}

export function sortIntervalSummaries(rows: ReadonlyArray<IntervalSummary>): IntervalSummary[] {
  return [...rows].sort((a, b) => b.mean - a.mean);
}

export function sortRobustnessSummaries(rows: ReadonlyArray<RobustnessSummary>): RobustnessSummary[] {
  return [...rows].sort((a, b) => a.meanRank - b.meanRank || b.baseWeightedScore - a.baseWeightedScore);
}

function loadSchemes(input: unknown): WeightingSchemeTable {
  return input === undefined ? defaultWeightingSchemeTable() : loadWeightingSchemeTable(input);
}

function analyzeScheme(
  table: DomainScoreTable,
  schemes: WeightingSchemeTable,
  name: string,
  config: AnalysisConfig,
  createRandom: (seed: number) => RandomSource,
  metrics: MetricsCollector
): SchemeAnalysis {
  const scheme = requireScheme(schemes, name);

  let stopTimer = metrics.startTimer();
  const baseline = sortByRank(scoreInterventions(table, scheme));
  metrics.recordStage(AnalysisStage.SCORING, stopTimer().durationMs);

  stopTimer = metrics.startTimer();
  const intervals = estimateScoreIntervals(
    table,
    scheme,
    { trials: config.scoreTrials, jitter: config.scoreJitter, boundary: config.jitterBoundary },
    createRandom(config.scoreSeed)
  );
  metrics.recordStage(AnalysisStage.SCORE_INTERVALS, stopTimer().durationMs, config.scoreTrials);

  stopTimer = metrics.startTimer();
  const robustness = analyzeRankRobustness(
    table,
    scheme,
    { trials: config.weightTrials, perturbation: config.weightPerturbation },
    createRandom(config.weightSeed)
  );
  metrics.recordStage(AnalysisStage.RANK_ROBUSTNESS, stopTimer().durationMs, config.weightTrials);

  return {
    scheme: scheme.name,
    baseline,
    intervals: sortIntervalSummaries(intervals),
    robustness: sortRobustnessSummaries(robustness),
  };
}

/**
 * Runs a complete analysis
 *
 * @throws ConfigurationError on invalid parameters or an unknown target scheme
 * @throws SchemaError, OutOfRangeError, WeightSumError on invalid tables
 */
export function runAnalysis(
  input: AnalysisInput,
  configOverrides: unknown = {},
  deps: AnalysisDependencies = {}
): AnalysisResult {
  const runId = deps.runId ?? uuidv4();
  const logger = (deps.logger ?? getLogger()).child(runId);
  const metrics = deps.metrics ?? createMetricsCollector();
  const createRandom = deps.createRandom ?? createSeededRandom;
  const stopTimer = metrics.startTimer();

  try {
    const config = resolveAnalysisConfig(configOverrides);
    const table = loadDomainScoreTable(input.scores);
    const schemes = loadSchemes(input.schemes);
    const categories = resolveCategoryAssignments(input.categories);
    for (const name of config.targetSchemes) {
      requireScheme(schemes, name);
    }

    logger.info('Analysis started', {
      interventionCount: table.length,
      schemes: config.targetSchemes,
    });

    const results = config.targetSchemes.map((name) =>
      analyzeScheme(table, schemes, name, config, createRandom, metrics)
    );
    const perspectives = buildPerspectiveRankings(table, schemes, categories);

    const processingTimeMs = stopTimer().durationMs;
    metrics.recordAnalysisRun(processingTimeMs, table.length);

    const topInterventions: Record<string, unknown> = {};
    for (const result of results) {
      topInterventions[result.scheme] = result.baseline[0].intervention;
    }

    logger.logAnalysis({
      runId,
      interventionCount: table.length,
      schemes: config.targetSchemes,
      parameters: { ...config },
      topInterventions,
      processingTimeMs,
    });

    return {
      runId,
      config,
      interventionCount: table.length,
      schemes: results,
      perspectives,
      processingTimeMs,
    };
  } catch (error) {
    const code = isAnalysisError(error) ? error.code : 'UNEXPECTED_ERROR';
    metrics.recordAnalysisError(code);
    logger.error(
      'Analysis rejected',
      error instanceof Error ? error : undefined,
      { code }
    );
    throw error;
  }
}
