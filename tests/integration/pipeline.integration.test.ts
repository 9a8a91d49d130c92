/**
 * Analysis Pipeline Integration Tests
 *
 * Runs the full analysis from raw inputs: configuration and table validation,
 * per-scheme scoring, score intervals, rank robustness and the perspective
 * table.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ConfigurationError,
  SchemaError,
  WeightSumError,
  createLogger,
  type DomainScores,
  type Logger,
  type RobustnessSummary,
} from '@geromcda/shared';
import {
  runAnalysis,
  sortIntervalSummaries,
  sortRobustnessSummaries,
  type AnalysisResult,
} from '../../src/backend/mcda-engine/src/pipeline/analysis-pipeline.js';
import { createSeededRandom } from '../../src/backend/mcda-engine/src/random/seeded-random.js';

// Test fixtures
function scores(values: [number, number, number, number, number, number]): DomainScores {
  return {
    lifespan_efficacy: values[0],
    healthspan_efficacy: values[1],
    mechanism_conservation: values[2],
    human_trial_evidence: values[3],
    safety_tolerability: values[4],
    cost_accessibility: values[5],
  };
}

const interventions = [
  { id: 'Steady', scores: scores([3, 3, 3, 3, 3, 3]) },
  { id: 'Leader', scores: scores([5, 5, 4, 5, 5, 4]) },
  { id: 'Laggard', scores: scores([1, 2, 1, 1, 2, 1]) },
  { id: 'Runner-up', scores: scores([4, 4, 4, 4, 4, 4]) },
];

const smallRun = { scoreTrials: 300, weightTrials: 300 };

function stochasticParts(result: AnalysisResult) {
  return result.schemes.map(({ scheme, intervals, robustness }) => ({ scheme, intervals, robustness }));
}

describe('Analysis Pipeline Integration Tests', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createLogger({ enableConsole: false });
  });

  describe('Results', () => {
    it('analyzes the default target scheme', () => {
      const result = runAnalysis({ scores: interventions }, smallRun, { logger, runId: 'run-1' });

      expect(result.runId).toBe('run-1');
      expect(result.interventionCount).toBe(4);
      expect(result.config.scoreTrials).toBe(300);
      expect(result.schemes.map((analysis) => analysis.scheme)).toEqual(['baseline']);
      expect(result.schemes[0].baseline.map((row) => [row.intervention, row.rank])).toEqual([
        ['Leader', 1],
        ['Runner-up', 2],
        ['Steady', 3],
        ['Laggard', 4],
      ]);
    });

    it('sorts intervals by mean descending and robustness by mean rank ascending', () => {
      const [analysis] = runAnalysis({ scores: interventions }, smallRun, { logger }).schemes;

      const means = analysis.intervals.map((row) => row.mean);
      expect(means).toEqual([...means].sort((a, b) => b - a));
      expect(analysis.intervals[0].intervention).toBe('Leader');
      expect(analysis.intervals[3].intervention).toBe('Laggard');

      const meanRanks = analysis.robustness.map((row) => row.meanRank);
      expect(meanRanks).toEqual([...meanRanks].sort((a, b) => a - b));
      expect(analysis.robustness.map((row) => row.intervention)).toEqual(['Leader', 'Runner-up', 'Steady', 'Laggard']);
    });

    it('builds perspective rows for every loaded scheme', () => {
      const result = runAnalysis({ scores: interventions }, smallRun, { logger });

      expect(result.perspectives.map((row) => row.intervention)).toEqual(['Steady', 'Leader', 'Laggard', 'Runner-up']);
      expect(Object.keys(result.perspectives[0].standings)).toHaveLength(4);
      expect(result.perspectives.map((row) => row.category)).toEqual(['Other', 'Other', 'Other', 'Other']);
    });

    it('categorizes perspective rows with caller-supplied assignments', () => {
      const result = runAnalysis(
        { scores: interventions, categories: { Leader: 'Front-runner', Laggard: 'Trailing' } },
        smallRun,
        { logger }
      );

      expect(result.perspectives.map((row) => row.category)).toEqual(['Other', 'Front-runner', 'Trailing', 'Other']);
    });

    it('uses caller-supplied schemes', () => {
      const result = runAnalysis(
        {
          scores: interventions,
          schemes: { safety_only: scores([0, 0, 0, 0, 1, 0]) },
        },
        { ...smallRun, targetSchemes: ['safety_only'] },
        { logger }
      );

      expect(result.schemes[0].scheme).toBe('safety_only');
      expect(result.schemes[0].baseline[0].score).toBe(5);
      expect(Object.keys(result.perspectives[0].standings)).toEqual(['safety_only']);
    });
  });

  describe('Reproducibility', () => {
    it('returns identical stochastic results for identical configuration', () => {
      const first = runAnalysis({ scores: interventions }, smallRun, { logger });
      const second = runAnalysis({ scores: interventions }, smallRun, { logger });

      expect(first.runId).not.toBe(second.runId);
      expect(stochasticParts(first)).toEqual(stochasticParts(second));
    });

    it('gives a scheme the same results whichever other schemes run with it', () => {
      const alone = runAnalysis({ scores: interventions }, smallRun, { logger });
      const together = runAnalysis(
        { scores: interventions },
        { ...smallRun, targetSchemes: ['patient_focused', 'baseline'] },
        { logger }
      );

      expect(together.schemes.map((analysis) => analysis.scheme)).toEqual(['patient_focused', 'baseline']);
      expect(together.schemes[1]).toEqual(alone.schemes[0]);
    });

    it('seeds one score source and one weight source per scheme', () => {
      const createRandom = vi.fn(createSeededRandom);

      runAnalysis(
        { scores: interventions },
        { ...smallRun, scoreSeed: 7, weightSeed: 8, targetSchemes: ['baseline', 'investor_focused'] },
        { logger, createRandom }
      );

      expect(createRandom.mock.calls.map(([seed]) => seed)).toEqual([7, 8, 7, 8]);
    });
  });

  describe('Validation', () => {
    it('validates the configuration before the tables', () => {
      expect(() => runAnalysis({ scores: [] }, { scoreTrials: 0 }, { logger })).toThrow(ConfigurationError);
      expect(() => runAnalysis({ scores: [] }, smallRun, { logger })).toThrow(SchemaError);
    });

    it('rejects an unknown target scheme before any trial runs', () => {
      const createRandom = vi.fn(createSeededRandom);

      expect(() =>
        runAnalysis(
          { scores: interventions },
          { ...smallRun, targetSchemes: ['baseline', 'donor_focused'] },
          { logger, createRandom }
        )
      ).toThrow('Unknown weighting scheme "donor_focused"');
      expect(createRandom).not.toHaveBeenCalled();
      expect(logger.getLogEntries().map((entry) => entry.message)).toEqual(['Analysis rejected']);
    });

    it('rejects malformed category assignments before any trial runs', () => {
      const createRandom = vi.fn(createSeededRandom);

      expect(() =>
        runAnalysis({ scores: interventions, categories: { Leader: '' } }, smallRun, { logger, createRandom })
      ).toThrow(SchemaError);
      expect(createRandom).not.toHaveBeenCalled();
    });

    it('rejects a scheme table whose weights do not sum to 1', () => {
      expect(() =>
        runAnalysis(
          { scores: interventions, schemes: { heavy: scores([0.3, 0.1, 0.1, 0.2, 0.2, 0.2]) } },
          { ...smallRun, targetSchemes: ['heavy'] },
          { logger }
        )
      ).toThrow(WeightSumError);
    });
  });

  describe('Output Ordering', () => {
    it('keeps input order for equal interval means', () => {
      const sorted = sortIntervalSummaries([
        { intervention: 'First', mean: 3, p2_5: 2, p97_5: 4 },
        { intervention: 'Top', mean: 4, p2_5: 3, p97_5: 5 },
        { intervention: 'Second', mean: 3, p2_5: 2, p97_5: 4 },
      ]);

      expect(sorted.map((row) => row.intervention)).toEqual(['Top', 'First', 'Second']);
    });

    it('breaks mean-rank ties by base weighted score', () => {
      const row = (intervention: string, meanRank: number, baseWeightedScore: number): RobustnessSummary => ({
        intervention,
        baseWeightedScore,
        meanRank,
        rankP2_5: 1,
        rankP97_5: 2,
        pTop1: 0.5,
        pTop3: 1,
      });

      const sorted = sortRobustnessSummaries([row('Lower', 1.5, 3.9), row('Best', 1, 4.5), row('Higher', 1.5, 4.1)]);

      expect(sorted.map((entry) => entry.intervention)).toEqual(['Best', 'Higher', 'Lower']);
    });
  });
});
