/**
 * E2E Tests for the Analysis Flow
 *
 * Tests the full flow from workbook-shaped rows to rendered output tables:
 * row loading, configuration, scoring under several stakeholder schemes,
 * score intervals, rank robustness and CSV rendering.
 */

import { readFileSync } from 'node:fs';

import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import {
  MetricNames,
  createLogger,
  createMetricsCollector,
  type Logger,
  type MetricsCollector,
} from '@geromcda/shared';
import { runAnalysis } from '../../src/backend/mcda-engine/src/pipeline/analysis-pipeline.js';
import {
  formatIntervalCsv,
  formatRobustnessCsv,
} from '../../src/backend/mcda-engine/src/pipeline/table-export.js';
import { loadScoreTableFromRows } from '../../src/backend/mcda-engine/src/tables/row-loader.js';

// Test fixtures
const FixtureSchema = z.object({
  description: z.string(),
  rows: z.array(z.record(z.string(), z.unknown())),
});

const fixture = FixtureSchema.parse(
  JSON.parse(readFileSync(new URL('../fixtures/interventions.json', import.meta.url), 'utf8'))
);

const config = {
  scoreTrials: 1000,
  weightTrials: 1000,
  scoreJitter: 0.5,
  weightPerturbation: 0.05,
  targetSchemes: ['baseline', 'regulator_focused'],
};

function loadRecords() {
  const { table, headerScheme } = loadScoreTableFromRows(fixture.rows);
  return {
    records: table.map((intervention) => ({ id: intervention.id, scores: { ...intervention.scores } })),
    headerScheme,
  };
}

describe('E2E: Analysis Flow', () => {
  let logger: Logger;
  let metrics: MetricsCollector;

  beforeEach(() => {
    logger = createLogger({ enableConsole: false });
    metrics = createMetricsCollector();
  });

  it('reads the workbook rows and their header weights', () => {
    const { records, headerScheme } = loadRecords();

    expect(records.map((record) => record.id)).toEqual(['Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo', 'Foxtrot']);
    expect(records[3].scores.human_trial_evidence).toBe(2);
    expect(headerScheme?.weights.lifespan_efficacy).toBeCloseTo(0.3, 12);
    expect(headerScheme?.weights.cost_accessibility).toBeCloseTo(0.1, 12);
  });

  it('ranks, bounds and renders the fixture end to end', () => {
    const { records } = loadRecords();

    const result = runAnalysis({ scores: records }, config, { logger, metrics });
    const [baseline, regulator] = result.schemes;

    // Deterministic baseline: 5.0, 4.0, 3.9, 3.5, 2.7, 1.0
    expect(baseline.baseline.map((row) => row.intervention)).toEqual([
      'Alpha',
      'Charlie',
      'Bravo',
      'Delta',
      'Echo',
      'Foxtrot',
    ]);
    expect(regulator.scheme).toBe('regulator_focused');

    const alphaInterval = baseline.intervals[0];
    expect(alphaInterval.intervention).toBe('Alpha');
    expect(alphaInterval.mean).toBeGreaterThanOrEqual(4.5);
    expect(alphaInterval.p97_5).toBeLessThanOrEqual(5 + 1e-9);
    expect(baseline.intervals[5].intervention).toBe('Foxtrot');
    expect(baseline.intervals[5].p2_5).toBeGreaterThanOrEqual(1 - 1e-9);

    expect(baseline.robustness[0]).toMatchObject({ intervention: 'Alpha', meanRank: 1, pTop1: 1, pTop3: 1 });
    expect(baseline.robustness[5]).toMatchObject({ intervention: 'Foxtrot', meanRank: 6, pTop1: 0, pTop3: 0 });

    const intervalLines = formatIntervalCsv(baseline.intervals).split('\n');
    expect(intervalLines[0]).toBe('Intervention,WeightedScore_Mean,WeightedScore_P2_5,WeightedScore_P97_5');
    expect(intervalLines).toHaveLength(8);
    expect(intervalLines[7]).toBe('');

    const robustnessLines = formatRobustnessCsv(baseline.robustness).split('\n');
    expect(robustnessLines[1]).toBe('Alpha,5,1,1,1,1,1');
  });

  it('derives readiness and impact for every intervention', () => {
    const { records } = loadRecords();

    const { perspectives } = runAnalysis({ scores: records }, config, { logger, metrics });

    expect(perspectives.map((row) => row.translationalReadiness)).toEqual([5, 4, 5, 2, 4, 1]);
    expect(perspectives[1].agingImpact).toBeCloseTo(4, 12);
  });

  it('repeats exactly for the same configuration', () => {
    const { records } = loadRecords();

    const first = runAnalysis({ scores: records }, config, { logger, metrics });
    const second = runAnalysis({ scores: records }, config, { logger, metrics });

    expect(second.schemes).toEqual(first.schemes);
    expect(second.perspectives).toEqual(first.perspectives);
    expect(metrics.getCounter(MetricNames.ANALYSIS_RUN_COUNT)).toBe(2);
    expect(logger.getLogEntries().filter((entry) => entry.message === 'Analysis completed')).toHaveLength(2);
  });
});
