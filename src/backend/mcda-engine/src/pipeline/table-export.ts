/**
 * Output Table Export
 *
 * Maps analysis summaries to rows keyed by the canonical output column names
 * and renders rows as CSV text. Writing the text anywhere is left to the
 * caller.
 *
 * @tested tests/integration/table-export.integration.test.ts
 */

import {
  INTERVAL_COLUMNS,
  ROBUSTNESS_COLUMNS,
  type IntervalRecord,
  type IntervalSummary,
  type PerspectiveRanking,
  type RobustnessRecord,
  type RobustnessSummary,
} from '@geromcda/shared';

export type CsvValue = string | number;

export function toIntervalRecords(rows: ReadonlyArray<IntervalSummary>): IntervalRecord[] {
  return rows.map((row) => ({
    Intervention: row.intervention,
    WeightedScore_Mean: row.mean,
    WeightedScore_P2_5: row.p2_5,
    WeightedScore_P97_5: row.p97_5,
  }));
}

export function toRobustnessRecords(rows: ReadonlyArray<RobustnessSummary>): RobustnessRecord[] {
  return rows.map((row) => ({
    Intervention: row.intervention,
    BaseWeightedScore: row.baseWeightedScore,
    MeanRank: row.meanRank,
    Rank_P2_5: row.rankP2_5,
    Rank_P97_5: row.rankP97_5,
    P_Top1: row.pTop1,
    P_Top3: row.pTop3,
  }));
}

/**
 * Column names of the perspective table for the given schemes:
 * Intervention, then `<scheme>_score` and `<scheme>_rank` per scheme, then
 * the derived metrics and the category
 */
export function perspectiveColumns(schemes: ReadonlyArray<string>): string[] {
  return [
    'Intervention',
    ...schemes.flatMap((scheme) => [`${scheme}_score`, `${scheme}_rank`]),
    'Translational_Readiness',
    'Aging_Impact',
    'Category',
  ];
}

export function toPerspectiveRecords(rows: ReadonlyArray<PerspectiveRanking>): Record<string, CsvValue>[] {
  return rows.map((row) => {
    const record: Record<string, CsvValue> = { Intervention: row.intervention };
    for (const [scheme, standing] of Object.entries(row.standings)) {
      record[`${scheme}_score`] = standing.score;
      record[`${scheme}_rank`] = standing.rank;
    }
    record.Translational_Readiness = row.translationalReadiness;
    record.Aging_Impact = row.agingImpact;
    record.Category = row.category;
    return record;
  });
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quotes a field when it contains a comma, a double quote or a line break
 */
export function escapeCsvField(value: CsvValue): string {
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Renders rows as CSV: a header line, then one line per row, each ending
 * in `\n`. Missing values render as empty fields.
 */
export function formatCsv<K extends string>(
  columns: ReadonlyArray<K>,
  rows: ReadonlyArray<Partial<Record<K, CsvValue>>>
): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => {
      const value = row[column];
      return value === undefined ? '' : escapeCsvField(value);
    }).join(','));
  }
  return lines.map((line) => `${line}\n`).join('');
}

export function formatIntervalCsv(rows: ReadonlyArray<IntervalSummary>): string {
  return formatCsv(INTERVAL_COLUMNS, toIntervalRecords(rows));
}

export function formatRobustnessCsv(rows: ReadonlyArray<RobustnessSummary>): string {
  return formatCsv(ROBUSTNESS_COLUMNS, toRobustnessRecords(rows));
}
