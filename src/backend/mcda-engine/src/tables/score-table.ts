/**
 * Domain Score Table
 *
 * Validates intervention scores at load time: every canonical domain present
 * and numeric, every score inside [1, 5], identifiers unique. The resulting
 * table is frozen and keeps input order, which is the ranking tie-break key.
 *
 * @tested tests/property/table-validation.property.test.ts
 */

import { z } from 'zod';
import {
  DOMAINS,
  DomainScoresSchema,
  InterventionRecordSchema,
  OutOfRangeError,
  SCORE_RANGE,
  SchemaError,
  toFieldIssues,
  type DomainScores,
  type Intervention,
} from '@geromcda/shared';

/**
 * Validated interventions in input order
 */
export type DomainScoreTable = ReadonlyArray<Intervention>;

const RecordListSchema = z.array(InterventionRecordSchema);
const ScoreMapSchema = z.record(z.string(), DomainScoresSchema);

/**
 * Checks every domain score of one intervention against the valid range
 */
export function assertScoresInRange(id: string, scores: DomainScores): void {
  for (const domain of DOMAINS) {
    const value = scores[domain];
    if (value < SCORE_RANGE.min || value > SCORE_RANGE.max) {
      throw new OutOfRangeError(
        `Score for "${id}" in ${domain} must be within [${SCORE_RANGE.min}, ${SCORE_RANGE.max}], got ${value}`,
        `${id}.${domain}`,
        value,
        SCORE_RANGE
      );
    }
  }
}

/**
 * Builds a frozen table from already-parsed records
 */
export function createScoreTable(records: ReadonlyArray<{ id: string; scores: DomainScores }>): DomainScoreTable {
  if (records.length === 0) {
    throw new SchemaError('Domain score table must contain at least one intervention');
  }

  const seen = new Set<string>();
  const interventions = records.map((record, order) => {
    if (seen.has(record.id)) {
      throw new SchemaError(`Duplicate intervention identifier "${record.id}"`, [
        { path: `${order}.id`, message: 'Intervention identifiers must be unique' },
      ]);
    }
    seen.add(record.id);
    assertScoresInRange(record.id, record.scores);

    return Object.freeze({
      id: record.id,
      scores: Object.freeze({ ...record.scores }),
      order,
    });
  });

  return Object.freeze(interventions);
}

/**
 * Loads a domain score table.
 *
 * Accepts either a list of `{ id, scores }` records or a mapping of
 * identifier to scores. Mapping order follows object key order, so integer-like
 * identifiers are better passed as a list.
 *
 * @throws SchemaError when a domain is missing, unknown or non-numeric
 * @throws OutOfRangeError when a score lies outside [1, 5]
 */
export function loadDomainScoreTable(input: unknown): DomainScoreTable {
  if (Array.isArray(input)) {
    const parsed = RecordListSchema.safeParse(input);
    if (!parsed.success) {
      throw new SchemaError('Invalid domain score records', toFieldIssues(parsed.error.issues));
    }
    return createScoreTable(parsed.data);
  }

  const parsed = ScoreMapSchema.safeParse(input);
  if (!parsed.success) {
    throw new SchemaError('Invalid domain score mapping', toFieldIssues(parsed.error.issues));
  }
  return createScoreTable(Object.entries(parsed.data).map(([id, scores]) => ({ id, scores })));
}

/**
 * Looks up an intervention by identifier
 */
export function findIntervention(table: DomainScoreTable, id: string): Intervention | undefined {
  return table.find((intervention) => intervention.id === id);
}
