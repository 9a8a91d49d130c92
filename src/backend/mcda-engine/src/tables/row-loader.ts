/**
 * Spreadsheet Row Loader
 *
 * Turns rows as a spreadsheet reader returns them (one object per row, keyed
 * by header text) into a Domain Score Table. Headers are resolved through the
 * display-name mapping; a "(NN%)" suffix marks a domain column and carries
 * its weight.
 *
 * @tested tests/integration/row-loading.integration.test.ts
 */

import {
  DOMAINS,
  SchemaError,
  SchemeName,
  parseDomainHeader,
  type Domain,
  type DomainScores,
  type FieldIssue,
  type WeightingScheme,
} from '@geromcda/shared';

import { createScoreTable, type DomainScoreTable } from './score-table.js';
import { normalizeRelativeWeights } from './weighting-table.js';

export interface RowLoadOptions {
  /** Header of the identifier column */
  idColumn?: string;
  /** Name given to the scheme derived from header weight suffixes */
  headerSchemeName?: string;
}

export interface RowLoadResult {
  table: DomainScoreTable;
  /** Domain → source header */
  columns: Readonly<Record<Domain, string>>;
  /** Present when every domain header carries a "(NN%)" weight */
  headerScheme?: WeightingScheme;
}

const DEFAULT_ID_COLUMN = 'Intervention';

function collectHeaders(rows: ReadonlyArray<Record<string, unknown>>): string[] {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      headers.add(key);
    }
  }
  return [...headers];
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return Number.NaN;
}

function isPlainRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads a score table from spreadsheet-shaped rows
 *
 * @throws SchemaError on a missing identifier column, an unknown weighted
 *   header, a duplicated or missing domain, or non-numeric cells
 * @throws OutOfRangeError when a score lies outside [1, 5]
 */
export function loadScoreTableFromRows(input: unknown, options: RowLoadOptions = {}): RowLoadResult {
  const idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;

  if (!Array.isArray(input)) {
    throw new SchemaError('Rows must be an array of objects keyed by header');
  }
  const rows: Record<string, unknown>[] = [];
  for (const row of input) {
    if (!isPlainRow(row)) {
      throw new SchemaError('Rows must be an array of objects keyed by header');
    }
    rows.push(row);
  }

  const headers = collectHeaders(rows);
  if (!headers.includes(idColumn)) {
    throw new SchemaError(`Required column "${idColumn}" not found`, [
      { path: idColumn, message: 'Identifier column is required' },
    ]);
  }

  const columnFor = new Map<Domain, string>();
  const headerWeights = new Map<Domain, number>();
  const issues: FieldIssue[] = [];

  for (const header of headers) {
    if (header === idColumn) continue;

    const parsed = parseDomainHeader(header);
    if (!parsed.domain) {
      if (parsed.weight !== undefined) {
        issues.push({ path: header, message: 'Weighted column does not name a known domain' });
      }
      continue;
    }

    const existing = columnFor.get(parsed.domain);
    if (existing !== undefined) {
      issues.push({ path: header, message: `Duplicates domain ${parsed.domain} (already read from "${existing}")` });
      continue;
    }

    columnFor.set(parsed.domain, header);
    if (parsed.weight !== undefined) {
      headerWeights.set(parsed.domain, parsed.weight);
    }
  }

  for (const domain of DOMAINS) {
    if (!columnFor.has(domain)) {
      issues.push({ path: domain, message: 'Domain column is missing' });
    }
  }

  if (issues.length > 0) {
    throw new SchemaError('Domain columns do not match the canonical domains', issues);
  }

  const columnOf = (domain: Domain): string => columnFor.get(domain) ?? domain;
  const columns: Record<Domain, string> = {
    lifespan_efficacy: columnOf('lifespan_efficacy'),
    healthspan_efficacy: columnOf('healthspan_efficacy'),
    mechanism_conservation: columnOf('mechanism_conservation'),
    human_trial_evidence: columnOf('human_trial_evidence'),
    safety_tolerability: columnOf('safety_tolerability'),
    cost_accessibility: columnOf('cost_accessibility'),
  };
  const badColumns = new Set<string>();

  const records = rows.map((row, index) => {
    const rawId = row[idColumn];
    const id = rawId === undefined || rawId === null ? '' : String(rawId).trim();
    if (id === '') {
      throw new SchemaError(`Row ${index} has no intervention identifier`, [
        { path: `${index}.${idColumn}`, message: 'Identifier must not be empty' },
      ]);
    }

    const read = (domain: Domain): number => {
      const value = toNumber(row[columns[domain]]);
      if (!Number.isFinite(value)) {
        badColumns.add(columns[domain]);
      }
      return value;
    };

    const scores: DomainScores = {
      lifespan_efficacy: read('lifespan_efficacy'),
      healthspan_efficacy: read('healthspan_efficacy'),
      mechanism_conservation: read('mechanism_conservation'),
      human_trial_evidence: read('human_trial_evidence'),
      safety_tolerability: read('safety_tolerability'),
      cost_accessibility: read('cost_accessibility'),
    };

    return { id, scores };
  });

  if (badColumns.size > 0) {
    const bad = [...badColumns];
    throw new SchemaError(
      `Non-numeric values detected in domain columns: ${bad.join(', ')}`,
      bad.map((column) => ({ path: column, message: 'Expected a number' }))
    );
  }

  const table = createScoreTable(records);

  let headerScheme: WeightingScheme | undefined;
  if (headerWeights.size === DOMAINS.length) {
    const relative = Object.fromEntries(headerWeights);
    headerScheme = normalizeRelativeWeights(options.headerSchemeName ?? SchemeName.BASELINE, relative);
  }

  return { table, columns, headerScheme };
}
