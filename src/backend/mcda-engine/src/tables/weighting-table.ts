/**
 * Weighting Scheme Table
 *
 * Validates named weight vectors when they are loaded: every domain present,
 * each weight inside [0, 1], and the vector summing to 1.0 within 1e-6.
 * Relative weights (slider values, header percentages) can be normalized into
 * a scheme first.
 *
 * @tested tests/property/table-validation.property.test.ts
 */

import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_WEIGHTING_SCHEMES,
  DOMAINS,
  DomainWeightsSchema,
  OutOfRangeError,
  SchemaError,
  SchemeNameSchema,
  WEIGHT_RANGE,
  WEIGHT_SUM_TOLERANCE,
  WeightSumError,
  sumWeights,
  toFieldIssues,
  type DomainWeights,
  type WeightingScheme,
} from '@geromcda/shared';

/**
 * Validated schemes keyed by name, in load order
 */
export type WeightingSchemeTable = ReadonlyMap<string, WeightingScheme>;

function parseSchemeName(name: unknown): string {
  const parsed = SchemeNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new SchemaError('Invalid weighting scheme name', toFieldIssues(parsed.error.issues, 'name'));
  }
  return parsed.data;
}

function parseWeights(name: string, weights: unknown): DomainWeights {
  const parsed = DomainWeightsSchema.safeParse(weights);
  if (!parsed.success) {
    throw new SchemaError(
      `Invalid weights for scheme "${name}"`,
      toFieldIssues(parsed.error.issues, name)
    );
  }
  return parsed.data;
}

/**
 * Loads one weighting scheme
 *
 * @throws SchemaError when a weight is missing, unknown or non-numeric
 * @throws OutOfRangeError when a weight lies outside [0, 1]
 * @throws WeightSumError when the weights do not sum to 1.0 within tolerance
 */
export function loadWeightingScheme(name: unknown, weights: unknown): WeightingScheme {
  const schemeName = parseSchemeName(name);
  const parsed = parseWeights(schemeName, weights);

  for (const domain of DOMAINS) {
    const value = parsed[domain];
    if (value < WEIGHT_RANGE.min || value > WEIGHT_RANGE.max) {
      throw new OutOfRangeError(
        `Weight for ${domain} in scheme "${schemeName}" must be within [0, 1], got ${value}`,
        `${schemeName}.${domain}`,
        value,
        WEIGHT_RANGE
      );
    }
  }

  const observedSum = sumWeights(parsed);
  if (Math.abs(observedSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new WeightSumError(schemeName, observedSum, WEIGHT_SUM_TOLERANCE);
  }

  return Object.freeze({ name: schemeName, weights: Object.freeze({ ...parsed }) });
}

/**
 * Loads a table of schemes from a name → weights mapping
 */
export function loadWeightingSchemeTable(input: unknown): WeightingSchemeTable {
  const parsed = z.record(z.string(), z.unknown()).safeParse(input);
  if (!parsed.success) {
    throw new SchemaError('Weighting scheme table must be an object', toFieldIssues(parsed.error.issues));
  }

  const entries = Object.entries(parsed.data);
  if (entries.length === 0) {
    throw new SchemaError('Weighting scheme table must contain at least one scheme');
  }

  const table = new Map<string, WeightingScheme>();
  for (const [name, weights] of entries) {
    const scheme = loadWeightingScheme(name, weights);
    if (table.has(scheme.name)) {
      throw new SchemaError(`Duplicate weighting scheme name "${scheme.name}"`, [
        { path: name, message: 'Scheme names must be unique after trimming' },
      ]);
    }
    table.set(scheme.name, scheme);
  }
  return table;
}

/**
 * Table of the built-in stakeholder schemes
 */
export function defaultWeightingSchemeTable(): WeightingSchemeTable {
  return loadWeightingSchemeTable(DEFAULT_WEIGHTING_SCHEMES);
}

/**
 * Normalizes non-negative relative weights so they sum to 1 and loads the
 * result as a scheme. A weight of 8 out of a total of 40 becomes 0.2.
 *
 * @throws WeightSumError when the relative weights sum to zero
 */
export function normalizeRelativeWeights(name: unknown, relativeWeights: unknown): WeightingScheme {
  const schemeName = parseSchemeName(name);
  const parsed = parseWeights(schemeName, relativeWeights);

  for (const domain of DOMAINS) {
    if (parsed[domain] < 0) {
      throw new OutOfRangeError(
        `Relative weight for ${domain} in scheme "${schemeName}" must not be negative, got ${parsed[domain]}`,
        `${schemeName}.${domain}`,
        parsed[domain],
        { min: 0, max: Number.POSITIVE_INFINITY }
      );
    }
  }

  const total = sumWeights(parsed);
  if (total <= 0) {
    throw new WeightSumError(schemeName, total, WEIGHT_SUM_TOLERANCE);
  }

  const normalized: DomainWeights = {
    lifespan_efficacy: parsed.lifespan_efficacy / total,
    healthspan_efficacy: parsed.healthspan_efficacy / total,
    mechanism_conservation: parsed.mechanism_conservation / total,
    human_trial_evidence: parsed.human_trial_evidence / total,
    safety_tolerability: parsed.safety_tolerability / total,
    cost_accessibility: parsed.cost_accessibility / total,
  };

  return loadWeightingScheme(schemeName, normalized);
}

/**
 * Resolves a scheme by name
 *
 * @throws ConfigurationError when the table has no scheme of that name
 */
export function requireScheme(table: WeightingSchemeTable, name: string): WeightingScheme {
  const scheme = table.get(name);
  if (!scheme) {
    throw new ConfigurationError(`Unknown weighting scheme "${name}"`, [
      {
        path: 'targetSchemes',
        message: `Expected one of: ${[...table.keys()].join(', ')}`,
      },
    ]);
  }
  return scheme;
}
