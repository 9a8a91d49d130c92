/**
 * Analysis Error Taxonomy
 *
 * Every error is raised at the boundary (table load or parameter validation)
 * before any computation starts; no partial results are produced.
 */

import type { ZodIssue } from 'zod';

export const ErrorCode = {
  SCHEMA: 'SCHEMA_ERROR',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  WEIGHT_SUM: 'WEIGHT_SUM_ERROR',
  CONFIGURATION: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Field-level detail for a rejected input
 */
export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * Maps zod issues to field-level details
 */
export function toFieldIssues(issues: readonly ZodIssue[], prefix?: string): FieldIssue[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return {
      path: prefix ? [prefix, path].filter(Boolean).join('.') : path,
      message: issue.message,
    };
  });
}

/**
 * Base class for analysis errors
 */
export class McdaError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'McdaError';
  }
}

/**
 * A required column or score is missing, non-numeric or unknown
 */
export class SchemaError extends McdaError {
  constructor(
    message: string,
    public readonly issues: FieldIssue[] = []
  ) {
    super(message, ErrorCode.SCHEMA, { issues });
    this.name = 'SchemaError';
  }
}

/**
 * A score or weight lies outside its declared range at load time.
 * Extends the built-in RangeError so `instanceof RangeError` still holds.
 */
export class OutOfRangeError extends RangeError {
  public readonly code = ErrorCode.OUT_OF_RANGE;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    public readonly field: string,
    public readonly value: number,
    public readonly range: { min: number; max: number }
  ) {
    super(message);
    this.name = 'OutOfRangeError';
    this.details = { field, value, range };
  }
}

/**
 * A weighting scheme's weights do not sum to 1.0 within tolerance
 */
export class WeightSumError extends McdaError {
  constructor(
    public readonly scheme: string,
    public readonly observedSum: number,
    public readonly tolerance: number
  ) {
    super(
      `Weights for scheme "${scheme}" must sum to 1.0 (±${tolerance}), got ${observedSum}`,
      ErrorCode.WEIGHT_SUM,
      { scheme, observedSum, tolerance }
    );
    this.name = 'WeightSumError';
  }
}

/**
 * An analysis parameter is invalid
 */
export class ConfigurationError extends McdaError {
  constructor(
    message: string,
    public readonly issues: FieldIssue[] = []
  ) {
    super(message, ErrorCode.CONFIGURATION, { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for errors carrying an analysis error code
 */
export function isAnalysisError(error: unknown): error is McdaError | OutOfRangeError {
  return error instanceof McdaError || error instanceof OutOfRangeError;
}
