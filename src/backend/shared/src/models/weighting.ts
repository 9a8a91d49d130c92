/**
 * Weighting Scheme Data Models and Zod Schemas
 *
 * A weighting scheme is a named weight vector over the six domains that sums
 * to 1.0. Schemes represent stakeholder viewpoints; nothing downstream reads
 * anything but the weights.
 *
 * @tested tests/property/table-validation.property.test.ts
 */

import { z } from 'zod';

import { DOMAINS, type DomainValues } from './domain.js';

/**
 * Tolerance for the weights-sum-to-one invariant
 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Inclusive valid range for a single weight
 */
export const WEIGHT_RANGE = {
  min: 0,
  max: 1,
} as const;

const weightValueSchema = z.number({
  required_error: 'Domain weight is required',
  invalid_type_error: 'Domain weight must be a number',
}).finite();

/**
 * Domain weights schema: exactly the six canonical codes, all numeric
 */
export const DomainWeightsSchema = z
  .object({
    lifespan_efficacy: weightValueSchema,
    healthspan_efficacy: weightValueSchema,
    mechanism_conservation: weightValueSchema,
    human_trial_evidence: weightValueSchema,
    safety_tolerability: weightValueSchema,
    cost_accessibility: weightValueSchema,
  })
  .strict();

export type DomainWeights = z.infer<typeof DomainWeightsSchema>;

export const SchemeNameSchema = z
  .string()
  .trim()
  .min(1, 'Scheme name must not be empty')
  .max(100);

/**
 * A validated, immutable weighting scheme
 */
export interface WeightingScheme {
  readonly name: string;
  readonly weights: DomainValues;
}

/**
 * Built-in stakeholder scheme names
 */
export const SchemeName = {
  BASELINE: 'baseline',
  REGULATOR: 'regulator_focused',
  INVESTOR: 'investor_focused',
  PATIENT: 'patient_focused',
} as const;

export type SchemeName = (typeof SchemeName)[keyof typeof SchemeName];

/**
 * Default stakeholder weight profiles
 * - baseline: evidence-weighted default (lifespan 30%, human trials and safety 20% each)
 * - regulator: clinical evidence and safety
 * - investor: efficacy outcomes
 * - patient: balanced across quality of life, safety and access
 */
export const DEFAULT_WEIGHTING_SCHEMES: Readonly<Record<SchemeName, DomainWeights>> = {
  baseline: {
    lifespan_efficacy: 0.3,
    healthspan_efficacy: 0.1,
    mechanism_conservation: 0.1,
    human_trial_evidence: 0.2,
    safety_tolerability: 0.2,
    cost_accessibility: 0.1,
  },
  regulator_focused: {
    lifespan_efficacy: 0.1,
    healthspan_efficacy: 0.1,
    mechanism_conservation: 0,
    human_trial_evidence: 0.3,
    safety_tolerability: 0.4,
    cost_accessibility: 0.1,
  },
  investor_focused: {
    lifespan_efficacy: 0.4,
    healthspan_efficacy: 0.2,
    mechanism_conservation: 0.1,
    human_trial_evidence: 0.1,
    safety_tolerability: 0.1,
    cost_accessibility: 0.1,
  },
  patient_focused: {
    lifespan_efficacy: 0.15,
    healthspan_efficacy: 0.15,
    mechanism_conservation: 0,
    human_trial_evidence: 0.25,
    safety_tolerability: 0.3,
    cost_accessibility: 0.15,
  },
};

/**
 * Sums weights in canonical domain order
 */
export function sumWeights(weights: DomainValues): number {
  return DOMAINS.reduce((sum, domain) => sum + weights[domain], 0);
}

/**
 * Builds domain weights from a vector in canonical domain order
 */
export function weightsFromVector(vector: ArrayLike<number>): DomainWeights {
  return {
    lifespan_efficacy: vector[0],
    healthspan_efficacy: vector[1],
    mechanism_conservation: vector[2],
    human_trial_evidence: vector[3],
    safety_tolerability: vector[4],
    cost_accessibility: vector[5],
  };
}
