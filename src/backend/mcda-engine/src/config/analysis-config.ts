/**
 * Analysis Configuration
 *
 * Every tunable parameter of a run: trial counts, jitter half-width, weight
 * perturbation fraction, both seeds, target schemes and the jitter boundary
 * policy. Values are validated before any computation starts.
 *
 * @tested tests/property/analysis-config.property.test.ts
 */

import { z } from 'zod';
import { ConfigurationError, SchemeName, SchemeNameSchema, toFieldIssues } from '@geromcda/shared';

/**
 * How jittered scores are treated at the edges of the valid score range
 * - clamp: each sampled score is clamped to [1, 5]
 * - none: sampled scores may leave [1, 5]
 */
export const JitterBoundary = {
  CLAMP: 'clamp',
  NONE: 'none',
} as const;

export type JitterBoundary = (typeof JitterBoundary)[keyof typeof JitterBoundary];

export const JitterBoundarySchema = z.enum(['clamp', 'none']);

const TrialCountSchema = z
  .number()
  .int('Trial count must be an integer')
  .positive('Trial count must be positive');

const SeedSchema = z
  .number()
  .int('Seed must be an integer')
  .min(0, 'Seed must not be negative')
  .max(0xffffffff, 'Seed must fit in 32 bits');

const JitterSchema = z.number().finite().positive('Jitter half-width must be positive');

const PerturbationSchema = z
  .number()
  .finite()
  .min(0, 'Perturbation fraction must not be negative')
  .lt(1, 'Perturbation fraction must be below 1.0');

/**
 * Full analysis configuration schema
 */
export const AnalysisConfigSchema = z
  .object({
    scoreTrials: TrialCountSchema.default(10_000),
    weightTrials: TrialCountSchema.default(10_000),
    scoreJitter: JitterSchema.default(0.5),
    weightPerturbation: PerturbationSchema.default(0.05),
    scoreSeed: SeedSchema.default(42),
    weightSeed: SeedSchema.default(123),
    targetSchemes: z.array(SchemeNameSchema).min(1, 'At least one target scheme is required').default([SchemeName.BASELINE]),
    jitterBoundary: JitterBoundarySchema.default(JitterBoundary.CLAMP),
  })
  .strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});

/**
 * Parameters of the Monte Carlo score-interval estimator
 */
export const ScoreIntervalParamsSchema = z
  .object({
    trials: TrialCountSchema,
    jitter: JitterSchema,
    boundary: JitterBoundarySchema.default(JitterBoundary.CLAMP),
  })
  .strict();

export type ScoreIntervalParams = z.infer<typeof ScoreIntervalParamsSchema>;
export type ScoreIntervalParamsInput = z.input<typeof ScoreIntervalParamsSchema>;

/**
 * Parameters of the weight-perturbation robustness analyzer
 */
export const RankRobustnessParamsSchema = z
  .object({
    trials: TrialCountSchema,
    perturbation: PerturbationSchema,
  })
  .strict();

export type RankRobustnessParams = z.infer<typeof RankRobustnessParamsSchema>;

/**
 * Parses a value against a schema, raising ConfigurationError with
 * field-level issues on failure
 */
export function parseParameters<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}`, toFieldIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Merges overrides over the defaults and validates the result
 *
 * @throws ConfigurationError on any invalid parameter
 */
export function resolveAnalysisConfig(overrides: unknown = {}): AnalysisConfig {
  return parseParameters(AnalysisConfigSchema, overrides, 'analysis configuration');
}

/**
 * Environment variables read by analysisConfigFromEnv
 */
export const CONFIG_ENV_VARS = {
  scoreTrials: 'MCDA_SCORE_TRIALS',
  weightTrials: 'MCDA_WEIGHT_TRIALS',
  scoreJitter: 'MCDA_SCORE_JITTER',
  weightPerturbation: 'MCDA_WEIGHT_PERTURBATION',
  scoreSeed: 'MCDA_SCORE_SEED',
  weightSeed: 'MCDA_WEIGHT_SEED',
  targetSchemes: 'MCDA_TARGET_SCHEMES',
  jitterBoundary: 'MCDA_JITTER_BOUNDARY',
} as const;

const NUMERIC_KEYS = [
  'scoreTrials',
  'weightTrials',
  'scoreJitter',
  'weightPerturbation',
  'scoreSeed',
  'weightSeed',
] as const;

/**
 * Builds a configuration from MCDA_* environment variables; unset variables
 * fall back to the defaults
 *
 * @throws ConfigurationError when a set variable does not parse
 */
export function analysisConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const raw: Record<string, unknown> = {};

  for (const key of NUMERIC_KEYS) {
    const value = env[CONFIG_ENV_VARS[key]];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = Number(value);
    }
  }

  const schemes = env[CONFIG_ENV_VARS.targetSchemes];
  if (schemes !== undefined && schemes.trim() !== '') {
    raw.targetSchemes = schemes.split(',').map((name) => name.trim());
  }

  const boundary = env[CONFIG_ENV_VARS.jitterBoundary];
  if (boundary !== undefined && boundary.trim() !== '') {
    raw.jitterBoundary = boundary.trim();
  }

  return resolveAnalysisConfig(raw);
}
