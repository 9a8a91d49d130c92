/**
 * Domain Data Models and Zod Schemas
 *
 * Defines the closed set of six evaluation domains, the display-name mapping
 * used when reading spreadsheet headers, and the canonical schema for an
 * intervention's domain scores.
 *
 * @tested tests/property/table-validation.property.test.ts
 * @tested tests/integration/row-loading.integration.test.ts
 */

import { z } from 'zod';

/**
 * Canonical domain codes in their fixed evaluation order
 */
export const DOMAINS = [
  'lifespan_efficacy',
  'healthspan_efficacy',
  'mechanism_conservation',
  'human_trial_evidence',
  'safety_tolerability',
  'cost_accessibility',
] as const;

export type Domain = (typeof DOMAINS)[number];

export const DOMAIN_COUNT = DOMAINS.length;

/**
 * A numeric value per canonical domain
 */
export type DomainValues = Readonly<Record<Domain, number>>;

/**
 * Inclusive valid range for a domain score at load time
 */
export const SCORE_RANGE = {
  min: 1,
  max: 5,
} as const;

/**
 * Display names and accepted header aliases per domain
 */
export const DOMAIN_DISPLAY_NAMES: Readonly<Record<Domain, { label: string; aliases: readonly string[] }>> = {
  lifespan_efficacy: {
    label: 'Preclinical Efficacy (Lifespan)',
    aliases: ['Lifespan', 'Lifespan Extension', 'Lifespan Efficacy'],
  },
  healthspan_efficacy: {
    label: 'Preclinical Efficacy (Healthspan)',
    aliases: ['Healthspan', 'Healthspan Benefits', 'Healthspan Efficacy'],
  },
  mechanism_conservation: {
    label: 'Mechanism Conservation',
    aliases: ['Conservation'],
  },
  human_trial_evidence: {
    label: 'Human Trial Evidence',
    aliases: ['Human Trials', 'Human', 'Human Evidence'],
  },
  safety_tolerability: {
    label: 'Safety & Tolerability',
    aliases: ['Safety', 'Safety and Tolerability'],
  },
  cost_accessibility: {
    label: 'Cost & Accessibility',
    aliases: ['Cost/Access', 'Cost', 'Cost and Accessibility'],
  },
};

/**
 * Trailing weight suffix on a spreadsheet header, e.g. "Lifespan (30%)"
 */
export const HEADER_WEIGHT_PATTERN = /\((\d+(?:\.\d+)?)\s*%\)\s*$/;

function normalizeHeader(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

const DISPLAY_NAME_LOOKUP: ReadonlyMap<string, Domain> = new Map(
  DOMAINS.flatMap((domain) => {
    const { label, aliases } = DOMAIN_DISPLAY_NAMES[domain];
    return [domain, label, ...aliases].map((name) => [normalizeHeader(name), domain] as const);
  })
);

/**
 * Parsed spreadsheet header
 */
export interface ParsedDomainHeader {
  header: string;
  domain: Domain | undefined;
  /** Weight fraction from a "(NN%)" suffix, if present */
  weight: number | undefined;
}

/**
 * Resolves a header to a canonical domain code.
 * The "(NN%)" suffix is stripped before lookup and reported as a fraction.
 */
export function parseDomainHeader(header: string): ParsedDomainHeader {
  const match = HEADER_WEIGHT_PATTERN.exec(header);
  const name = match ? header.slice(0, match.index) : header;
  const weight = match ? Number(match[1]) / 100 : undefined;

  return {
    header,
    domain: DISPLAY_NAME_LOOKUP.get(normalizeHeader(name)),
    weight,
  };
}

const domainValueSchema = z.number({
  required_error: 'Domain value is required',
  invalid_type_error: 'Domain value must be a number',
}).finite();

/**
 * Domain scores schema: exactly the six canonical codes, all numeric.
 * Range is checked separately so it can be reported as its own error.
 */
export const DomainScoresSchema = z
  .object({
    lifespan_efficacy: domainValueSchema,
    healthspan_efficacy: domainValueSchema,
    mechanism_conservation: domainValueSchema,
    human_trial_evidence: domainValueSchema,
    safety_tolerability: domainValueSchema,
    cost_accessibility: domainValueSchema,
  })
  .strict();

export type DomainScores = z.infer<typeof DomainScoresSchema>;

/**
 * Intervention record schema
 */
export const InterventionRecordSchema = z.object({
  id: z.string().trim().min(1, 'Intervention identifier must not be empty'),
  scores: DomainScoresSchema,
});

export type InterventionRecord = z.infer<typeof InterventionRecordSchema>;

/**
 * A validated, immutable intervention
 */
export interface Intervention {
  readonly id: string;
  readonly scores: DomainValues;
  /** Zero-based position in the input table; the ranking tie-break key */
  readonly order: number;
}

/**
 * Copies domain values into a fixed-size vector in canonical domain order
 */
export function toDomainVector(values: DomainValues): Float64Array {
  const vector = new Float64Array(DOMAIN_COUNT);
  DOMAINS.forEach((domain, index) => {
    vector[index] = values[domain];
  });
  return vector;
}
