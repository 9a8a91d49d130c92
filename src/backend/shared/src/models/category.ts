/**
 * Intervention Category Models
 *
 * Categories are plain data: a mapping from intervention identifier to a
 * category label. The preset groups interventions by mechanism; callers may
 * supply their own mapping. Unmapped interventions fall back to "Other".
 *
 * @tested tests/integration/perspective-rankings.integration.test.ts
 */

import { z } from 'zod';

/**
 * Category labels used by the preset grouping
 */
export const InterventionCategory = {
  PHARMACOLOGICAL: 'Pharmacological',
  GENETIC_EPIGENETIC: 'Genetic & Epigenetic',
  CELLULAR_REGENERATIVE: 'Cellular & Regenerative',
  SYSTEMIC: 'Systemic & Other',
  OTHER: 'Other',
} as const;

export type InterventionCategory = (typeof InterventionCategory)[keyof typeof InterventionCategory];

export const DEFAULT_CATEGORY: string = InterventionCategory.OTHER;

/**
 * Intervention identifier → category label
 */
export type CategoryAssignments = ReadonlyMap<string, string>;

export const CategoryAssignmentsSchema = z.record(
  z.string().trim().min(1, 'Intervention identifier must not be empty'),
  z.string().trim().min(1, 'Category must not be empty')
);

/**
 * Preset mechanism groups, category → intervention identifiers
 */
export const DEFAULT_CATEGORY_GROUPS: Readonly<Record<string, readonly string[]>> = {
  [InterventionCategory.PHARMACOLOGICAL]: [
    'Rapamycin',
    'Metformin',
    'Acarbose',
    'GLP-1 agonists',
    'SGLT2 inhibitors',
    'Alpha-ketoglutarate',
    'Senolytics (D+Q)',
    'Fisetin',
    'NAD+ Restoration (NMN/NR)',
    'Mitochondria (Urolithin A)',
    'Elamipretide',
    'Spermidine',
    'Chloroquine',
    'Glutathione Precursors',
    'L-deprenyl',
    '17α-estradiol',
  ],
  [InterventionCategory.GENETIC_EPIGENETIC]: [
    'Epigenetic reprogramming',
    'Gene therapy',
    'Proteostasis & Nucleolus',
    'Telomere extension',
  ],
  [InterventionCategory.CELLULAR_REGENERATIVE]: [
    'Stem cell therapy',
    'Exosome therapy',
    'Chemical reprogramming',
    'Synthetic organs',
    'Immunotherapy senolytics',
    'Xenotransplantation',
  ],
  [InterventionCategory.SYSTEMIC]: [
    'Gut Microbiome Modulation',
    'Anti-inflammatory',
    'Plasma dilution/apheresis',
    'Young blood plasma',
  ],
};

/**
 * Flattens category groups into identifier → category assignments. An
 * identifier listed under several categories keeps the first one.
 */
export function categoryAssignmentsFromGroups(
  groups: Readonly<Record<string, readonly string[]>>
): CategoryAssignments {
  const assignments = new Map<string, string>();
  for (const [category, interventions] of Object.entries(groups)) {
    for (const intervention of interventions) {
      if (!assignments.has(intervention)) {
        assignments.set(intervention, category);
      }
    }
  }
  return assignments;
}

export const DEFAULT_CATEGORY_ASSIGNMENTS: CategoryAssignments = categoryAssignmentsFromGroups(DEFAULT_CATEGORY_GROUPS);

export function categorizeIntervention(
  intervention: string,
  assignments: CategoryAssignments = DEFAULT_CATEGORY_ASSIGNMENTS
): string {
  return assignments.get(intervention) ?? DEFAULT_CATEGORY;
}
