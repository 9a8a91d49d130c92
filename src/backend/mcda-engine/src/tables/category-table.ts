/**
 * Category Table
 *
 * Validates a caller-supplied intervention → category mapping. Identifiers
 * and labels are trimmed; identifiers that collide after trimming are
 * rejected.
 *
 * @tested tests/integration/perspective-rankings.integration.test.ts
 */

import {
  CategoryAssignmentsSchema,
  DEFAULT_CATEGORY_ASSIGNMENTS,
  SchemaError,
  toFieldIssues,
  type CategoryAssignments,
} from '@geromcda/shared';

/**
 * Loads category assignments from an identifier → category mapping
 *
 * @throws SchemaError on a non-object input, a blank identifier or label, or
 * a duplicate identifier
 */
export function loadCategoryAssignments(input: unknown): CategoryAssignments {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new SchemaError('Category assignments must be an object of identifier to category');
  }

  const assignments = new Map<string, string>();
  for (const [key, value] of Object.entries(input)) {
    const parsed = CategoryAssignmentsSchema.safeParse({ [key]: value });
    if (!parsed.success) {
      throw new SchemaError('Invalid category assignment', toFieldIssues(parsed.error.issues));
    }
    for (const [intervention, category] of Object.entries(parsed.data)) {
      if (assignments.has(intervention)) {
        throw new SchemaError(`Duplicate category assignment for "${intervention}"`, [
          { path: key, message: 'Intervention identifiers must be unique after trimming' },
        ]);
      }
      assignments.set(intervention, category);
    }
  }
  return assignments;
}

/**
 * The preset assignments when `input` is undefined, otherwise the validated
 * caller mapping
 */
export function resolveCategoryAssignments(input: unknown): CategoryAssignments {
  return input === undefined ? DEFAULT_CATEGORY_ASSIGNMENTS : loadCategoryAssignments(input);
}
