/**
 * Shared Package
 *
 * Domain models, schemas, error taxonomy, logging and metrics used by the
 * MCDA engine.
 */

// Domain models and schemas
export * from './models/domain.js';

// Weighting scheme models and schemas
export * from './models/weighting.js';

// Intervention category models
export * from './models/category.js';

// Analysis output models
export * from './models/analysis.js';

// Error taxonomy
export * from './errors/analysis-errors.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';
