/**
 * MCDA Engine
 *
 * Weighted scoring of geroscience interventions, Monte Carlo score intervals,
 * rank robustness under weight perturbation and stakeholder perspectives.
 */

export const VERSION = '1.0.0';

// Configuration
export * from './config/analysis-config.js';

// Random sources and statistics
export * from './random/seeded-random.js';
export * from './statistics/summary-statistics.js';

// Input tables
export * from './tables/index.js';

// Scoring and perspectives
export * from './scoring/index.js';

// Uncertainty analyses
export * from './uncertainty/index.js';

// Pipeline and export
export * from './pipeline/index.js';
