/**
 * Uncertainty Module Exports
 *
 * Exports Monte Carlo score intervals and weight-perturbation robustness.
 */

export * from './score-intervals.js';
export * from './rank-robustness.js';
