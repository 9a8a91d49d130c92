/**
 * Scoring Module Exports
 *
 * Exports weighted scoring, ranking and stakeholder perspectives.
 */

export * from './weighted-scorer.js';
export * from './stakeholder-perspectives.js';
