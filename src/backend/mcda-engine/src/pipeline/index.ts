/**
 * Pipeline Module Exports
 */

export * from './analysis-pipeline.js';
export * from './table-export.js';
