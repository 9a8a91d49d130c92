/**
 * Table Module Exports
 *
 * Exports score table, weighting scheme table, category assignments and
 * header-row loading.
 */

export * from './score-table.js';
export * from './weighting-table.js';
export * from './row-loader.js';
export * from './category-table.js';
