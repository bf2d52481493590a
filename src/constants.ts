/**
 * Centralized constants for toolscope.
 *
 * Re-exports the grouped constant modules so callers import from one place.
 */

export * from './constants/core.js';
export * from './constants/analysis.js';
