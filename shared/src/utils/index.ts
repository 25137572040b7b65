/**
 * Shared utilities
 * @module utils
 */

export * from './logging/index.js';
export * from './validators/index.js';
export * from './errorTypes.js';
