/**
 * Type exports for @fxpool/shared
 */

export * from './token.js';
export * from './rate.js';
export * from './pool.js';
export * from './plans.js';
export * from './operation-result.js';
