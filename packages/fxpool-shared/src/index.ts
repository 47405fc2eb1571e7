/**
 * @fxpool/shared
 *
 * Pure types and math for the FX pool pricing engine.
 * No I/O: everything here is deterministic over its inputs.
 */

// Export all types
export * from './types/index.js';

// Export the error taxonomy
export * from './errors/index.js';

// Export all utilities
export * from './utils/index.js';
