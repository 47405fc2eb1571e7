export * from './fx-pool-error.js';
