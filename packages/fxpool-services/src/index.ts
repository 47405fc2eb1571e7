/**
 * FX Pool Engine - Services
 *
 * Pricing and orchestration for two-asset FX pools:
 * - assimilators converting token amounts to and from the USD numeraire
 * - curve liquidity and share math against the balance ledger
 * - rebalance-then-deposit and pool-to-pool migration
 * - pool onboarding
 */

// Re-export shared types and math from @fxpool/shared
export * from '@fxpool/shared';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

// Export services
export * from './services/assimilator/index.js';
export * from './services/pool/index.js';
export * from './services/curve/index.js';
export * from './services/rebalance/index.js';
export * from './services/operations/index.js';
