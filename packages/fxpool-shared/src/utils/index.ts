/**
 * Utility functions for FX pool pricing
 */

// 64.64 fixed point
export * from './fixed-point/index.js';

// Decimal utilities
export * from './decimals.js';

// Conversion, liquidity, rebalance and slippage math
export * from './fx-curve/index.js';
