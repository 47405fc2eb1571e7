export * from './conversion.js';
export * from './liquidity.js';
export * from './rebalance.js';
export * from './slippage.js';
