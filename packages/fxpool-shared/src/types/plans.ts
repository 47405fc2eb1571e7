import type { Fixed64x64 } from '../utils/fixed-point/index.js';
import type { Hex32, HexAddress, PoolSide } from './token.js';

/**
 * Gross numeraire liquidity of a pool and its per-side split
 */
export interface GrossLiquidity {
  total: Fixed64x64;
  /** [base, quote] */
  perSide: readonly [Fixed64x64, Fixed64x64];
}

/**
 * Priced deposit: shares to mint and the raw amounts the vault must receive
 *
 * A read-only computation; re-validated against the actually minted shares
 * at execution time.
 */
export interface DepositPlan {
  depositNumeraire: Fixed64x64;
  /** Pool shares, 18 decimals */
  expectedShares: bigint;
  baseTokenAmount: bigint;
  quoteTokenAmount: bigint;
  /** Liquidity the deposit was priced against */
  liquidity: GrossLiquidity;
  totalSupply: bigint;
}

/**
 * Priced withdrawal: raw amounts released for burning `shares`
 */
export interface WithdrawPlan {
  shares: bigint;
  baseTokenAmount: bigint;
  quoteTokenAmount: bigint;
  totalSupply: bigint;
}

/**
 * Rebalance state machine
 *
 * Balanced → NeedsQuoteIn | NeedsBaseIn → Swapped → LiquidityPriced → Executed
 */
export type RebalanceState =
  | 'Balanced'
  | 'NeedsQuoteIn'
  | 'NeedsBaseIn'
  | 'Swapped'
  | 'LiquidityPriced'
  | 'Executed';

/**
 * Swap needed to bring a pool back to its target ratio
 *
 * Ephemeral: recomputed on every call, never persisted.
 */
export interface RebalancePlan {
  poolId: Hex32;
  state: RebalanceState;
  /** Under-weight side that is swapped into the pool */
  targetAssetIn: PoolSide;
  tokenIn: HexAddress;
  tokenOut: HexAddress;
  /** Index of tokenIn in the ledger's canonical ordering */
  assetInIndex: 0 | 1;
  swapAmountInRaw: bigint;
  /** Filled once the swap has been quoted */
  swapAmountOutRaw: bigint;
  /** Quote-side share of oracle-priced liquidity before the swap */
  quoteRatio: Fixed64x64;
}

/**
 * Read-only envelope for a rebalance-then-deposit
 */
export interface RebalancedDepositQuote {
  minShares: bigint;
  maxBase: bigint;
  maxQuote: bigint;
  swapAsset: HexAddress | null;
  swapAmountRaw: bigint;
  rebalance: RebalancePlan;
  deposit: DepositPlan;
}

/**
 * Read-only envelope for moving a position between two pools
 */
export interface MigrationQuote {
  minShares: bigint;
  /** Base dust left with the caller (exit amount − new deposit amount) */
  baseDelta: bigint;
  /** Quote dust left with the caller */
  quoteDelta: bigint;
  withdraw: WithdrawPlan;
  deposit: DepositPlan;
}

export interface RebalancedDepositReceipt {
  poolId: Hex32;
  sharesMinted: bigint;
  /** Base paid into the pool across the swap and liquidity legs */
  baseSpent: bigint;
  /** Quote paid into the pool across the swap and liquidity legs */
  quoteSpent: bigint;
  /** Raw output the caller received from the swap leg */
  swapAmountOut: bigint;
  rebalance: RebalancePlan;
}

export interface MigrationReceipt {
  oldPoolId: Hex32;
  newPoolId: Hex32;
  sharesBurned: bigint;
  sharesMinted: bigint;
  baseWithdrawn: bigint;
  quoteWithdrawn: bigint;
  baseDust: bigint;
  quoteDust: bigint;
}
