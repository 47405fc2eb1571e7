import type { Fixed64x64 } from '../utils/fixed-point/index.js';
import type { FxToken, Hex32, HexAddress } from './token.js';

/**
 * Pool weights, both 64.64 in (0, 1], summing to exactly 1.0
 */
export interface WeightedPair {
  baseWeight: Fixed64x64;
  quoteWeight: Fixed64x64;
}

/**
 * Curve parameters of an FX pool
 *
 * Onboarding metadata: validated when the pool is onboarded and passed through
 * to the vault-side curve, which prices swaps with them. Liquidity and
 * rebalance pricing here never reads them.
 *
 * All values are 64.64 fractions except protocolPercentFee, which is a
 * whole-number percentage of the swap fee routed to the protocol.
 */
export interface CurveParameters {
  alpha: Fixed64x64;
  beta: Fixed64x64;
  delta: Fixed64x64;
  /** Percent fee charged on swaps */
  epsilon: Fixed64x64;
  lambda: Fixed64x64;
  protocolPercentFee: bigint;
}

/**
 * Immutable description of an onboarded pool
 */
export interface FxPoolConfig {
  poolId: Hex32;
  /** Pool share token (BPT) address */
  poolAddress: HexAddress;
  baseToken: FxToken;
  quoteToken: FxToken;
  /** Aggregator feeding the base token's USD rate */
  baseOracle: HexAddress;
  weights: WeightedPair;
  curve: CurveParameters;
}

/**
 * Pool balances as the ledger reports them, in canonical (ascending address) order
 */
export interface LedgerPoolTokens {
  tokens: HexAddress[];
  balances: bigint[];
}

/**
 * Raw pool balances mapped onto pool sides
 *
 * Always read fresh from the ledger; never cached across calls.
 */
export interface PoolBalances {
  baseRaw: bigint;
  quoteRaw: bigint;
  /** Index of the base token in the ledger's canonical ordering */
  baseIndex: 0 | 1;
  /** Index of the quote token in the ledger's canonical ordering */
  quoteIndex: 0 | 1;
}
