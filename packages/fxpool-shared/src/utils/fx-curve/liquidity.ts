import {
  type Fixed64x64,
  add,
  mulByInteger,
  mulDiv,
} from '../fixed-point/fixed-point.js';
import { InputError, InvariantViolation } from '../../errors/index.js';
import type { GrossLiquidity } from '../../types/index.js';
import { SHARE_DECIMALS, decimalsMultiplier } from '../decimals.js';

/**
 * Proportional liquidity math
 *
 * Share minting and per-side deposit / withdrawal sizing. All truncation
 * favours the pool: minted shares round down, amounts owed to the pool
 * round up, amounts released by the pool round down.
 */

export const SHARE_SCALE = decimalsMultiplier(SHARE_DECIMALS);

/** Added to each side's numeraire share before raw conversion (one 64.64 ulp) */
export const DEPOSIT_NUMERAIRE_EPSILON: Fixed64x64 = 1n;

/** Added to each converted raw deposit amount (one wei) */
export const DEPOSIT_RAW_EPSILON = 1n;

const ZERO_LIQUIDITY = (
  perSide: readonly [Fixed64x64, Fixed64x64]
): GrossLiquidity => ({ total: 0n, perSide });

/**
 * Combine per-side numeraire balances into gross liquidity
 *
 * Total is zero unless both sides are strictly positive.
 */
export function combineLiquidity(base: Fixed64x64, quote: Fixed64x64): GrossLiquidity {
  if (base <= 0n || quote <= 0n) {
    return ZERO_LIQUIDITY([base, quote]);
  }
  return { total: add(base, quote), perSide: [base, quote] };
}

/**
 * Shares minted for a numeraire deposit
 *
 * - Empty supply: the first deposit defines a 1:1 share price
 *   (`depositNumeraire` expressed with 18 decimals)
 * - Otherwise: floor(depositNumeraire * totalSupply / grossLiquidity)
 */
export function sharesToMint(
  depositNumeraire: Fixed64x64,
  grossLiquidity: Fixed64x64,
  totalSupply: bigint
): bigint {
  if (depositNumeraire <= 0n) {
    throw new InputError('AmountMustBePositive', 'Deposit must be positive', {
      depositNumeraire: depositNumeraire.toString(),
    });
  }

  if (totalSupply === 0n) {
    return mulByInteger(depositNumeraire, SHARE_SCALE);
  }

  if (grossLiquidity <= 0n) {
    throw new InvariantViolation('PoolNotLiquid', 'Pool has shares outstanding but no liquidity', {
      totalSupply: totalSupply.toString(),
    });
  }

  // Both operands share the 2^64 scale, so it cancels
  return (depositNumeraire * totalSupply) / grossLiquidity;
}

/**
 * Numeraire each side must receive for a deposit against existing liquidity
 *
 * perSide[i] * deposit / total, plus DEPOSIT_NUMERAIRE_EPSILON.
 */
export function depositNumeraireShares(
  liquidity: GrossLiquidity,
  depositNumeraire: Fixed64x64
): [Fixed64x64, Fixed64x64] {
  if (liquidity.total <= 0n) {
    throw new InvariantViolation('PoolNotLiquid', 'Cannot split a deposit across an empty pool');
  }
  const [base, quote] = liquidity.perSide;
  return [
    add(mulDiv(base, depositNumeraire, liquidity.total), DEPOSIT_NUMERAIRE_EPSILON),
    add(mulDiv(quote, depositNumeraire, liquidity.total), DEPOSIT_NUMERAIRE_EPSILON),
  ];
}

/**
 * Numeraire each side releases for burning `shares` out of `totalSupply`
 */
export function withdrawNumeraireShares(
  liquidity: GrossLiquidity,
  shares: bigint,
  totalSupply: bigint
): [Fixed64x64, Fixed64x64] {
  if (shares <= 0n) {
    throw new InputError('AmountMustBePositive', 'Withdrawn shares must be positive');
  }
  if (totalSupply <= 0n || shares > totalSupply) {
    throw new InvariantViolation('PoolNotLiquid', 'Cannot withdraw more shares than exist', {
      shares: shares.toString(),
      totalSupply: totalSupply.toString(),
    });
  }
  const [base, quote] = liquidity.perSide;
  return [mulDiv(base, shares, totalSupply), mulDiv(quote, shares, totalSupply)];
}

/**
 * Largest drop in liquidity per whole share absorbed as rounding noise
 * (about 1e-6 numeraire)
 */
export const LIQUIDITY_INVARIANT_TOLERANCE: Fixed64x64 = 0x10c6f7a0b5een;

/**
 * Numeraire liquidity backing one whole (1e18) share
 */
export function liquidityPerShare(liquidity: Fixed64x64, totalSupply: bigint): Fixed64x64 {
  return mulDiv(liquidity, SHARE_SCALE, totalSupply);
}

/**
 * Liquidity per share may not decrease across a deposit beyond
 * LIQUIDITY_INVARIANT_TOLERANCE
 *
 * Skipped for the bootstrap deposit.
 */
export function assertLiquidityInvariant(
  before: GrossLiquidity,
  beforeSupply: bigint,
  after: GrossLiquidity,
  afterSupply: bigint
): void {
  if (beforeSupply === 0n || before.total === 0n) {
    return;
  }

  const previous = liquidityPerShare(before.total, beforeSupply);
  const next = afterSupply > 0n ? liquidityPerShare(after.total, afterSupply) : 0n;

  if (next - previous < -LIQUIDITY_INVARIANT_TOLERANCE) {
    throw new InvariantViolation(
      'LiquidityInvariantViolation',
      'Deposit would dilute liquidity per share',
      {
        beforeTotal: before.total.toString(),
        beforeSupply: beforeSupply.toString(),
        afterTotal: after.total.toString(),
        afterSupply: afterSupply.toString(),
      }
    );
  }
}
