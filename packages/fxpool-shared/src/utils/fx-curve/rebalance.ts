import {
  type Fixed64x64,
  add,
  div,
  fromBps,
  mul,
  sub,
} from '../fixed-point/fixed-point.js';
import { InvariantViolation } from '../../errors/index.js';
import type { PoolBalances, PoolSide } from '../../types/index.js';

/**
 * Rebalance band math
 *
 * The band is centred on the pool's target quote ratio (its quote weight,
 * normally 0.50). Inside the band no swap is needed.
 */

export const DEFAULT_REBALANCE_BAND_BPS = 200;

export interface RebalanceBand {
  target: Fixed64x64;
  lower: Fixed64x64;
  upper: Fixed64x64;
}

export function rebalanceBand(
  targetQuoteRatio: Fixed64x64,
  bandBps: number = DEFAULT_REBALANCE_BAND_BPS
): RebalanceBand {
  const width = fromBps(bandBps);
  return {
    target: targetQuoteRatio,
    lower: sub(targetQuoteRatio, width),
    upper: add(targetQuoteRatio, width),
  };
}

/**
 * Quote side's share of total liquidity
 */
export function quoteRatio(baseNumeraire: Fixed64x64, quoteNumeraire: Fixed64x64): Fixed64x64 {
  const total = add(baseNumeraire, quoteNumeraire);
  if (total <= 0n) {
    throw new InvariantViolation('PoolNotLiquid', 'Pool has no liquidity to rebalance');
  }
  return div(quoteNumeraire, total);
}

export function isWithinBand(ratio: Fixed64x64, band: RebalanceBand): boolean {
  return ratio >= band.lower && ratio <= band.upper;
}

/**
 * Under-weight side and the numeraire it lacks to sit exactly on target
 */
export function numeraireDeficit(
  baseNumeraire: Fixed64x64,
  quoteNumeraire: Fixed64x64,
  targetQuoteRatio: Fixed64x64
): { side: PoolSide; deficit: Fixed64x64 } {
  const total = add(baseNumeraire, quoteNumeraire);
  const quoteTarget = mul(total, targetQuoteRatio);

  if (quoteNumeraire < quoteTarget) {
    return { side: 'quote', deficit: sub(quoteTarget, quoteNumeraire) };
  }
  const baseTarget = sub(total, quoteTarget);
  return { side: 'base', deficit: baseNumeraire < baseTarget ? sub(baseTarget, baseNumeraire) : 0n };
}

/**
 * Balances as if a swap of `amountIn` of `sideIn` for `amountOut` of the
 * other side had settled
 *
 * @throws InvariantViolation BaseBalanceViolation / QuoteBalanceViolation
 * when the simulated balance would go negative
 */
export function applySwapDelta(
  balances: PoolBalances,
  sideIn: PoolSide,
  amountIn: bigint,
  amountOut: bigint
): PoolBalances {
  const baseRaw =
    sideIn === 'base' ? balances.baseRaw + amountIn : balances.baseRaw - amountOut;
  const quoteRaw =
    sideIn === 'quote' ? balances.quoteRaw + amountIn : balances.quoteRaw - amountOut;

  if (baseRaw < 0n) {
    throw new InvariantViolation('BaseBalanceViolation', 'Simulated base balance would be negative', {
      baseRaw: balances.baseRaw.toString(),
      amountOut: amountOut.toString(),
    });
  }
  if (quoteRaw < 0n) {
    throw new InvariantViolation('QuoteBalanceViolation', 'Simulated quote balance would be negative', {
      quoteRaw: balances.quoteRaw.toString(),
      amountOut: amountOut.toString(),
    });
  }

  return { ...balances, baseRaw, quoteRaw };
}
