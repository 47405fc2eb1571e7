import { InputError } from '../../errors/index.js';

/**
 * Slippage envelope helpers (basis points, 10_000 = 100%)
 */

export const BPS_DENOMINATOR = 10_000n;

/** Share of the exit valuation re-deposited during a migration (99%) */
export const DEFAULT_MIGRATION_BUFFER_BPS = 9_900;

export function validateBps(bps: number, field: string = 'slippageBps'): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
    throw new InputError('InvalidSlippage', `${field} must be an integer between 0 and 10000`, {
      [field]: bps,
    });
  }
  return BigInt(bps);
}

/**
 * Ceiling for an amount the caller pays: amount * (1 + bps), rounded up
 */
export function widenCeiling(amount: bigint, slippageBps: number): bigint {
  const numerator = amount * (BPS_DENOMINATOR + validateBps(slippageBps));
  return (numerator + BPS_DENOMINATOR - 1n) / BPS_DENOMINATOR;
}

/**
 * Floor for an amount the caller receives: amount * (1 - bps), rounded down
 */
export function narrowFloor(amount: bigint, slippageBps: number): bigint {
  return (amount * (BPS_DENOMINATOR - validateBps(slippageBps))) / BPS_DENOMINATOR;
}

/**
 * Portion of an amount: amount * bps / 10_000, rounded down
 */
export function applyBps(amount: bigint, bps: number, field: string = 'bps'): bigint {
  return (amount * validateBps(bps, field)) / BPS_DENOMINATOR;
}
