import {
  type Fixed64x64,
  divideIntegerBy,
  mulByInteger,
} from '../fixed-point/fixed-point.js';
import { ArithmeticError, InputError, InvariantViolation } from '../../errors/index.js';
import type { WeightedPair } from '../../types/index.js';

/**
 * Raw ↔ numeraire conversion formulas
 *
 * Rates are integers scaled by RATE_SCALE (1e8): the USD value of one whole
 * token. Pure functions; the assimilators decide where the rate comes from.
 */

/** Oracle price scale */
export const RATE_SCALE = 100_000_000n;

/** Rate of a USD-pegged quote token */
export const FIXED_QUOTE_RATE = RATE_SCALE;

/** Integer scale weights are normalised to before the LP-ratio division */
export const WEIGHT_SCALE = 10n ** 18n;

function requirePositiveRate(rate: bigint): void {
  if (rate <= 0n) {
    throw new ArithmeticError('DivisionByZero', `Conversion rate must be positive, got ${rate}`);
  }
}

/**
 * raw = numeraire * decimalsMultiplier * 1e8 / rate
 *
 * One truncating division at the end, so low rates keep full precision.
 */
export function numeraireToRaw(
  numeraire: Fixed64x64,
  decimalsMultiplier: bigint,
  rate: bigint
): bigint {
  if (numeraire < 0n) {
    throw new InputError('AmountMustBePositive', 'Cannot convert a negative numeraire amount', {
      numeraire: numeraire.toString(),
    });
  }
  requirePositiveRate(rate);
  return (numeraire * decimalsMultiplier * RATE_SCALE) / (rate << 64n);
}

/**
 * numeraire = raw * rate / (1e8 * decimalsMultiplier)
 */
export function rawToNumeraire(
  raw: bigint,
  rate: bigint,
  decimalsMultiplier: bigint
): Fixed64x64 {
  if (raw < 0n) {
    throw new InputError('AmountMustBePositive', 'Raw amounts cannot be negative', {
      raw: raw.toString(),
    });
  }
  requirePositiveRate(rate);
  return divideIntegerBy(raw * rate, RATE_SCALE * decimalsMultiplier);
}

/**
 * 64.64 weight as a WEIGHT_SCALE integer (0.5 → 5e17)
 */
export function weightToInteger(weight: Fixed64x64): bigint {
  return mulByInteger(weight, WEIGHT_SCALE);
}

/**
 * Oracle-independent base rate implied by the weighted pool balances
 *
 * rate = (quoteRaw / quoteWeight) * baseDecimals * 1e8
 *        / ((baseRaw / baseWeight) * quoteDecimals)
 *
 * i.e. the quote-per-base price at which the pool's current composition
 * matches its weights, expressed like an oracle rate.
 *
 * @throws InvariantViolation ZeroBaseBalance when the pool holds no base token
 */
export function lpRatioRate(
  baseRaw: bigint,
  quoteRaw: bigint,
  weights: WeightedPair,
  baseDecimalsMultiplier: bigint,
  quoteDecimalsMultiplier: bigint
): bigint {
  if (baseRaw <= 0n) {
    throw new InvariantViolation(
      'ZeroBaseBalance',
      'Cannot derive an LP-ratio rate from a pool without base token balance',
      { baseRaw: baseRaw.toString(), quoteRaw: quoteRaw.toString() }
    );
  }

  const baseWeight = weightToInteger(weights.baseWeight);
  const quoteWeight = weightToInteger(weights.quoteWeight);
  if (baseWeight === 0n || quoteWeight === 0n) {
    throw new ArithmeticError('DivisionByZero', 'Pool weights must be non-zero');
  }

  const baseNormalized = (baseRaw * WEIGHT_SCALE) / baseWeight;
  const quoteNormalized = (quoteRaw * WEIGHT_SCALE) / quoteWeight;

  return (
    (quoteNormalized * baseDecimalsMultiplier * RATE_SCALE) /
    (baseNormalized * quoteDecimalsMultiplier)
  );
}
