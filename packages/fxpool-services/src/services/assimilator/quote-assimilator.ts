import {
  FixedPoint,
  FIXED_QUOTE_RATE,
  type Fixed64x64,
  type FxToken,
} from '@fxpool/shared';
import { FxAssimilator, type LpRatioContext, type RateSource } from './assimilator.js';

/**
 * Assimilator for the USD-pegged quote token
 *
 * The rate is fixed at 1.0 and the LP-ratio view is the decimals-normalised
 * balance itself.
 */
export class QuoteAssimilator extends FxAssimilator {
  readonly side = 'quote' as const;
  readonly rateSource: RateSource = { kind: 'fixed', rate: FIXED_QUOTE_RATE };

  constructor(token: FxToken) {
    super(token);
  }

  async getRate(): Promise<bigint> {
    return FIXED_QUOTE_RATE;
  }

  viewRawAmountLPRatio(numeraire: Fixed64x64, _context: LpRatioContext): bigint {
    return FixedPoint.mulByInteger(numeraire, this.decimalsMultiplier);
  }

  viewNumeraireBalanceLPRatio(context: LpRatioContext): Fixed64x64 {
    return FixedPoint.divideIntegerBy(context.balances.quoteRaw, this.decimalsMultiplier);
  }
}
