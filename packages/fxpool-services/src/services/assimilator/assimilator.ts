/**
 * Assimilator
 *
 * Converts one token's raw amounts to and from the 64.64 USD numeraire.
 * Base tokens are priced by a rate oracle, the quote token at a fixed 1.0.
 * Assimilators are immutable and never hold balances; every balance view
 * takes the pool balances read for the current call.
 */

import {
  decimalsMultiplier,
  numeraireToRaw,
  rawToNumeraire,
  InputError,
  type Fixed64x64,
  type FxToken,
  type HexAddress,
  type PoolBalances,
  type PoolSide,
  type WeightedPair,
} from '@fxpool/shared';

export type RateSource =
  | {
      kind: 'oracle';
      oracle: HexAddress;
      /** Seconds after round start before the price is rejected */
      stalenessSeconds: bigint;
    }
  | {
      kind: 'fixed';
      rate: bigint;
    };

/**
 * Pool state needed to derive the oracle-independent LP-ratio rate
 */
export interface LpRatioContext {
  weights: WeightedPair;
  balances: PoolBalances;
  baseDecimalsMultiplier: bigint;
  quoteDecimalsMultiplier: bigint;
}

export interface Assimilator {
  readonly token: FxToken;
  readonly side: PoolSide;
  readonly decimalsMultiplier: bigint;
  readonly rateSource: RateSource;

  /** Current USD rate scaled by 1e8 */
  getRate(): Promise<bigint>;

  viewRawAmount(numeraire: Fixed64x64): Promise<bigint>;
  viewNumeraireAmount(raw: bigint): Promise<Fixed64x64>;

  viewRawAmountLPRatio(numeraire: Fixed64x64, context: LpRatioContext): bigint;
  viewNumeraireBalanceLPRatio(context: LpRatioContext): Fixed64x64;

  viewNumeraireBalance(balances: PoolBalances): Promise<Fixed64x64>;
  virtualViewNumeraireBalanceIntake(balances: PoolBalances, intakeRaw: bigint): Promise<Fixed64x64>;
  virtualViewNumeraireBalanceOutput(balances: PoolBalances, outputRaw: bigint): Promise<Fixed64x64>;
}

/**
 * Conversions shared by both sides; subclasses supply the rate and the
 * LP-ratio rule
 */
export abstract class FxAssimilator implements Assimilator {
  abstract readonly side: PoolSide;
  abstract readonly rateSource: RateSource;
  readonly decimalsMultiplier: bigint;

  constructor(readonly token: FxToken) {
    this.decimalsMultiplier = decimalsMultiplier(token.decimals);
  }

  abstract getRate(): Promise<bigint>;
  abstract viewRawAmountLPRatio(numeraire: Fixed64x64, context: LpRatioContext): bigint;
  abstract viewNumeraireBalanceLPRatio(context: LpRatioContext): Fixed64x64;

  async viewRawAmount(numeraire: Fixed64x64): Promise<bigint> {
    return numeraireToRaw(numeraire, this.decimalsMultiplier, await this.getRate());
  }

  async viewNumeraireAmount(raw: bigint): Promise<Fixed64x64> {
    return rawToNumeraire(raw, await this.getRate(), this.decimalsMultiplier);
  }

  async viewNumeraireBalance(balances: PoolBalances): Promise<Fixed64x64> {
    return this.viewNumeraireAmount(this.rawBalance(balances));
  }

  async virtualViewNumeraireBalanceIntake(
    balances: PoolBalances,
    intakeRaw: bigint
  ): Promise<Fixed64x64> {
    this.requireNonNegative(intakeRaw, 'intakeRaw');
    return this.viewNumeraireAmount(this.rawBalance(balances) + intakeRaw);
  }

  /**
   * Value of the balance left after releasing `outputRaw`, floored at zero
   */
  async virtualViewNumeraireBalanceOutput(
    balances: PoolBalances,
    outputRaw: bigint
  ): Promise<Fixed64x64> {
    this.requireNonNegative(outputRaw, 'outputRaw');
    const remaining = this.rawBalance(balances) - outputRaw;
    return remaining <= 0n ? 0n : this.viewNumeraireAmount(remaining);
  }

  protected rawBalance(balances: PoolBalances): bigint {
    return this.side === 'base' ? balances.baseRaw : balances.quoteRaw;
  }

  private requireNonNegative(amount: bigint, field: string): void {
    if (amount < 0n) {
      throw new InputError('AmountMustBePositive', `${field} cannot be negative`, {
        [field]: amount.toString(),
      });
    }
  }
}
