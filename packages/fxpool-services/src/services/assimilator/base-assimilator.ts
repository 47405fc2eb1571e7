/**
 * Base Assimilator
 *
 * Prices the foreign-currency base token with a USD rate oracle. Every rate
 * read validates the oracle round; nothing is cached between calls.
 */

import {
  OracleError,
  isFxPoolError,
  lpRatioRate,
  numeraireToRaw,
  rawToNumeraire,
  type Fixed64x64,
  type FxToken,
  type HexAddress,
  type RoundData,
} from '@fxpool/shared';
import type { RateOracle } from '../../clients/oracle/index.js';
import { getEngineConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import { FxAssimilator, type LpRatioContext, type RateSource } from './assimilator.js';

/**
 * Unix time in seconds
 */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export interface BaseAssimilatorOptions {
  /** Defaults to the engine configuration (24h15m) */
  stalenessSeconds?: bigint;
  now?: Clock;
}

export class BaseAssimilator extends FxAssimilator {
  readonly side = 'base' as const;
  readonly rateSource: RateSource;

  private readonly now: Clock;
  private readonly stalenessSeconds: bigint;
  private readonly logger = createServiceLogger('BaseAssimilator');

  constructor(
    token: FxToken,
    private readonly oracle: RateOracle,
    readonly oracleAddress: HexAddress,
    options: BaseAssimilatorOptions = {}
  ) {
    super(token);
    this.now = options.now ?? systemClock;
    this.stalenessSeconds = options.stalenessSeconds ?? getEngineConfig().oracleStalenessSeconds;
    this.rateSource = {
      kind: 'oracle',
      oracle: oracleAddress,
      stalenessSeconds: this.stalenessSeconds,
    };
  }

  async getRate(): Promise<bigint> {
    let round: RoundData;
    try {
      round = await this.oracle.latestRoundData();
    } catch (error) {
      log.methodError(this.logger, 'getRate', error, { oracle: this.oracleAddress });
      if (isFxPoolError(error)) {
        throw error;
      }
      throw new OracleError(
        'RateUnavailable',
        `Rate oracle ${this.oracleAddress} is unavailable`,
        { oracle: this.oracleAddress },
        error
      );
    }

    return this.validateRound(round);
  }

  /**
   * Reject unusable rounds, in order: not started, non-positive price,
   * carried-over answer, stale
   */
  private validateRound(round: RoundData): bigint {
    const details = {
      oracle: this.oracleAddress,
      roundId: round.roundId.toString(),
      price: round.price.toString(),
      startedAt: round.startedAt.toString(),
    };

    if (round.startedAt === 0n) {
      throw this.reject(new OracleError('StalePrice', 'Oracle round has not started', details));
    }
    if (round.price <= 0n) {
      throw this.reject(
        new OracleError('ZeroOrNegativePrice', `Oracle price must be positive, got ${round.price}`, details)
      );
    }
    if (round.answeredInRound < round.roundId) {
      throw this.reject(
        new OracleError(
          'OracleRoundIncomplete',
          'Oracle answer was carried over from an earlier round',
          { ...details, answeredInRound: round.answeredInRound.toString() }
        )
      );
    }

    const now = this.now();
    if (now > round.startedAt + this.stalenessSeconds) {
      throw this.reject(
        new OracleError(
          'StaleOraclePrice',
          `Oracle price is stale: round started at ${round.startedAt}, now ${now}`,
          { ...details, now: now.toString(), stalenessSeconds: this.stalenessSeconds.toString() }
        )
      );
    }

    return round.price;
  }

  private reject(error: OracleError): OracleError {
    this.logger.warn({ code: error.code, ...error.details, msg: error.message });
    return error;
  }

  viewRawAmountLPRatio(numeraire: Fixed64x64, context: LpRatioContext): bigint {
    return numeraireToRaw(numeraire, this.decimalsMultiplier, this.lpRatioRate(context));
  }

  viewNumeraireBalanceLPRatio(context: LpRatioContext): Fixed64x64 {
    return rawToNumeraire(
      context.balances.baseRaw,
      this.lpRatioRate(context),
      this.decimalsMultiplier
    );
  }

  private lpRatioRate(context: LpRatioContext): bigint {
    return lpRatioRate(
      context.balances.baseRaw,
      context.balances.quoteRaw,
      context.weights,
      this.decimalsMultiplier,
      context.quoteDecimalsMultiplier
    );
  }
}
