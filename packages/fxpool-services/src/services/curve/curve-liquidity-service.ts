/**
 * Curve Liquidity Service
 *
 * Gross liquidity and proportional share math for an FX pool. Deposits and
 * withdrawals are priced at the LP-ratio rate (pool composition) rather than
 * the oracle rate; the oracle view is used for rebalancing and valuation.
 *
 * Every call reads balances fresh from the reader it is given, which may be
 * the committed ledger or an open LedgerTransaction.
 */

import {
  FixedPoint,
  InputError,
  InvariantViolation,
  DEPOSIT_NUMERAIRE_EPSILON,
  DEPOSIT_RAW_EPSILON,
  combineLiquidity,
  depositNumeraireShares,
  sameAddress,
  sharesToMint,
  withdrawNumeraireShares,
  type DepositPlan,
  type Fixed64x64,
  type GrossLiquidity,
  type PoolBalances,
  type WithdrawPlan,
} from '@fxpool/shared';
import type { BalanceReader } from '../../clients/ledger/index.js';
import { createServiceLogger, log, type ServiceLogger } from '../../logging/index.js';
import type { LpRatioContext } from '../assimilator/index.js';
import type { FxPool } from '../pool/fx-pool.js';

const EMPTY_LIQUIDITY: GrossLiquidity = { total: 0n, perSide: [0n, 0n] };

export interface CurveLiquidityServiceDependencies {
  /** Committed ledger view used when no reader is passed */
  ledger: BalanceReader;
}

export class CurveLiquidityService {
  private readonly ledger: BalanceReader;
  private readonly logger: ServiceLogger;

  constructor(dependencies: CurveLiquidityServiceDependencies) {
    this.ledger = dependencies.ledger;
    this.logger = createServiceLogger('CurveLiquidityService');
  }

  /**
   * Pool balances mapped onto base / quote sides
   */
  async readBalances(pool: FxPool, reader: BalanceReader = this.ledger): Promise<PoolBalances> {
    const { poolId, baseToken, quoteToken } = pool.config;
    const { tokens, balances } = await reader.getPoolTokens(poolId);

    const baseIndex = tokens.findIndex((token) => sameAddress(token, baseToken.address));
    const quoteIndex = tokens.findIndex((token) => sameAddress(token, quoteToken.address));

    if (tokens.length !== 2 || baseIndex < 0 || quoteIndex < 0) {
      throw new InputError('TokenMismatch', `Ledger tokens do not match pool ${poolId}`, {
        poolId,
        tokens,
      });
    }

    return {
      baseRaw: balances[baseIndex],
      quoteRaw: balances[quoteIndex],
      baseIndex: baseIndex === 0 ? 0 : 1,
      quoteIndex: quoteIndex === 0 ? 0 : 1,
    };
  }

  /**
   * Gross liquidity at the LP-ratio rate
   *
   * Zero when either side holds no tokens.
   */
  grossLiquidity(pool: FxPool, balances: PoolBalances): GrossLiquidity {
    if (balances.baseRaw <= 0n || balances.quoteRaw <= 0n) {
      return EMPTY_LIQUIDITY;
    }

    const context = this.lpContext(pool, balances);
    return combineLiquidity(
      pool.base.viewNumeraireBalanceLPRatio(context),
      pool.quote.viewNumeraireBalanceLPRatio(context)
    );
  }

  /**
   * Gross liquidity at the oracle rate
   */
  async grossLiquidityByOracle(pool: FxPool, balances: PoolBalances): Promise<GrossLiquidity> {
    const [base, quote] = await Promise.all([
      pool.base.viewNumeraireBalance(balances),
      pool.quote.viewNumeraireBalance(balances),
    ]);
    return combineLiquidity(base, quote);
  }

  /**
   * Shares and raw amounts for depositing `depositNumeraire`
   *
   * Each side receives its proportional share plus one 64.64 ulp, converted
   * at the LP-ratio rate, plus one raw unit. A pool without liquidity is
   * seeded by weight at the oracle rate instead.
   */
  async depositAmountsForShares(
    pool: FxPool,
    depositNumeraire: Fixed64x64,
    balances: PoolBalances,
    totalSupply: bigint
  ): Promise<DepositPlan> {
    const liquidity = this.grossLiquidity(pool, balances);
    const expectedShares = sharesToMint(depositNumeraire, liquidity.total, totalSupply);

    let baseTokenAmount: bigint;
    let quoteTokenAmount: bigint;

    if (liquidity.total === 0n) {
      const { baseWeight, quoteWeight } = pool.config.weights;
      const baseShare = FixedPoint.add(
        FixedPoint.mul(depositNumeraire, baseWeight),
        DEPOSIT_NUMERAIRE_EPSILON
      );
      const quoteShare = FixedPoint.add(
        FixedPoint.mul(depositNumeraire, quoteWeight),
        DEPOSIT_NUMERAIRE_EPSILON
      );
      const [baseRaw, quoteRaw] = await Promise.all([
        pool.base.viewRawAmount(baseShare),
        pool.quote.viewRawAmount(quoteShare),
      ]);
      baseTokenAmount = baseRaw + DEPOSIT_RAW_EPSILON;
      quoteTokenAmount = quoteRaw + DEPOSIT_RAW_EPSILON;
    } else {
      const context = this.lpContext(pool, balances);
      const [baseShare, quoteShare] = depositNumeraireShares(liquidity, depositNumeraire);
      baseTokenAmount = pool.base.viewRawAmountLPRatio(baseShare, context) + DEPOSIT_RAW_EPSILON;
      quoteTokenAmount = pool.quote.viewRawAmountLPRatio(quoteShare, context) + DEPOSIT_RAW_EPSILON;
    }

    return {
      depositNumeraire,
      expectedShares,
      baseTokenAmount,
      quoteTokenAmount,
      liquidity,
      totalSupply,
    };
  }

  /**
   * Raw amounts released for burning `shares`
   *
   * Converted at the LP-ratio rate, truncated and capped at each side's
   * balance.
   */
  withdrawAmountsForShares(
    pool: FxPool,
    shares: bigint,
    balances: PoolBalances,
    totalSupply: bigint
  ): WithdrawPlan {
    const liquidity = this.grossLiquidity(pool, balances);
    if (liquidity.total === 0n) {
      throw new InvariantViolation('PoolNotLiquid', `Pool ${pool.config.poolId} has no liquidity`, {
        poolId: pool.config.poolId,
      });
    }

    const context = this.lpContext(pool, balances);
    const [baseShare, quoteShare] = withdrawNumeraireShares(liquidity, shares, totalSupply);
    const baseRaw = pool.base.viewRawAmountLPRatio(baseShare, context);
    const quoteRaw = pool.quote.viewRawAmountLPRatio(quoteShare, context);

    return {
      shares,
      baseTokenAmount: baseRaw < balances.baseRaw ? baseRaw : balances.baseRaw,
      quoteTokenAmount: quoteRaw < balances.quoteRaw ? quoteRaw : balances.quoteRaw,
      totalSupply,
    };
  }

  /**
   * Price a deposit against the pool's current state
   */
  async viewDeposit(
    pool: FxPool,
    depositNumeraire: Fixed64x64,
    reader: BalanceReader = this.ledger
  ): Promise<DepositPlan> {
    log.methodEntry(this.logger, 'viewDeposit', {
      poolId: pool.config.poolId,
      depositNumeraire: FixedPoint.toDecimalString(depositNumeraire),
    });

    const [balances, totalSupply] = await Promise.all([
      this.readBalances(pool, reader),
      reader.getTotalSupply(pool.config.poolId),
    ]);
    const plan = await this.depositAmountsForShares(pool, depositNumeraire, balances, totalSupply);

    log.methodExit(this.logger, 'viewDeposit', {
      expectedShares: plan.expectedShares.toString(),
      baseTokenAmount: plan.baseTokenAmount.toString(),
      quoteTokenAmount: plan.quoteTokenAmount.toString(),
    });
    return plan;
  }

  /**
   * Price a withdrawal against the pool's current state
   */
  async viewWithdraw(
    pool: FxPool,
    shares: bigint,
    reader: BalanceReader = this.ledger
  ): Promise<WithdrawPlan> {
    log.methodEntry(this.logger, 'viewWithdraw', {
      poolId: pool.config.poolId,
      shares: shares.toString(),
    });

    const [balances, totalSupply] = await Promise.all([
      this.readBalances(pool, reader),
      reader.getTotalSupply(pool.config.poolId),
    ]);
    const plan = this.withdrawAmountsForShares(pool, shares, balances, totalSupply);

    log.methodExit(this.logger, 'viewWithdraw', {
      baseTokenAmount: plan.baseTokenAmount.toString(),
      quoteTokenAmount: plan.quoteTokenAmount.toString(),
    });
    return plan;
  }

  private lpContext(pool: FxPool, balances: PoolBalances): LpRatioContext {
    return {
      weights: pool.config.weights,
      balances,
      baseDecimalsMultiplier: pool.base.decimalsMultiplier,
      quoteDecimalsMultiplier: pool.quote.decimalsMultiplier,
    };
  }
}
