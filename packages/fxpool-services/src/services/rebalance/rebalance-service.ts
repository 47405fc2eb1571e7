/**
 * Rebalance Service
 *
 * Decides whether a deposit must be preceded by a swap that restores the
 * pool's target quote ratio, sizes and quotes that swap, and prices the
 * deposit against the simulated post-swap balances.
 *
 * State machine:
 *   Balanced                       (inside the band, no swap)
 *   NeedsQuoteIn | NeedsBaseIn     (calculateSwapAmount)
 *   → Swapped                      (quoteSwapOutput)
 *   → LiquidityPriced              (planRebalancedDeposit)
 *   → Executed                     (FxPoolOperationsService)
 *
 * Plans are value objects recomputed on every call.
 */

import {
  FixedPoint,
  InputError,
  InvariantViolation,
  applySwapDelta,
  isWithinBand,
  numeraireDeficit,
  quoteRatio,
  rebalanceBand,
  type DepositPlan,
  type Fixed64x64,
  type PoolBalances,
  type RebalancePlan,
} from '@fxpool/shared';
import type { BalanceReader } from '../../clients/ledger/index.js';
import { getEngineConfig } from '../../config/index.js';
import { createServiceLogger, log, type ServiceLogger } from '../../logging/index.js';
import type { CurveLiquidityService } from '../curve/index.js';
import { assimilatorFor, type FxPool } from '../pool/fx-pool.js';

export interface RebalanceServiceDependencies {
  curve: CurveLiquidityService;
  /** Committed ledger view used when no reader is passed */
  ledger: BalanceReader;
  /** Half-width of the balanced band; defaults to the engine configuration */
  rebalanceBandBps?: number;
}

export interface PricedRebalance {
  rebalance: RebalancePlan;
  deposit: DepositPlan;
  /** Balances the deposit was priced against */
  balances: PoolBalances;
}

export class RebalanceService {
  private readonly curve: CurveLiquidityService;
  private readonly ledger: BalanceReader;
  private readonly bandBps: number;
  private readonly logger: ServiceLogger;

  constructor(dependencies: RebalanceServiceDependencies) {
    this.curve = dependencies.curve;
    this.ledger = dependencies.ledger;
    this.bandBps = dependencies.rebalanceBandBps ?? getEngineConfig().rebalanceBandBps;
    this.logger = createServiceLogger('RebalanceService');
  }

  /**
   * Swap that moves the oracle-priced quote ratio back to target
   *
   * Inside the band the plan is Balanced with a zero amount.
   */
  async calculateSwapAmount(
    pool: FxPool,
    reader: BalanceReader = this.ledger
  ): Promise<RebalancePlan> {
    const { poolId, baseToken, quoteToken, weights } = pool.config;
    log.methodEntry(this.logger, 'calculateSwapAmount', { poolId });

    const balances = await this.curve.readBalances(pool, reader);
    const liquidity = await this.curve.grossLiquidityByOracle(pool, balances);
    const [baseNumeraire, quoteNumeraire] = liquidity.perSide;

    const ratio = quoteRatio(baseNumeraire, quoteNumeraire);
    const band = rebalanceBand(weights.quoteWeight, this.bandBps);

    if (isWithinBand(ratio, band)) {
      log.methodExit(this.logger, 'calculateSwapAmount', {
        state: 'Balanced',
        quoteRatio: FixedPoint.toDecimalString(ratio),
      });
      return {
        poolId,
        state: 'Balanced',
        targetAssetIn: 'quote',
        tokenIn: quoteToken.address,
        tokenOut: baseToken.address,
        assetInIndex: balances.quoteIndex,
        swapAmountInRaw: 0n,
        swapAmountOutRaw: 0n,
        quoteRatio: ratio,
      };
    }

    const { side, deficit } = numeraireDeficit(baseNumeraire, quoteNumeraire, band.target);
    const swapAmountInRaw = await assimilatorFor(pool, side).viewRawAmount(deficit);

    const plan: RebalancePlan =
      side === 'quote'
        ? {
            poolId,
            state: 'NeedsQuoteIn',
            targetAssetIn: 'quote',
            tokenIn: quoteToken.address,
            tokenOut: baseToken.address,
            assetInIndex: balances.quoteIndex,
            swapAmountInRaw,
            swapAmountOutRaw: 0n,
            quoteRatio: ratio,
          }
        : {
            poolId,
            state: 'NeedsBaseIn',
            targetAssetIn: 'base',
            tokenIn: baseToken.address,
            tokenOut: quoteToken.address,
            assetInIndex: balances.baseIndex,
            swapAmountInRaw,
            swapAmountOutRaw: 0n,
            quoteRatio: ratio,
          };

    log.methodExit(this.logger, 'calculateSwapAmount', {
      state: plan.state,
      quoteRatio: FixedPoint.toDecimalString(ratio),
      swapAmountInRaw: swapAmountInRaw.toString(),
    });
    return plan;
  }

  /**
   * Simulated output of the planned swap; read-only
   */
  async quoteSwapOutput(
    pool: FxPool,
    plan: RebalancePlan,
    reader: BalanceReader = this.ledger
  ): Promise<RebalancePlan> {
    if (plan.state === 'Balanced') {
      return plan;
    }
    if (plan.state !== 'NeedsQuoteIn' && plan.state !== 'NeedsBaseIn') {
      throw new InvariantViolation(
        'InvalidPlanState',
        `Cannot quote a swap for a plan in state ${plan.state}`,
        { poolId: plan.poolId, state: plan.state }
      );
    }

    const swapAmountOutRaw = await reader.simulateSwap(
      pool.config.poolId,
      plan.tokenIn,
      plan.tokenOut,
      plan.swapAmountInRaw
    );

    return { ...plan, state: 'Swapped', swapAmountOutRaw };
  }

  /**
   * Price a deposit on the balances the planned swap would leave behind
   *
   * Both legs are priced against the same simulated state.
   */
  async planRebalancedDeposit(
    pool: FxPool,
    depositNumeraire: Fixed64x64,
    plan: RebalancePlan,
    reader: BalanceReader = this.ledger
  ): Promise<PricedRebalance> {
    const { poolId } = pool.config;

    if (depositNumeraire <= 0n) {
      throw new InputError('AmountMustBePositive', 'Deposit must be positive', {
        depositNumeraire: depositNumeraire.toString(),
      });
    }
    if (plan.state !== 'Balanced' && plan.state !== 'Swapped') {
      throw new InvariantViolation(
        'InvalidPlanState',
        `Cannot price a deposit for a plan in state ${plan.state}`,
        { poolId, state: plan.state }
      );
    }

    const [current, totalSupply] = await Promise.all([
      this.curve.readBalances(pool, reader),
      reader.getTotalSupply(poolId),
    ]);
    const balances =
      plan.state === 'Swapped'
        ? applySwapDelta(current, plan.targetAssetIn, plan.swapAmountInRaw, plan.swapAmountOutRaw)
        : current;

    if (this.curve.grossLiquidity(pool, balances).total === 0n) {
      throw new InvariantViolation(
        'PoolNotLiquid',
        `Pool ${poolId} has no liquidity to rebalance against`,
        { poolId }
      );
    }

    const deposit = await this.curve.depositAmountsForShares(
      pool,
      depositNumeraire,
      balances,
      totalSupply
    );

    return {
      rebalance: plan.state === 'Swapped' ? { ...plan, state: 'LiquidityPriced' } : plan,
      deposit,
      balances,
    };
  }
}
