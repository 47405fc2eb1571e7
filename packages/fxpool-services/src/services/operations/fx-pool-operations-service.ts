/**
 * FX Pool Operations Service
 *
 * Compound, state-mutating entry points of the engine:
 * - rebalance-then-deposit: swap the under-weight asset in, then join
 * - migration: exit a position from one pool and re-deposit it into another
 *
 * Each execution holds the reentrancy guard for its pools, stages every
 * effect in one LedgerTransaction and commits only after the
 * post-conditions pass. Failures come back as OperationResult with the
 * transaction rolled back. Quotes are read-only and throw.
 */

import {
  FixedPoint,
  InputError,
  InvariantViolation,
  LedgerError,
  SlippageViolation,
  ZERO_ADDRESS,
  applyBps,
  assertLiquidityInvariant,
  isFxPoolError,
  narrowFloor,
  operationFailure,
  operationSuccess,
  sameAddress,
  validateBps,
  widenCeiling,
  type DepositPlan,
  type Fixed64x64,
  type Hex32,
  type HexAddress,
  type MigrationQuote,
  type MigrationReceipt,
  type OperationFailure,
  type OperationResult,
  type PoolBalances,
  type RebalancedDepositQuote,
  type RebalancedDepositReceipt,
  type RebalancePlan,
  type WithdrawPlan,
} from '@fxpool/shared';
import type {
  BalanceLedger,
  BalanceReader,
  LedgerTransaction,
} from '../../clients/ledger/index.js';
import { getEngineConfig } from '../../config/index.js';
import { createServiceLogger, log, type ServiceLogger } from '../../logging/index.js';
import { ReentrancyGuard } from '../../utils/index.js';
import { CurveLiquidityService } from '../curve/index.js';
import type { FxPool } from '../pool/fx-pool.js';
import type { PoolDirectory } from '../pool/pool-directory.js';
import { RebalanceService, type PricedRebalance } from '../rebalance/index.js';

export interface FxPoolOperationsServiceDependencies {
  directory: PoolDirectory;
  ledger: BalanceLedger;
  curve?: CurveLiquidityService;
  rebalance?: RebalanceService;
  guard?: ReentrancyGuard;
  /** Share of the exit valuation re-deposited on migration; defaults to the engine configuration */
  migrationBufferBps?: number;
}

export interface RebalancedDepositRequest {
  account: HexAddress;
  poolId: Hex32;
  depositNumeraire: Fixed64x64;
  maxBase: bigint;
  maxQuote: bigint;
  minShares: bigint;
}

export interface MigrationRequest {
  account: HexAddress;
  oldPoolId: Hex32;
  newPoolId: Hex32;
  minShares: bigint;
  minBase: bigint;
  minQuote: bigint;
}

interface PlannedMigration extends MigrationQuote {
  oldBalances: PoolBalances;
  newBalances: PoolBalances;
}

export class FxPoolOperationsService {
  private readonly directory: PoolDirectory;
  private readonly ledger: BalanceLedger;
  private readonly curve: CurveLiquidityService;
  private readonly rebalance: RebalanceService;
  private readonly guard: ReentrancyGuard;
  private readonly migrationBufferBps: number;
  private readonly logger: ServiceLogger;

  constructor(dependencies: FxPoolOperationsServiceDependencies) {
    this.directory = dependencies.directory;
    this.ledger = dependencies.ledger;
    this.curve = dependencies.curve ?? new CurveLiquidityService({ ledger: this.ledger });
    this.rebalance =
      dependencies.rebalance ?? new RebalanceService({ curve: this.curve, ledger: this.ledger });
    this.guard = dependencies.guard ?? new ReentrancyGuard();
    this.migrationBufferBps =
      dependencies.migrationBufferBps ?? getEngineConfig().migrationBufferBps;
    validateBps(this.migrationBufferBps, 'migrationBufferBps');
    this.logger = createServiceLogger('FxPoolOperationsService');
  }

  // ============================================================================
  // Views
  // ============================================================================

  async viewDeposit(poolId: Hex32, depositNumeraire: Fixed64x64): Promise<DepositPlan> {
    return this.curve.viewDeposit(this.directory.get(poolId), depositNumeraire);
  }

  async viewWithdraw(poolId: Hex32, shares: bigint): Promise<WithdrawPlan> {
    return this.curve.viewWithdraw(this.directory.get(poolId), shares);
  }

  // ============================================================================
  // Rebalance-then-deposit
  // ============================================================================

  /**
   * Envelope for a rebalance-then-deposit
   *
   * Ceilings cover everything the caller pays in (swap leg plus liquidity
   * leg), widened by `slippageBps` and rounded up; the share floor is
   * narrowed and rounded down.
   */
  async quoteRebalancedDeposit(
    poolId: Hex32,
    depositNumeraire: Fixed64x64,
    slippageBps: number
  ): Promise<RebalancedDepositQuote> {
    validateBps(slippageBps);
    const pool = this.directory.get(poolId);

    log.methodEntry(this.logger, 'quoteRebalancedDeposit', {
      poolId,
      depositNumeraire: FixedPoint.toDecimalString(depositNumeraire),
      slippageBps,
    });

    const priced = await this.priceRebalancedDeposit(pool, depositNumeraire, this.ledger);
    const { baseSpent, quoteSpent } = amountsPaidIn(priced.rebalance, priced.deposit);
    const balanced = priced.rebalance.state === 'Balanced';

    const quote: RebalancedDepositQuote = {
      minShares: narrowFloor(priced.deposit.expectedShares, slippageBps),
      maxBase: widenCeiling(baseSpent, slippageBps),
      maxQuote: widenCeiling(quoteSpent, slippageBps),
      swapAsset: balanced ? null : priced.rebalance.tokenIn,
      swapAmountRaw: priced.rebalance.swapAmountInRaw,
      rebalance: priced.rebalance,
      deposit: priced.deposit,
    };

    log.methodExit(this.logger, 'quoteRebalancedDeposit', {
      state: priced.rebalance.state,
      minShares: quote.minShares.toString(),
      maxBase: quote.maxBase.toString(),
      maxQuote: quote.maxQuote.toString(),
    });
    return quote;
  }

  async executeRebalancedDeposit(
    request: RebalancedDepositRequest
  ): Promise<OperationResult<RebalancedDepositReceipt>> {
    const { account, poolId, depositNumeraire } = request;
    log.methodEntry(this.logger, 'executeRebalancedDeposit', {
      poolId,
      account,
      depositNumeraire: FixedPoint.toDecimalString(depositNumeraire),
    });

    try {
      requireAccount(account);
      const pool = this.directory.get(poolId);

      const receipt = await this.guard.run([poolId], () =>
        this.runInTransaction('executeRebalancedDeposit', (tx) =>
          this.rebalancedDepositIn(tx, pool, request)
        )
      );

      this.logger.info({
        poolId,
        account,
        sharesMinted: receipt.sharesMinted.toString(),
        baseSpent: receipt.baseSpent.toString(),
        quoteSpent: receipt.quoteSpent.toString(),
        msg: 'Rebalanced deposit committed',
      });
      return operationSuccess(receipt);
    } catch (error) {
      return this.fail('executeRebalancedDeposit', error, { poolId, account });
    }
  }

  private async rebalancedDepositIn(
    tx: LedgerTransaction,
    pool: FxPool,
    request: RebalancedDepositRequest
  ): Promise<RebalancedDepositReceipt> {
    const { account, poolId, depositNumeraire, maxBase, maxQuote, minShares } = request;
    const { rebalance, deposit, balances } = await this.priceRebalancedDeposit(
      pool,
      depositNumeraire,
      tx
    );

    let swapAmountOut = 0n;
    if (rebalance.state !== 'Balanced') {
      swapAmountOut = await tx.executeSwap({
        poolId,
        account,
        tokenIn: rebalance.tokenIn,
        tokenOut: rebalance.tokenOut,
        amountIn: rebalance.swapAmountInRaw,
        minAmountOut: rebalance.swapAmountOutRaw,
      });
      if (swapAmountOut < rebalance.swapAmountOutRaw) {
        throw new SlippageViolation('SwapOutputViolation', 'Swap returned less than quoted', {
          quoted: rebalance.swapAmountOutRaw.toString(),
          received: swapAmountOut.toString(),
        });
      }
    }

    const amountsIn = canonicalPair(balances, deposit.baseTokenAmount, deposit.quoteTokenAmount);
    const joined = await tx.join({
      poolId,
      account,
      amountsIn,
      maxAmountsIn: amountsIn,
      sharesOut: deposit.expectedShares,
    });

    await this.assertDepositInvariant(tx, pool, deposit);

    if (joined.sharesMinted < minShares) {
      throw new SlippageViolation('ExpectedSharesViolation', 'Minted shares below minimum', {
        minShares: minShares.toString(),
        sharesMinted: joined.sharesMinted.toString(),
      });
    }

    const { baseSpent, quoteSpent } = amountsPaidIn(rebalance, deposit);
    if (baseSpent > maxBase || quoteSpent > maxQuote) {
      throw new SlippageViolation('MaxAmountInViolation', 'Deposit exceeds the amount-in ceiling', {
        baseSpent: baseSpent.toString(),
        maxBase: maxBase.toString(),
        quoteSpent: quoteSpent.toString(),
        maxQuote: maxQuote.toString(),
      });
    }

    return {
      poolId,
      sharesMinted: joined.sharesMinted,
      baseSpent,
      quoteSpent,
      swapAmountOut,
      rebalance: { ...rebalance, state: 'Executed' },
    };
  }

  private async priceRebalancedDeposit(
    pool: FxPool,
    depositNumeraire: Fixed64x64,
    reader: BalanceReader
  ): Promise<PricedRebalance> {
    const plan = await this.rebalance.calculateSwapAmount(pool, reader);
    const swapped = await this.rebalance.quoteSwapOutput(pool, plan, reader);
    return this.rebalance.planRebalancedDeposit(pool, depositNumeraire, swapped, reader);
  }

  // ============================================================================
  // Migration
  // ============================================================================

  /**
   * Envelope for moving `lpBalance` old-pool shares into the new pool
   *
   * @throws InputError TokenMismatch before any balance is read
   */
  async quoteMigration(
    oldPoolId: Hex32,
    newPoolId: Hex32,
    lpBalance: bigint
  ): Promise<MigrationQuote> {
    const [oldPool, newPool] = this.migrationPools(oldPoolId, newPoolId);
    requirePositiveShares(lpBalance);

    log.methodEntry(this.logger, 'quoteMigration', {
      oldPoolId,
      newPoolId,
      lpBalance: lpBalance.toString(),
    });

    const { minShares, baseDelta, quoteDelta, withdraw, deposit } = await this.planMigration(
      oldPool,
      newPool,
      lpBalance,
      this.ledger
    );
    const quote: MigrationQuote = { minShares, baseDelta, quoteDelta, withdraw, deposit };

    log.methodExit(this.logger, 'quoteMigration', {
      minShares: quote.minShares.toString(),
      baseDelta: quote.baseDelta.toString(),
      quoteDelta: quote.quoteDelta.toString(),
    });
    return quote;
  }

  async executeMigration(request: MigrationRequest): Promise<OperationResult<MigrationReceipt>> {
    const { account, oldPoolId, newPoolId } = request;
    log.methodEntry(this.logger, 'executeMigration', { account, oldPoolId, newPoolId });

    try {
      requireAccount(account);
      const [oldPool, newPool] = this.migrationPools(oldPoolId, newPoolId);

      const receipt = await this.guard.run([oldPoolId, newPoolId], () =>
        this.runInTransaction('executeMigration', (tx) =>
          this.migrationIn(tx, oldPool, newPool, request)
        )
      );

      this.logger.info({
        oldPoolId,
        newPoolId,
        account,
        sharesBurned: receipt.sharesBurned.toString(),
        sharesMinted: receipt.sharesMinted.toString(),
        baseDust: receipt.baseDust.toString(),
        quoteDust: receipt.quoteDust.toString(),
        msg: 'Migration committed',
      });
      return operationSuccess(receipt);
    } catch (error) {
      return this.fail('executeMigration', error, { oldPoolId, newPoolId, account });
    }
  }

  private async migrationIn(
    tx: LedgerTransaction,
    oldPool: FxPool,
    newPool: FxPool,
    request: MigrationRequest
  ): Promise<MigrationReceipt> {
    const { account, oldPoolId, newPoolId, minShares, minBase, minQuote } = request;

    const shares = await tx.getShareBalance(oldPoolId, account);
    requirePositiveShares(shares);

    const plan = await this.planMigration(oldPool, newPool, shares, tx);
    const { withdraw, deposit } = plan;

    const amountsOut = canonicalPair(
      plan.oldBalances,
      withdraw.baseTokenAmount,
      withdraw.quoteTokenAmount
    );
    const exited = await tx.exit({
      poolId: oldPoolId,
      account,
      sharesIn: shares,
      amountsOut,
      minAmountsOut: amountsOut,
    });

    if (withdraw.baseTokenAmount < minBase || withdraw.quoteTokenAmount < minQuote) {
      throw new SlippageViolation('MinAmountOutViolation', 'Withdrawn amounts below minimum', {
        baseWithdrawn: withdraw.baseTokenAmount.toString(),
        minBase: minBase.toString(),
        quoteWithdrawn: withdraw.quoteTokenAmount.toString(),
        minQuote: minQuote.toString(),
      });
    }

    const amountsIn = canonicalPair(
      plan.newBalances,
      deposit.baseTokenAmount,
      deposit.quoteTokenAmount
    );
    const joined = await tx.join({
      poolId: newPoolId,
      account,
      amountsIn,
      maxAmountsIn: amountsIn,
      sharesOut: deposit.expectedShares,
    });

    if (joined.sharesMinted < minShares) {
      throw new SlippageViolation('ExpectedSharesViolation', 'Minted shares below minimum', {
        minShares: minShares.toString(),
        sharesMinted: joined.sharesMinted.toString(),
      });
    }

    await this.assertDepositInvariant(tx, newPool, deposit);

    return {
      oldPoolId,
      newPoolId,
      sharesBurned: exited.sharesBurned,
      sharesMinted: joined.sharesMinted,
      baseWithdrawn: withdraw.baseTokenAmount,
      quoteWithdrawn: withdraw.quoteTokenAmount,
      baseDust: plan.baseDelta,
      quoteDust: plan.quoteDelta,
    };
  }

  /**
   * Prices the exit and the buffered re-deposit against one reader
   *
   * The re-deposit is `migrationBufferBps` of the smaller of the exit's
   * oracle valuation and what the withdrawn amounts can fund on each side
   * of the new pool.
   */
  private async planMigration(
    oldPool: FxPool,
    newPool: FxPool,
    lpBalance: bigint,
    reader: BalanceReader
  ): Promise<PlannedMigration> {
    const [oldBalances, oldSupply, newBalances, newSupply] = await Promise.all([
      this.curve.readBalances(oldPool, reader),
      reader.getTotalSupply(oldPool.config.poolId),
      this.curve.readBalances(newPool, reader),
      reader.getTotalSupply(newPool.config.poolId),
    ]);

    const withdraw = this.curve.withdrawAmountsForShares(oldPool, lpBalance, oldBalances, oldSupply);

    const [baseValue, quoteValue] = await Promise.all([
      newPool.base.viewNumeraireAmount(withdraw.baseTokenAmount),
      newPool.quote.viewNumeraireAmount(withdraw.quoteTokenAmount),
    ]);
    const valuation = FixedPoint.add(baseValue, quoteValue);

    const [baseCapacity, quoteCapacity] = this.depositCapacity(
      newPool,
      newBalances,
      withdraw,
      baseValue,
      quoteValue
    );
    const fundable = FixedPoint.min(valuation, FixedPoint.min(baseCapacity, quoteCapacity));
    const depositNumeraire = applyBps(fundable, this.migrationBufferBps, 'migrationBufferBps');

    const deposit = await this.curve.depositAmountsForShares(
      newPool,
      depositNumeraire,
      newBalances,
      newSupply
    );

    const baseDelta = withdraw.baseTokenAmount - deposit.baseTokenAmount;
    const quoteDelta = withdraw.quoteTokenAmount - deposit.quoteTokenAmount;
    if (baseDelta < 0n) {
      throw new InvariantViolation(
        'BaseBalanceViolation',
        'Re-deposit needs more base than withdrawn',
        {
          withdrawn: withdraw.baseTokenAmount.toString(),
          required: deposit.baseTokenAmount.toString(),
        }
      );
    }
    if (quoteDelta < 0n) {
      throw new InvariantViolation(
        'QuoteBalanceViolation',
        'Re-deposit needs more quote than withdrawn',
        {
          withdrawn: withdraw.quoteTokenAmount.toString(),
          required: deposit.quoteTokenAmount.toString(),
        }
      );
    }

    return {
      minShares: deposit.expectedShares,
      baseDelta,
      quoteDelta,
      withdraw,
      deposit,
      oldBalances,
      newBalances,
    };
  }

  /**
   * Largest deposit, per side, the withdrawn amounts could fund
   *
   * Against existing liquidity a deposit takes each side in proportion to
   * its balance; an empty pool is seeded by weight at the oracle rate.
   */
  private depositCapacity(
    pool: FxPool,
    balances: PoolBalances,
    withdraw: WithdrawPlan,
    baseValue: Fixed64x64,
    quoteValue: Fixed64x64
  ): [Fixed64x64, Fixed64x64] {
    const liquidity = this.curve.grossLiquidity(pool, balances);

    if (liquidity.total === 0n) {
      const { baseWeight, quoteWeight } = pool.config.weights;
      return [FixedPoint.div(baseValue, baseWeight), FixedPoint.div(quoteValue, quoteWeight)];
    }

    return [
      FixedPoint.mulDiv(liquidity.total, withdraw.baseTokenAmount, balances.baseRaw),
      FixedPoint.mulDiv(liquidity.total, withdraw.quoteTokenAmount, balances.quoteRaw),
    ];
  }

  private migrationPools(oldPoolId: Hex32, newPoolId: Hex32): [FxPool, FxPool] {
    if (oldPoolId.toLowerCase() === newPoolId.toLowerCase()) {
      throw new InputError('InvalidPoolParameters', 'Cannot migrate a position into the same pool', {
        poolId: oldPoolId,
      });
    }

    const oldPool = this.directory.get(oldPoolId);
    const newPool = this.directory.get(newPoolId);

    const sameBase = sameAddress(
      oldPool.config.baseToken.address,
      newPool.config.baseToken.address
    );
    const sameQuote = sameAddress(
      oldPool.config.quoteToken.address,
      newPool.config.quoteToken.address
    );
    if (!sameBase || !sameQuote) {
      throw new InputError('TokenMismatch', 'Pools do not trade the same token pair', {
        oldPoolId,
        newPoolId,
      });
    }

    return [oldPool, newPool];
  }

  // ============================================================================
  // Shared
  // ============================================================================

  /**
   * Liquidity per share may not drop across the join
   */
  private async assertDepositInvariant(
    tx: LedgerTransaction,
    pool: FxPool,
    deposit: DepositPlan
  ): Promise<void> {
    const [balances, totalSupply] = await Promise.all([
      this.curve.readBalances(pool, tx),
      tx.getTotalSupply(pool.config.poolId),
    ]);
    assertLiquidityInvariant(
      deposit.liquidity,
      deposit.totalSupply,
      this.curve.grossLiquidity(pool, balances),
      totalSupply
    );
  }

  /**
   * Run `operation` in a fresh ledger transaction; commit on success,
   * roll back on any failure and rethrow it
   */
  private async runInTransaction<T>(
    method: string,
    operation: (tx: LedgerTransaction) => Promise<T>
  ): Promise<T> {
    const tx = await this.ledger.begin();

    let result: T;
    try {
      result = await operation(tx);
    } catch (error) {
      try {
        await tx.rollback();
      } catch (rollbackError) {
        log.methodError(this.logger, method, rollbackError, { phase: 'rollback' });
      }
      throw error;
    }

    await tx.commit();
    return result;
  }

  private fail(
    method: string,
    error: unknown,
    context: Record<string, unknown>
  ): OperationFailure {
    const failure = isFxPoolError(error)
      ? error
      : new LedgerError(
          `${method} failed: ${error instanceof Error ? error.message : String(error)}`,
          context,
          error
        );

    this.logger.warn(
      { method, code: failure.code, error: failure.message, ...context },
      `${method} rejected`
    );
    return operationFailure(failure);
  }
}

/**
 * Everything the caller pays into the pool: the swap's input leg plus the
 * join amounts. Swap output is paid to the caller and not netted.
 */
function amountsPaidIn(
  rebalance: RebalancePlan,
  deposit: DepositPlan
): { baseSpent: bigint; quoteSpent: bigint } {
  const swapIn = rebalance.state === 'Balanced' ? 0n : rebalance.swapAmountInRaw;
  return {
    baseSpent: deposit.baseTokenAmount + (rebalance.targetAssetIn === 'base' ? swapIn : 0n),
    quoteSpent: deposit.quoteTokenAmount + (rebalance.targetAssetIn === 'quote' ? swapIn : 0n),
  };
}

function canonicalPair(balances: PoolBalances, base: bigint, quote: bigint): bigint[] {
  const pair = [0n, 0n];
  pair[balances.baseIndex] = base;
  pair[balances.quoteIndex] = quote;
  return pair;
}

function requireAccount(account: HexAddress): void {
  if (sameAddress(account, ZERO_ADDRESS)) {
    throw new InputError('ZeroAddress', 'account cannot be the zero address', {
      field: 'account',
    });
  }
}

function requirePositiveShares(shares: bigint): void {
  if (shares <= 0n) {
    throw new InputError('AmountMustBePositive', 'No pool shares to migrate', {
      shares: shares.toString(),
    });
  }
}
