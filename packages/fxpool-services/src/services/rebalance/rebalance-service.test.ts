import { describe, it, expect } from 'vitest';
import { FixedPoint, type RebalancePlan } from '@fxpool/shared';
import { CurveLiquidityService } from '../curve/index.js';
import { RebalanceService } from './rebalance-service.js';
import {
  BASE_TOKEN,
  POOL_ID,
  QUOTE_TOKEN,
  createTestLedger,
  createTestPool,
} from '../test-fixtures.js';

const TOKEN = 1_000_000n;
const SHARES = 10n ** 18n;

function serviceFor(baseTokens: bigint, quoteTokens: bigint, rebalanceBandBps?: number) {
  const ledger = createTestLedger([
    { baseRaw: baseTokens * TOKEN, quoteRaw: quoteTokens * TOKEN, supply: 1_000n * SHARES },
  ]);
  const curve = new CurveLiquidityService({ ledger });
  return { ledger, service: new RebalanceService({ curve, ledger, rebalanceBandBps }) };
}

describe('RebalanceService', () => {
  describe('calculateSwapAmount', () => {
    it('should leave a pool at exactly 0.50 balanced', async () => {
      const { service } = serviceFor(1_000n, 1_000n);

      const plan = await service.calculateSwapAmount(createTestPool());

      expect(plan.state).toBe('Balanced');
      expect(plan.swapAmountInRaw).toBe(0n);
    });

    it('should treat ratios inside the band as balanced', async () => {
      const { service } = serviceFor(510n, 490n);

      expect((await service.calculateSwapAmount(createTestPool())).state).toBe('Balanced');
    });

    it('should swap quote in when the quote side is under-weight', async () => {
      const { service } = serviceFor(600n, 400n);

      const plan = await service.calculateSwapAmount(createTestPool());

      expect(plan).toMatchObject({
        poolId: POOL_ID,
        state: 'NeedsQuoteIn',
        targetAssetIn: 'quote',
        tokenIn: QUOTE_TOKEN.address,
        tokenOut: BASE_TOKEN.address,
        assetInIndex: 1,
        swapAmountInRaw: 100n * TOKEN,
        swapAmountOutRaw: 0n,
      });
    });

    it('should swap base in when the quote side is over-weight', async () => {
      const { service } = serviceFor(400n, 600n);

      const plan = await service.calculateSwapAmount(createTestPool());

      expect(plan).toMatchObject({
        state: 'NeedsBaseIn',
        targetAssetIn: 'base',
        tokenIn: BASE_TOKEN.address,
        assetInIndex: 0,
        swapAmountInRaw: 100n * TOKEN,
      });
    });

    it('should size the swap at the oracle rate', async () => {
      // 2000 base at 0.50 USD is worth as much as 1000 quote
      const { service } = serviceFor(2_000n, 1_000n);
      expect((await service.calculateSwapAmount(createTestPool(50_000_000n))).state).toBe('Balanced');

      // 1 base vs 1000 quote at 1.00: base needs 499.5 numeraire
      const skewed = serviceFor(1n, 1_000n).service;
      const plan = await skewed.calculateSwapAmount(createTestPool());
      expect(plan.state).toBe('NeedsBaseIn');
      expect(plan.swapAmountInRaw).toBe(499_500_000n);
    });

    it('should honour a wider band', async () => {
      const { service } = serviceFor(600n, 400n, 1_500);

      expect((await service.calculateSwapAmount(createTestPool())).state).toBe('Balanced');
    });

    it('should reject a pool without liquidity', async () => {
      const { service } = serviceFor(0n, 0n);

      await expect(service.calculateSwapAmount(createTestPool())).rejects.toMatchObject({
        code: 'PoolNotLiquid',
      });
    });
  });

  describe('quoteSwapOutput', () => {
    it('should simulate the swap without moving balances', async () => {
      const { ledger, service } = serviceFor(600n, 400n);
      const pool = createTestPool();

      const plan = await service.quoteSwapOutput(pool, await service.calculateSwapAmount(pool));

      expect(plan.state).toBe('Swapped');
      expect(plan.swapAmountOutRaw).toBe(100n * TOKEN);
      expect((await ledger.getPoolTokens(POOL_ID)).balances).toEqual([600n * TOKEN, 400n * TOKEN]);
    });

    it('should pass balanced plans through', async () => {
      const { service } = serviceFor(1_000n, 1_000n);
      const pool = createTestPool();
      const plan = await service.calculateSwapAmount(pool);

      expect(await service.quoteSwapOutput(pool, plan)).toBe(plan);
    });

    it('should refuse to quote a plan that is already swapped', async () => {
      const { service } = serviceFor(600n, 400n);
      const pool = createTestPool();
      const swapped = await service.quoteSwapOutput(pool, await service.calculateSwapAmount(pool));

      await expect(service.quoteSwapOutput(pool, swapped)).rejects.toMatchObject({
        kind: 'InvariantViolation',
        code: 'InvalidPlanState',
      });
    });
  });

  describe('planRebalancedDeposit', () => {
    it('should price the deposit on post-swap balances', async () => {
      const { service } = serviceFor(600n, 400n);
      const pool = createTestPool();
      const swapped = await service.quoteSwapOutput(pool, await service.calculateSwapAmount(pool));

      const priced = await service.planRebalancedDeposit(pool, FixedPoint.fromInt(100n), swapped);

      expect(priced.rebalance.state).toBe('LiquidityPriced');
      expect(priced.balances).toMatchObject({ baseRaw: 500n * TOKEN, quoteRaw: 500n * TOKEN });
      expect(priced.deposit.expectedShares).toBe(100n * SHARES);
      expect(priced.deposit.baseTokenAmount).toBe(50_000_001n);
      expect(priced.deposit.quoteTokenAmount).toBe(50_000_001n);
    });

    it('should reject a swap that would overdraw the pool', async () => {
      const { service } = serviceFor(600n, 400n);
      const pool = createTestPool();
      const plan: RebalancePlan = {
        poolId: POOL_ID,
        state: 'Swapped',
        targetAssetIn: 'quote',
        tokenIn: QUOTE_TOKEN.address,
        tokenOut: BASE_TOKEN.address,
        assetInIndex: 1,
        swapAmountInRaw: 1n,
        swapAmountOutRaw: 601n * TOKEN,
        quoteRatio: 0n,
      };

      await expect(
        service.planRebalancedDeposit(pool, FixedPoint.fromInt(1n), plan)
      ).rejects.toMatchObject({ code: 'BaseBalanceViolation' });
    });

    it('should refuse to price a plan whose swap was not quoted', async () => {
      const { service } = serviceFor(600n, 400n);
      const pool = createTestPool();
      const plan = await service.calculateSwapAmount(pool);

      expect(plan.state).toBe('NeedsQuoteIn');
      await expect(
        service.planRebalancedDeposit(pool, FixedPoint.fromInt(1n), plan)
      ).rejects.toMatchObject({ kind: 'InvariantViolation', code: 'InvalidPlanState' });
    });

    it('should reject non-positive deposits', async () => {
      const { service } = serviceFor(1_000n, 1_000n);
      const pool = createTestPool();
      const plan = await service.calculateSwapAmount(pool);

      await expect(service.planRebalancedDeposit(pool, 0n, plan)).rejects.toMatchObject({
        code: 'AmountMustBePositive',
      });
    });
  });
});
