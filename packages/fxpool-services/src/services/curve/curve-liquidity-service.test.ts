import { describe, it, expect } from 'vitest';
import {
  FIXED_QUOTE_RATE,
  FixedPoint,
  InputError,
  ONE_64X64,
  lpRatioRate,
  rawToNumeraire,
} from '@fxpool/shared';
import { CurveLiquidityService } from './curve-liquidity-service.js';
import {
  HALF_WEIGHTS,
  POOL_ID,
  createTestLedger,
  createTestPool,
} from '../test-fixtures.js';

const SHARES = 10n ** 18n;

describe('CurveLiquidityService', () => {
  // 1 base token against 1000 quote tokens, 2000e18 shares outstanding
  const scenario = () =>
    createTestLedger([{ baseRaw: 1_000_000n, quoteRaw: 1_000_000_000n, supply: 2_000n * SHARES }]);

  describe('readBalances', () => {
    it('should map canonical ledger order onto pool sides', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });

      expect(await service.readBalances(createTestPool())).toEqual({
        baseRaw: 1_000_000n,
        quoteRaw: 1_000_000_000n,
        baseIndex: 0,
        quoteIndex: 1,
      });
    });

    it('should reject ledger tokens that do not belong to the pool', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });
      const pool = createTestPool(undefined, {
        quoteToken: { address: '0x4444444444444444444444444444444444444444', symbol: 'USDT', decimals: 6 },
      });

      await expect(service.readBalances(pool)).rejects.toMatchObject({ code: 'TokenMismatch' });
    });
  });

  describe('grossLiquidity', () => {
    const service = new CurveLiquidityService({ ledger: scenario() });
    const pool = createTestPool();

    it('should sum both sides at the LP-ratio rate', () => {
      const liquidity = service.grossLiquidity(pool, {
        baseRaw: 1_000_000n,
        quoteRaw: 1_000_000_000n,
        baseIndex: 0,
        quoteIndex: 1,
      });

      expect(liquidity.total).toBe(FixedPoint.fromInt(2_000n));
      expect(liquidity.perSide).toEqual([FixedPoint.fromInt(1_000n), FixedPoint.fromInt(1_000n)]);
    });

    it('should be zero when either side is empty', () => {
      expect(
        service.grossLiquidity(pool, { baseRaw: 0n, quoteRaw: 5n, baseIndex: 0, quoteIndex: 1 }).total
      ).toBe(0n);
      expect(
        service.grossLiquidity(pool, { baseRaw: 5n, quoteRaw: 0n, baseIndex: 0, quoteIndex: 1 }).total
      ).toBe(0n);
    });

    it('should value the pool at the oracle rate', async () => {
      const liquidity = await service.grossLiquidityByOracle(pool, {
        baseRaw: 1_000_000n,
        quoteRaw: 1_000_000_000n,
        baseIndex: 0,
        quoteIndex: 1,
      });

      expect(liquidity.perSide).toEqual([FixedPoint.fromInt(1n), FixedPoint.fromInt(1_000n)]);
      expect(liquidity.total).toBe(FixedPoint.fromInt(1_001n));
    });
  });

  describe('viewDeposit', () => {
    it('should mint proportional shares and split the deposit by liquidity', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });

      const plan = await service.viewDeposit(createTestPool(), FixedPoint.fromInt(200n));

      expect(plan.expectedShares).toBe(200n * SHARES);
      // 100 numeraire per side, +1 ulp, converted, +1 raw unit
      expect(plan.baseTokenAmount).toBe(100_001n);
      expect(plan.quoteTokenAmount).toBe(100_000_001n);
      expect(plan.liquidity.total).toBe(FixedPoint.fromInt(2_000n));
      expect(plan.totalSupply).toBe(2_000n * SHARES);
    });

    it('should price the first deposit 1:1 by weight at the oracle rate', async () => {
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw: 0n, quoteRaw: 0n }]),
      });

      const plan = await service.viewDeposit(createTestPool(), FixedPoint.fromInt(200n));

      expect(plan.expectedShares).toBe(200n * SHARES);
      expect(plan.baseTokenAmount).toBe(100_000_001n);
      expect(plan.quoteTokenAmount).toBe(100_000_001n);
    });

    it('should round shares down', async () => {
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw: 1_000_000n, quoteRaw: 1_000_000_000n, supply: 3n }]),
      });

      const plan = await service.viewDeposit(createTestPool(), FixedPoint.fromInt(1_000n));

      // 1000 * 3 / 2000
      expect(plan.expectedShares).toBe(1n);
    });

    it('should reject a pool with shares but no liquidity', async () => {
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw: 0n, quoteRaw: 0n, supply: SHARES }]),
      });

      await expect(
        service.viewDeposit(createTestPool(), FixedPoint.fromInt(1n))
      ).rejects.toMatchObject({ code: 'PoolNotLiquid' });
    });

    it('should reject non-positive deposits', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });

      await expect(service.viewDeposit(createTestPool(), 0n)).rejects.toBeInstanceOf(InputError);
    });
  });

  describe('deposit rounding', () => {
    const TOKEN_MULTIPLIER = 1_000_000n;
    // 123.456789 numeraire
    const DEPOSIT = FixedPoint.divideIntegerBy(123_456_789n, TOKEN_MULTIPLIER);

    it('should charge a seeding deposit at least its value at the oracle rate', async () => {
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw: 0n, quoteRaw: 0n }], 74_000_000n),
      });
      const pool = createTestPool(74_000_000n, {
        weights: { baseWeight: (ONE_64X64 * 3n) / 4n, quoteWeight: ONE_64X64 / 4n },
      });

      const plan = await service.viewDeposit(pool, DEPOSIT);
      const paid = FixedPoint.add(
        await pool.base.viewNumeraireAmount(plan.baseTokenAmount),
        await pool.quote.viewNumeraireAmount(plan.quoteTokenAmount)
      );

      expect(paid).toBeGreaterThanOrEqual(DEPOSIT);
    });

    it('should charge a deposit at least its value at the LP-ratio rate', async () => {
      const baseRaw = 740_000_001n;
      const quoteRaw = 260_000_003n;
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw, quoteRaw, supply: 1_000n * SHARES }], 74_000_000n),
      });

      const plan = await service.viewDeposit(createTestPool(74_000_000n), DEPOSIT);
      const rate = lpRatioRate(baseRaw, quoteRaw, HALF_WEIGHTS, TOKEN_MULTIPLIER, TOKEN_MULTIPLIER);
      const paid = FixedPoint.add(
        rawToNumeraire(plan.baseTokenAmount, rate, TOKEN_MULTIPLIER),
        rawToNumeraire(plan.quoteTokenAmount, FIXED_QUOTE_RATE, TOKEN_MULTIPLIER)
      );

      expect(rate).toBe(35_135_135n);
      expect(paid).toBeGreaterThanOrEqual(DEPOSIT);
    });
  });

  describe('viewWithdraw', () => {
    it('should release each side in proportion to the burned shares', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });

      const plan = await service.viewWithdraw(createTestPool(), 200n * SHARES);

      expect(plan).toEqual({
        shares: 200n * SHARES,
        baseTokenAmount: 100_000n,
        quoteTokenAmount: 100_000_000n,
        totalSupply: 2_000n * SHARES,
      });
    });

    it('should return at most what a deposit paid in', async () => {
      const ledger = scenario();
      const service = new CurveLiquidityService({ ledger });
      const pool = createTestPool();

      const deposit = await service.viewDeposit(pool, FixedPoint.fromInt(200n));
      const balances = {
        baseRaw: 1_000_000n + deposit.baseTokenAmount,
        quoteRaw: 1_000_000_000n + deposit.quoteTokenAmount,
        baseIndex: 0 as const,
        quoteIndex: 1 as const,
      };
      const withdraw = service.withdrawAmountsForShares(
        pool,
        deposit.expectedShares,
        balances,
        2_000n * SHARES + deposit.expectedShares
      );

      expect(withdraw.baseTokenAmount).toBe(100_000n);
      expect(withdraw.quoteTokenAmount).toBe(100_000_000n);
      expect(deposit.baseTokenAmount - withdraw.baseTokenAmount).toBeLessThanOrEqual(2n);
      expect(deposit.quoteTokenAmount - withdraw.quoteTokenAmount).toBeLessThanOrEqual(2n);
    });

    it('should reject burning more than the supply', async () => {
      const service = new CurveLiquidityService({ ledger: scenario() });

      await expect(
        service.viewWithdraw(createTestPool(), 2_001n * SHARES)
      ).rejects.toMatchObject({ code: 'PoolNotLiquid' });
    });

    it('should reject an empty pool', async () => {
      const service = new CurveLiquidityService({
        ledger: createTestLedger([{ baseRaw: 0n, quoteRaw: 0n, supply: SHARES }]),
      });

      await expect(service.viewWithdraw(createTestPool(), SHARES)).rejects.toMatchObject({
        code: 'PoolNotLiquid',
      });
    });
  });

  it('should use weights when seeding an uneven pool', async () => {
    const service = new CurveLiquidityService({
      ledger: createTestLedger([{ poolId: POOL_ID, baseRaw: 0n, quoteRaw: 0n }]),
    });
    const pool = createTestPool(undefined, {
      weights: { baseWeight: (ONE_64X64 * 3n) / 4n, quoteWeight: ONE_64X64 / 4n },
    });

    const plan = await service.viewDeposit(pool, FixedPoint.fromInt(100n));

    expect(plan.baseTokenAmount).toBe(75_000_001n);
    expect(plan.quoteTokenAmount).toBe(25_000_001n);
  });
});
