import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerError, type Hex32, type HexAddress } from '@fxpool/shared';
import { InMemoryBalanceLedger, fixedRateSwapQuoter } from './in-memory-balance-ledger.js';

const POOL: Hex32 = '0x00000000000000000000000000000000000000000000000000000000000000f1';
const BASE: HexAddress = '0x1111111111111111111111111111111111111111';
const QUOTE: HexAddress = '0x2222222222222222222222222222222222222222';
const ALICE: HexAddress = '0x000000000000000000000000000000000000a11c';

describe('fixedRateSwapQuoter', () => {
  const pool = { tokens: [BASE, QUOTE], balances: [0n, 0n] };

  it('should price at the rate ratio', () => {
    const quoter = fixedRateSwapQuoter([
      [BASE, { rate: 74_000_000n, decimals: 6 }],
      [QUOTE, { rate: 100_000_000n, decimals: 6 }],
    ]);

    expect(quoter({ tokenIn: BASE, tokenOut: QUOTE, amountIn: 100_000_000n, pool })).toBe(
      74_000_000n
    );
  });

  it('should take the fee from the output', () => {
    const quoter = fixedRateSwapQuoter(
      [
        [BASE, { rate: 74_000_000n, decimals: 6 }],
        [QUOTE, { rate: 100_000_000n, decimals: 6 }],
      ],
      30
    );

    expect(quoter({ tokenIn: BASE, tokenOut: QUOTE, amountIn: 100_000_000n, pool })).toBe(
      73_778_000n
    );
  });

  it('should convert between token decimals', () => {
    const quoter = fixedRateSwapQuoter([
      [BASE, { rate: 200_000_000n, decimals: 18 }],
      [QUOTE, { rate: 100_000_000n, decimals: 6 }],
    ]);

    expect(quoter({ tokenIn: BASE, tokenOut: QUOTE, amountIn: 10n ** 18n, pool })).toBe(
      2_000_000n
    );
  });

  it('should scale to more decimals before dividing by the output rate', () => {
    const quoter = fixedRateSwapQuoter([
      [BASE, { rate: 74_000_000n, decimals: 18 }],
      [QUOTE, { rate: 100_000_000n, decimals: 6 }],
    ]);

    // 0.000001 quote at 1.00 buys 0.000001 / 0.74 base
    expect(quoter({ tokenIn: QUOTE, tokenOut: BASE, amountIn: 1n, pool })).toBe(1_351_351_351_351n);
  });

  it('should reject unknown tokens', () => {
    const quoter = fixedRateSwapQuoter([[BASE, { rate: 1n, decimals: 6 }]]);
    expect(() => quoter({ tokenIn: BASE, tokenOut: QUOTE, amountIn: 1n, pool })).toThrow(
      LedgerError
    );
  });
});

describe('InMemoryBalanceLedger', () => {
  let ledger: InMemoryBalanceLedger;

  beforeEach(() => {
    ledger = new InMemoryBalanceLedger(
      fixedRateSwapQuoter([
        [BASE, { rate: 100_000_000n, decimals: 6 }],
        [QUOTE, { rate: 100_000_000n, decimals: 6 }],
      ])
    );
    ledger.createPool(POOL, [
      { token: QUOTE, balance: 5_000n },
      { token: BASE, balance: 7_000n },
    ]);
    ledger.mintShares(POOL, ALICE, 1_000n);
    ledger.fund(ALICE, BASE, 500n);
    ledger.fund(ALICE, QUOTE, 500n);
  });

  it('should store tokens in ascending address order', async () => {
    expect(await ledger.getPoolTokens(POOL)).toEqual({
      tokens: [BASE, QUOTE],
      balances: [7_000n, 5_000n],
    });
    expect(await ledger.getTotalSupply(POOL)).toBe(1_000n);
    expect(await ledger.getShareBalance(POOL, ALICE)).toBe(1_000n);
  });

  it('should reject unknown pools', async () => {
    const other: Hex32 = '0x00000000000000000000000000000000000000000000000000000000000000f2';
    await expect(ledger.getPoolTokens(other)).rejects.toThrow(LedgerError);
  });

  it('should simulate swaps without moving balances', async () => {
    expect(await ledger.simulateSwap(POOL, BASE, QUOTE, 300n)).toBe(300n);
    expect((await ledger.getPoolTokens(POOL)).balances).toEqual([7_000n, 5_000n]);
  });

  it('should stage a join until commit', async () => {
    const tx = await ledger.begin();
    await tx.join({
      poolId: POOL,
      account: ALICE,
      amountsIn: [100n, 200n],
      maxAmountsIn: [100n, 200n],
      sharesOut: 50n,
    });

    expect((await tx.getPoolTokens(POOL)).balances).toEqual([7_100n, 5_200n]);
    expect(await tx.getShareBalance(POOL, ALICE)).toBe(1_050n);
    expect((await ledger.getPoolTokens(POOL)).balances).toEqual([7_000n, 5_000n]);
    expect(await ledger.getTotalSupply(POOL)).toBe(1_000n);

    await tx.commit();

    expect((await ledger.getPoolTokens(POOL)).balances).toEqual([7_100n, 5_200n]);
    expect(await ledger.getTotalSupply(POOL)).toBe(1_050n);
    expect(ledger.walletBalance(ALICE, BASE)).toBe(400n);
    expect(ledger.walletBalance(ALICE, QUOTE)).toBe(300n);
  });

  it('should discard staged effects on rollback', async () => {
    const tx = await ledger.begin();
    await tx.executeSwap({
      poolId: POOL,
      account: ALICE,
      tokenIn: QUOTE,
      tokenOut: BASE,
      amountIn: 200n,
      minAmountOut: 200n,
    });
    expect((await tx.getPoolTokens(POOL)).balances).toEqual([6_800n, 5_200n]);

    await tx.rollback();

    expect((await ledger.getPoolTokens(POOL)).balances).toEqual([7_000n, 5_000n]);
    expect(ledger.walletBalance(ALICE, QUOTE)).toBe(500n);
    await expect(tx.commit()).rejects.toThrow('Ledger transaction is rolledBack');
  });

  it('should stage an exit', async () => {
    const tx = await ledger.begin();
    const result = await tx.exit({
      poolId: POOL,
      account: ALICE,
      sharesIn: 1_000n,
      amountsOut: [7_000n, 5_000n],
      minAmountsOut: [6_900n, 4_900n],
    });
    await tx.commit();

    expect(result).toEqual({ amountsOut: [7_000n, 5_000n], sharesBurned: 1_000n });
    expect(await ledger.getTotalSupply(POOL)).toBe(0n);
    expect(ledger.walletBalance(ALICE, BASE)).toBe(7_500n);
  });

  it('should enforce join and exit limits', async () => {
    const tx = await ledger.begin();

    await expect(
      tx.join({
        poolId: POOL,
        account: ALICE,
        amountsIn: [101n, 0n],
        maxAmountsIn: [100n, 0n],
        sharesOut: 1n,
      })
    ).rejects.toThrow('Join amount exceeds limit');

    await expect(
      tx.exit({
        poolId: POOL,
        account: ALICE,
        sharesIn: 1_001n,
        amountsOut: [1n, 1n],
        minAmountsOut: [0n, 0n],
      })
    ).rejects.toThrow('Insufficient share balance');
  });

  it('should reject swaps below the output limit', async () => {
    const tx = await ledger.begin();
    await expect(
      tx.executeSwap({
        poolId: POOL,
        account: ALICE,
        tokenIn: BASE,
        tokenOut: QUOTE,
        amountIn: 100n,
        minAmountOut: 101n,
      })
    ).rejects.toThrow('Swap output below limit');
  });

  it('should reject spending more than the account holds', async () => {
    const tx = await ledger.begin();
    await expect(
      tx.join({
        poolId: POOL,
        account: ALICE,
        amountsIn: [600n, 0n],
        maxAmountsIn: [600n, 0n],
        sharesOut: 1n,
      })
    ).rejects.toThrow('Insufficient account balance');
  });
});
