import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LedgerError, type Hex32, type HexAddress } from '@fxpool/shared';
import { VaultBalanceReader, type VaultReadClient } from './vault-balance-reader.js';

const VAULT: HexAddress = '0xBA12222222228d8Ba445958a75a0704d566BF2C8';
const POOL_TOKEN: HexAddress = '0x00000000000000000000000000000000000000b7';
const POOL_ID: Hex32 = '0x00000000000000000000000000000000000000b7000200000000000000000001';
const BASE: HexAddress = '0x1111111111111111111111111111111111111111';
const QUOTE: HexAddress = '0x2222222222222222222222222222222222222222';
const ALICE: HexAddress = '0x000000000000000000000000000000000000a11c';

describe('VaultBalanceReader', () => {
  let readContract: ReturnType<typeof vi.fn>;
  let simulateContract: ReturnType<typeof vi.fn>;
  let reader: VaultBalanceReader;

  beforeEach(() => {
    readContract = vi.fn(async ({ functionName }: { functionName: string }) => {
      switch (functionName) {
        case 'getPoolTokens':
          return [[BASE, QUOTE], [1_000n, 2_000n], 123n];
        case 'getPool':
          return [POOL_TOKEN, 2];
        case 'totalSupply':
          return 3_000n;
        case 'balanceOf':
          return 42n;
        default:
          throw new Error(`unexpected ${functionName}`);
      }
    });
    simulateContract = vi.fn(async () => ({ result: [500n, -495n] }));

    reader = new VaultBalanceReader(
      { readContract, simulateContract } as unknown as VaultReadClient,
      VAULT
    );
  });

  it('should read pool tokens from the vault', async () => {
    expect(await reader.getPoolTokens(POOL_ID)).toEqual({
      tokens: [BASE, QUOTE],
      balances: [1_000n, 2_000n],
    });
    expect(readContract).toHaveBeenCalledWith(
      expect.objectContaining({ address: VAULT, functionName: 'getPoolTokens', args: [POOL_ID] })
    );
  });

  it('should read supply and holdings from the pool token', async () => {
    expect(await reader.getTotalSupply(POOL_ID)).toBe(3_000n);
    expect(await reader.getShareBalance(POOL_ID, ALICE)).toBe(42n);
    expect(readContract).toHaveBeenCalledWith(
      expect.objectContaining({ address: POOL_TOKEN, functionName: 'balanceOf', args: [ALICE] })
    );
  });

  it('should negate the output delta of queryBatchSwap', async () => {
    expect(await reader.simulateSwap(POOL_ID, BASE, QUOTE, 500n)).toBe(495n);
    expect(simulateContract).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: 'queryBatchSwap' })
    );
  });

  it('should wrap transport failures', async () => {
    readContract.mockRejectedValueOnce(new Error('execution reverted'));

    const error = await reader.getPoolTokens(POOL_ID).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerError);
    expect(error).toMatchObject({
      code: 'LedgerCallFailed',
      message: `Failed to read getPoolTokens for pool ${POOL_ID}: execution reverted`,
    });
  });

  it('should reject a positive output delta', async () => {
    simulateContract.mockResolvedValueOnce({ result: [500n, 10n] });
    await expect(reader.simulateSwap(POOL_ID, BASE, QUOTE, 500n)).rejects.toThrow(LedgerError);
  });
});
