/**
 * Vault Balance Reader
 *
 * Read-only BalanceReader over a Balancer-style vault, via viem.
 * Pool tokens come from the vault; share supply and holdings from the pool's
 * ERC-20; swap output from queryBatchSwap, simulated with eth_call.
 */

import { parseAbi, type Address, type PublicClient } from 'viem';
import {
  LedgerError,
  type Hex32,
  type HexAddress,
  type LedgerPoolTokens,
} from '@fxpool/shared';
import type { BalanceReader } from './balance-ledger.js';

export const vaultAbi = parseAbi([
  'function getPoolTokens(bytes32 poolId) view returns (address[] tokens, uint256[] balances, uint256 lastChangeBlock)',
  'function getPool(bytes32 poolId) view returns (address pool, uint8 specialization)',
  'function queryBatchSwap(uint8 kind, (bytes32 poolId, uint256 assetInIndex, uint256 assetOutIndex, uint256 amount, bytes userData)[] swaps, address[] assets, (address sender, bool fromInternalBalance, address recipient, bool toInternalBalance) funds) returns (int256[] assetDeltas)',
]);

export const poolShareAbi = parseAbi([
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address account) view returns (uint256)',
]);

/** queryBatchSwap kind for exact-input swaps */
const GIVEN_IN = 0;

/**
 * Subset of PublicClient the reader needs
 */
export type VaultReadClient = Pick<PublicClient, 'readContract' | 'simulateContract'>;

export class VaultBalanceReader implements BalanceReader {
  constructor(
    private readonly client: VaultReadClient,
    readonly vaultAddress: Address
  ) {}

  async getPoolTokens(poolId: Hex32): Promise<LedgerPoolTokens> {
    try {
      const [tokens, balances] = await this.client.readContract({
        address: this.vaultAddress,
        abi: vaultAbi,
        functionName: 'getPoolTokens',
        args: [poolId],
      });
      return { tokens: [...tokens], balances: [...balances] };
    } catch (error) {
      throw this.wrap('getPoolTokens', poolId, error);
    }
  }

  async getTotalSupply(poolId: Hex32): Promise<bigint> {
    const pool = await this.getPoolAddress(poolId);
    try {
      return await this.client.readContract({
        address: pool,
        abi: poolShareAbi,
        functionName: 'totalSupply',
      });
    } catch (error) {
      throw this.wrap('totalSupply', poolId, error);
    }
  }

  async getShareBalance(poolId: Hex32, account: HexAddress): Promise<bigint> {
    const pool = await this.getPoolAddress(poolId);
    try {
      return await this.client.readContract({
        address: pool,
        abi: poolShareAbi,
        functionName: 'balanceOf',
        args: [account],
      });
    } catch (error) {
      throw this.wrap('balanceOf', poolId, error);
    }
  }

  async simulateSwap(
    poolId: Hex32,
    tokenIn: HexAddress,
    tokenOut: HexAddress,
    amountIn: bigint
  ): Promise<bigint> {
    try {
      const { result } = await this.client.simulateContract({
        address: this.vaultAddress,
        abi: vaultAbi,
        functionName: 'queryBatchSwap',
        args: [
          GIVEN_IN,
          [{ poolId, assetInIndex: 0n, assetOutIndex: 1n, amount: amountIn, userData: '0x' }],
          [tokenIn, tokenOut],
          {
            sender: this.vaultAddress,
            fromInternalBalance: false,
            recipient: this.vaultAddress,
            toInternalBalance: false,
          },
        ],
      });

      // Deltas are from the vault's perspective: output is negative
      const outDelta = result[1];
      if (outDelta === undefined || outDelta > 0n) {
        throw new Error(`Unexpected queryBatchSwap output delta: ${String(outDelta)}`);
      }
      return -outDelta;
    } catch (error) {
      throw this.wrap('queryBatchSwap', poolId, error);
    }
  }

  private async getPoolAddress(poolId: Hex32): Promise<Address> {
    try {
      const [pool] = await this.client.readContract({
        address: this.vaultAddress,
        abi: vaultAbi,
        functionName: 'getPool',
        args: [poolId],
      });
      return pool;
    } catch (error) {
      throw this.wrap('getPool', poolId, error);
    }
  }

  private wrap(method: string, poolId: Hex32, error: unknown): LedgerError {
    return new LedgerError(
      `Failed to read ${method} for pool ${poolId}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { vault: this.vaultAddress, poolId, method },
      error
    );
  }
}
