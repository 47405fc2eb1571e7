/**
 * Token types
 */

/** 20-byte EVM address, structurally identical to viem's Address */
export type HexAddress = `0x${string}`;

/** 32-byte identifier (pool ids, registry keys) */
export type Hex32 = `0x${string}`;

export const ZERO_ADDRESS: HexAddress = '0x0000000000000000000000000000000000000000';

/**
 * ERC-20 token participating in an FX pool
 */
export interface FxToken {
  /** Token contract address */
  address: HexAddress;

  /** Token symbol (e.g., "XSGD", "USDC") */
  symbol: string;

  /** Number of decimal places (e.g., 6 for USDC, 18 for most tokens) */
  decimals: number;
}

/**
 * Which side of the pool a token sits on
 */
export type PoolSide = 'base' | 'quote';

/**
 * Case-insensitive address comparison
 */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
