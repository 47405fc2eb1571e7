/**
 * Decimal conversion utilities for cross-token arithmetic
 *
 * Raw token amounts live in each token's native decimal scale (6 for USDC,
 * 18 for most ERC-20s). These helpers move values between scales.
 */

/**
 * Pool shares (BPT) use 18 decimals
 */
export const SHARE_DECIMALS = 18;

/**
 * 10^decimals as bigint
 *
 * @example
 * decimalsMultiplier(6); // 1_000_000n
 */
export function decimalsMultiplier(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new RangeError(`Invalid token decimals: ${decimals}`);
  }
  return 10n ** BigInt(decimals);
}

/**
 * Convert a bigint value from source decimals to target decimals
 *
 * @param value - Value in source token's smallest units
 * @param sourceDecimals - Decimals of source token (e.g., 6 for USDC)
 * @param targetDecimals - Decimals of target token (e.g., 18 for shares)
 * @returns Value in target token's smallest units
 *
 * @example
 * // 100 USDC (6 decimals) in 18 decimals
 * convertDecimals(100_000_000n, 6, 18);
 * // Returns: 100_000_000_000_000_000_000n
 *
 * @example
 * // 1 token (18 decimals) in 6 decimals (lossy)
 * convertDecimals(1_000_000_000_000_000_000n, 18, 6);
 * // Returns: 1_000_000n
 */
export function convertDecimals(
  value: bigint,
  sourceDecimals: number,
  targetDecimals: number
): bigint {
  if (sourceDecimals === targetDecimals) {
    return value;
  }

  const decimalDiff = targetDecimals - sourceDecimals;

  if (decimalDiff > 0) {
    return value * 10n ** BigInt(decimalDiff);
  } else {
    // Scale down - truncates
    return value / 10n ** BigInt(-decimalDiff);
  }
}
