/**
 * Pool Parameter Schemas
 *
 * Validates the configuration an FX pool is onboarded with. Curve
 * parameters and weights are 64.64 bigints; protocolPercentFee is a whole
 * percentage.
 */

import { z } from 'zod';
import { isAddress, isHex, size } from 'viem';
import { ONE_64X64, sameAddress, type Hex32, type HexAddress } from '@fxpool/shared';

export const addressSchema = z.custom<HexAddress>(
  (value) => typeof value === 'string' && isAddress(value, { strict: false }),
  { message: 'Invalid address' }
);

export const hex32Schema = z.custom<Hex32>(
  (value) => typeof value === 'string' && isHex(value) && size(value) === 32,
  { message: 'Invalid 32-byte identifier' }
);

export const fxTokenSchema = z.object({
  address: addressSchema,
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(36),
});

/** 64.64 fraction in (0, 1] */
const weightSchema = z.bigint().positive().max(ONE_64X64);

export const weightedPairSchema = z
  .object({
    baseWeight: weightSchema,
    quoteWeight: weightSchema,
  })
  .refine((weights) => weights.baseWeight + weights.quoteWeight === ONE_64X64, {
    message: 'Weights must sum to 1.0',
  });

export const curveParametersSchema = z
  .object({
    alpha: z.bigint().positive().lt(ONE_64X64),
    beta: z.bigint().nonnegative(),
    delta: z.bigint().nonnegative(),
    // At most a 1% swap fee
    epsilon: z.bigint().nonnegative().max(ONE_64X64 / 100n),
    lambda: z.bigint().nonnegative().max(ONE_64X64),
    protocolPercentFee: z.bigint().nonnegative().max(100n),
  })
  .refine((curve) => curve.beta < curve.alpha, {
    message: 'beta must be below alpha',
    path: ['beta'],
  });

export const poolParametersSchema = z
  .object({
    poolId: hex32Schema,
    poolAddress: addressSchema,
    baseToken: fxTokenSchema,
    quoteToken: fxTokenSchema,
    baseOracle: addressSchema,
    weights: weightedPairSchema,
    curve: curveParametersSchema,
  })
  .refine((pool) => !sameAddress(pool.baseToken.address, pool.quoteToken.address), {
    message: 'Base and quote tokens must differ',
    path: ['quoteToken', 'address'],
  });

export type PoolParameters = z.infer<typeof poolParametersSchema>;
