/**
 * Engine Configuration
 *
 * Tunables read from environment variables and validated with zod:
 * - FXPOOL_ORACLE_STALENESS_SECONDS: max age of an oracle round (default 87300 = 24h15m)
 * - FXPOOL_REBALANCE_BAND_BPS: half-width of the balanced dead-band (default 200 = ±2%)
 * - FXPOOL_MIGRATION_BUFFER_BPS: share of the exit valuation re-deposited (default 9900)
 *
 * Services take explicit overrides through their dependency objects; these
 * values are the defaults.
 */

import { z } from 'zod';
import {
  DEFAULT_MIGRATION_BUFFER_BPS,
  DEFAULT_REBALANCE_BAND_BPS,
} from '@fxpool/shared';

/** 24 hours + 15 minutes */
export const DEFAULT_ORACLE_STALENESS_SECONDS = 87_300;

const bps = z.coerce.number().int().min(0).max(10_000);

export const EngineConfigSchema = z.object({
  FXPOOL_ORACLE_STALENESS_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_ORACLE_STALENESS_SECONDS),
  FXPOOL_REBALANCE_BAND_BPS: bps.default(DEFAULT_REBALANCE_BAND_BPS),
  FXPOOL_MIGRATION_BUFFER_BPS: bps.default(DEFAULT_MIGRATION_BUFFER_BPS),
});

export interface EngineConfig {
  oracleStalenessSeconds: bigint;
  rebalanceBandBps: number;
  migrationBufferBps: number;
}

let cachedConfig: EngineConfig | undefined;

/**
 * Parse engine configuration from an environment object
 *
 * @throws Error listing every invalid variable
 */
export function parseEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const result = EngineConfigSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `- ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid FX pool engine configuration:\n${issues}`);
  }

  return {
    oracleStalenessSeconds: BigInt(result.data.FXPOOL_ORACLE_STALENESS_SECONDS),
    rebalanceBandBps: result.data.FXPOOL_REBALANCE_BAND_BPS,
    migrationBufferBps: result.data.FXPOOL_MIGRATION_BUFFER_BPS,
  };
}

/**
 * Engine configuration from process.env, parsed once
 */
export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = parseEngineConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests)
 */
export function resetEngineConfig(): void {
  cachedConfig = undefined;
}
