import type { RoundData } from '@fxpool/shared';

/**
 * Read-only rate oracle consumed by base-token assimilators
 *
 * Prices are signed integers scaled by 1e8.
 */
export interface RateOracle {
  latestRoundData(): Promise<RoundData>;
  latestAnswer(): Promise<bigint>;
}
