/**
 * Rate oracle types
 *
 * Prices are signed integers scaled by 1e8 (Chainlink USD feed convention).
 */

/**
 * Raw answer of an aggregator's latestRoundData()
 */
export interface RoundData {
  roundId: bigint;
  /** Signed price, 1e8 scale */
  price: bigint;
  /** Unix seconds the round started; 0 means the round never started */
  startedAt: bigint;
  /** Unix seconds of the last update */
  updatedAt: bigint;
  answeredInRound: bigint;
}
