/**
 * Chainlink Rate Oracle
 *
 * Reads a Chainlink-compatible USD price aggregator through a viem PublicClient.
 * Transport failures and malformed answers are wrapped in OracleError
 * (RateUnavailable); validation of the answer itself is the assimilator's job.
 */

import { parseAbi, type Address, type PublicClient } from 'viem';
import { OracleError, type RoundData } from '@fxpool/shared';
import type { RateOracle } from './rate-oracle.js';

export const aggregatorV3Abi = parseAbi([
  'function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
  'function latestAnswer() view returns (int256)',
  'function decimals() view returns (uint8)',
]);

/**
 * Subset of PublicClient the oracle needs
 */
export type OracleReadClient = Pick<PublicClient, 'readContract'>;

export class ChainlinkRateOracle implements RateOracle {
  constructor(
    private readonly client: OracleReadClient,
    readonly address: Address
  ) {}

  async latestRoundData(): Promise<RoundData> {
    try {
      const [roundId, answer, startedAt, updatedAt, answeredInRound] =
        await this.client.readContract({
          address: this.address,
          abi: aggregatorV3Abi,
          functionName: 'latestRoundData',
        });

      return { roundId, price: answer, startedAt, updatedAt, answeredInRound };
    } catch (error) {
      throw this.wrap('latestRoundData', error);
    }
  }

  async latestAnswer(): Promise<bigint> {
    try {
      return await this.client.readContract({
        address: this.address,
        abi: aggregatorV3Abi,
        functionName: 'latestAnswer',
      });
    } catch (error) {
      throw this.wrap('latestAnswer', error);
    }
  }

  /**
   * Feed decimals; FX pool assimilators expect 8
   */
  async decimals(): Promise<number> {
    try {
      return await this.client.readContract({
        address: this.address,
        abi: aggregatorV3Abi,
        functionName: 'decimals',
      });
    } catch (error) {
      throw this.wrap('decimals', error);
    }
  }

  private wrap(method: string, error: unknown): OracleError {
    return new OracleError(
      'RateUnavailable',
      `Failed to read ${method} from oracle ${this.address}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { oracle: this.address, method },
      error
    );
  }
}
