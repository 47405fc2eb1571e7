/**
 * Shared test fixtures for FX pool services
 */

import { mock } from 'vitest-mock-extended';
import {
  ONE_64X64,
  type FxPoolConfig,
  type FxToken,
  type Hex32,
  type HexAddress,
  type RoundData,
  type WeightedPair,
} from '@fxpool/shared';
import type { RateOracle } from '../clients/oracle/index.js';
import { InMemoryBalanceLedger, fixedRateSwapQuoter } from '../clients/ledger/index.js';
import { BaseAssimilator } from './assimilator/base-assimilator.js';
import { QuoteAssimilator } from './assimilator/quote-assimilator.js';
import type { FxPool } from './pool/fx-pool.js';

export const NOW = 1_700_000_000n;
export const fixedClock = (): bigint => NOW;

export const BASE_TOKEN: FxToken = {
  address: '0x1111111111111111111111111111111111111111',
  symbol: 'XSGD',
  decimals: 6,
};

export const QUOTE_TOKEN: FxToken = {
  address: '0x2222222222222222222222222222222222222222',
  symbol: 'USDC',
  decimals: 6,
};

export const BASE_ORACLE: HexAddress = '0x3333333333333333333333333333333333333333';
export const ALICE: HexAddress = '0x000000000000000000000000000000000000a11c';

export const POOL_ID: Hex32 = '0x00000000000000000000000000000000000000000000000000000000000000a1';
export const POOL_ADDRESS: HexAddress = '0x00000000000000000000000000000000000000a1';

export const HALF_WEIGHTS: WeightedPair = {
  baseWeight: ONE_64X64 / 2n,
  quoteWeight: ONE_64X64 / 2n,
};

/** USD rate of one base token, 1e8 scale */
export const UNIT_RATE = 100_000_000n;

export function createRound(overrides: Partial<RoundData> = {}): RoundData {
  return {
    roundId: 10n,
    price: UNIT_RATE,
    startedAt: NOW,
    updatedAt: NOW,
    answeredInRound: 10n,
    ...overrides,
  };
}

/**
 * RateOracle mock answering `price` with a fresh round
 */
export function createMockOracle(price: bigint = UNIT_RATE) {
  const oracle = mock<RateOracle>();
  oracle.latestRoundData.mockResolvedValue(createRound({ price }));
  oracle.latestAnswer.mockResolvedValue(price);
  return oracle;
}

export function createPoolConfig(overrides: Partial<FxPoolConfig> = {}): FxPoolConfig {
  return {
    poolId: POOL_ID,
    poolAddress: POOL_ADDRESS,
    baseToken: BASE_TOKEN,
    quoteToken: QUOTE_TOKEN,
    baseOracle: BASE_ORACLE,
    weights: HALF_WEIGHTS,
    curve: {
      alpha: ONE_64X64 / 2n,
      beta: ONE_64X64 / 4n,
      delta: ONE_64X64 / 4n,
      epsilon: ONE_64X64 / 2000n,
      lambda: ONE_64X64 / 2n,
      protocolPercentFee: 50n,
    },
    ...overrides,
  };
}

/**
 * Pool wired to a mocked base oracle answering `price`
 */
export function createTestPool(price: bigint = UNIT_RATE, overrides: Partial<FxPoolConfig> = {}): FxPool {
  const config = createPoolConfig(overrides);
  return {
    config,
    base: new BaseAssimilator(config.baseToken, createMockOracle(price), config.baseOracle, {
      now: fixedClock,
    }),
    quote: new QuoteAssimilator(config.quoteToken),
  };
}

export interface TestLedgerPool {
  poolId?: Hex32;
  baseRaw: bigint;
  quoteRaw: bigint;
  /** Shares held by ALICE */
  supply?: bigint;
}

/**
 * In-memory ledger pricing swaps at `price` for the base token and 1.0 for the quote
 */
export function createTestLedger(
  pools: TestLedgerPool[],
  price: bigint = UNIT_RATE
): InMemoryBalanceLedger {
  const ledger = new InMemoryBalanceLedger(
    fixedRateSwapQuoter([
      [BASE_TOKEN.address, { rate: price, decimals: BASE_TOKEN.decimals }],
      [QUOTE_TOKEN.address, { rate: UNIT_RATE, decimals: QUOTE_TOKEN.decimals }],
    ])
  );

  for (const pool of pools) {
    const poolId = pool.poolId ?? POOL_ID;
    ledger.createPool(poolId, [
      { token: BASE_TOKEN.address, balance: pool.baseRaw },
      { token: QUOTE_TOKEN.address, balance: pool.quoteRaw },
    ]);
    if (pool.supply) {
      ledger.mintShares(poolId, ALICE, pool.supply);
    }
  }

  return ledger;
}
