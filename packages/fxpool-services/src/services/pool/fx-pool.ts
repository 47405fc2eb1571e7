import type { FxPoolConfig, PoolSide } from '@fxpool/shared';
import type { Assimilator } from '../assimilator/index.js';

/**
 * Onboarded pool: immutable configuration plus its two assimilators
 */
export interface FxPool {
  config: FxPoolConfig;
  base: Assimilator;
  quote: Assimilator;
}

export function assimilatorFor(pool: FxPool, side: PoolSide): Assimilator {
  return side === 'base' ? pool.base : pool.quote;
}
