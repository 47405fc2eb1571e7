import { InputError, type Hex32 } from '@fxpool/shared';
import type { FxPool } from './fx-pool.js';

/**
 * Onboarded pools by pool id
 */
export class PoolDirectory {
  private readonly pools = new Map<string, FxPool>();

  has(poolId: Hex32): boolean {
    return this.pools.has(poolId.toLowerCase());
  }

  register(pool: FxPool): void {
    const { poolId } = pool.config;
    if (this.has(poolId)) {
      throw new InputError('InvalidPoolParameters', `Pool ${poolId} is already onboarded`, {
        poolId,
      });
    }
    this.pools.set(poolId.toLowerCase(), pool);
  }

  /**
   * @throws InputError UnknownPool
   */
  get(poolId: Hex32): FxPool {
    const pool = this.pools.get(poolId.toLowerCase());
    if (!pool) {
      throw new InputError('UnknownPool', `Pool ${poolId} has not been onboarded`, { poolId });
    }
    return pool;
  }
}
