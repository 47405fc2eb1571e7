import { InvariantViolation } from '@fxpool/shared';

/**
 * Rejects overlapping entry into a state-mutating operation on the same pool
 *
 * Keys are claimed synchronously when `run` is called and released once the
 * operation settles, so a second call that starts while the first is
 * awaiting a collaborator fails immediately.
 */
export class ReentrancyGuard {
  private readonly active = new Set<string>();

  async run<T>(keys: readonly string[], operation: () => Promise<T>): Promise<T> {
    const claimed = [...new Set(keys.map((key) => key.toLowerCase()))];

    const busy = claimed.find((key) => this.active.has(key));
    if (busy) {
      throw new InvariantViolation('ReentrantCall', `Operation already in progress for ${busy}`, {
        key: busy,
      });
    }

    claimed.forEach((key) => this.active.add(key));
    try {
      return await operation();
    } finally {
      claimed.forEach((key) => this.active.delete(key));
    }
  }
}
