import { describe, it, expect } from 'vitest';
import { InvariantViolation } from '@fxpool/shared';
import { ReentrancyGuard } from './reentrancy-guard.js';

describe('ReentrancyGuard', () => {
  it('should reject a second entry while the first is pending', async () => {
    const guard = new ReentrancyGuard();
    let release: () => void = () => undefined;
    const pending = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = guard.run(['0xAB'], async () => {
      await pending;
      return 'first';
    });

    await expect(guard.run(['0xab'], async () => 'second')).rejects.toBeInstanceOf(
      InvariantViolation
    );
    await expect(guard.run(['0xAb'], async () => 'third')).rejects.toMatchObject({
      code: 'ReentrantCall',
    });

    release();
    expect(await first).toBe('first');
    expect(await guard.run(['0xab'], async () => 'after')).toBe('after');
  });

  it('should allow different keys to run concurrently', async () => {
    const guard = new ReentrancyGuard();

    const results = await Promise.all([
      guard.run(['0x01'], async () => 1),
      guard.run(['0x02'], async () => 2),
    ]);

    expect(results).toEqual([1, 2]);
  });

  it('should release keys when the operation fails', async () => {
    const guard = new ReentrancyGuard();

    await expect(
      guard.run(['0x01', '0x02'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await guard.run(['0x01'], async () => 1)).toBe(1);
    expect(await guard.run(['0x02'], async () => 2)).toBe(2);
  });
});
