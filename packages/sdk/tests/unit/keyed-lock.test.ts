/**
 * Unit tests for per-key task serialization
 */

import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/keyed-lock.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedLock [unit]', () => {
  it('should run tasks under one key in order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        await tick();
        order.push('first');
      }),
      lock.run('a', async () => {
        order.push('second');
      }),
    ]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should not hold other keys behind a slow task', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        await tick();
        order.push('a');
      }),
      lock.run('b', async () => {
        order.push('b');
      }),
    ]);

    expect(order).toEqual(['b', 'a']);
  });

  it('should keep the queue going after a rejected task', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget a key once its queue drains', async () => {
    const lock = new KeyedLock();

    await lock.run('a', async () => 1);
    await tick();

    expect(lock.size).toBe(0);
  });
});
