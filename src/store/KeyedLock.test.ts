/**
 * Tests for KeyedLock.
 */

import { describe, it, expect } from 'vitest';
import { KeyedLock } from './KeyedLock.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedLock', () => {
  it('serializes read-modify-write tasks on one key', async () => {
    const lock = new KeyedLock();
    let counter = 0;

    await Promise.all(
      [15, 5, 0].map((wait) =>
        lock.run('counter', async () => {
          const read = counter;
          await delay(wait);
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(3);
  });

  it('runs tasks for one key in submission order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('k', async () => {
        await delay(10);
        order.push('first');
      }),
      lock.run('k', () => {
        order.push('second');
      }),
    ]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        await delay(20);
        order.push('a');
      }),
      lock.run('b', () => {
        order.push('b');
      }),
    ]);

    expect(order).toEqual(['b', 'a']);
  });

  it('releases the key when a task fails', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('k', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('k', () => 42)).resolves.toBe(42);
    expect(lock.isLocked('k')).toBe(false);
    expect(lock.size()).toBe(0);
  });

  it('returns the task result', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('k', async () => 'done')).resolves.toBe('done');
  });
});
