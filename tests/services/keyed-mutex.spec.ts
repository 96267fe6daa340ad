import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../../src/services/keyed-mutex.js';

describe('KeyedMutex', () => {
  it('hands a key to waiters in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const releaseFirst = await mutex.acquire('main');
    const second = mutex.acquire('main').then((release) => {
      order.push('second');
      release();
    });
    const third = mutex.acquire('main').then((release) => {
      order.push('third');
      release();
    });

    expect(mutex.isLocked('main')).toBe(true);
    order.push('first');
    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(mutex.isLocked('main')).toBe(false);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const releaseA = await mutex.acquire('a');
    const releaseB = await mutex.acquire('b');

    expect(mutex.isLocked('a')).toBe(true);
    expect(mutex.isLocked('b')).toBe(true);
    releaseA();
    releaseB();
  });

  it('ignores a second release call', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('k');
    release();
    release();

    const again = await mutex.acquire('k');
    expect(mutex.isLocked('k')).toBe(true);
    again();
  });
});
