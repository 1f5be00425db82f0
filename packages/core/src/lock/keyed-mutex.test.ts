/**
 * Keyed Mutex Tests
 */
import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('should serialize work on the same key', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive('inc-1', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive('inc-1', async () => {
      order.push('second');
    });

    await tick();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('inc-1')).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('inc-1')).toBe(false);
    expect(mutex.size).toBe(0);
  });

  it('should not block different keys', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });

    const a = mutex.runExclusive('a', async () => {
      await gate;
      order.push('a');
    });
    const b = mutex.runExclusive('b', async () => {
      order.push('b');
    });

    await b;
    expect(order).toEqual(['b']);
    releaseA();
    await a;
    expect(order).toEqual(['b', 'a']);
  });

  it('should release the key when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('inc-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('inc-1', async () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });
});
