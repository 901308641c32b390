import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './lock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('KeyedMutex', () => {
  it('serializes tasks under one key', async () => {
    const mutex = new KeyedMutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        mutex.runExclusive('test-store.example', async () => {
          const read = counter;
          await tick();
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(20);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive('a.example', async () => {
      await blocked;
      order.push('a');
    });
    await mutex.runExclusive('b.example', () => {
      order.push('b');
    });
    release();
    await first;

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the queue going after a failure', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('a.example', () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('a.example', () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets keys once idle', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive('a.example', () => undefined);
    expect(mutex.size).toBe(0);
  });
});
