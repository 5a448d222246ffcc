import { describe, it, expect } from 'vitest';
import { createMutex } from '../src/lock.js';

describe('createMutex', () => {
  it('grants the lock immediately when free', async () => {
    const mutex = createMutex();
    const unlock = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    unlock();
    expect(mutex.locked).toBe(false);
  });

  it('serves waiters in arrival order', async () => {
    const mutex = createMutex();
    const order: string[] = [];
    const unlock = await mutex.acquire();

    const first = mutex.runExclusive(async () => {
      order.push('first');
    });
    const second = mutex.runExclusive(async () => {
      order.push('second');
    });
    order.push('holder');
    unlock();

    await Promise.all([first, second]);
    expect(order).toEqual(['holder', 'first', 'second']);
    expect(mutex.locked).toBe(false);
  });

  it('releases when the callback throws', async () => {
    const mutex = createMutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.locked).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = createMutex();
    const unlock = await mutex.acquire();
    const waiter = mutex.acquire();

    unlock();
    unlock();
    const unlockWaiter = await waiter;

    expect(mutex.locked).toBe(true);
    unlockWaiter();
    expect(mutex.locked).toBe(false);
  });

  it('drops a waiter whose signal aborts', async () => {
    const mutex = createMutex();
    const unlock = await mutex.acquire();
    const controller = new AbortController();
    const ran: string[] = [];

    const aborted = mutex.runExclusive(async () => {
      ran.push('aborted');
    }, controller.signal);
    const next = mutex.runExclusive(async () => {
      ran.push('next');
    });

    controller.abort(new Error('gave up'));
    await expect(aborted).rejects.toThrow('gave up');

    unlock();
    await next;
    expect(ran).toEqual(['next']);
    expect(mutex.locked).toBe(false);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const mutex = createMutex();
    await expect(mutex.acquire(AbortSignal.abort(new Error('late')))).rejects.toThrow(
      'late'
    );
    expect(mutex.locked).toBe(false);
  });
});
