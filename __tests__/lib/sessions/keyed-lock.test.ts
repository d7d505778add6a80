import { describe, it, expect } from 'vitest';

import { KeyedLock } from '@/lib/sessions/keyed-lock';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flush() {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('KeyedLock', () => {
  it('runs tasks for the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run('s1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('s1', async () => {
      events.push('second');
    });

    await flush();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different keys wait on each other', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run('s1', () => gate.promise);
    const other = await lock.run('s2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('releases the key after a failure and once idle', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('s1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await lock.run('s1', async () => 42)).toBe(42);
    expect(lock.size).toBe(0);
  });
});
