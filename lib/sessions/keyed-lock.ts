import pLimit, { type LimitFunction } from 'p-limit';

interface LockEntry {
  limit: LimitFunction;
  holders: number;
}

/**
 * Mutual exclusion per key. Work under different keys never waits on each
 * other; work under the same key runs one task at a time, in arrival order.
 *
 * Entries are dropped once no task holds or waits on them.
 */
export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { limit: pLimit(1), holders: 0 };
      this.entries.set(key, entry);
    }

    const current = entry;
    current.holders++;
    try {
      return await current.limit(task);
    } finally {
      current.holders--;
      if (current.holders === 0) {
        this.entries.delete(key);
      }
    }
  }

  /** Number of keys with pending or running work */
  get size(): number {
    return this.entries.size;
  }
}
