import { Mutex } from 'async-mutex';

/**
 * Set of keys currently held by a caller. `tryAcquire` is an insert-if-absent:
 * the check and the insertion happen in the same synchronous step.
 */
export class KeyedRegistry<K> {
  private readonly held = new Set<K>();

  tryAcquire(key: K): boolean {
    if (this.held.has(key)) {
      return false;
    }
    this.held.add(key);
    return true;
  }

  release(key: K): void {
    this.held.delete(key);
  }

  has(key: K): boolean {
    return this.held.has(key);
  }

  keys(): K[] {
    return [...this.held];
  }
}

/**
 * Mutual exclusion per key. Callers for the same key run one after another,
 * callers for different keys run concurrently. Idle keys are dropped.
 */
export class KeyedMutex<K> {
  private readonly entries = new Map<K, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.entries.set(key, entry);
    }
    entry.holders++;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) {
        this.entries.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.entries.get(key)?.mutex.isLocked() ?? false;
  }
}
