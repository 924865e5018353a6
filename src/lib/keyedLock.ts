import { Semaphore } from './semaphore';

/**
 * One mutex per key. Work for different keys runs in parallel; work for the
 * same key runs one at a time in arrival order. Idle locks are dropped.
 */
export class KeyedLock {
  private locks = new Map<string, Semaphore>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(key, lock);
    }
    try {
      return await lock.run(fn);
    } finally {
      if (lock.idle && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  /** True while work for `key` is running or queued. */
  isBusy(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
