/**
 * Per-key mutual exclusion built on promise chaining.
 *
 * Each `run(key, fn)` waits for the previous holder of `key` before executing,
 * so work on the same key is serialized while different keys run in parallel.
 * Idle keys are dropped from the table.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Holds every key in `keys` for the duration of `task`. Keys are taken in
   * sorted order so two callers sharing keys cannot deadlock.
   */
  async runAll<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const acquire = (i: number): Promise<T> =>
      i === ordered.length ? task() : this.run(ordered[i], () => acquire(i + 1));
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
