/**
 * @stockpile/storage: Async mutual exclusion.
 *
 * Mutex serializes async critical sections in FIFO order.
 * KeyedMutex keeps one independent queue per key, so work on different
 * keys interleaves freely while work on the same key runs one at a time.
 *
 * Both are in-process only; they coordinate callers sharing one event loop.
 */

/**
 * FIFO async mutex.
 */
export class Mutex {
  /** Settles when the current holder (and everyone queued) is done */
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Run `fn` once every previously queued section has finished.
   * The lock is released whether `fn` resolves or rejects.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this._tail;
    let release: () => void = () => undefined;
    this._tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this._pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this._pending--;
      release();
    }
  }

  /** True while a section is running or queued. */
  get isLocked(): boolean {
    return this._pending > 0;
  }
}

/**
 * One FIFO mutex per string key.
 *
 * Idle keys are dropped so the map does not grow with every item ever seen.
 */
export class KeyedMutex {
  private readonly _locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this._locks.get(key);
    if (mutex === undefined) {
      mutex = new Mutex();
      this._locks.set(key, mutex);
    }

    const lock = mutex;
    try {
      return await lock.runExclusive(fn);
    } finally {
      if (!lock.isLocked && this._locks.get(key) === lock) {
        this._locks.delete(key);
      }
    }
  }

  /** True while `key` has a running or queued section. */
  isLocked(key: string): boolean {
    return this._locks.get(key)?.isLocked ?? false;
  }

  /** Number of keys with running or queued sections. */
  get size(): number {
    return this._locks.size;
  }
}
