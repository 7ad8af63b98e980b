/**
 * Promise-chain locks for serialising async critical sections.
 *
 * State is in-memory and does not span processes.
 */

const noop = (): void => undefined;

/**
 * A mutual-exclusion lock. Callers run in arrival order; a failing
 * critical section releases the lock for the next caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(noop, noop);
    return run;
  }
}

/**
 * One mutex per key, created on demand and dropped once idle.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(noop, noop);
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a queued or running critical section */
  get size(): number {
    return this.tails.size;
  }
}
