/**
 * Keyed Mutex
 *
 * Serializes async tasks that share a key; tasks under different keys run
 * independently. Used to make read-modify-write sequences on one shop's
 * records free of lost updates.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` after every task previously queued under `key` has settled
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running tasks */
  get size(): number {
    return this.tails.size;
  }
}
