/**
 * Per-key mutual exclusion for async critical sections.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys run freely. The chain entry is dropped once its last task
 * settles, so the map does not grow with every key ever seen.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
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
  get pendingKeys(): number {
    return this.tails.size;
  }
}
