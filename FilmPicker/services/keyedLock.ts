/**
 * Per-key mutual exclusion built on promise chains.  Tasks for the same key
 * run one after another in arrival order; tasks for different keys never wait
 * on each other.  A key's entry is dropped once its queue drains.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running tasks */
  get activeKeys(): number {
    return this.tails.size;
  }
}
