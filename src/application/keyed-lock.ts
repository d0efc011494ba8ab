/**
 * Per-key mutual exclusion built on promise chains.
 *
 * Work submitted under the same key runs strictly in submission order;
 * different keys never wait on each other. A rejected task does not
 * poison the chain for the next one.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      // last one out clears the entry so idle keys don't accumulate.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pending(): number {
    return this.tails.size;
  }
}
