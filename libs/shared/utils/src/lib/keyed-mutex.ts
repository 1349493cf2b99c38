/**
 * Per-key async mutual exclusion.
 *
 * Tasks queued under the same key run one at a time in submission order;
 * tasks under different keys never wait on each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>>;

  constructor() {
    this.tails = new Map();
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
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
      // Last one out removes the key
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
