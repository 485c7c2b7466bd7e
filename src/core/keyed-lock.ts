/**
 * Per-key async mutual exclusion.
 *
 * Operations submitted under the same key run one after another in
 * submission order; operations under different keys never wait on each
 * other. Used to serialize container transitions per agent.
 */

export class KeyedLock {
  /** Tail of the wait chain per key. Removed once the chain drains. */
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `operation` once every earlier operation on `key` has settled. */
  async inLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any operation is running or queued for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
