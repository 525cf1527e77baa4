/**
 * Per-key async mutex. Callers holding different keys never wait on each other;
 * callers on the same key run one at a time in arrival order.
 */
export class KeyedLock<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  /** Run `fn` once every earlier holder of `key` has finished (successfully or not). */
  public async run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last one out drops the key so the map does not grow with every id ever seen.
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Whether any caller currently holds or waits on `key`. */
  public isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
