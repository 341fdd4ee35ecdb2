/**
 * Serializes async work per key. Work for different keys runs concurrently;
 * work for the same key runs one at a time in submission order.
 */
export class PerKeyLock<K> {
  private readonly tails = new Map<K, Promise<void>>();
  private readonly holders = new Map<K, number>();

  isLocked(key: K): boolean {
    return (this.holders.get(key) ?? 0) > 0;
  }

  async run<T>(key: K, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

    try {
      await previous;
      return await work();
    } finally {
      release();
      const remaining = (this.holders.get(key) ?? 1) - 1;
      if (remaining <= 0) this.holders.delete(key);
      else this.holders.set(key, remaining);
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
