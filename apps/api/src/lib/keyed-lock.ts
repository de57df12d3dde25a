// =====================================================
// Keyed Lock
// =====================================================
// Serializes async critical sections that share a key.
// Sections on different keys run independently. Each key
// holds the tail of its promise chain; the entry is dropped
// once the chain drains so idle keys cost nothing.

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` after every section previously queued under `key` settles.
   * A rejected section does not block the ones queued behind it.
   */
  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Number of keys with queued or running sections */
  get activeKeys(): number {
    return this.tails.size;
  }
}
