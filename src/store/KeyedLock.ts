/**
 * KeyedLock — Serializes async tasks per key.
 *
 * Tasks for the same key run one after another in submission order; tasks
 * for different keys never wait on each other. A failing task releases its
 * key like any other.
 */

export class KeyedLock {
  // key -> promise settled when the last queued task for that key is done
  private readonly tails: Map<string, Promise<void>> = new Map();

  /**
   * Run a task once every earlier task for the same key has settled.
   */
  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task for the key is running or queued.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with running or queued tasks.
   */
  size(): number {
    return this.tails.size;
  }
}
