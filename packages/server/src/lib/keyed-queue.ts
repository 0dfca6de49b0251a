/**
 * KeyedQueue - serializes async work per key.
 *
 * Tasks sharing a key run one at a time in submission order; tasks with
 * different keys run concurrently. A key's chain is dropped once it drains.
 */

export class KeyedQueue<K> {
  private tails = new Map<K, Promise<void>>();

  /**
   * Run `task` after every earlier task for `key` has settled.
   * Resolves or rejects with the task's own result.
   */
  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain must keep going whether this task fails or not.
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

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
