// Utility: Per-key task queue
// Tasks sharing a key run one after another; different keys run concurrently

export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run a task once every earlier task queued under the same key has settled
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Number of keys with queued or running tasks
   */
  get size(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
