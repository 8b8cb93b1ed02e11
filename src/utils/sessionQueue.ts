/**
 * Runs tasks one at a time per key. Tasks under different keys run concurrently.
 * A failing task rejects its own promise only; the next task for the key still runs.
 */
export class KeyedSerialQueue {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
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

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
