/**
 * Runs tasks one at a time per key; tasks under different keys run
 * concurrently. A rejected task does not block the ones queued after it.
 */
export class KeyedTaskQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return next;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
