/** Runs tasks one at a time per key; tasks under different keys run independently. */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const tail = next.catch(() => undefined);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return next;
  }

  get size(): number {
    return this.tails.size;
  }
}
