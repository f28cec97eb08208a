/**
 * Runs async tasks one at a time per key.
 *
 * Tasks sharing a key execute in submission order; tasks under different keys
 * run independently. Used to order store writes for a job id and
 * read-modify-write cycles on a JSON file.
 */
export class KeyedSequencer {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    // A failed predecessor must not block the queue; its caller already saw the rejection.
    const next = previous.then(task, task);
    const tail = next.catch(() => undefined);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return next;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
