/**
 * Runs tasks one at a time per key, in submission order. Tasks under
 * different keys run independently. A rejected task rejects only its own
 * caller; the chain continues with the next task.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
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

  /** Keys with queued or running work. */
  get pendingKeys(): readonly string[] {
    return [...this.tails.keys()];
  }

  /** Resolves once everything queued under `key` so far has settled. */
  async drain(key: string): Promise<void> {
    await this.tails.get(key);
  }
}
