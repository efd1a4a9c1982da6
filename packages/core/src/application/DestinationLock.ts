/**
 * Serialises work per destination: tasks sharing a key run one after another,
 * tasks with different keys run freely. A failing task does not block the
 * tasks queued behind it. A key is forgotten once its last task settles.
 */
export class DestinationLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with a task queued or running. */
  get size(): number {
    return this.tails.size;
  }

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return result;
  }

  private release(key: string, tail: Promise<void>): void {
    // A later task on the key has queued behind this one and owns it now.
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
