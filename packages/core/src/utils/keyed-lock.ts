/**
 * Per-key mutual exclusion built from promise chains.
 *
 * Operations for the same key run one after another in call order; operations
 * for different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with queued or running operations */
  get activeKeys(): number {
    return this.tails.size;
  }

  run<T>(key: string, op: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(op);

    // The tail settles once `op` does, whatever the outcome, so a failed
    // operation never blocks the ones queued behind it.
    const tail: Promise<void> = next.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);

    return next;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
