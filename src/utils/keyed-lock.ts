/**
 * Per-key mutual exclusion.
 *
 * Work for one key runs strictly one at a time in arrival order; work for
 * different keys never waits on each other. The chain for a key is dropped
 * once its last holder finishes.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
