/**
 * Single-writer guarantee for read-decide-write sequences.
 *
 * Matching reads riders and drives, decides, then writes both back.
 * Two matchers running at once against the same riders could book a rider
 * twice, so callers must run each sequence inside withLock().
 *
 * InProcessWriteLock only serializes work within one Node process. A
 * deployment running several instances must supply a distributed
 * implementation (e.g. Firestore transactions or a Redis lock).
 */
export interface WriteLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export class InProcessWriteLock implements WriteLock {
  private tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
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
}
