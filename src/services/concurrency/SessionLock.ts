/**
 * Per-session lock: turns for the same session run one after another,
 * turns for different sessions are never blocked by each other.
 *
 * Unlike a busy/reject lock, waiting callers queue up behind the current
 * holder and run in arrival order.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier call for `key` has settled.
   * The lock is released in finally, including when `fn` throws.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
