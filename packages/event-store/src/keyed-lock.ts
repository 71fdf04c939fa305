/**
 * @quire/event-store — Per-key async mutual exclusion.
 *
 * Serializes async critical sections that share a key (a billing entity,
 * a subscription id, an author+period) while letting different keys run
 * concurrently. Waiters are served in arrival order.
 *
 * Not re-entrant: calling `run` for a key from inside a section holding
 * the same key deadlocks. Functions that already hold the lock take the
 * state they need as arguments instead of locking again.
 */

export class KeyedLock {
  /** Tail of the waiter chain per key */
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier section for `key` has settled.
   * The section's result or error is passed through unchanged.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** True while a section for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this._tails.has(key);
  }

  /** Number of keys with a running or queued section. */
  get activeKeys(): number {
    return this._tails.size;
  }
}
