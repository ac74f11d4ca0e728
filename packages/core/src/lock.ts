/**
 * Serializes async work per key.  Tasks sharing a key run one after another
 * in call order; tasks under different keys never wait on each other.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock();
 * await locks.run(session.sessionId, () => orchestrator.run(order));
 * ```
 */
export class KeyedLock {
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   * The task's result or rejection is passed through unchanged.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Last one out clears the entry.
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Whether any task is running or queued for `key`. */
  isLocked(key: string): boolean {
    return this._tails.has(key);
  }
}
