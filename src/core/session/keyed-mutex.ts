/**
 * Keyed Mutex
 *
 * Serializes async work per key. Calls for the same key run one at a time
 * in arrival order; calls for different keys never wait on each other.
 * The orchestrator keys on session id (messages, abandon) and on the
 * (user, topic, course) triple (session start).
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await mutex.runExclusive('sess_abc', async () => {
 *   // no other runExclusive('sess_abc', ...) body runs here
 * });
 * ```
 */
export class KeyedMutex {
  /**
   * Waiters per held key. Presence of an entry means the key is held;
   * the array holds the resume callbacks of queued callers.
   */
  private readonly waiters = new Map<string, Array<() => void>>();

  /**
   * Runs `fn` while holding the lock for `key`.
   * The lock is released on every exit path, including a thrown error.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  /**
   * Whether some caller currently holds `key`.
   */
  isLocked(key: string): boolean {
    return this.waiters.has(key);
  }

  /**
   * Number of keys currently held.
   */
  get size(): number {
    return this.waiters.size;
  }

  private acquire(key: string): Promise<void> {
    const queue = this.waiters.get(key);

    if (!queue) {
      this.waiters.set(key, []);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  }

  /**
   * Hands the lock to the next waiter, or frees the key when none is queued.
   */
  private release(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();

    if (next) {
      next();
    } else {
      this.waiters.delete(key);
    }
  }
}
