/**
 * Serializes async operations that must never overlap.
 *
 * @module utils/concurrency
 */

/**
 * Runs async operations one at a time, in call order.
 *
 * A request/reply channel accepts exactly one outstanding request, so callers
 * that share a channel queue their work here instead of interleaving frames.
 *
 * @example
 * ```typescript
 * const lock = new SerialLock();
 * const [a, b] = await Promise.all([
 *   lock.run(() => exchange('first')),
 *   lock.run(() => exchange('second')), // starts after 'first' settles
 * ]);
 * ```
 */
export class SerialLock {
  private busy = false;
  private waiters: Array<() => void> = [];

  /**
   * Execute `fn` once every previously queued operation has settled.
   *
   * @param fn - Async function to execute
   * @returns Promise resolving to the function's result
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.busy) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    this.busy = true;
    try {
      return await fn();
    } finally {
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter
        next();
      } else {
        this.busy = false;
      }
    }
  }

  /**
   * Whether an operation is currently executing.
   */
  isBusy(): boolean {
    return this.busy;
  }

  /**
   * Number of operations waiting for their turn.
   */
  getQueueSize(): number {
    return this.waiters.length;
  }
}
