/**
 * Unbounded FIFO queue with an awaitable, cancellable pop.
 *
 * Producers never block. A consumer either polls with `tryShift()` or
 * suspends in `shift(signal)` until an item arrives, the signal aborts,
 * or the queue is closed.
 */
export class AsyncQueue<T extends object | string | number | boolean> {
  private items: T[] = [];
  private waiters: Array<(value: T | null) => void> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append an item. Returns false if the queue is closed and the item was dropped.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Remove and return the head item, or undefined when empty.
   */
  tryShift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Wait for the next item. Resolves null when the signal aborts or the
   * queue is closed while waiting.
   */
  shift(signal?: AbortSignal): Promise<T | null> {
    const head = this.items.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) {
          this.waiters.splice(idx, 1);
        }
        resolve(null);
      };
      const waiter = (value: T | null) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Close the queue. Pending waiters resolve null; buffered items remain
   * available to `tryShift()` and `shift()`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }

  clear(): void {
    this.items = [];
  }
}
