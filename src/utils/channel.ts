/**
 * Unbounded async channel for handing messages from event producers to a
 * single consumer loop.
 *
 * Values are delivered in push order. Consumers await `next()` (or iterate
 * with `for await`) and are resumed as soon as a value arrives, so nothing
 * polls while the channel is empty.
 */
export class AsyncChannel<T> implements AsyncIterableIterator<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /**
   * Enqueue a value. Returns false when the channel is already closed.
   */
  push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  /**
   * Close the channel. Buffered values are still delivered; pending and
   * future reads past the end resolve as done.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of values waiting to be consumed
   */
  size(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
