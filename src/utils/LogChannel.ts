/**
 * Unbounded single-consumer queue that turns push callbacks into an async
 * iterator. Values are yielded in push order; a failure is thrown to the
 * consumer once the values queued before it have been drained.
 */
export class LogChannel<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: { resolve: () => void } | null = null;
  private failure: { error: unknown } | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed || this.failure) return;
    this.buffer.push(value);
    this.wake();
  }

  fail(error: unknown): void {
    if (this.closed || this.failure) return;
    this.failure = { error };
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;

      await new Promise<void>(resolve => {
        this.waiter = { resolve };
      });
    }
  }
}
