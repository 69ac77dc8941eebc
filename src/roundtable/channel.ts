/**
 * Bounded many-producer, single-consumer async channel.
 *
 * `push()` resolves once the item is buffered or handed to a waiting
 * consumer; while the buffer is full it waits, which is what holds a fast
 * network reader back behind a slow renderer. After `close()` buffered
 * items still drain, and later pushes are dropped.
 *
 * ```typescript
 * const channel = new AsyncChannel<number>(2);
 * void (async () => { await channel.push(1); channel.close(); })();
 * for await (const n of channel) console.log(n);
 * ```
 */
export class AsyncChannel<T> implements AsyncIterableIterator<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly waitingSenders: Array<() => void> = [];
  private receiver: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  constructor(private readonly capacity = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel closed before the item was accepted. */
  async push(value: T): Promise<boolean> {
    while (!this.closed && !this.receiver && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => {
        this.waitingSenders.push(resolve);
      });
    }
    if (this.closed) return false;

    if (this.receiver) {
      const resolve = this.receiver;
      this.receiver = null;
      resolve({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.receiver) {
      const resolve = this.receiver;
      this.receiver = null;
      resolve({ value: undefined, done: true });
    }
    for (const wake of this.waitingSenders.splice(0)) wake();
  }

  async next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item) {
      this.waitingSenders.shift()?.();
      return { value: item.value, done: false };
    }
    if (this.closed) return { value: undefined, done: true };

    return new Promise((resolve) => {
      this.receiver = resolve;
    });
  }

  /** Consumer walked away: close and discard whatever is buffered. */
  async return(): Promise<IteratorResult<T>> {
    this.buffer.length = 0;
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
