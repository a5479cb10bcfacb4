/**
 * Bounded FIFO channel between one producer and one consumer.
 *
 * `send` waits while the queue is full, which throttles a fast producer.
 * Only the producer closes; the consumer sees the remaining items and then
 * the end of iteration.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waitingSenders: Array<() => void> = [];
  private readonly waitingReceivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue an item, waiting for room if needed. Resolves false when the queue
   * is closed or the signal aborts before the item could be delivered.
   */
  async send(item: T, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (this.isClosed || signal?.aborted) return false;

      const receiver = this.waitingReceivers.shift();
      if (receiver) {
        receiver({ value: item, done: false });
        return true;
      }
      if (this.items.length < this.capacity) {
        this.items.push(item);
        return true;
      }
      await this.waitForRoom(signal);
    }
  }

  /** Next item, or `done` once the queue is closed and drained. */
  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      this.waitingSenders.shift()?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waitingReceivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const receiver of this.waitingReceivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const wake of this.waitingSenders.splice(0)) wake();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }

  private waitForRoom(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.waitingSenders.indexOf(wake);
        if (index !== -1) this.waitingSenders.splice(index, 1);
        resolve();
      };
      const wake = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waitingSenders.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
