/**
 * @file packages/gateway/src/infrastructure/events/event-channel.ts
 * @description Single-consumer async queue with optional drop-oldest bound.
 */

export const CHANNEL_TIMEOUT = Symbol('channel-timeout');

type Waiter<T> = (result: IteratorResult<T>) => void;

export interface EventChannelOptions {
  /** Maximum queued items; when full, the oldest item is dropped. Unbounded when omitted. */
  capacity?: number;
}

/**
 * Producers `push` without blocking; one consumer pulls with `next` or
 * `for await`. After `close`, queued items still drain before the
 * iterator finishes.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;
  private dropped = 0;

  constructor(private readonly options: EventChannelOptions = {}) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items discarded because the channel was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Queues an item.
   * @returns false when the channel is already closed.
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }
    const capacity = this.options.capacity;
    if (capacity !== undefined && this.items.length >= capacity) {
      this.items.shift();
      this.dropped += 1;
    }
    this.items.push(item);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /**
   * Waits for the next item.
   * @param timeoutMs - Resolve with CHANNEL_TIMEOUT after this long without an item.
   */
  next(timeoutMs?: number): Promise<IteratorResult<T> | typeof CHANNEL_TIMEOUT> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter<T> = (result) => {
        if (timer) clearTimeout(timer);
        resolve(result);
      };
      this.waiters.push(waiter);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          resolve(CHANNEL_TIMEOUT);
        }, timeoutMs);
      }
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.next();
      if (result === CHANNEL_TIMEOUT || result.done) return;
      yield result.value;
    }
  }
}
