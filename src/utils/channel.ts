type Waiter<T> = (value: T | undefined) => void;

/**
 * Multi-producer, single-consumer queue. `receive` resolves with
 * `undefined` once the channel is closed and drained.
 *
 * An item keeps its slot until the consumer calls `release`, so
 * `capacity` bounds both queued items and those still being worked on.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private outstanding = 0;

  constructor(readonly capacity = Infinity) {}

  get size() {
    return this.items.length;
  }

  /** Items queued or received but not yet released */
  get pending() {
    return this.outstanding;
  }

  get isClosed() {
    return this.closed;
  }

  /**
   * Returns `false` when the channel is closed or full. An `urgent` item
   * skips the capacity check and the queue.
   */
  send(item: T, urgent = false): boolean {
    if (this.closed) return false;
    if (!urgent && this.outstanding >= this.capacity) return false;
    this.outstanding++;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else if (urgent) {
      this.items.unshift(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** Frees the slot of an item the consumer is done with */
  release() {
    if (this.outstanding > 0) this.outstanding--;
  }

  receive(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Closes the channel and returns whatever was still queued; those items keep their slots */
  close(): T[] {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
    return this.items.splice(0);
  }

  /** Stops accepting items; queued items can still be received */
  end() {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) return;
      yield item;
    }
  }
}
