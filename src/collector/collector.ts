import { FullEvent } from "../dispatch/full-event";
import { Channel } from "../utils/channel";
import { CollectorSink } from "./registry";

export type CollectorOptions<T> = {
  /** Maps an event to the collected value, or `undefined` to skip it */
  filter: (event: FullEvent) => T | undefined;
  /** Stops the collector after this long, counted from creation */
  timeoutMs?: number;
  /** Stops the collector once this many values were collected */
  maxEvents?: number;
};

/**
 * Taps the decoded event stream of a shard. Values are buffered until
 * read, so a slow reader never holds up dispatch.
 *
 * @example
 * const replies = messenger.addCollector(
 *   new Collector({
 *     filter: (event) => (event.type === "MessageCreate" ? event.message : undefined),
 *     maxEvents: 3,
 *     timeoutMs: 30_000,
 *   })
 * );
 * for await (const message of replies) console.log(message.content);
 */
export class Collector<T> implements CollectorSink, AsyncIterable<T> {
  private readonly buffer = new Channel<T>();
  private readonly filter: (event: FullEvent) => T | undefined;
  private readonly stopListeners: (() => void)[] = [];
  private remaining: number;
  private timeout: NodeJS.Timeout | null = null;

  constructor(options: CollectorOptions<T>) {
    this.filter = options.filter;
    this.remaining = options.maxEvents ?? Infinity;
    if (this.remaining <= 0) {
      throw new RangeError("maxEvents must be positive");
    }
    if (options.timeoutMs !== undefined) {
      this.timeout = setTimeout(() => this.stop(), options.timeoutMs);
      this.timeout.unref();
    }
  }

  get stopped() {
    return this.buffer.isClosed;
  }

  offer(event: FullEvent): boolean {
    if (this.stopped) return false;

    const value = this.filter(event);
    if (value === undefined) return true;

    this.buffer.send(value);
    if (--this.remaining <= 0) {
      this.stop();
      return false;
    }
    return true;
  }

  /** Next collected value, `undefined` once stopped and drained */
  next(): Promise<T | undefined> {
    return this.buffer.receive();
  }

  /** First collected value; stops the collector */
  async first(): Promise<T | undefined> {
    const value = await this.next();
    this.stop();
    return value;
  }

  /** Every value collected until the collector stops */
  async collect(): Promise<T[]> {
    const values: T[] = [];
    for await (const value of this) {
      values.push(value);
    }
    return values;
  }

  stop() {
    if (this.stopped) return;
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
    this.buffer.end();
    for (const listener of this.stopListeners.splice(0)) {
      listener();
    }
  }

  onStop(listener: () => void) {
    if (this.stopped) {
      listener();
      return;
    }
    this.stopListeners.push(listener);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.buffer[Symbol.asyncIterator]();
  }
}
