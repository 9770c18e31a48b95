import { AsyncQueue } from "@sapphire/async-queue";
import { sleep } from "../utils/helpers";

type Bucket = {
  queue: AsyncQueue;
  lastIdentifyAt: number;
};

export const IDENTIFY_INTERVAL = 5_000;

/**
 * Hands out identify permits: shards whose ids share a bucket
 * (`shardId % maxConcurrency`) identify at most once per interval.
 */
export class IdentifyQueue {
  private readonly buckets = new Map<number, Bucket>();

  constructor(
    private readonly maxConcurrency = 1,
    private readonly interval = IDENTIFY_INTERVAL
  ) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError("maxConcurrency must be a positive integer");
    }
  }

  bucketOf(shardId: number) {
    return shardId % this.maxConcurrency;
  }

  /** Resolves when `shardId` may identify; waiters of a bucket are served in call order */
  async wait(shardId: number) {
    const key = this.bucketOf(shardId);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { queue: new AsyncQueue(), lastIdentifyAt: -Infinity };
      this.buckets.set(key, bucket);
    }

    await bucket.queue.wait();
    try {
      const delay = bucket.lastIdentifyAt + this.interval - Date.now();
      if (delay > 0) await sleep(delay);
      bucket.lastIdentifyAt = Date.now();
    } finally {
      bucket.queue.shift();
    }
  }

  get pending() {
    let pending = 0;
    for (const { queue } of this.buckets.values()) {
      pending += queue.remaining;
    }
    return pending;
  }
}
