import { IdentifyQueue } from "../src/gateway/identify-queue";

describe("IdentifyQueue", () => {
  test("rejects a concurrency below one", () => {
    expect(() => new IdentifyQueue(0)).toThrow(RangeError);
  });

  test("maps shards to buckets", () => {
    const queue = new IdentifyQueue(4);
    expect([0, 1, 5, 8].map((id) => queue.bucketOf(id))).toEqual([0, 1, 1, 0]);
  });

  test("spaces identifies within a bucket", async () => {
    const queue = new IdentifyQueue(1, 50);
    const start = Date.now();
    const order: number[] = [];

    await Promise.all(
      [0, 1].map(async (id) => {
        await queue.wait(id);
        order.push(id);
      })
    );

    expect(order).toEqual([0, 1]);
    expect(Date.now() - start).toBeGreaterThanOrEqual(45);
  });

  test("lets separate buckets identify together", async () => {
    const queue = new IdentifyQueue(2, 1_000);
    const start = Date.now();

    await Promise.all([queue.wait(0), queue.wait(1)]);

    expect(Date.now() - start).toBeLessThan(500);
    expect(queue.pending).toBe(0);
  });
});
