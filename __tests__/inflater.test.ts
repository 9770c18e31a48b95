import { constants, createDeflate } from "node:zlib";
import { ZlibInflater } from "../src/gateway/inflater";
import { GatewayError } from "../src/utils/errors";

/** Compresses messages on one shared zlib context, flushing after each */
const createCompressor = () => {
  const deflate = createDeflate();
  const chunks: Buffer[] = [];
  deflate.on("data", (chunk: Buffer) => chunks.push(chunk));

  return (text: string) =>
    new Promise<Buffer>((resolve) => {
      deflate.write(text);
      deflate.flush(constants.Z_SYNC_FLUSH, () => {
        setImmediate(() => resolve(Buffer.concat(chunks.splice(0))));
      });
    });
};

describe("ZlibInflater", () => {
  test("inflates a message that arrives in one frame", async () => {
    const compress = createCompressor();
    const inflater = new ZlibInflater();
    const text = JSON.stringify({ op: 10, d: { heartbeat_interval: 41250 } });

    expect(inflater.push(await compress(text))).toBe(text);
  });

  test("waits for the flush suffix before returning a message", async () => {
    const compress = createCompressor();
    const inflater = new ZlibInflater();
    const text = JSON.stringify({ op: 0, t: "MESSAGE_CREATE", s: 2, d: { content: "hello" } });
    const frame = await compress(text);
    const split = Math.floor(frame.length / 2);

    expect(inflater.push(frame.subarray(0, split))).toBeNull();
    expect(inflater.push(frame.subarray(split))).toBe(text);
  });

  test("keeps the zlib context across messages", async () => {
    const compress = createCompressor();
    const inflater = new ZlibInflater();
    const first = JSON.stringify({ op: 11 });
    const second = JSON.stringify({ op: 0, t: "TYPING_START", s: 3, d: {} });
    const third = JSON.stringify({ op: 11 });

    expect(inflater.push(await compress(first))).toBe(first);
    expect(inflater.push(await compress(second))).toBe(second);
    expect(inflater.push(await compress(third))).toBe(third);
  });

  test("inflates messages larger than one output buffer", async () => {
    const compress = createCompressor();
    const inflater = new ZlibInflater();
    const small = JSON.stringify({ op: 11 });
    const large = JSON.stringify({ op: 0, t: "GUILD_CREATE", s: 4, d: { blob: "abc".repeat(100_000) } });

    expect(inflater.push(await compress(small))).toBe(small);
    expect(inflater.push(await compress(large))).toBe(large);
    expect(inflater.push(await compress(small))).toBe(small);
  });

  test("rejects data that is not a zlib stream", () => {
    const inflater = new ZlibInflater();
    const garbage = Buffer.from([0x01, 0x02, 0x03, 0x04, 0x00, 0x00, 0xff, 0xff]);

    expect(() => inflater.push(garbage)).toThrow(GatewayError);
  });
});
