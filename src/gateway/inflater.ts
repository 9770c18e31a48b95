import { constants, Data, Inflate } from "pako";
import { GatewayError, GatewayErrorKind } from "../utils/errors";
import { isRecord } from "../utils/validator/base";

const ZLIB_SUFFIX = 0x0000ffff;

/** The part of pako's internal stream state needed to read partial output */
type InflateStream = {
  /** `null` until pako allocated its first output buffer */
  output: Uint8Array | null;
  next_out: number;
  avail_out: number;
};

const streamOf = (inflate: Inflate): InflateStream => {
  const stream = "strm" in inflate ? inflate.strm : undefined;
  if (
    isRecord(stream) &&
    typeof stream.next_out === "number" &&
    typeof stream.avail_out === "number"
  ) {
    return {
      output: stream.output instanceof Uint8Array ? stream.output : null,
      next_out: stream.next_out,
      avail_out: stream.avail_out,
    };
  }
  throw new GatewayError(
    GatewayErrorKind.ProtocolViolation,
    "The installed pako release does not expose its inflate stream"
  );
};

/**
 * Inflates a `zlib-stream` gateway connection. Every connection needs its own
 * instance because the zlib context spans the whole socket lifetime.
 */
export class ZlibInflater {
  private readonly inflate = new Inflate({ chunkSize: 128 * 1024 });
  /** Output buffers pako filled while the current message was pushed */
  private flushed: Uint8Array[] = [];
  /** Offset into the output buffer where the current message starts */
  private messageStart: number | null = null;

  constructor() {
    this.inflate.onData = (chunk: Data) => {
      if (chunk instanceof Uint8Array) this.flushed.push(chunk);
    };
  }

  /** Feeds one binary frame; returns the decoded text once a message is complete */
  push(data: Buffer): string | null {
    if (this.messageStart === null) {
      const stream = streamOf(this.inflate);
      this.messageStart = stream.avail_out === 0 ? 0 : stream.next_out;
    }

    const complete =
      data.length >= 4 && data.readUInt32BE(data.length - 4) === ZLIB_SUFFIX;
    this.inflate.push(data, complete ? constants.Z_SYNC_FLUSH : false);

    if (this.inflate.err) {
      throw new GatewayError(
        GatewayErrorKind.ProtocolViolation,
        `zlib error ${this.inflate.err}: ${this.inflate.msg}`
      );
    }
    if (!complete) return null;

    const start = this.messageStart;
    const stream = streamOf(this.inflate);
    const [first, ...rest] = this.flushed;
    const parts: Uint8Array[] = [];
    if (first) {
      parts.push(first.subarray(start), ...rest);
    }
    // A full output buffer was already handed to onData
    if (stream.output && stream.avail_out !== 0) {
      parts.push(stream.output.subarray(first ? 0 : start, stream.next_out));
    }

    this.flushed = [];
    this.messageStart = null;
    return Buffer.concat(parts).toString("utf8");
  }
}
