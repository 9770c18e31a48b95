import { GatewayOpcodes } from "discord-api-types/v10";
import { parseInboundFrame } from "../src/gateway/frames";
import { GatewayError, GatewayErrorKind } from "../src/utils/errors";

const expectViolation = (text: string) => {
  try {
    parseInboundFrame(text);
  } catch (err) {
    expect(err).toBeInstanceOf(GatewayError);
    expect(err).toHaveProperty("kind", GatewayErrorKind.ProtocolViolation);
    return;
  }
  throw new Error(`expected ${text} to be rejected`);
};

describe("parseInboundFrame", () => {
  test("parses a hello", () => {
    expect(parseInboundFrame('{"op":10,"d":{"heartbeat_interval":41250}}')).toEqual({
      op: GatewayOpcodes.Hello,
      d: { heartbeat_interval: 41250 },
    });
  });

  test("parses a dispatch with its name and sequence", () => {
    expect(parseInboundFrame('{"op":0,"t":"RESUMED","s":7,"d":{}}')).toEqual({
      op: GatewayOpcodes.Dispatch,
      t: "RESUMED",
      s: 7,
      d: {},
    });
  });

  test("reads the resumable flag of an invalid session", () => {
    expect(parseInboundFrame('{"op":9,"d":true}')).toEqual({
      op: GatewayOpcodes.InvalidSession,
      d: true,
    });
    expect(parseInboundFrame('{"op":9,"d":false}')).toEqual({
      op: GatewayOpcodes.InvalidSession,
      d: false,
    });
  });

  test("keeps unknown opcodes instead of rejecting them", () => {
    expect(parseInboundFrame('{"op":42,"d":[1,2]}')).toEqual({
      op: "unknown",
      opcode: 42,
      d: [1, 2],
    });
  });

  test("rejects text that is not JSON", () => {
    expectViolation("{op:10");
  });

  test("rejects an envelope without an opcode", () => {
    expectViolation('{"d":null}');
  });

  test("rejects a dispatch without a sequence", () => {
    expectViolation('{"op":0,"t":"READY","s":null,"d":{}}');
  });

  test("rejects a hello without an interval", () => {
    expectViolation('{"op":10,"d":{}}');
  });
});
