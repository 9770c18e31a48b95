import { GatewayOpcodes } from "discord-api-types/v10";
import { GatewayError, GatewayErrorKind, toError } from "../utils/errors";
import { Infer, v } from "../utils/validator";

const envelopeSchema = v.object({
  op: v.number().integer(),
  d: v.unknown(),
  s: v.number().integer().nullable().optional(),
  t: v.string().nullable().optional(),
});

/** The `{op, d, s, t}` envelope as it arrived */
export type RawFrame = Infer<typeof envelopeSchema>;

const helloSchema = v.object({
  heartbeat_interval: v.number().min(1),
});

export type DispatchFrame = {
  op: GatewayOpcodes.Dispatch;
  t: string;
  s: number;
  d: unknown;
};

export type InboundFrame =
  | DispatchFrame
  | { op: GatewayOpcodes.Heartbeat }
  | { op: GatewayOpcodes.Reconnect }
  | { op: GatewayOpcodes.InvalidSession; d: boolean }
  | { op: GatewayOpcodes.Hello; d: Infer<typeof helloSchema> }
  | { op: GatewayOpcodes.HeartbeatAck }
  | { op: "unknown"; opcode: number; d: unknown };

const violation = (message: string, cause?: unknown) =>
  new GatewayError(GatewayErrorKind.ProtocolViolation, message, { cause });

/** Parses one text frame. Malformed envelopes throw a `ProtocolViolation`. */
export const parseInboundFrame = (text: string): InboundFrame => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw violation("Received a frame that is not valid JSON", err);
  }

  let frame: RawFrame;
  try {
    frame = envelopeSchema.parse(json);
  } catch (err) {
    throw violation(`Malformed frame envelope: ${toError(err).message}`, err);
  }

  switch (frame.op) {
    case GatewayOpcodes.Dispatch: {
      if (typeof frame.t !== "string" || typeof frame.s !== "number") {
        throw violation("Dispatch frame is missing its event name or sequence");
      }
      return { op: GatewayOpcodes.Dispatch, t: frame.t, s: frame.s, d: frame.d };
    }
    case GatewayOpcodes.Heartbeat:
      return { op: GatewayOpcodes.Heartbeat };
    case GatewayOpcodes.Reconnect:
      return { op: GatewayOpcodes.Reconnect };
    case GatewayOpcodes.InvalidSession:
      return { op: GatewayOpcodes.InvalidSession, d: frame.d === true };
    case GatewayOpcodes.Hello: {
      try {
        return { op: GatewayOpcodes.Hello, d: helloSchema.parse(frame.d) };
      } catch (err) {
        throw violation(`Malformed hello: ${toError(err).message}`, err);
      }
    }
    case GatewayOpcodes.HeartbeatAck:
      return { op: GatewayOpcodes.HeartbeatAck };
    default:
      return { op: "unknown", opcode: frame.op, d: frame.d };
  }
};
