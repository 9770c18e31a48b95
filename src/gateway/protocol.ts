import { GatewayCloseCodes, GatewayDispatchEvents, GatewayOpcodes } from "discord-api-types/v10";
import { PresenceData } from "../model/presence";
import { GatewayError, toError } from "../utils/errors";
import { Infer, v } from "../utils/validator";
import { InboundFrame } from "./frames";
import * as payloads from "./payloads";

export enum ShardStage {
  Disconnected = "Disconnected",
  Connecting = "Connecting",
  HelloWait = "HelloWait",
  Identifying = "Identifying",
  Resuming = "Resuming",
  Ready = "Ready",
  Reconnecting = "Reconnecting",
  Fatal = "Fatal",
}

export enum CloseCodes {
  Normal = 1_000,
  /** Sent by this client when it closes a socket it intends to resume */
  Resuming = 4_200,
}

export type SessionInfo = {
  id: string;
  sequence: number;
  resumeUrl: string;
};

export type ShardAction =
  | { type: "send"; payload: payloads.OutboundPayload }
  /** Identify once `delayMs` has passed and the identify queue allows it */
  | { type: "identify"; delayMs: number }
  | { type: "startHeartbeat"; intervalMs: number; firstDelayMs: number }
  | { type: "reconnect"; code: number; reason: string; resume: boolean }
  | { type: "dispatch"; name: string; sequence: number; data: unknown }
  | { type: "ready"; session: SessionInfo }
  | { type: "resumed"; replayed: number }
  | { type: "heartbeatAck"; latency: number }
  | { type: "discarded"; name: string }
  | { type: "fatal"; error: GatewayError };

export type ProtocolOptions = {
  shardId: number;
  totalShards: number;
  token: string;
  intents: number;
  largeThreshold: number;
  presence?: PresenceData;
  random?: () => number;
  now?: () => number;
};

/** Close codes after which the session can't be resumed */
const SessionEndingCodes: ReadonlySet<number> = new Set([
  GatewayCloseCodes.InvalidSeq,
  GatewayCloseCodes.SessionTimedOut,
]);

const readySessionSchema = v.object({
  session_id: v.string().isNotEmpty(),
  resume_gateway_url: v.string().isNotEmpty(),
});

/**
 * Opcode state machine for one shard.
 *
 * Holds no sockets or timers: every input returns the actions the driver
 * has to carry out, which keeps each transition testable in isolation.
 */
export class ShardProtocol {
  #stage = ShardStage.Disconnected;
  #session: SessionInfo | null = null;
  /** Highest sequence seen on the current session */
  #sequence: number | null = null;
  #acked = true;
  #lastHeartbeatAt = -1;
  #latency = -1;
  #replayed = 0;
  /** Set after a non-resumable InvalidSession until the next READY */
  #discardUntilReady = false;
  #presence: PresenceData | undefined;

  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: ProtocolOptions) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.#presence = options.presence;
  }

  get stage() {
    return this.#stage;
  }

  get session(): Readonly<SessionInfo> | null {
    return this.#session;
  }

  get sequence() {
    return this.#sequence;
  }

  /** Round trip of the last acknowledged heartbeat, `-1` before the first ack */
  get latency() {
    return this.#latency;
  }

  get shardId() {
    return this.options.shardId;
  }

  /** Presence sent with the next Identify */
  set presence(presence: PresenceData | undefined) {
    this.#presence = presence;
  }

  /** A new socket is being opened */
  connecting(): ShardAction[] {
    this.#stage = ShardStage.Connecting;
    this.#acked = true;
    this.#lastHeartbeatAt = -1;
    return [];
  }

  /** Builds the Identify payload; call when the identify permit was granted */
  beginIdentify(): payloads.OutboundPayload {
    this.#stage = ShardStage.Identifying;
    return payloads.identify({
      token: this.options.token,
      intents: this.options.intents,
      properties: {
        os: process.platform,
        browser: "shardline",
        device: "shardline",
      },
      compress: false,
      large_threshold: this.options.largeThreshold,
      shard: [this.options.shardId, this.options.totalShards],
      presence: this.#presence,
    });
  }

  handleFrame(frame: InboundFrame): ShardAction[] {
    switch (frame.op) {
      case GatewayOpcodes.Hello:
        return this.onHello(frame.d.heartbeat_interval);
      case GatewayOpcodes.Dispatch:
        return this.onDispatch(frame.t, frame.s, frame.d);
      case GatewayOpcodes.Heartbeat:
        return [{ type: "send", payload: payloads.heartbeat(this.#sequence) }];
      case GatewayOpcodes.HeartbeatAck: {
        this.#acked = true;
        if (this.#lastHeartbeatAt < 0) return [];
        this.#latency = this.now() - this.#lastHeartbeatAt;
        return [{ type: "heartbeatAck", latency: this.#latency }];
      }
      case GatewayOpcodes.Reconnect:
        return this.reconnect(CloseCodes.Resuming, "Told to reconnect by the gateway", true);
      case GatewayOpcodes.InvalidSession:
        return this.onInvalidSession(frame.d);
      default:
        return [];
    }
  }

  /** Heartbeat timer fired */
  heartbeatDue(): ShardAction[] {
    if (!this.#acked) {
      return this.reconnect(
        CloseCodes.Resuming,
        "Zombie connection: heartbeat was not acknowledged",
        true
      );
    }
    this.#acked = false;
    this.#lastHeartbeatAt = this.now();
    return [{ type: "send", payload: payloads.heartbeat(this.#sequence) }];
  }

  /** The server closed the socket, or the transport dropped it */
  handleClose(code: number): ShardAction[] {
    const error = GatewayError.fromCloseCode(code, this.options.shardId);
    if (error) return this.fail(error);

    if (SessionEndingCodes.has(code)) {
      return this.reconnect(code, `Session ended with close code ${code}`, false);
    }
    return this.reconnect(code, `Connection closed with code ${code}`, true);
  }

  /** A frame could not be understood; start over with a fresh session */
  protocolViolation(error: unknown): ShardAction[] {
    return this.reconnect(
      CloseCodes.Normal,
      `Protocol violation: ${toError(error).message}`,
      false
    );
  }

  fail(error: GatewayError): ShardAction[] {
    this.#stage = ShardStage.Fatal;
    this.#session = null;
    this.#sequence = null;
    return [{ type: "fatal", error }];
  }

  /** Clean shutdown; the session is ended by the 1000 close */
  stopped() {
    this.#stage = ShardStage.Disconnected;
    this.#session = null;
    this.#sequence = null;
    this.#discardUntilReady = false;
  }

  private onHello(intervalMs: number): ShardAction[] {
    this.#stage = ShardStage.HelloWait;
    this.#acked = true;
    const actions: ShardAction[] = [
      {
        type: "startHeartbeat",
        intervalMs,
        firstDelayMs: Math.floor(intervalMs * this.random()),
      },
    ];

    if (this.#session) {
      this.#stage = ShardStage.Resuming;
      this.#replayed = 0;
      actions.push({
        type: "send",
        payload: payloads.resume({
          token: this.options.token,
          session_id: this.#session.id,
          seq: this.#session.sequence,
        }),
      });
    } else {
      actions.push({ type: "identify", delayMs: 0 });
    }
    return actions;
  }

  private onDispatch(name: string, sequence: number, data: unknown): ShardAction[] {
    if (name === GatewayDispatchEvents.Ready) return this.onReady(sequence, data);

    if (this.#discardUntilReady) return [{ type: "discarded", name }];

    this.trackSequence(sequence);
    const dispatch: ShardAction = { type: "dispatch", name, sequence, data };

    if (name === GatewayDispatchEvents.Resumed) {
      this.#stage = ShardStage.Ready;
      const replayed = this.#replayed;
      this.#replayed = 0;
      return [{ type: "resumed", replayed }, dispatch];
    }

    if (this.#stage === ShardStage.Resuming) this.#replayed++;
    return [dispatch];
  }

  private onReady(sequence: number, data: unknown): ShardAction[] {
    let ready: Infer<typeof readySessionSchema>;
    try {
      ready = readySessionSchema.parse(data);
    } catch (err) {
      return this.protocolViolation(err);
    }

    this.#discardUntilReady = false;
    this.#sequence = sequence;
    this.#session = {
      id: ready.session_id,
      sequence,
      resumeUrl: ready.resume_gateway_url,
    };
    this.#stage = ShardStage.Ready;
    return [
      { type: "ready", session: { ...this.#session } },
      { type: "dispatch", name: GatewayDispatchEvents.Ready, sequence, data },
    ];
  }

  private onInvalidSession(resumable: boolean): ShardAction[] {
    if (resumable && this.#session) {
      return this.reconnect(CloseCodes.Resuming, "Invalid session, resuming", true);
    }

    this.#session = null;
    this.#sequence = null;
    this.#discardUntilReady = true;
    this.#stage = ShardStage.Disconnected;
    return [
      { type: "identify", delayMs: 1_000 + Math.floor(this.random() * 4_000) },
    ];
  }

  private trackSequence(sequence: number) {
    if (this.#sequence === null || sequence > this.#sequence) {
      this.#sequence = sequence;
    }
    if (this.#session && sequence > this.#session.sequence) {
      this.#session.sequence = sequence;
    }
  }

  private reconnect(code: number, reason: string, resume: boolean): ShardAction[] {
    if (!resume) {
      this.#session = null;
      this.#sequence = null;
    }
    this.#stage = ShardStage.Reconnecting;
    return [
      {
        type: "reconnect",
        code,
        reason,
        resume: resume && this.#session !== null,
      },
    ];
  }
}
