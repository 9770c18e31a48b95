import { AsyncQueue } from "@sapphire/async-queue";
import { GatewayVersion } from "discord-api-types/v10";
import { EventEmitter, once } from "node:events";
import { PresenceData } from "../model/presence";
import { GatewayError, GatewayErrorKind, toError } from "../utils/errors";
import { getReconnectDelay, sleep } from "../utils/helpers";
import { Logger, logger } from "../utils/logger";
import { InboundFrame, parseInboundFrame } from "./frames";
import { ZlibInflater } from "./inflater";
import { GatewayPayload, PriorityOpcodes } from "./payloads";
import { CloseCodes, SessionInfo, ShardAction, ShardProtocol, ShardStage } from "./protocol";
import {
  GatewayTimeouts,
  Transport,
  TransportFactory,
  TransportFrame,
  webSocketTransport,
} from "./transport";

export type Compression = "none" | "zlib-stream";

export enum ShardEvents {
  Dispatch = "dispatch",
  Ready = "ready",
  Resumed = "resumed",
  Stage = "stage",
  Heartbeat = "heartbeat",
  Discarded = "discarded",
  TransportError = "transportError",
  ProtocolError = "protocolError",
  Fatal = "fatal",
}

export type ShardEventsMap = {
  [ShardEvents.Dispatch]: [payload: { name: string; sequence: number; data: unknown }];
  [ShardEvents.Ready]: [session: SessionInfo];
  [ShardEvents.Resumed]: [payload: { replayed: number }];
  [ShardEvents.Stage]: [payload: { old: ShardStage; new: ShardStage }];
  [ShardEvents.Heartbeat]: [payload: { latency: number }];
  [ShardEvents.Discarded]: [payload: { name: string }];
  [ShardEvents.TransportError]: [error: Error];
  [ShardEvents.ProtocolError]: [error: Error];
  [ShardEvents.Fatal]: [error: GatewayError];
};

export type ShardOptions = {
  id: number;
  total: number;
  token: string;
  intents: number;
  largeThreshold: number;
  gatewayUrl: string;
  compression: Compression;
  presence?: PresenceData;
  maxReconnectAttempts: number;
  /** Resolves when this shard may send Identify */
  identifyGate: (shardId: number) => Promise<void>;
  transportFactory?: TransportFactory;
  random?: () => number;
};

type RateLimitState = {
  resetAt: number;
  sent: number;
};

const RATE_LIMIT_WINDOW = 60_000;
const RATE_LIMIT_MAX = 115;

const getInitialRateLimitState = (): RateLimitState => ({
  resetAt: Date.now() + RATE_LIMIT_WINDOW,
  sent: 0,
});

/** Drives one gateway connection: sockets, timers and the send queue around a `ShardProtocol` */
export class Shard extends EventEmitter<ShardEventsMap> {
  readonly id: number;

  private readonly protocol: ShardProtocol;
  private readonly transportFactory: TransportFactory;
  private readonly random: () => number;
  private readonly log: Logger;

  private transport: Transport | null = null;
  private inflater: ZlibInflater | null = null;
  /** Bumped whenever a connection is opened or abandoned; stale callbacks compare against it */
  private generation = 0;
  private reconnectAttempts = 0;
  private closing = false;

  private helloTimeout: NodeJS.Timeout | null = null;
  private initialHeartbeatTimeout: NodeJS.Timeout | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private identifyTimeout: NodeJS.Timeout | null = null;
  private reconnectTimeout: NodeJS.Timeout | null = null;

  private rateLimitState = getInitialRateLimitState();
  private readonly sendQueue = new AsyncQueue();
  /** Aborted when the current connection is abandoned */
  private connectionController = new AbortController();

  constructor(private readonly options: ShardOptions) {
    super();
    this.id = options.id;
    this.transportFactory = options.transportFactory ?? webSocketTransport;
    this.random = options.random ?? Math.random;
    this.log = logger.scope(`Shard ${options.id}`);
    this.protocol = new ShardProtocol({
      shardId: options.id,
      totalShards: options.total,
      token: options.token,
      intents: options.intents,
      largeThreshold: options.largeThreshold,
      presence: options.presence,
      random: this.random,
    });
  }

  get stage() {
    return this.protocol.stage;
  }

  get session() {
    return this.protocol.session;
  }

  get sequence() {
    return this.protocol.sequence;
  }

  get latency() {
    return this.protocol.latency;
  }

  /** Changes whenever a connection is opened or abandoned */
  get connection() {
    return this.generation;
  }

  /** Presence sent with the next Identify */
  set presence(presence: PresenceData | undefined) {
    this.protocol.presence = presence;
  }

  /** Opens the connection; progress is reported through events */
  connect() {
    if (this.transport || this.reconnectTimeout) {
      throw new Error(`Shard ${this.id} is already connected`);
    }
    this.closing = false;
    this.reconnectAttempts = 0;
    this.open();
  }

  /** Closes the socket and stops reconnecting */
  async close(code: number = CloseCodes.Normal, reason = "Shutting down") {
    this.closing = true;
    this.log.warn(`Closing with code ${code} for reason: ${reason}`);

    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    const transport = this.abandon();
    this.transition(() => this.protocol.stopped());
    if (transport) await transport.close(code, reason);
  }

  /** Sends a payload, respecting the per-connection rate limit */
  async send(payload: GatewayPayload): Promise<void> {
    const transport = this.transport;
    const { signal } = this.connectionController;
    if (!transport?.isOpen) {
      throw new GatewayError(
        GatewayErrorKind.TransportFailure,
        "Cannot send payload; no open connection",
        { shardId: this.id }
      );
    }

    if (PriorityOpcodes.has(payload.op)) {
      this.rateLimitState.sent++;
      return transport.send(JSON.stringify(payload));
    }

    await this.sendQueue.wait();
    try {
      const now = Date.now();
      if (now >= this.rateLimitState.resetAt) {
        this.rateLimitState = getInitialRateLimitState();
      }

      if (this.rateLimitState.sent + 1 >= RATE_LIMIT_MAX && !signal.aborted) {
        const sleepFor = this.rateLimitState.resetAt - now;
        this.log.warn(`Was about to hit the send rate limit, sleeping for ${sleepFor}ms`);
        const controller = new AbortController();

        // Cancel the wait if the connection is closed
        const interrupted = await Promise.race([
          sleep(sleepFor, false, { signal: controller.signal }),
          once(signal, "abort", { signal: controller.signal }).then(() => true),
        ]).finally(() => controller.abort());

        if (!interrupted) this.rateLimitState = getInitialRateLimitState();
      }

      if (signal.aborted || this.transport !== transport) {
        throw new GatewayError(
          GatewayErrorKind.TransportFailure,
          "Connection closed while waiting for the send rate limit to reset",
          { shardId: this.id }
        );
      }

      this.rateLimitState.sent++;
      await transport.send(JSON.stringify(payload));
    } finally {
      this.sendQueue.shift();
    }
  }

  private buildUrl() {
    const url = new URL(this.protocol.session?.resumeUrl ?? this.options.gatewayUrl);
    url.searchParams.set("v", GatewayVersion);
    url.searchParams.set("encoding", "json");
    if (this.options.compression === "zlib-stream") {
      url.searchParams.set("compress", "zlib-stream");
    }
    return url.toString();
  }

  private open() {
    this.reconnectTimeout = null;
    const generation = ++this.generation;
    this.transition(() => this.protocol.connecting());

    const url = this.buildUrl();
    this.log.init(`Connecting to ${url}`);

    const transport = this.transportFactory(url);
    this.transport = transport;
    this.connectionController = new AbortController();
    this.rateLimitState = getInitialRateLimitState();
    this.inflater =
      this.options.compression === "zlib-stream" ? new ZlibInflater() : null;

    transport.on("frame", (frame) => this.onFrame(generation, frame));
    transport.on("closed", ({ code, reason }) => this.onClosed(generation, code, reason));
    transport.on("error", (error) => this.onTransportError(generation, error));

    this.helloTimeout = setTimeout(() => {
      if (generation !== this.generation) return;
      this.log.warn("Timed out waiting for hello");
      this.run(() => this.protocol.handleClose(CloseCodes.Resuming));
    }, GatewayTimeouts.hello);
  }

  /** Detaches the current connection and stops its timers */
  private abandon(): Transport | null {
    this.generation++;
    this.connectionController.abort();
    for (const timeout of [
      this.helloTimeout,
      this.initialHeartbeatTimeout,
      this.identifyTimeout,
    ]) {
      if (timeout) clearTimeout(timeout);
    }
    if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
    this.helloTimeout = null;
    this.initialHeartbeatTimeout = null;
    this.identifyTimeout = null;
    this.heartbeatInterval = null;

    const transport = this.transport;
    transport?.removeAllListeners("frame");
    transport?.removeAllListeners("closed");
    // Keep an error listener so a late socket error is not thrown
    transport?.removeAllListeners("error");
    transport?.on("error", (error) => this.log.debug("Error on a closed socket:", error.message));
    this.transport = null;
    this.inflater = null;
    return transport;
  }

  private decode(frame: TransportFrame): string | null {
    if (frame.kind === "text") return frame.payload;
    if (!this.inflater) {
      throw new GatewayError(
        GatewayErrorKind.ProtocolViolation,
        "Received a binary frame without compression",
        { shardId: this.id }
      );
    }
    return this.inflater.push(frame.payload);
  }

  private onFrame(generation: number, frame: TransportFrame) {
    if (generation !== this.generation) return;

    let inbound: InboundFrame;
    try {
      const text = this.decode(frame);
      if (text === null) return;
      inbound = parseInboundFrame(text);
    } catch (err) {
      const error = toError(err);
      this.log.error("Failed to decode a frame:", error.message);
      this.emit(ShardEvents.ProtocolError, error);
      this.run(() => this.protocol.protocolViolation(error));
      return;
    }

    if (this.helloTimeout && inbound.op !== "unknown") {
      clearTimeout(this.helloTimeout);
      this.helloTimeout = null;
    }
    this.run(() => this.protocol.handleFrame(inbound));
  }

  private onClosed(generation: number, code: number, reason: string) {
    if (generation !== this.generation) return;
    this.log.warn(`The gateway closed with code ${code}${reason ? `: ${reason}` : ""}`);
    this.run(() => this.protocol.handleClose(code));
  }

  private onTransportError(generation: number, error: Error) {
    if (generation !== this.generation) return;
    this.log.error("An error occurred in the WebSocket connection:", error.message);
    this.emit(ShardEvents.TransportError, error);
  }

  /** Runs a protocol input, reports a stage change and carries out the actions */
  private run(input: () => ShardAction[]) {
    const actions = this.transition(input);
    for (const action of actions) {
      this.execute(action);
    }
  }

  private transition<T>(input: () => T): T {
    const old = this.protocol.stage;
    const result = input();
    if (this.protocol.stage !== old) {
      this.log.debug(`Stage ${old} -> ${this.protocol.stage}`);
      this.emit(ShardEvents.Stage, { old, new: this.protocol.stage });
    }
    return result;
  }

  private execute(action: ShardAction) {
    switch (action.type) {
      case "send":
        this.sendInBackground(action.payload);
        break;
      case "identify":
        this.scheduleIdentify(action.delayMs);
        break;
      case "startHeartbeat":
        this.startHeartbeat(action.intervalMs, action.firstDelayMs);
        break;
      case "reconnect":
        this.reconnect(action.code, action.reason, action.resume);
        break;
      case "dispatch":
        this.emit(ShardEvents.Dispatch, {
          name: action.name,
          sequence: action.sequence,
          data: action.data,
        });
        break;
      case "ready":
        this.reconnectAttempts = 0;
        this.log.ready(`Session ${action.session.id} is ready`);
        this.emit(ShardEvents.Ready, action.session);
        break;
      case "resumed":
        this.reconnectAttempts = 0;
        this.log.ready(`Resumed and replayed ${action.replayed} events`);
        this.emit(ShardEvents.Resumed, { replayed: action.replayed });
        break;
      case "heartbeatAck":
        this.emit(ShardEvents.Heartbeat, { latency: action.latency });
        break;
      case "discarded":
        this.emit(ShardEvents.Discarded, { name: action.name });
        break;
      case "fatal": {
        this.log.error(action.error.message);
        const transport = this.abandon();
        if (transport) {
          transport.close(CloseCodes.Normal, action.error.message).catch((err) => {
            this.log.debug("Failed to close after a fatal error:", toError(err).message);
          });
        }
        this.emit(ShardEvents.Fatal, action.error);
        break;
      }
    }
  }

  private sendInBackground(payload: GatewayPayload) {
    this.send(payload).catch((err) => {
      const error = toError(err);
      this.log.warn(`Failed to send op ${payload.op}:`, error.message);
      this.emit(ShardEvents.TransportError, error);
    });
  }

  private startHeartbeat(intervalMs: number, firstDelayMs: number) {
    const generation = this.generation;
    if (this.initialHeartbeatTimeout) clearTimeout(this.initialHeartbeatTimeout);
    if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);

    this.log.debug(`Preparing first heartbeat; waiting ${firstDelayMs}ms`);
    const beat = () => {
      if (generation !== this.generation) return;
      this.run(() => this.protocol.heartbeatDue());
    };

    this.initialHeartbeatTimeout = setTimeout(() => {
      this.initialHeartbeatTimeout = null;
      beat();
      if (generation !== this.generation) return;
      this.heartbeatInterval = setInterval(beat, intervalMs);
    }, firstDelayMs);
  }

  private scheduleIdentify(delayMs: number) {
    const generation = this.generation;
    const identify = () => {
      this.identifyTimeout = null;
      this.identify(generation).catch((err) => {
        const error = toError(err);
        this.log.error("Failed to identify:", error.message);
        this.emit(ShardEvents.TransportError, error);
      });
    };

    if (delayMs > 0) {
      this.log.debug(`Identifying in ${delayMs}ms`);
      this.identifyTimeout = setTimeout(identify, delayMs);
    } else {
      identify();
    }
  }

  private async identify(generation: number) {
    this.log.debug("Waiting for identify");
    await this.options.identifyGate(this.id);
    if (generation !== this.generation || this.closing) {
      this.log.warn("Was waiting for an identify, but the connection closed in the meantime");
      return;
    }
    const payload = this.transition(() => this.protocol.beginIdentify());
    await this.send(payload);
  }

  private reconnect(code: number, reason: string, resume: boolean) {
    const transport = this.abandon();
    if (transport) {
      transport.close(code, reason).catch((err) => {
        this.log.debug("Failed to close the previous socket:", toError(err).message);
      });
    }
    if (this.closing) return;

    this.reconnectAttempts++;
    if (this.reconnectAttempts > this.options.maxReconnectAttempts) {
      this.run(() =>
        this.protocol.fail(
          new GatewayError(
            GatewayErrorKind.ReconnectExhausted,
            `Exceeded maximum number of reconnect attempts (${this.options.maxReconnectAttempts})`,
            { shardId: this.id }
          )
        )
      );
      return;
    }

    const delay = getReconnectDelay(this.reconnectAttempts, this.random);
    this.log.warn(
      `${reason}; ${resume ? "resuming" : "reconnecting"} (attempt ${this.reconnectAttempts}/${this.options.maxReconnectAttempts}) in ${delay}ms`
    );
    this.reconnectTimeout = setTimeout(() => this.open(), delay);
  }
}
