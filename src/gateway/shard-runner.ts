import { EventEmitter } from "node:events";
import { Cache } from "../cache/cache";
import { CollectorRegistry } from "../collector/registry";
import { DropReason, Diagnostics } from "../diagnostics";
import { Dispatcher } from "../dispatch/dispatcher";
import { Context } from "../dispatch/handler";
import { decodeEvent } from "../events/decoder";
import { GatewayEvent } from "../events/gateway-event";
import { PresenceData } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { RestClient } from "../rest/rest-client";
import { Channel } from "../utils/channel";
import { GatewayError, toError, ValidationError } from "../utils/errors";
import { Logger, logger } from "../utils/logger";
import * as payloads from "./payloads";
import { CloseCodes, ShardStage } from "./protocol";
import { Shard, ShardEvents, ShardOptions } from "./shard";
import { ShardCommand, ShardMessenger } from "./shard-messenger";
import { VoiceGatewayManager } from "./voice";

export enum ShardRunnerEvents {
  Ready = "ready",
  Fatal = "fatal",
  Stopped = "stopped",
}

export type ShardRunnerEventsMap = {
  [ShardRunnerEvents.Ready]: [payload: { shardId: number; userId: Snowflake }];
  [ShardRunnerEvents.Fatal]: [error: GatewayError];
  [ShardRunnerEvents.Stopped]: [];
};

export type ShardRunnerOptions = Omit<ShardOptions, "presence"> & {
  presence: PresenceData;
  mailboxCapacity: number;
  cache: Cache;
  rest: RestClient;
  dispatcher: Dispatcher;
  diagnostics: Diagnostics;
  voiceManager?: VoiceGatewayManager;
};

export type ShardRunnerInfo = {
  shardId: number;
  stage: ShardStage;
  latency: number;
};

type QueuedCommand = Exclude<ShardCommand, { type: "close" }>;

/** Stages after which the shard no longer counts as connected */
const DownStages: ReadonlySet<ShardStage> = new Set([
  ShardStage.Disconnected,
  ShardStage.Reconnecting,
  ShardStage.Fatal,
]);

/**
 * Owns one shard: feeds its dispatches through the decoder, the cache and
 * the dispatcher, and drains its mailbox onto the socket.
 */
export class ShardRunner extends EventEmitter<ShardRunnerEventsMap> {
  readonly shard: Shard;
  readonly messenger: ShardMessenger;
  readonly collectors = new CollectorRegistry();

  private readonly mailbox: Channel<ShardCommand>;
  private readonly context: Context;
  private readonly log: Logger;
  /** Commands taken off the mailbox, in call order; they keep their mailbox slot until sent */
  private readonly held: QueuedCommand[] = [];
  private presence: PresenceData;
  private loop: Promise<void> | null = null;
  private sending = false;
  private pumping: Promise<void> = Promise.resolve();
  private haltReason: DropReason | null = null;

  constructor(private readonly options: ShardRunnerOptions) {
    super();
    this.log = logger.scope(`Shard ${options.id}`);
    this.presence = options.presence;
    this.shard = new Shard({ ...options, presence: options.presence });
    this.mailbox = new Channel(options.mailboxCapacity);
    this.messenger = new ShardMessenger(
      options.id,
      this.mailbox,
      this.collectors,
      options.diagnostics
    );
    this.context = {
      shardId: options.id,
      cache: options.cache,
      rest: options.rest,
      messenger: this.messenger,
    };
    this.listen();
  }

  get id() {
    return this.options.id;
  }

  get info(): ShardRunnerInfo {
    return { shardId: this.id, stage: this.shard.stage, latency: this.shard.latency };
  }

  start() {
    if (this.loop) throw new Error(`Shard runner ${this.id} was already started`);
    this.shard.connect();
    this.loop = this.drain();
  }

  /** Closes the socket; queued commands are dropped, decoded events still dispatch */
  async shutdown(code: number = CloseCodes.Normal, reason = "Shutting down") {
    if (!this.haltReason) {
      this.halt("shutdown");
      await this.shard.close(code, reason);
      this.emit(ShardRunnerEvents.Stopped);
    }
    await Promise.all([this.loop, this.pumping]);
  }

  private listen() {
    const { diagnostics, dispatcher } = this.options;
    const shardId = this.id;

    this.shard.on(ShardEvents.Dispatch, (dispatch) => this.onDispatch(dispatch));
    this.shard.on(ShardEvents.Ready, () => this.pump());
    this.shard.on(ShardEvents.Resumed, () => this.pump());
    this.shard.on(ShardEvents.Stage, (change) => {
      if (DownStages.has(change.new)) this.options.cache.shardData.disconnect(shardId);
      diagnostics.emit("stage", { shardId, ...change });
      dispatcher.spawnPseudo(this.context, { type: "ShardStageUpdate", shardId, ...change });
    });
    this.shard.on(ShardEvents.Heartbeat, ({ latency }) => {
      diagnostics.emit("heartbeat", { shardId, latency });
    });
    this.shard.on(ShardEvents.Discarded, ({ name }) => {
      diagnostics.emit("dropped", { shardId, name, reason: "invalidSession" });
    });
    this.shard.on(ShardEvents.TransportError, (error) => {
      diagnostics.emit("transport", { shardId, error });
    });
    this.shard.on(ShardEvents.ProtocolError, (error) => {
      diagnostics.emit("protocol", { shardId, error });
    });
    this.shard.on(ShardEvents.Fatal, (error) => {
      diagnostics.emit("fatal", { shardId, error });
      this.halt("fatal");
      this.emit(ShardRunnerEvents.Fatal, error);
    });
  }

  private onDispatch({ name, sequence, data }: { name: string; sequence: number; data: unknown }) {
    const ordinal = this.collectors.stamp();
    const event = this.decode(name, data);
    const result = this.options.cache.update(event, {
      id: this.id,
      total: this.options.total,
    });
    if (event.type === "Ready") {
      this.emit(ShardRunnerEvents.Ready, { shardId: this.id, userId: event.ready.user.id });
    }
    this.forwardVoice(event);

    this.options.dispatcher.spawn({
      ctx: this.context,
      event,
      result,
      ordinal,
      collectors: this.collectors,
      raw: { name, sequence, data },
    });
  }

  private decode(name: string, data: unknown): GatewayEvent {
    try {
      return decodeEvent(name, data);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.log.warn(`Could not decode ${name}:`, err.message);
      this.options.diagnostics.emit("protocol", { shardId: this.id, error: err });
      return { type: "Unknown", name, raw: data };
    }
  }

  private forwardVoice(event: GatewayEvent) {
    const voice = this.options.voiceManager;
    if (!voice) return;
    try {
      switch (event.type) {
        case "Ready":
          voice.registerShard(this.id, this.messenger);
          break;
        case "VoiceServerUpdate":
          voice.serverUpdate(event.update.guild_id, event.update.endpoint, event.update.token);
          break;
        case "VoiceStateUpdate":
          if (event.state.guild_id) voice.stateUpdate(event.state.guild_id, event.state);
          break;
      }
    } catch (err) {
      this.log.error("Voice manager failed:", toError(err));
    }
  }

  /** Single consumer of the mailbox */
  private async drain() {
    for await (const command of this.mailbox) {
      if (command.type === "close") {
        if (!this.haltReason) {
          this.halt("shutdown");
          await this.shard.close(command.code, command.reason);
          this.emit(ShardRunnerEvents.Stopped);
        }
        this.mailbox.release();
        command.settle("sent");
        return;
      }
      this.held.push(command);
      this.pump();
    }
  }

  /** Starts sending held commands unless a send is already running */
  private pump() {
    if (this.sending) return;
    this.sending = true;
    this.pumping = this.sendHeld().catch((err) => {
      this.log.error("Failed to send queued commands:", toError(err));
    });
  }

  /** Sends held commands one at a time while the shard is ready */
  private async sendHeld() {
    try {
      for (;;) {
        if (this.haltReason || this.shard.stage !== ShardStage.Ready) return;
        const command = this.held.shift();
        if (!command) return;

        const connection = this.shard.connection;
        if (await this.execute(command)) continue;

        if (this.haltReason) {
          this.drop(command, this.haltReason);
          return;
        }
        this.held.unshift(command);
        // Retry at once only if a new connection became ready meanwhile
        if (this.shard.connection === connection) return;
      }
    } finally {
      this.sending = false;
    }
  }

  /** Resolves `false` when the send failed and the command should be retried */
  private async execute(command: QueuedCommand): Promise<boolean> {
    let presence: PresenceData | null = null;
    let payload: payloads.GatewayPayload;
    if (command.type === "presence") {
      presence = command.update(this.presence);
      payload = payloads.presenceUpdate(presence);
    } else {
      payload = command.payload;
    }

    try {
      await this.shard.send(payload);
    } catch (err) {
      this.log.debug(`${command.name} will be retried once ready:`, toError(err).message);
      return false;
    }

    if (presence) {
      this.presence = presence;
      this.shard.presence = presence;
    }
    this.mailbox.release();
    command.settle("sent");
    return true;
  }

  private halt(reason: DropReason) {
    this.haltReason = reason;
    for (const command of [...this.held.splice(0), ...this.mailbox.close()]) {
      this.drop(command, reason);
    }
    this.collectors.clear();
    this.options.cache.shardData.disconnect(this.id);
    this.options.voiceManager?.deregisterShard(this.id);
  }

  private drop(command: ShardCommand, reason: DropReason) {
    this.options.diagnostics.emit("dropped", { shardId: this.id, name: command.name, reason });
    this.mailbox.release();
    command.settle("dropped");
  }
}
