import { PresenceUpdateStatus } from "discord-api-types/v10";
import { Collector } from "../collector/collector";
import { CollectorHost } from "../collector/helpers";
import { CollectorRegistry } from "../collector/registry";
import { Diagnostics } from "../diagnostics";
import { ActivityData, PresenceData } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { Channel } from "../utils/channel";
import * as payloads from "./payloads";
import { CloseCodes } from "./protocol";

export type SendResult = "sent" | "dropped";

type Settle = (result: SendResult) => void;

/** Work queued on a shard runner's mailbox */
export type ShardCommand =
  | {
      type: "presence";
      name: string;
      update: (current: PresenceData) => PresenceData;
      settle: Settle;
    }
  | { type: "payload"; name: string; payload: payloads.GatewayPayload; settle: Settle }
  | { type: "close"; name: string; code: number; reason: string; settle: Settle };

type CommandInit =
  | Omit<Extract<ShardCommand, { type: "presence" }>, "settle">
  | Omit<Extract<ShardCommand, { type: "payload" }>, "settle">
  | Omit<Extract<ShardCommand, { type: "close" }>, "settle">;

export type ChunkGuildOptions = {
  limit?: number;
  presences?: boolean;
  filter?: payloads.ChunkGuildFilter;
  nonce?: string;
};

/**
 * Handle for sending commands to one shard. Cheap to copy around; every
 * command resolves with `"dropped"` instead of rejecting when the shard
 * is shutting down or its mailbox is full. A mailbox slot stays taken
 * until the command reached the socket, so a full mailbox pushes back on
 * producers. Close commands skip the queue.
 */
export class ShardMessenger implements CollectorHost {
  constructor(
    readonly shardId: number,
    private readonly mailbox: Channel<ShardCommand>,
    private readonly collectors: CollectorRegistry,
    private readonly diagnostics: Diagnostics
  ) {}

  setActivity(activity: ActivityData | null) {
    return this.enqueue({
      type: "presence",
      name: "SetActivity",
      update: (current) => ({ ...current, activities: activity ? [activity] : [] }),
    });
  }

  setPresence(status: PresenceUpdateStatus, activity: ActivityData | null) {
    return this.enqueue({
      type: "presence",
      name: "SetPresence",
      update: (current) => ({
        ...current,
        status,
        activities: activity ? [activity] : [],
      }),
    });
  }

  setStatus(status: PresenceUpdateStatus) {
    return this.enqueue({
      type: "presence",
      name: "SetStatus",
      update: (current) => ({ ...current, status }),
    });
  }

  /** Requests members of a guild; they arrive as `GuildMembersChunk` events */
  chunkGuild(guildId: Snowflake, options: ChunkGuildOptions = {}) {
    return this.enqueue({
      type: "payload",
      name: "ChunkGuild",
      payload: payloads.requestGuildMembers(guildId, options),
    });
  }

  /** Joins, moves between or (with a `null` channel) leaves voice channels */
  updateVoiceState(
    guildId: Snowflake,
    channelId: Snowflake | null,
    options: { selfMute?: boolean; selfDeaf?: boolean } = {}
  ) {
    return this.enqueue({
      type: "payload",
      name: "VoiceStateUpdate",
      payload: payloads.voiceStateUpdate({
        guild_id: guildId,
        channel_id: channelId,
        self_mute: options.selfMute ?? false,
        self_deaf: options.selfDeaf ?? false,
      }),
    });
  }

  /** Sends an arbitrary payload through the shard's rate-limited queue */
  websocketMessage(payload: payloads.GatewayPayload) {
    return this.enqueue({ type: "payload", name: "Message", payload });
  }

  /** Closes the connection and stops the runner */
  shutdownClean(code: number = CloseCodes.Normal, reason = "Shutting down") {
    return this.enqueue({ type: "close", name: "Close", code, reason });
  }

  addCollector<T>(collector: Collector<T>): Collector<T> {
    const unregister = this.collectors.register(collector);
    collector.onStop(unregister);
    return collector;
  }

  private enqueue(init: CommandInit): Promise<SendResult> {
    return new Promise((resolve) => {
      const command: ShardCommand = { ...init, settle: resolve };
      if (this.mailbox.send(command, command.type === "close")) return;

      const reason = this.mailbox.isClosed ? "shutdown" : "overflow";
      this.diagnostics.emit("dropped", { shardId: this.shardId, name: init.name, reason });
      resolve("dropped");
    });
  }
}
