import { CacheUpdateResult, PreImage } from "../cache/updates";
import { GatewayEvent, GuildMembersChunk } from "../events/gateway-event";
import { ChannelPinsUpdate, GuildMemberUpdate, Ready, ThreadDelete, TypingStart } from "../events/payloads";
import { ShardStage } from "../gateway/protocol";
import { Channel, GuildChannel } from "../model/channel";
import { CachedGuild, Emoji, Guild, GuildUpdate, Role, UnavailableGuild } from "../model/guild";
import { Interaction } from "../model/interaction";
import { Member } from "../model/member";
import { Message, MessageUpdate, Reaction } from "../model/message";
import { Presence } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { User } from "../model/user";
import { VoiceServerUpdate, VoiceState } from "../model/voice";

/** Events synthesised by the client rather than received from the gateway */
export type PseudoEvent =
  | { type: "CacheReady"; guilds: Snowflake[] }
  | { type: "ShardsReady"; totalShards: number }
  | { type: "ShardStageUpdate"; shardId: number; old: ShardStage; new: ShardStage };

/**
 * A decoded event together with the cache state it displaced (`old`,
 * `removed`, `evicted`) and, for partial updates, the merged result.
 */
export type FullEvent =
  | { type: "Ready"; ready: Ready }
  | { type: "Resumed" }
  | { type: "ChannelCreate"; channel: Channel; old?: Channel }
  | { type: "ChannelUpdate"; channel: Channel; old?: Channel }
  | { type: "ChannelDelete"; channel: Channel; messages: Message[] }
  | { type: "ChannelPinsUpdate"; pins: ChannelPinsUpdate }
  | { type: "ThreadCreate"; thread: GuildChannel; old?: GuildChannel }
  | { type: "ThreadUpdate"; thread: GuildChannel; old?: GuildChannel }
  | { type: "ThreadDelete"; thread: ThreadDelete; removed?: GuildChannel }
  | { type: "GuildCreate"; guild: Guild; isNew: boolean }
  | { type: "GuildUpdate"; guild: GuildUpdate; old?: CachedGuild }
  | { type: "GuildDelete"; guild: UnavailableGuild; removed?: CachedGuild }
  | { type: "GuildEmojisUpdate"; guildId: Snowflake; emojis: Emoji[]; old?: Emoji[] }
  | { type: "GuildMemberAdd"; member: Member }
  | { type: "GuildMemberUpdate"; update: GuildMemberUpdate; old?: Member; member?: Member }
  | { type: "GuildMemberRemove"; guildId: Snowflake; user: User; removed?: Member }
  | { type: "GuildMembersChunk"; chunk: GuildMembersChunk }
  | { type: "GuildRoleCreate"; role: Role; old?: Role }
  | { type: "GuildRoleUpdate"; role: Role; old?: Role }
  | { type: "GuildRoleDelete"; guildId: Snowflake; roleId: Snowflake; removed?: Role }
  | { type: "MessageCreate"; message: Message; evicted?: Message }
  | { type: "MessageUpdate"; update: MessageUpdate; old?: Message; message?: Message }
  | {
      type: "MessageDelete";
      channelId: Snowflake;
      messageId: Snowflake;
      guildId?: Snowflake;
      removed?: Message;
    }
  | {
      type: "MessageDeleteBulk";
      channelId: Snowflake;
      messageIds: Snowflake[];
      guildId?: Snowflake;
      removed: Message[];
    }
  | { type: "MessageReactionAdd"; reaction: Reaction }
  | { type: "MessageReactionRemove"; reaction: Reaction }
  | { type: "PresenceUpdate"; presence: Presence; old?: Presence }
  | { type: "TypingStart"; typing: TypingStart }
  | { type: "UserUpdate"; user: User; old?: User }
  | { type: "VoiceStateUpdate"; state: VoiceState; old?: VoiceState }
  | { type: "VoiceServerUpdate"; update: VoiceServerUpdate }
  | { type: "InteractionCreate"; interaction: Interaction }
  | { type: "Unknown"; name: string; raw: unknown }
  | PseudoEvent;

export type FullEventType = FullEvent["type"];

type PreImageOf<K extends PreImage["kind"]> = Extract<PreImage, { kind: K }>;

const isKind = <K extends PreImage["kind"]>(
  image: PreImage,
  kind: K
): image is PreImageOf<K> => image.kind === kind;

const pre = <K extends PreImage["kind"]>(
  result: CacheUpdateResult,
  kind: K
): PreImageOf<K> | undefined =>
  result.preImage && isKind(result.preImage, kind) ? result.preImage : undefined;

/** Pairs a decoded event with what the cache reported for it */
export const buildFullEvent = (
  event: GatewayEvent,
  result: CacheUpdateResult
): FullEvent => {
  switch (event.type) {
    case "ChannelCreate":
    case "ChannelUpdate":
      return { ...event, old: pre(result, "channel")?.channel };
    case "ChannelDelete":
      return { ...event, messages: pre(result, "messages")?.messages ?? [] };
    case "ThreadCreate":
    case "ThreadUpdate":
      return { ...event, old: pre(result, "thread")?.thread };
    case "ThreadDelete":
      return { ...event, removed: pre(result, "thread")?.thread };
    case "GuildCreate":
      return { ...event, isNew: result.isNew ?? false };
    case "GuildUpdate":
      return { ...event, old: pre(result, "guild")?.guild };
    case "GuildDelete":
      return { ...event, removed: pre(result, "guild")?.guild };
    case "GuildEmojisUpdate":
      return { ...event, old: pre(result, "emojis")?.emojis };
    case "GuildMemberUpdate":
      return {
        ...event,
        old: pre(result, "member")?.member,
        member: result.current?.kind === "member" ? result.current.member : undefined,
      };
    case "GuildMemberRemove":
      return { ...event, removed: pre(result, "member")?.member };
    case "GuildRoleCreate":
    case "GuildRoleUpdate":
      return { ...event, old: pre(result, "role")?.role };
    case "GuildRoleDelete":
      return { ...event, removed: pre(result, "role")?.role };
    case "MessageCreate":
      return { ...event, evicted: pre(result, "message")?.message };
    case "MessageUpdate":
      return {
        ...event,
        old: pre(result, "message")?.message,
        message: result.current?.kind === "message" ? result.current.message : undefined,
      };
    case "MessageDelete":
      return { ...event, removed: pre(result, "message")?.message };
    case "MessageDeleteBulk":
      return { ...event, removed: pre(result, "messages")?.messages ?? [] };
    case "PresenceUpdate":
      return { ...event, old: pre(result, "presence")?.presence };
    case "UserUpdate":
      return { ...event, old: pre(result, "user")?.user };
    case "VoiceStateUpdate":
      return { ...event, old: pre(result, "voiceState")?.state };
    default:
      return event;
  }
};
