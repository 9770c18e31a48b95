import { Channel, GuildChannel } from "../model/channel";
import { Emoji, Guild, GuildUpdate, Role, UnavailableGuild } from "../model/guild";
import { Interaction } from "../model/interaction";
import { Member } from "../model/member";
import { Message, MessageUpdate, Reaction } from "../model/message";
import { Presence } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { User } from "../model/user";
import { VoiceServerUpdate, VoiceState } from "../model/voice";
import {
  ChannelPinsUpdate,
  GuildMemberUpdate,
  Ready,
  ThreadDelete,
  TypingStart,
} from "./payloads";

export type GuildMembersChunk = {
  guild_id: Snowflake;
  members: Member[];
  presences: Presence[];
  chunk_index: number;
  chunk_count: number;
  not_found?: unknown[];
  nonce?: string;
};

/** A dispatch payload decoded by event name */
export type GatewayEvent =
  | { type: "Ready"; ready: Ready }
  | { type: "Resumed" }
  | { type: "ChannelCreate"; channel: Channel }
  | { type: "ChannelUpdate"; channel: Channel }
  | { type: "ChannelDelete"; channel: Channel }
  | { type: "ChannelPinsUpdate"; pins: ChannelPinsUpdate }
  | { type: "ThreadCreate"; thread: GuildChannel }
  | { type: "ThreadUpdate"; thread: GuildChannel }
  | { type: "ThreadDelete"; thread: ThreadDelete }
  | { type: "GuildCreate"; guild: Guild }
  | { type: "GuildUpdate"; guild: GuildUpdate }
  | { type: "GuildDelete"; guild: UnavailableGuild }
  | { type: "GuildEmojisUpdate"; guildId: Snowflake; emojis: Emoji[] }
  | { type: "GuildMemberAdd"; member: Member }
  | { type: "GuildMemberUpdate"; update: GuildMemberUpdate }
  | { type: "GuildMemberRemove"; guildId: Snowflake; user: User }
  | { type: "GuildMembersChunk"; chunk: GuildMembersChunk }
  | { type: "GuildRoleCreate"; role: Role }
  | { type: "GuildRoleUpdate"; role: Role }
  | { type: "GuildRoleDelete"; guildId: Snowflake; roleId: Snowflake }
  | { type: "MessageCreate"; message: Message }
  | { type: "MessageUpdate"; update: MessageUpdate }
  | {
      type: "MessageDelete";
      channelId: Snowflake;
      messageId: Snowflake;
      guildId?: Snowflake;
    }
  | {
      type: "MessageDeleteBulk";
      channelId: Snowflake;
      messageIds: Snowflake[];
      guildId?: Snowflake;
    }
  | { type: "MessageReactionAdd"; reaction: Reaction }
  | { type: "MessageReactionRemove"; reaction: Reaction }
  | { type: "PresenceUpdate"; presence: Presence }
  | { type: "TypingStart"; typing: TypingStart }
  | { type: "UserUpdate"; user: User }
  | { type: "VoiceStateUpdate"; state: VoiceState }
  | { type: "VoiceServerUpdate"; update: VoiceServerUpdate }
  | { type: "InteractionCreate"; interaction: Interaction }
  | { type: "Unknown"; name: string; raw: unknown };

export type GatewayEventType = GatewayEvent["type"];
