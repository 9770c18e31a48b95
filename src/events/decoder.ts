import { GatewayDispatchEvents } from "discord-api-types/v10";
import { channelSchema, threadSchema } from "../model/channel";
import {
  Guild,
  guildCreateSchema,
  GuildUpdate,
  guildUpdateSchema,
  Role,
  roleSchema,
  unavailableGuildSchema,
} from "../model/guild";
import { interactionSchema } from "../model/interaction";
import { Member, memberSchema } from "../model/member";
import {
  messageSchema,
  messageUpdateSchema,
  reactionSchema,
} from "../model/message";
import { Presence, presenceSchema } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { userSchema } from "../model/user";
import {
  voiceServerUpdateSchema,
  voiceStateSchema,
  withVoiceGuild,
} from "../model/voice";
import { Infer } from "../utils/validator";
import { GatewayEvent, GuildMembersChunk } from "./gateway-event";
import {
  channelPinsUpdateSchema,
  guildEmojisUpdateSchema,
  guildMemberAddSchema,
  guildMemberRemoveSchema,
  guildMembersChunkSchema,
  guildMemberUpdateSchema,
  guildRoleDeleteSchema,
  guildRoleSchema,
  messageDeleteBulkSchema,
  messageDeleteSchema,
  readySchema,
  threadDeleteSchema,
  typingStartSchema,
} from "./payloads";

const withGuildId =
  (guildId: Snowflake) =>
  <T extends object>(entity: T): T & { guild_id: Snowflake } => ({
    ...entity,
    guild_id: guildId,
  });

const enrichRoles = (
  guildId: Snowflake,
  roles: Infer<typeof roleSchema>[]
): Role[] => roles.map(withGuildId(guildId));

const enrichMembers = (
  guildId: Snowflake,
  members: Infer<typeof memberSchema>[]
): Member[] => members.map(withGuildId(guildId));

const enrichPresences = (
  guildId: Snowflake,
  presences: Presence[]
): Presence[] => presences.map((presence) => ({ ...presence, guild_id: guildId }));

export const decodeGuild = (data: unknown): Guild => {
  const guild = guildCreateSchema.parse(data);
  const attach = withGuildId(guild.id);
  return {
    ...guild,
    roles: enrichRoles(guild.id, guild.roles),
    channels: (guild.channels ?? []).map(attach),
    threads: (guild.threads ?? []).map(attach),
    members: enrichMembers(guild.id, guild.members ?? []),
    voice_states: (guild.voice_states ?? []).map((state) =>
      withVoiceGuild(state, guild.id)
    ),
    presences: enrichPresences(guild.id, guild.presences ?? []),
  };
};

const decodeGuildUpdate = (data: unknown): GuildUpdate => {
  const guild = guildUpdateSchema.parse(data);
  return { ...guild, roles: enrichRoles(guild.id, guild.roles) };
};

const decodeMembersChunk = (data: unknown): GuildMembersChunk => {
  const chunk = guildMembersChunkSchema.parse(data);
  return {
    ...chunk,
    members: enrichMembers(chunk.guild_id, chunk.members),
    presences: enrichPresences(chunk.guild_id, chunk.presences ?? []),
  };
};

const decodeRole = (data: unknown): Role => {
  const { guild_id, role } = guildRoleSchema.parse(data);
  return { ...role, guild_id };
};

/**
 * Maps a dispatch payload to its typed event. Unknown names become
 * `Unknown`; a known name with a malformed payload throws `ValidationError`.
 */
export const decodeEvent = (name: string, data: unknown): GatewayEvent => {
  switch (name) {
    case GatewayDispatchEvents.Ready:
      return { type: "Ready", ready: readySchema.parse(data) };
    case GatewayDispatchEvents.Resumed:
      return { type: "Resumed" };
    case GatewayDispatchEvents.ChannelCreate:
      return { type: "ChannelCreate", channel: channelSchema.parse(data) };
    case GatewayDispatchEvents.ChannelUpdate:
      return { type: "ChannelUpdate", channel: channelSchema.parse(data) };
    case GatewayDispatchEvents.ChannelDelete:
      return { type: "ChannelDelete", channel: channelSchema.parse(data) };
    case GatewayDispatchEvents.ChannelPinsUpdate:
      return { type: "ChannelPinsUpdate", pins: channelPinsUpdateSchema.parse(data) };
    case GatewayDispatchEvents.ThreadCreate:
      return { type: "ThreadCreate", thread: threadSchema.parse(data) };
    case GatewayDispatchEvents.ThreadUpdate:
      return { type: "ThreadUpdate", thread: threadSchema.parse(data) };
    case GatewayDispatchEvents.ThreadDelete:
      return { type: "ThreadDelete", thread: threadDeleteSchema.parse(data) };
    case GatewayDispatchEvents.GuildCreate:
      return { type: "GuildCreate", guild: decodeGuild(data) };
    case GatewayDispatchEvents.GuildUpdate:
      return { type: "GuildUpdate", guild: decodeGuildUpdate(data) };
    case GatewayDispatchEvents.GuildDelete:
      return { type: "GuildDelete", guild: unavailableGuildSchema.parse(data) };
    case GatewayDispatchEvents.GuildEmojisUpdate: {
      const { guild_id, emojis } = guildEmojisUpdateSchema.parse(data);
      return { type: "GuildEmojisUpdate", guildId: guild_id, emojis };
    }
    case GatewayDispatchEvents.GuildMemberAdd:
      return { type: "GuildMemberAdd", member: guildMemberAddSchema.parse(data) };
    case GatewayDispatchEvents.GuildMemberUpdate:
      return {
        type: "GuildMemberUpdate",
        update: guildMemberUpdateSchema.parse(data),
      };
    case GatewayDispatchEvents.GuildMemberRemove: {
      const { guild_id, user } = guildMemberRemoveSchema.parse(data);
      return { type: "GuildMemberRemove", guildId: guild_id, user };
    }
    case GatewayDispatchEvents.GuildMembersChunk:
      return { type: "GuildMembersChunk", chunk: decodeMembersChunk(data) };
    case GatewayDispatchEvents.GuildRoleCreate:
      return { type: "GuildRoleCreate", role: decodeRole(data) };
    case GatewayDispatchEvents.GuildRoleUpdate:
      return { type: "GuildRoleUpdate", role: decodeRole(data) };
    case GatewayDispatchEvents.GuildRoleDelete: {
      const { guild_id, role_id } = guildRoleDeleteSchema.parse(data);
      return { type: "GuildRoleDelete", guildId: guild_id, roleId: role_id };
    }
    case GatewayDispatchEvents.MessageCreate:
      return { type: "MessageCreate", message: messageSchema.parse(data) };
    case GatewayDispatchEvents.MessageUpdate:
      return { type: "MessageUpdate", update: messageUpdateSchema.parse(data) };
    case GatewayDispatchEvents.MessageDelete: {
      const { id, channel_id, guild_id } = messageDeleteSchema.parse(data);
      return {
        type: "MessageDelete",
        channelId: channel_id,
        messageId: id,
        guildId: guild_id,
      };
    }
    case GatewayDispatchEvents.MessageDeleteBulk: {
      const { ids, channel_id, guild_id } = messageDeleteBulkSchema.parse(data);
      return {
        type: "MessageDeleteBulk",
        channelId: channel_id,
        messageIds: ids,
        guildId: guild_id,
      };
    }
    case GatewayDispatchEvents.MessageReactionAdd:
      return { type: "MessageReactionAdd", reaction: reactionSchema.parse(data) };
    case GatewayDispatchEvents.MessageReactionRemove:
      return {
        type: "MessageReactionRemove",
        reaction: reactionSchema.parse(data),
      };
    case GatewayDispatchEvents.PresenceUpdate:
      return { type: "PresenceUpdate", presence: presenceSchema.parse(data) };
    case GatewayDispatchEvents.TypingStart:
      return { type: "TypingStart", typing: typingStartSchema.parse(data) };
    case GatewayDispatchEvents.UserUpdate:
      return { type: "UserUpdate", user: userSchema.parse(data) };
    case GatewayDispatchEvents.VoiceStateUpdate: {
      const state = voiceStateSchema.parse(data);
      return { type: "VoiceStateUpdate", state: withVoiceGuild(state, state.guild_id) };
    }
    case GatewayDispatchEvents.VoiceServerUpdate:
      return {
        type: "VoiceServerUpdate",
        update: voiceServerUpdateSchema.parse(data),
      };
    case GatewayDispatchEvents.InteractionCreate:
      return {
        type: "InteractionCreate",
        interaction: interactionSchema.parse(data),
      };
    default:
      return { type: "Unknown", name, raw: data };
  }
};
