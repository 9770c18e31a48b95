import { emojiSchema, roleSchema, unavailableGuildSchema } from "../model/guild";
import { memberSchema, memberShape } from "../model/member";
import { presenceSchema } from "../model/presence";
import { snowflake } from "../model/snowflake";
import { userSchema } from "../model/user";
import { Infer, v } from "../utils/validator";

export const readySchema = v.object({
  v: v.number(),
  user: userSchema,
  guilds: v.array().of(unavailableGuildSchema),
  session_id: v.string().isNotEmpty(),
  resume_gateway_url: v.string().isNotEmpty(),
  shard: v.array().of(v.number()).optional(),
  application: v
    .object({ id: snowflake(), flags: v.number().optional() })
    .optional(),
});

export type Ready = Infer<typeof readySchema>;

export const channelPinsUpdateSchema = v.object({
  guild_id: snowflake().optional(),
  channel_id: snowflake(),
  last_pin_timestamp: v.string().nullable().optional(),
});

export type ChannelPinsUpdate = Infer<typeof channelPinsUpdateSchema>;

export const threadDeleteSchema = v.object({
  id: snowflake(),
  guild_id: snowflake(),
  parent_id: snowflake().nullable().optional(),
  type: v.number(),
});

export type ThreadDelete = Infer<typeof threadDeleteSchema>;

export const guildEmojisUpdateSchema = v.object({
  guild_id: snowflake(),
  emojis: v.array().of(emojiSchema),
});

export const guildMemberAddSchema = v.object({
  ...memberShape,
  guild_id: snowflake(),
});

export const guildMemberUpdateSchema = v.object({
  ...memberShape,
  guild_id: snowflake(),
});

export type GuildMemberUpdate = Infer<typeof guildMemberUpdateSchema>;

export const guildMemberRemoveSchema = v.object({
  guild_id: snowflake(),
  user: userSchema,
});

export const guildMembersChunkSchema = v.object({
  guild_id: snowflake(),
  members: v.array().of(memberSchema),
  chunk_index: v.number().integer(),
  chunk_count: v.number().integer(),
  not_found: v.array().optional(),
  presences: v.array().of(presenceSchema).optional(),
  nonce: v.string().optional(),
});

export const guildRoleSchema = v.object({
  guild_id: snowflake(),
  role: roleSchema,
});

export const guildRoleDeleteSchema = v.object({
  guild_id: snowflake(),
  role_id: snowflake(),
});

export const messageDeleteSchema = v.object({
  id: snowflake(),
  channel_id: snowflake(),
  guild_id: snowflake().optional(),
});

export const messageDeleteBulkSchema = v.object({
  ids: v.array().of(snowflake()),
  channel_id: snowflake(),
  guild_id: snowflake().optional(),
});

export const typingStartSchema = v.object({
  channel_id: snowflake(),
  guild_id: snowflake().optional(),
  user_id: snowflake(),
  timestamp: v.number(),
  member: memberSchema.optional(),
});

export type TypingStart = Infer<typeof typingStartSchema>;
