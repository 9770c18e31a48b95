import { Infer, v } from "../utils/validator";
import { Snowflake, snowflake } from "./snowflake";
import { userSchema } from "./user";

export const channelShape = {
  id: snowflake(),
  type: v.number(),
  guild_id: snowflake().optional(),
  name: v.string().nullable().optional(),
  position: v.number().optional(),
  parent_id: snowflake().nullable().optional(),
  owner_id: snowflake().optional(),
  topic: v.string().nullable().optional(),
  nsfw: v.boolean().optional(),
  last_message_id: snowflake().nullable().optional(),
  last_pin_timestamp: v.string().nullable().optional(),
  recipients: v.array().of(userSchema).optional(),
  permission_overwrites: v.array().optional(),
  thread_metadata: v.unknown().optional(),
};

export const channelSchema = v.object(channelShape);

export type Channel = Infer<typeof channelSchema>;

export type GuildChannel = Channel & { guild_id: Snowflake };

export const threadSchema = v.object({
  ...channelShape,
  guild_id: snowflake(),
});

export const isGuildChannel = (channel: Channel): channel is GuildChannel =>
  channel.guild_id !== undefined;
