import { Infer, v } from "../utils/validator";
import { Member, memberSchema } from "./member";
import { Snowflake, snowflake } from "./snowflake";

export const voiceStateSchema = v.object({
  guild_id: snowflake().optional(),
  channel_id: snowflake().nullable(),
  user_id: snowflake(),
  member: memberSchema.optional(),
  session_id: v.string(),
  deaf: v.boolean().optional(),
  mute: v.boolean().optional(),
  self_deaf: v.boolean().optional(),
  self_mute: v.boolean().optional(),
  self_stream: v.boolean().optional(),
  self_video: v.boolean().optional(),
  suppress: v.boolean().optional(),
});

export type VoiceState = Omit<Infer<typeof voiceStateSchema>, "member"> & {
  member?: Member;
};

export const voiceServerUpdateSchema = v.object({
  token: v.string(),
  guild_id: snowflake(),
  endpoint: v.string().nullable(),
});

export type VoiceServerUpdate = Infer<typeof voiceServerUpdateSchema>;

export const withVoiceGuild = (
  state: Infer<typeof voiceStateSchema>,
  guildId: Snowflake | undefined
): VoiceState => {
  const { member, ...rest } = state;
  const resolvedGuildId = rest.guild_id ?? guildId;
  return {
    ...rest,
    guild_id: resolvedGuildId,
    member:
      member && resolvedGuildId
        ? { ...member, guild_id: resolvedGuildId }
        : undefined,
  };
};
