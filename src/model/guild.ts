import { Infer, v } from "../utils/validator";
import { channelShape, GuildChannel } from "./channel";
import { Presence, presenceSchema } from "./presence";
import { Snowflake, snowflake } from "./snowflake";
import { Member, memberSchema } from "./member";
import { VoiceState, voiceStateSchema } from "./voice";

export const roleSchema = v.object({
  id: snowflake(),
  name: v.string(),
  color: v.number().optional(),
  hoist: v.boolean().optional(),
  position: v.number().optional(),
  permissions: v.string().optional(),
  managed: v.boolean().optional(),
  mentionable: v.boolean().optional(),
});

/** Roles arrive without `guild_id`; the decoder fills it in */
export type Role = Infer<typeof roleSchema> & { guild_id: Snowflake };

export const emojiSchema = v.object({
  id: snowflake().nullable(),
  name: v.string().nullable(),
  roles: v.array().of(snowflake()).optional(),
  animated: v.boolean().optional(),
  available: v.boolean().optional(),
});

export type Emoji = Infer<typeof emojiSchema>;

export const unavailableGuildSchema = v.object({
  id: snowflake(),
  unavailable: v.boolean().optional(),
});

export type UnavailableGuild = Infer<typeof unavailableGuildSchema>;

const guildShape = {
  id: snowflake(),
  name: v.string(),
  owner_id: snowflake(),
  icon: v.string().nullable().optional(),
  unavailable: v.boolean().optional(),
  large: v.boolean().optional(),
  member_count: v.number().optional(),
  roles: v.array().of(roleSchema),
  emojis: v.array().of(emojiSchema).optional(),
  features: v.array().of(v.string()).optional(),
};

export const guildUpdateSchema = v.object(guildShape);

export const guildCreateSchema = v.object({
  ...guildShape,
  joined_at: v.string().optional(),
  channels: v.array().of(v.object(channelShape)).optional(),
  threads: v.array().of(v.object(channelShape)).optional(),
  members: v.array().of(memberSchema).optional(),
  voice_states: v.array().of(voiceStateSchema).optional(),
  presences: v.array().of(presenceSchema).optional(),
});

type GuildCollections =
  | "roles"
  | "channels"
  | "threads"
  | "members"
  | "voice_states"
  | "presences";

/** A GUILD_CREATE payload with every nested entity carrying `guild_id` */
export type Guild = Omit<Infer<typeof guildCreateSchema>, GuildCollections> & {
  roles: Role[];
  channels: GuildChannel[];
  threads: GuildChannel[];
  members: Member[];
  voice_states: VoiceState[];
  presences: Presence[];
};

export type GuildUpdate = Omit<Infer<typeof guildUpdateSchema>, "roles"> & {
  roles: Role[];
};

/** Guild as held by the cache; inner collections are keyed by id */
export type CachedGuild = Omit<Guild, GuildCollections> & {
  roles: Map<Snowflake, Role>;
  channels: Map<Snowflake, GuildChannel>;
  threads: Map<Snowflake, GuildChannel>;
  members: Map<Snowflake, Member>;
  voice_states: Map<Snowflake, VoiceState>;
  presences: Map<Snowflake, Presence>;
};
