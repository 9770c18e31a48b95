import { Infer, v } from "../utils/validator";
import { Snowflake, snowflake } from "./snowflake";
import { userSchema } from "./user";

export const memberShape = {
  user: userSchema,
  nick: v.string().nullable().optional(),
  avatar: v.string().nullable().optional(),
  roles: v.array().of(snowflake()),
  joined_at: v.string().nullable().optional(),
  premium_since: v.string().nullable().optional(),
  deaf: v.boolean().optional(),
  mute: v.boolean().optional(),
  pending: v.boolean().optional(),
  communication_disabled_until: v.string().nullable().optional(),
};

export const memberSchema = v.object(memberShape);

/** Members arrive without `guild_id`; the decoder fills it in */
export type Member = Infer<typeof memberSchema> & { guild_id: Snowflake };
