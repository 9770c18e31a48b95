import { Infer, v } from "../utils/validator";
import { memberSchema } from "./member";
import { Snowflake, snowflake } from "./snowflake";
import { userSchema } from "./user";

/**
 * One model for every interaction kind (commands, components, modals).
 * Only the routing fields are typed; the rest of the payload passes through.
 */
export const interactionSchema = v.object({
  id: snowflake(),
  application_id: snowflake(),
  type: v.number(),
  token: v.string(),
  guild_id: snowflake().optional(),
  channel_id: snowflake().optional(),
  member: memberSchema.optional(),
  user: userSchema.optional(),
  data: v
    .object({
      id: snowflake().optional(),
      name: v.string().optional(),
      type: v.number().optional(),
      custom_id: v.string().optional(),
      component_type: v.number().optional(),
      values: v.array().of(v.string()).optional(),
      components: v.array().optional(),
      options: v.array().optional(),
    })
    .optional(),
  message: v
    .object({
      id: snowflake(),
      channel_id: snowflake().optional(),
    })
    .optional(),
  locale: v.string().optional(),
});

export type Interaction = Infer<typeof interactionSchema>;

export const interactionUserId = (
  interaction: Interaction
): Snowflake | undefined => interaction.member?.user.id ?? interaction.user?.id;
