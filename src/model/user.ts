import { Infer, v } from "../utils/validator";
import { snowflake } from "./snowflake";

export const userSchema = v.object({
  id: snowflake(),
  username: v.string(),
  discriminator: v.string().optional(),
  global_name: v.string().nullable().optional(),
  avatar: v.string().nullable().optional(),
  bot: v.boolean().optional(),
  system: v.boolean().optional(),
});

export type User = Infer<typeof userSchema>;

/** Users nested in presence updates only guarantee `id` */
export const partialUserSchema = v.object({
  id: snowflake(),
  username: v.string().optional(),
  discriminator: v.string().optional(),
  global_name: v.string().nullable().optional(),
  avatar: v.string().nullable().optional(),
  bot: v.boolean().optional(),
});

export type PartialUser = Infer<typeof partialUserSchema>;

export const toUser = (partial: PartialUser): User | undefined => {
  if (partial.username === undefined) return undefined;
  return { ...partial, username: partial.username };
};
