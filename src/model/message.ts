import { Infer, v } from "../utils/validator";
import { snowflake } from "./snowflake";
import { userSchema } from "./user";

export const messageSchema = v.object({
  id: snowflake(),
  channel_id: snowflake(),
  guild_id: snowflake().optional(),
  author: userSchema,
  member: v.unknown().optional(),
  content: v.string(),
  timestamp: v.string(),
  edited_timestamp: v.string().nullable().optional(),
  tts: v.boolean().optional(),
  mention_everyone: v.boolean().optional(),
  mentions: v.array().of(userSchema).optional(),
  mention_roles: v.array().of(snowflake()).optional(),
  attachments: v.array().optional(),
  embeds: v.array().optional(),
  reactions: v.array().optional(),
  components: v.array().optional(),
  pinned: v.boolean().optional(),
  type: v.number().optional(),
  flags: v.number().optional(),
  webhook_id: snowflake().optional(),
  nonce: v.unknown().optional(),
});

export type Message = Infer<typeof messageSchema>;

/** MESSAGE_UPDATE only carries the fields that changed */
export const messageUpdateSchema = v.object({
  id: snowflake(),
  channel_id: snowflake(),
  guild_id: snowflake().optional(),
  author: userSchema.optional(),
  content: v.string().optional(),
  edited_timestamp: v.string().nullable().optional(),
  tts: v.boolean().optional(),
  mention_everyone: v.boolean().optional(),
  mentions: v.array().of(userSchema).optional(),
  mention_roles: v.array().of(snowflake()).optional(),
  attachments: v.array().optional(),
  embeds: v.array().optional(),
  components: v.array().optional(),
  pinned: v.boolean().optional(),
  flags: v.number().optional(),
});

export type MessageUpdate = Infer<typeof messageUpdateSchema>;

/** Field-wise merge of an update into a cached message */
export const applyMessageUpdate = (message: Message, update: MessageUpdate) => {
  if (update.author !== undefined) message.author = update.author;
  if (update.content !== undefined) message.content = update.content;
  if (update.edited_timestamp !== undefined)
    message.edited_timestamp = update.edited_timestamp;
  if (update.tts !== undefined) message.tts = update.tts;
  if (update.mention_everyone !== undefined)
    message.mention_everyone = update.mention_everyone;
  if (update.mentions !== undefined) message.mentions = update.mentions;
  if (update.mention_roles !== undefined)
    message.mention_roles = update.mention_roles;
  if (update.attachments !== undefined) message.attachments = update.attachments;
  if (update.embeds !== undefined) message.embeds = update.embeds;
  if (update.components !== undefined) message.components = update.components;
  if (update.pinned !== undefined) message.pinned = update.pinned;
  if (update.flags !== undefined) message.flags = update.flags;
};

export const reactionSchema = v.object({
  user_id: snowflake(),
  channel_id: snowflake(),
  message_id: snowflake(),
  guild_id: snowflake().optional(),
  member: v.unknown().optional(),
  emoji: v.object({
    id: snowflake().nullable().optional(),
    name: v.string().nullable().optional(),
    animated: v.boolean().optional(),
  }),
});

export type Reaction = Infer<typeof reactionSchema>;
