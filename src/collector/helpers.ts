import { InteractionType } from "discord-api-types/v10";
import { Interaction, interactionUserId } from "../model/interaction";
import { Message, Reaction } from "../model/message";
import { Snowflake } from "../model/snowflake";
import { Collector } from "./collector";

/** Anything collectors can be registered on, usually a `ShardMessenger` */
export interface CollectorHost {
  addCollector<T>(collector: Collector<T>): Collector<T>;
}

type Timed = { timeoutMs?: number };

export type MessageFilter = Timed & {
  channelId: Snowflake;
  authorId?: Snowflake;
  maxEvents?: number;
};

export type ReactionFilter = Timed & {
  messageId: Snowflake;
  userId?: Snowflake;
  maxEvents?: number;
};

const DEFAULT_TIMEOUT = 60_000;

const matchMessage =
  ({ channelId, authorId }: MessageFilter) =>
  (message: Message) =>
    message.channel_id === channelId &&
    (authorId === undefined || message.author.id === authorId);

const matchReaction =
  ({ messageId, userId }: ReactionFilter) =>
  (reaction: Reaction) =>
    reaction.message_id === messageId && (userId === undefined || reaction.user_id === userId);

export const collectMessages = (host: CollectorHost, options: MessageFilter) => {
  const matches = matchMessage(options);
  return host.addCollector(
    new Collector<Message>({
      filter: (event) =>
        event.type === "MessageCreate" && matches(event.message) ? event.message : undefined,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT,
      maxEvents: options.maxEvents,
    })
  );
};

export const collectReactions = (host: CollectorHost, options: ReactionFilter) => {
  const matches = matchReaction(options);
  return host.addCollector(
    new Collector<Reaction>({
      filter: (event) =>
        event.type === "MessageReactionAdd" && matches(event.reaction)
          ? event.reaction
          : undefined,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT,
      maxEvents: options.maxEvents,
    })
  );
};

/** Resolves with the next matching message, or `undefined` on timeout */
export const awaitReply = (host: CollectorHost, options: Omit<MessageFilter, "maxEvents">) =>
  collectMessages(host, { ...options, maxEvents: 1 }).first();

export const awaitReaction = (
  host: CollectorHost,
  options: Omit<ReactionFilter, "maxEvents">
) => collectReactions(host, { ...options, maxEvents: 1 }).first();

const awaitInteraction = (
  host: CollectorHost,
  timeoutMs: number | undefined,
  matches: (interaction: Interaction) => boolean
) =>
  host
    .addCollector(
      new Collector<Interaction>({
        filter: (event) =>
          event.type === "InteractionCreate" && matches(event.interaction)
            ? event.interaction
            : undefined,
        timeoutMs: timeoutMs ?? DEFAULT_TIMEOUT,
        maxEvents: 1,
      })
    )
    .first();

export const awaitComponent = (
  host: CollectorHost,
  options: Timed & { messageId?: Snowflake; customId?: string }
) =>
  awaitInteraction(
    host,
    options.timeoutMs,
    (interaction) =>
      interaction.type === InteractionType.MessageComponent &&
      (options.messageId === undefined || interaction.message?.id === options.messageId) &&
      (options.customId === undefined || interaction.data?.custom_id === options.customId)
  );

export const awaitModal = (
  host: CollectorHost,
  options: Timed & { customId: string; userId?: Snowflake }
) =>
  awaitInteraction(
    host,
    options.timeoutMs,
    (interaction) =>
      interaction.type === InteractionType.ModalSubmit &&
      interaction.data?.custom_id === options.customId &&
      (options.userId === undefined || interactionUserId(interaction) === options.userId)
  );
