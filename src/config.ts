import { GatewayIntentBits } from "discord-api-types/v10";
import { EventHandler, RawEventHandler } from "./dispatch/handler";
import { Compression } from "./gateway/shard";
import { VoiceGatewayManager } from "./gateway/voice";
import { createPresence, PresenceData } from "./model/presence";
import { Snowflake } from "./model/snowflake";
import { loadEnv } from "./utils/env";
import { ValidationError } from "./utils/errors";
import { resolveBitfield } from "./utils/helpers";
import { Parser, v } from "./utils/validator";

export type ClientOptions = {
  token: string;
  /** A bitfield, or the intents to fold into one */
  intents: number | readonly GatewayIntentBits[];
  /** Defaults to the count recommended by the gateway */
  totalShards?: number;
  /** Messages kept per channel; `0` disables the message cache */
  maxMessages?: number;
  largeThreshold?: number;
  initialPresence?: PresenceData;
  compression?: Compression;
  maxReconnectAttempts?: number;
  /** Commands a shard queues before new ones are dropped */
  mailboxCapacity?: number;
  eventHandler?: EventHandler;
  rawEventHandler?: RawEventHandler;
  voiceManager?: VoiceGatewayManager;
  /** Channel that receives fatal errors and handler failures */
  auditLogChannelId?: Snowflake;
};

export type ClientConfig = Readonly<{
  token: string;
  intents: number;
  totalShards?: number;
  maxMessages: number;
  largeThreshold: number;
  initialPresence: PresenceData;
  compression: Compression;
  maxReconnectAttempts: number;
  mailboxCapacity: number;
  eventHandler?: EventHandler;
  rawEventHandler?: RawEventHandler;
  voiceManager?: VoiceGatewayManager;
  auditLogChannelId?: Snowflake;
}>;

export const DEFAULT_INTENTS = resolveBitfield([
  GatewayIntentBits.Guilds,
  GatewayIntentBits.GuildMessages,
  GatewayIntentBits.GuildMessageReactions,
  GatewayIntentBits.GuildVoiceStates,
]);

const field = <T>(name: string, parser: Parser<T>, value: unknown): T => {
  try {
    return parser.parse(value);
  } catch (err) {
    throw ValidationError.at(name, err);
  }
};

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  v.number().integer().min(min).max(max);

/** Applies defaults and validates every option */
export const resolveConfig = (options: ClientOptions): ClientConfig => {
  const intents =
    typeof options.intents === "number"
      ? options.intents
      : resolveBitfield(options.intents);

  return Object.freeze({
    token: field("token", v.string().isNotEmpty(), options.token),
    intents: field("intents", integer(0), intents),
    totalShards: field("totalShards", integer(1, 65_535).optional(), options.totalShards),
    maxMessages: field("maxMessages", integer(0), options.maxMessages ?? 0),
    largeThreshold: field("largeThreshold", integer(50, 250), options.largeThreshold ?? 50),
    initialPresence: options.initialPresence ?? createPresence(),
    compression: field(
      "compression",
      v.enum(["none", "zlib-stream"] as const),
      options.compression ?? "none"
    ),
    maxReconnectAttempts: field(
      "maxReconnectAttempts",
      integer(0),
      options.maxReconnectAttempts ?? 10
    ),
    mailboxCapacity: field("mailboxCapacity", integer(1), options.mailboxCapacity ?? 1_024),
    eventHandler: options.eventHandler,
    rawEventHandler: options.rawEventHandler,
    voiceManager: options.voiceManager,
    auditLogChannelId: options.auditLogChannelId,
  });
};

const toNumber = (value: string | undefined) =>
  value === undefined ? undefined : Number(value);

/** Reads client options from the environment; `overrides` win */
export const configFromEnv = (
  overrides: Partial<ClientOptions> = {},
  source: NodeJS.ProcessEnv = process.env
): ClientOptions => {
  const env = loadEnv(source);
  return {
    token: env.BOT_TOKEN,
    intents: toNumber(env.INTENTS) ?? DEFAULT_INTENTS,
    totalShards: toNumber(env.TOTAL_SHARDS),
    maxMessages: toNumber(env.MAX_MESSAGES),
    largeThreshold: toNumber(env.LARGE_THRESHOLD),
    compression: env.GATEWAY_COMPRESSION,
    auditLogChannelId: env.AUDIT_LOG_CHANNEL,
    ...overrides,
  };
};
