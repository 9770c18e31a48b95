export { Client } from "./client";
export type { ClientCollaborators } from "./client";
export { configFromEnv, DEFAULT_INTENTS, resolveConfig } from "./config";
export type { ClientConfig, ClientOptions } from "./config";
export { Diagnostics } from "./diagnostics";
export type { DiagnosticsEventsMap, DropReason } from "./diagnostics";

export { Cache } from "./cache/cache";
export type { CacheOptions } from "./cache/cache";
export type { CacheWarning } from "./cache/store";
export type { CacheUpdateResult, PreImage } from "./cache/updates";

export { Collector } from "./collector/collector";
export type { CollectorOptions } from "./collector/collector";
export {
  awaitComponent,
  awaitModal,
  awaitReaction,
  awaitReply,
  collectMessages,
  collectReactions,
} from "./collector/helpers";
export type { CollectorHost } from "./collector/helpers";

export { Dispatcher } from "./dispatch/dispatcher";
export type { FullEvent, FullEventType, PseudoEvent } from "./dispatch/full-event";
export type {
  Context,
  EventHandler,
  EventMap,
  RawDispatch,
  RawEventHandler,
} from "./dispatch/handler";

export { decodeEvent } from "./events/decoder";
export type { GatewayEvent, GatewayEventType } from "./events/gateway-event";

export { IdentifyQueue } from "./gateway/identify-queue";
export { CloseCodes, ShardProtocol, ShardStage } from "./gateway/protocol";
export type { SessionInfo, ShardAction } from "./gateway/protocol";
export { Shard, ShardEvents } from "./gateway/shard";
export type { Compression } from "./gateway/shard";
export { ShardData } from "./gateway/shard-data";
export { ShardManager, ShardManagerEvents } from "./gateway/shard-manager";
export { ShardMessenger } from "./gateway/shard-messenger";
export type { ChunkGuildOptions, SendResult } from "./gateway/shard-messenger";
export { ShardRunner } from "./gateway/shard-runner";
export type { ShardRunnerInfo } from "./gateway/shard-runner";
export { WebSocketTransport } from "./gateway/transport";
export type { Transport, TransportFactory } from "./gateway/transport";
export type { VoiceGatewayManager } from "./gateway/voice";

export { activity, createPresence } from "./model/presence";
export type { ActivityData, PresenceData } from "./model/presence";
export { shardIdFor } from "./model/snowflake";
export type { Snowflake } from "./model/snowflake";

export { RestClient } from "./rest/rest-client";
export type { GatewayBot, GatewayBotProvider } from "./rest/rest-client";
export { AuditLogService, AuditLogLevel } from "./utils/audit-log";
export {
  GatewayError,
  GatewayErrorKind,
  HandlerError,
  RestError,
  ValidationError,
} from "./utils/errors";
export { logger, Logger } from "./utils/logger";
export { v } from "./utils/validator";
