import { Cache } from "./cache/cache";
import { ClientConfig, ClientOptions, resolveConfig } from "./config";
import { Diagnostics } from "./diagnostics";
import { Dispatcher } from "./dispatch/dispatcher";
import { ShardManager, ShardManagerEvents } from "./gateway/shard-manager";
import { ShardMessenger } from "./gateway/shard-messenger";
import { ShardData } from "./gateway/shard-data";
import { TransportFactory } from "./gateway/transport";
import { Snowflake } from "./model/snowflake";
import { GatewayBotProvider, RestClient } from "./rest/rest-client";
import { AuditLogService } from "./utils/audit-log";
import { GatewayError } from "./utils/errors";
import { logger } from "./utils/logger";

/** Replaceable collaborators, mostly for tests */
export type ClientCollaborators = {
  rest?: RestClient;
  gateway?: GatewayBotProvider;
  transportFactory?: TransportFactory;
  identifyInterval?: number;
  random?: () => number;
};

const log = logger.scope("Client");

/** Wires the shards, the cache and the dispatcher together */
export class Client {
  readonly config: ClientConfig;
  readonly rest: RestClient;
  readonly cache: Cache;
  readonly diagnostics = new Diagnostics();
  readonly dispatcher: Dispatcher;
  readonly shards: ShardManager;
  readonly auditLog: AuditLogService | null;

  private detachAuditLog: (() => void) | null = null;

  constructor(options: ClientOptions, collaborators: ClientCollaborators = {}) {
    this.config = resolveConfig(options);
    this.rest = collaborators.rest ?? new RestClient(this.config.token);

    this.cache = new Cache({
      maxMessages: this.config.maxMessages,
      shardData: new ShardData(this.config.totalShards ?? 1),
      onWarning: (warning) => {
        log.warn(warning.message);
        this.diagnostics.emit("cacheWarning", warning);
      },
    });

    this.dispatcher = new Dispatcher({
      handler: this.config.eventHandler,
      rawHandler: this.config.rawEventHandler,
      diagnostics: this.diagnostics,
    });

    this.shards = new ShardManager({
      token: this.config.token,
      intents: this.config.intents,
      totalShards: this.config.totalShards,
      largeThreshold: this.config.largeThreshold,
      compression: this.config.compression,
      presence: this.config.initialPresence,
      maxReconnectAttempts: this.config.maxReconnectAttempts,
      mailboxCapacity: this.config.mailboxCapacity,
      gateway: collaborators.gateway ?? this.rest,
      rest: this.rest,
      cache: this.cache,
      dispatcher: this.dispatcher,
      diagnostics: this.diagnostics,
      voiceManager: this.config.voiceManager,
      transportFactory: collaborators.transportFactory,
      identifyInterval: collaborators.identifyInterval,
      random: collaborators.random,
    });

    this.auditLog = this.config.auditLogChannelId
      ? new AuditLogService(this.rest, this.config.auditLogChannelId)
      : null;
  }

  /**
   * Connects every shard. Resolves once all of them received READY and
   * rejects with the first fatal error raised before that.
   */
  async start(): Promise<void> {
    this.detachAuditLog ??= this.auditLog?.attach(this.diagnostics) ?? null;

    let settle: { resolve: () => void; reject: (error: Error) => void } | null = null;
    const ready = new Promise<void>((resolve, reject) => {
      settle = { resolve, reject };
    });
    const onReady = () => settle?.resolve();
    const onFatal = (error: GatewayError) => settle?.reject(error);
    this.shards.on(ShardManagerEvents.AllReady, onReady);
    this.shards.on(ShardManagerEvents.Fatal, onFatal);

    try {
      await this.shards.start();
      await ready;
    } finally {
      this.shards.off(ShardManagerEvents.AllReady, onReady);
      this.shards.off(ShardManagerEvents.Fatal, onFatal);
    }
    log.ready(`Connected with ${this.shards.total} shards`);
  }

  /** Closes every shard with code 1000 and waits for running handlers */
  async shutdown() {
    await this.shards.shutdownAll();
    await this.dispatcher.settled();
    this.detachAuditLog?.();
    this.detachAuditLog = null;
  }

  messenger(shardId: number): ShardMessenger | undefined {
    return this.shards.messenger(shardId);
  }

  /** Messenger of the shard that receives events for `guildId` */
  messengerFor(guildId: Snowflake): ShardMessenger | undefined {
    return this.shards.messenger(this.shards.shardFor(guildId));
  }
}
