import { EventEmitter } from "node:events";
import { Cache } from "../cache/cache";
import { Diagnostics } from "../diagnostics";
import { Dispatcher } from "../dispatch/dispatcher";
import { PresenceData } from "../model/presence";
import { shardIdFor, Snowflake } from "../model/snowflake";
import { GatewayBotProvider, RestClient } from "../rest/rest-client";
import { GatewayError, GatewayErrorKind, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { IDENTIFY_INTERVAL, IdentifyQueue } from "./identify-queue";
import { CloseCodes } from "./protocol";
import { Compression } from "./shard";
import { ShardMessenger } from "./shard-messenger";
import { ShardRunner, ShardRunnerEvents, ShardRunnerInfo } from "./shard-runner";
import { TransportFactory } from "./transport";
import { VoiceGatewayManager } from "./voice";

export enum ShardManagerEvents {
  ShardReady = "shardReady",
  AllReady = "allReady",
  Fatal = "fatal",
}

export type ShardManagerEventsMap = {
  [ShardManagerEvents.ShardReady]: [shardId: number];
  /** Every shard of the current topology has received READY */
  [ShardManagerEvents.AllReady]: [totalShards: number];
  [ShardManagerEvents.Fatal]: [error: GatewayError];
};

export type ShardManagerOptions = {
  token: string;
  intents: number;
  /** Defaults to the count recommended by `/gateway/bot` */
  totalShards?: number;
  largeThreshold: number;
  compression: Compression;
  presence: PresenceData;
  maxReconnectAttempts: number;
  mailboxCapacity: number;
  gateway: GatewayBotProvider;
  rest: RestClient;
  cache: Cache;
  dispatcher: Dispatcher;
  diagnostics: Diagnostics;
  voiceManager?: VoiceGatewayManager;
  transportFactory?: TransportFactory;
  identifyInterval?: number;
  random?: () => number;
};

const log = logger.scope("Shard Manager");

/** Boots, supervises and stops every shard of the topology */
export class ShardManager extends EventEmitter<ShardManagerEventsMap> {
  private readonly shardRunners = new Map<number, ShardRunner>();
  private readonly readyShards = new Set<number>();
  private identifyQueue = new IdentifyQueue();
  private gatewayUrl = "";
  private totalShards = 0;
  private voiceInitialised = false;
  private resharding: Promise<void> | null = null;

  constructor(private readonly options: ShardManagerOptions) {
    super();
  }

  get total() {
    return this.totalShards;
  }

  /** Fetches the gateway and starts every shard in ascending id order */
  async start() {
    const bot = await this.options.gateway.getGatewayBot();
    this.gatewayUrl = bot.url;
    this.boot(this.options.totalShards ?? bot.shards, bot.session_start_limit);
  }

  runners(): ShardRunnerInfo[] {
    return [...this.shardRunners.values()].map((runner) => runner.info);
  }

  messenger(shardId: number): ShardMessenger | undefined {
    return this.shardRunners.get(shardId)?.messenger;
  }

  /** Shard responsible for events of `guildId` */
  shardFor(guildId: Snowflake) {
    return shardIdFor(guildId, this.totalShards);
  }

  async shutdownShard(shardId: number, code: number = CloseCodes.Normal) {
    const runner = this.shardRunners.get(shardId);
    if (!runner) return;
    log.info(`Shutting down shard ${shardId}`);
    this.shardRunners.delete(shardId);
    this.readyShards.delete(shardId);
    await runner.shutdown(code);
  }

  /** Stops a shard and boots it again through the identify queue */
  async restartShard(shardId: number) {
    await this.shutdownShard(shardId, CloseCodes.Resuming);
    this.spawn(shardId);
  }

  async shutdownAll(code: number = CloseCodes.Normal) {
    log.info(`Shutting down all ${this.shardRunners.size} shards`);
    await Promise.all([...this.shardRunners.keys()].map((id) => this.shutdownShard(id, code)));
  }

  private boot(
    totalShards: number,
    limit: { remaining: number; max_concurrency: number }
  ) {
    if (!Number.isInteger(totalShards) || totalShards < 1 || totalShards > 65_535) {
      throw new RangeError("totalShards must be an integer between 1 and 65535");
    }
    if (limit.remaining < totalShards) {
      log.warn(
        `Only ${limit.remaining} session starts remain; ${totalShards} shards need to identify`
      );
    }

    this.totalShards = totalShards;
    this.readyShards.clear();
    this.voiceInitialised = false;
    this.options.cache.shardData.reset(totalShards);
    this.identifyQueue = new IdentifyQueue(
      limit.max_concurrency,
      this.options.identifyInterval ?? IDENTIFY_INTERVAL
    );

    log.init(`Starting ${totalShards} shards (max concurrency ${limit.max_concurrency})`);
    for (let id = 0; id < totalShards; id++) {
      this.spawn(id);
    }
  }

  private spawn(shardId: number) {
    const { options } = this;
    const queue = this.identifyQueue;
    const runner = new ShardRunner({
      id: shardId,
      total: this.totalShards,
      token: options.token,
      intents: options.intents,
      largeThreshold: options.largeThreshold,
      gatewayUrl: this.gatewayUrl,
      compression: options.compression,
      presence: options.presence,
      maxReconnectAttempts: options.maxReconnectAttempts,
      mailboxCapacity: options.mailboxCapacity,
      identifyGate: (id) => queue.wait(id),
      transportFactory: options.transportFactory,
      random: options.random,
      cache: options.cache,
      rest: options.rest,
      dispatcher: options.dispatcher,
      diagnostics: options.diagnostics,
      voiceManager: options.voiceManager,
    });

    runner.on(ShardRunnerEvents.Ready, ({ userId }) => this.onShardReady(shardId, userId));
    runner.on(ShardRunnerEvents.Fatal, (error) => this.onShardFatal(runner, error));

    this.shardRunners.set(shardId, runner);
    runner.start();
  }

  private onShardReady(shardId: number, userId: Snowflake) {
    if (!this.voiceInitialised && this.options.voiceManager) {
      this.voiceInitialised = true;
      this.options.voiceManager.initialise(userId, this.totalShards);
    }
    this.emit(ShardManagerEvents.ShardReady, shardId);

    if (this.readyShards.has(shardId)) return;
    this.readyShards.add(shardId);
    if (this.readyShards.size === this.totalShards) {
      log.ready(`All ${this.totalShards} shards are ready`);
      this.emit(ShardManagerEvents.AllReady, this.totalShards);
    }
  }

  private onShardFatal(runner: ShardRunner, error: GatewayError) {
    if (this.shardRunners.get(runner.id) !== runner) return;

    if (error.kind === GatewayErrorKind.ShardingRequired) {
      if (this.resharding) return;
      this.resharding = this.reshard()
        .catch((err) => {
          const failure = new GatewayError(
            GatewayErrorKind.ShardingRequired,
            `Failed to restart with more shards: ${toError(err).message}`,
            { cause: err }
          );
          log.error(failure.message);
          this.emit(ShardManagerEvents.Fatal, failure);
        })
        .finally(() => {
          this.resharding = null;
        });
      return;
    }

    this.shardRunners.delete(runner.id);
    this.emit(ShardManagerEvents.Fatal, error);
  }

  /** Re-reads the recommended shard count and restarts the topology */
  private async reshard() {
    log.warn("The gateway requires more shards; restarting the topology");
    await this.shutdownAll(CloseCodes.Normal);
    const bot = await this.options.gateway.getGatewayBot();
    this.gatewayUrl = bot.url;
    this.boot(Math.max(bot.shards, this.totalShards + 1), bot.session_start_limit);
  }
}
