import { ShardData } from "../gateway/shard-data";
import { Channel } from "../model/channel";
import { CachedGuild } from "../model/guild";
import { Message } from "../model/message";
import { Presence } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { User } from "../model/user";
import { Collection } from "../utils/collection";

export type CacheSettings = {
  /** Per-channel message capacity; 0 disables message caching */
  maxMessages: number;
};

export type CacheWarning = {
  message: string;
  guildId?: Snowflake;
};

/** Mutable cache state. Only the update functions write to it. */
export class CacheStore {
  readonly guilds = new Collection<Snowflake, CachedGuild>();
  readonly unavailableGuilds = new Set<Snowflake>();
  /** Channel and thread ids to the guild that owns them */
  readonly channelGuilds = new Collection<Snowflake, Snowflake>();
  readonly privateChannels = new Collection<Snowflake, Channel>();
  readonly messages = new Collection<Snowflake, Message[]>();
  readonly users = new Collection<Snowflake, User>();
  /** Presences received outside of any guild */
  readonly presences = new Collection<Snowflake, Presence>();
  currentUser: User | null = null;
  cacheReadySent = false;

  constructor(
    readonly settings: CacheSettings,
    readonly shardData: ShardData,
    readonly warn: (warning: CacheWarning) => void
  ) {}

  findChannel(channelId: Snowflake): Channel | undefined {
    const guildId = this.channelGuilds.get(channelId);
    if (guildId === undefined) return this.privateChannels.get(channelId);

    const guild = this.guilds.get(guildId);
    return guild?.channels.get(channelId) ?? guild?.threads.get(channelId);
  }
}
