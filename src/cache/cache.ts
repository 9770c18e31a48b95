import { GatewayEvent } from "../events/gateway-event";
import { ShardData, ShardInfo } from "../gateway/shard-data";
import { Channel, GuildChannel } from "../model/channel";
import { CachedGuild, Role } from "../model/guild";
import { Member } from "../model/member";
import { Message } from "../model/message";
import { Presence } from "../model/presence";
import { Snowflake } from "../model/snowflake";
import { User } from "../model/user";
import { VoiceState } from "../model/voice";
import { CacheSettings, CacheStore, CacheWarning } from "./store";
import { applyEvent, CacheUpdateResult } from "./updates";

export type CacheOptions = Partial<CacheSettings> & {
  shardData?: ShardData;
  onWarning?: (warning: CacheWarning) => void;
};

const snapshot = <T>(value: T | undefined): T | undefined =>
  value === undefined ? undefined : structuredClone(value);

/**
 * Process-wide entity cache shared by every shard.
 *
 * Updates are synchronous, so each `update` call is atomic with respect to
 * readers. Every read returns a snapshot the caller may keep or mutate.
 */
export class Cache {
  private readonly store: CacheStore;

  constructor(options: CacheOptions = {}) {
    const maxMessages = options.maxMessages ?? 0;
    if (!Number.isInteger(maxMessages) || maxMessages < 0) {
      throw new RangeError("maxMessages must be a non-negative integer");
    }
    this.store = new CacheStore(
      { maxMessages },
      options.shardData ?? new ShardData(),
      options.onWarning ?? (() => undefined)
    );
  }

  get settings(): Readonly<CacheSettings> {
    return { ...this.store.settings };
  }

  get shardData() {
    return this.store.shardData;
  }

  /** Applies a decoded event received on `shard` and reports what it displaced */
  update(event: GatewayEvent, shard: ShardInfo): CacheUpdateResult {
    // The cache keeps its own copy so handlers can't mutate cached state
    return applyEvent(this.store, structuredClone(event), shard);
  }

  guild(id: Snowflake): CachedGuild | undefined {
    return snapshot(this.store.guilds.get(id));
  }

  /** Runs `reader` against the live guild without copying it */
  readGuild<T>(id: Snowflake, reader: (guild: Readonly<CachedGuild>) => T): T | undefined {
    const guild = this.store.guilds.get(id);
    return guild ? reader(guild) : undefined;
  }

  guildIds(): Snowflake[] {
    return this.store.guilds.keysArray;
  }

  unavailableGuildIds(): Snowflake[] {
    return [...this.store.unavailableGuilds];
  }

  /** Looks up guild channels, threads and DM channels */
  channel(id: Snowflake): Channel | undefined {
    return snapshot(this.store.findChannel(id));
  }

  guildChannels(guildId: Snowflake): GuildChannel[] {
    return (
      this.readGuild(guildId, (guild) => structuredClone([...guild.channels.values()])) ??
      []
    );
  }

  message(channelId: Snowflake, messageId: Snowflake): Message | undefined {
    return snapshot(
      this.store.messages.get(channelId)?.find((message) => message.id === messageId)
    );
  }

  /** Cached messages of a channel, oldest first */
  messages(channelId: Snowflake): Message[] {
    return structuredClone(this.store.messages.get(channelId) ?? []);
  }

  member(guildId: Snowflake, userId: Snowflake): Member | undefined {
    return snapshot(this.store.guilds.get(guildId)?.members.get(userId));
  }

  role(guildId: Snowflake, roleId: Snowflake): Role | undefined {
    return snapshot(this.store.guilds.get(guildId)?.roles.get(roleId));
  }

  presence(guildId: Snowflake, userId: Snowflake): Presence | undefined {
    return snapshot(this.store.guilds.get(guildId)?.presences.get(userId));
  }

  voiceState(guildId: Snowflake, userId: Snowflake): VoiceState | undefined {
    return snapshot(this.store.guilds.get(guildId)?.voice_states.get(userId));
  }

  user(id: Snowflake): User | undefined {
    return snapshot(this.store.users.get(id));
  }

  currentUser(): User | undefined {
    return snapshot(this.store.currentUser ?? undefined);
  }

  shardCount(): number {
    return this.store.shardData.total;
  }
}
