import { v } from "../utils/validator";

export type Snowflake = string;

const DISCORD_EPOCH = 1_420_070_400_000n;

export const snowflake = () =>
  v.string().matches(/^\d{1,20}$/, "is not a snowflake");

/** Shard that owns a guild: `(guild_id >> 22) % total` */
export const shardIdFor = (guildId: Snowflake, totalShards: number): number =>
  Number((BigInt(guildId) >> 22n) % BigInt(totalShards));

/** Creation time encoded in a snowflake, in unix milliseconds */
export const snowflakeTimestamp = (id: Snowflake): number =>
  Number((BigInt(id) >> 22n) + DISCORD_EPOCH);
