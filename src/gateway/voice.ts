import { Snowflake } from "../model/snowflake";
import { VoiceState } from "../model/voice";
import { ShardMessenger } from "./shard-messenger";

/**
 * Receives the voice events of every shard. The gateway core forwards
 * them without interpreting the voice connection itself.
 */
export interface VoiceGatewayManager {
  /** Called once the current user is known, before any shard registers */
  initialise(userId: Snowflake, shardCount: number): void;
  /** A shard became ready; `messenger` can send op 4 for it */
  registerShard(shardId: number, messenger: ShardMessenger): void;
  /** A shard stopped; it may register again after reconnecting */
  deregisterShard(shardId: number): void;
  stateUpdate(guildId: Snowflake, state: VoiceState): void;
  serverUpdate(guildId: Snowflake, endpoint: string | null, token: string): void;
}
