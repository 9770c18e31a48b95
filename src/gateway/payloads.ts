import { GatewayOpcodes, PresenceUpdateStatus } from "discord-api-types/v10";
import { PresenceData } from "../model/presence";
import { Snowflake } from "../model/snowflake";

/** Anything written to the socket */
export type GatewayPayload = {
  op: number;
  d: unknown;
};

export type IdentifyData = {
  token: string;
  intents: number;
  properties: {
    os: string;
    browser: string;
    device: string;
  };
  compress: false;
  large_threshold: number;
  shard: [id: number, total: number];
  presence?: PresenceData;
};

export type ResumeData = {
  token: string;
  session_id: string;
  seq: number;
};

export type ChunkGuildFilter =
  | { query: string }
  | { userIds: Snowflake[] };

export type RequestGuildMembersData = {
  guild_id: Snowflake;
  limit: number;
  presences?: boolean;
  query?: string;
  user_ids?: Snowflake[];
  nonce?: string;
};

export type VoiceStateData = {
  guild_id: Snowflake;
  channel_id: Snowflake | null;
  self_mute: boolean;
  self_deaf: boolean;
};

export type OutboundPayload =
  | { op: GatewayOpcodes.Heartbeat; d: number | null }
  | { op: GatewayOpcodes.Identify; d: IdentifyData }
  | { op: GatewayOpcodes.PresenceUpdate; d: PresenceData }
  | { op: GatewayOpcodes.VoiceStateUpdate; d: VoiceStateData }
  | { op: GatewayOpcodes.Resume; d: ResumeData }
  | { op: GatewayOpcodes.RequestGuildMembers; d: RequestGuildMembersData };

/** Opcodes that skip the send queue */
export const PriorityOpcodes: ReadonlySet<number> = new Set([
  GatewayOpcodes.Heartbeat,
  GatewayOpcodes.Identify,
  GatewayOpcodes.Resume,
]);

export const heartbeat = (sequence: number | null): OutboundPayload => ({
  op: GatewayOpcodes.Heartbeat,
  d: sequence,
});

export const identify = (data: IdentifyData): OutboundPayload => ({
  op: GatewayOpcodes.Identify,
  d: data,
});

export const resume = (data: ResumeData): OutboundPayload => ({
  op: GatewayOpcodes.Resume,
  d: data,
});

/** Bots cannot appear offline, so `offline` is sent as `invisible` */
export const presenceUpdate = (presence: PresenceData): OutboundPayload => ({
  op: GatewayOpcodes.PresenceUpdate,
  d: {
    ...presence,
    status:
      presence.status === PresenceUpdateStatus.Offline
        ? PresenceUpdateStatus.Invisible
        : presence.status,
  },
});

export const requestGuildMembers = (
  guildId: Snowflake,
  options: {
    limit?: number;
    presences?: boolean;
    filter?: ChunkGuildFilter;
    nonce?: string;
  } = {}
): OutboundPayload => {
  const filter = options.filter ?? { query: "" };
  return {
    op: GatewayOpcodes.RequestGuildMembers,
    d: {
      guild_id: guildId,
      limit: options.limit ?? 0,
      presences: options.presences,
      nonce: options.nonce,
      ...("query" in filter ? { query: filter.query } : { user_ids: filter.userIds }),
    },
  };
};

export const voiceStateUpdate = (data: VoiceStateData): OutboundPayload => ({
  op: GatewayOpcodes.VoiceStateUpdate,
  d: data,
});
