import { GatewayBot, GatewayBotProvider } from "../../src/rest/rest-client";

export const BOT_USER = { id: "900000000000000001", username: "test-bot", bot: true };

export const user = (id: string, username = `user-${id}`) => ({ id, username });

export const readyPayload = (
  sessionId: string,
  guilds: { id: string; unavailable?: boolean }[] = [],
  shard: [number, number] = [0, 1]
) => ({
  v: 10,
  user: BOT_USER,
  guilds,
  session_id: sessionId,
  resume_gateway_url: "wss://resume.gateway.test",
  shard,
});

export const rolePayload = (id: string, name = `role-${id}`) => ({ id, name, position: 0 });

export const channelPayload = (id: string, guildId?: string, name = `channel-${id}`) => ({
  id,
  type: 0,
  name,
  ...(guildId === undefined ? {} : { guild_id: guildId }),
});

export const memberPayload = (userId: string, roles: string[] = []) => ({
  user: user(userId),
  roles,
  joined_at: "2024-01-01T00:00:00.000Z",
});

export const guildPayload = (
  id: string,
  extras: {
    channels?: object[];
    members?: object[];
    roles?: object[];
    name?: string;
  } = {}
) => ({
  id,
  name: extras.name ?? `guild-${id}`,
  owner_id: "100",
  member_count: extras.members?.length ?? 0,
  roles: extras.roles ?? [rolePayload(id, "@everyone")],
  emojis: [],
  channels: extras.channels ?? [],
  threads: [],
  members: extras.members ?? [],
  voice_states: [],
  presences: [],
});

export const messagePayload = (
  id: string,
  channelId: string,
  extras: { content?: string; authorId?: string; guildId?: string } = {}
) => ({
  id,
  channel_id: channelId,
  ...(extras.guildId === undefined ? {} : { guild_id: extras.guildId }),
  author: user(extras.authorId ?? "200"),
  content: extras.content ?? `message ${id}`,
  timestamp: "2024-01-01T00:00:00.000Z",
});

export const gatewayBot = (shards = 1, maxConcurrency = 1): GatewayBot => ({
  url: "wss://gateway.test",
  shards,
  session_start_limit: {
    total: 1000,
    remaining: 1000,
    reset_after: 0,
    max_concurrency: maxConcurrency,
  },
});

/** Serves `/gateway/bot` from memory; `bots` are returned in order, the last one repeats */
export class FakeGatewayBotProvider implements GatewayBotProvider {
  calls = 0;

  constructor(private readonly bots: GatewayBot[] = [gatewayBot()]) {}

  async getGatewayBot(): Promise<GatewayBot> {
    const bot = this.bots[Math.min(this.calls, this.bots.length - 1)];
    this.calls++;
    if (!bot) throw new Error("no gateway bot configured");
    return bot;
  }
}
