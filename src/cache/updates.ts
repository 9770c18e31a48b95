import { PresenceUpdateStatus } from "discord-api-types/v10";
import { GatewayEvent, GuildMembersChunk } from "../events/gateway-event";
import { ChannelPinsUpdate, GuildMemberUpdate, Ready, ThreadDelete } from "../events/payloads";
import { ShardInfo } from "../gateway/shard-data";
import { Channel, GuildChannel, isGuildChannel } from "../model/channel";
import { CachedGuild, Emoji, Guild, GuildUpdate, Role, UnavailableGuild } from "../model/guild";
import { Member } from "../model/member";
import { applyMessageUpdate, Message, MessageUpdate } from "../model/message";
import { Presence } from "../model/presence";
import { shardIdFor, Snowflake, snowflakeTimestamp } from "../model/snowflake";
import { toUser, User } from "../model/user";
import { VoiceState } from "../model/voice";
import { CacheStore } from "./store";

/** Entity state displaced or removed by an update */
export type PreImage =
  | { kind: "channel"; channel: Channel }
  | { kind: "thread"; thread: GuildChannel }
  | { kind: "messages"; messages: Message[] }
  | { kind: "message"; message: Message }
  | { kind: "guild"; guild: CachedGuild }
  | { kind: "member"; member: Member }
  | { kind: "role"; role: Role }
  | { kind: "emojis"; emojis: Emoji[] }
  | { kind: "presence"; presence: Presence }
  | { kind: "voiceState"; state: VoiceState }
  | { kind: "user"; user: User };

/** Post-update state for events that only carry a partial payload */
export type CurrentImage =
  | { kind: "message"; message: Message }
  | { kind: "member"; member: Member };

export type Milestone =
  | { type: "CacheReady"; guilds: Snowflake[] }
  | { type: "ShardsReady"; totalShards: number };

export type CacheUpdateResult = {
  preImage?: PreImage;
  current?: CurrentImage;
  /** GuildCreate only: the guild was neither cached nor awaited as unavailable */
  isNew?: boolean;
  milestones: Milestone[];
};

const clone = <T>(value: T): T => structuredClone(value);

const none = (): CacheUpdateResult => ({ milestones: [] });

const keyBy = <T>(items: readonly T[], key: (item: T) => Snowflake) => {
  const map = new Map<Snowflake, T>();
  for (const item of items) map.set(key(item), item);
  return map;
};

export const toCachedGuild = (guild: Guild): CachedGuild => {
  const { roles, channels, threads, members, voice_states, presences, ...fields } =
    guild;
  return {
    ...fields,
    roles: keyBy(roles, (role) => role.id),
    channels: keyBy(channels, (channel) => channel.id),
    threads: keyBy(threads, (thread) => thread.id),
    members: keyBy(members, (member) => member.user.id),
    voice_states: keyBy(voice_states, (state) => state.user_id),
    presences: keyBy(presences, (presence) => presence.user.id),
  };
};

const checkMemberRoles = (store: CacheStore, guild: CachedGuild, member: Member) => {
  for (const roleId of member.roles) {
    if (!guild.roles.has(roleId)) {
      store.warn({
        message: `Member ${member.user.id} references unknown role ${roleId}`,
        guildId: guild.id,
      });
    }
  }
};

const pushCacheReady = (store: CacheStore, milestones: Milestone[]) => {
  if (
    store.cacheReadySent ||
    store.unavailableGuilds.size > 0 ||
    !store.shardData.allConnected
  ) {
    return;
  }
  store.cacheReadySent = true;
  milestones.push({ type: "CacheReady", guilds: store.guilds.keysArray });
};

const connectShard = (store: CacheStore, shard: ShardInfo) => {
  const milestones: Milestone[] = [];
  if (store.shardData.connect(shard.id)) {
    milestones.push({ type: "ShardsReady", totalShards: store.shardData.total });
  }
  pushCacheReady(store, milestones);
  return milestones;
};

const forgetChannel = (store: CacheStore, channelId: Snowflake) => {
  store.channelGuilds.delete(channelId);
  store.messages.delete(channelId);
};

const evictGuild = (store: CacheStore, guildId: Snowflake) => {
  const guild = store.guilds.get(guildId);
  if (!guild) return undefined;
  store.guilds.delete(guildId);
  for (const id of [...guild.channels.keys(), ...guild.threads.keys()]) {
    forgetChannel(store, id);
  }
  return guild;
};

const applyReady = (store: CacheStore, ready: Ready, shard: ShardInfo) => {
  const listed = new Set(ready.guilds.map((guild) => guild.id));
  // Guilds this shard owns that Ready no longer lists were left while disconnected
  const stale = (id: Snowflake) =>
    shardIdFor(id, shard.total) === shard.id && !listed.has(id);

  for (const id of store.guilds.keysArray) {
    if (stale(id)) evictGuild(store, id);
  }
  for (const id of [...store.unavailableGuilds]) {
    if (stale(id)) store.unavailableGuilds.delete(id);
  }
  for (const { id } of ready.guilds) {
    store.unavailableGuilds.add(id);
    const cached = store.guilds.get(id);
    if (cached) cached.unavailable = true;
  }

  store.currentUser = ready.user;
  store.users.set(ready.user.id, ready.user);
  return { milestones: connectShard(store, shard) };
};

const applyGuildCreate = (store: CacheStore, guild: Guild): CacheUpdateResult => {
  const awaited = store.unavailableGuilds.delete(guild.id);
  const previous = store.guilds.get(guild.id);
  const cached = toCachedGuild(guild);
  cached.unavailable = false;
  store.guilds.set(guild.id, cached);

  if (previous) {
    for (const id of [...previous.channels.keys(), ...previous.threads.keys()]) {
      if (!cached.channels.has(id) && !cached.threads.has(id)) {
        forgetChannel(store, id);
      }
    }
  }
  for (const id of [...cached.channels.keys(), ...cached.threads.keys()]) {
    store.channelGuilds.set(id, guild.id);
  }
  for (const member of guild.members) {
    store.users.set(member.user.id, member.user);
    checkMemberRoles(store, cached, member);
  }

  const milestones: Milestone[] = [];
  pushCacheReady(store, milestones);
  return {
    preImage: previous ? { kind: "guild", guild: previous } : undefined,
    isNew: !awaited && !previous,
    milestones,
  };
};

const applyGuildUpdate = (store: CacheStore, update: GuildUpdate): CacheUpdateResult => {
  const existing = store.guilds.get(update.id);
  if (!existing) return none();

  const old = clone(existing);
  const { roles, emojis, ...fields } = update;
  Object.assign(existing, fields);
  existing.roles = keyBy(roles, (role) => role.id);
  if (emojis !== undefined) existing.emojis = emojis;
  return { preImage: { kind: "guild", guild: old }, milestones: [] };
};

const applyGuildDelete = (
  store: CacheStore,
  guild: UnavailableGuild
): CacheUpdateResult => {
  if (guild.unavailable === true) {
    store.unavailableGuilds.add(guild.id);
    const cached = store.guilds.get(guild.id);
    if (cached) cached.unavailable = true;
    return none();
  }

  const evicted = evictGuild(store, guild.id);
  store.unavailableGuilds.delete(guild.id);
  const milestones: Milestone[] = [];
  pushCacheReady(store, milestones);
  return {
    preImage: evicted ? { kind: "guild", guild: evicted } : undefined,
    milestones,
  };
};

const upsertChannel = (store: CacheStore, channel: Channel): CacheUpdateResult => {
  let displaced: Channel | undefined;
  if (isGuildChannel(channel)) {
    const guild = store.guilds.get(channel.guild_id);
    if (!guild) return none();
    displaced = guild.channels.get(channel.id);
    guild.channels.set(channel.id, channel);
    store.channelGuilds.set(channel.id, channel.guild_id);
  } else {
    displaced = store.privateChannels.get(channel.id);
    store.privateChannels.set(channel.id, channel);
    for (const recipient of channel.recipients ?? []) {
      store.users.set(recipient.id, recipient);
    }
  }
  return {
    preImage: displaced ? { kind: "channel", channel: displaced } : undefined,
    milestones: [],
  };
};

const applyChannelDelete = (store: CacheStore, channel: Channel): CacheUpdateResult => {
  if (isGuildChannel(channel)) {
    store.guilds.get(channel.guild_id)?.channels.delete(channel.id);
  } else {
    store.privateChannels.delete(channel.id);
  }
  const buffered = store.messages.get(channel.id);
  forgetChannel(store, channel.id);
  return {
    preImage: buffered ? { kind: "messages", messages: buffered } : undefined,
    milestones: [],
  };
};

const applyChannelPinsUpdate = (store: CacheStore, pins: ChannelPinsUpdate) => {
  const channel = store.findChannel(pins.channel_id);
  if (channel) channel.last_pin_timestamp = pins.last_pin_timestamp ?? null;
  return none();
};

const upsertThread = (store: CacheStore, thread: GuildChannel): CacheUpdateResult => {
  const guild = store.guilds.get(thread.guild_id);
  if (!guild) return none();
  const displaced = guild.threads.get(thread.id);
  guild.threads.set(thread.id, thread);
  store.channelGuilds.set(thread.id, thread.guild_id);
  return {
    preImage: displaced ? { kind: "thread", thread: displaced } : undefined,
    milestones: [],
  };
};

const applyThreadDelete = (store: CacheStore, thread: ThreadDelete): CacheUpdateResult => {
  const guild = store.guilds.get(thread.guild_id);
  const removed = guild?.threads.get(thread.id);
  guild?.threads.delete(thread.id);
  forgetChannel(store, thread.id);
  return {
    preImage: removed ? { kind: "thread", thread: removed } : undefined,
    milestones: [],
  };
};

const applyEmojisUpdate = (
  store: CacheStore,
  guildId: Snowflake,
  emojis: Emoji[]
): CacheUpdateResult => {
  const guild = store.guilds.get(guildId);
  if (!guild) return none();
  const old = guild.emojis ?? [];
  guild.emojis = emojis;
  return { preImage: { kind: "emojis", emojis: old }, milestones: [] };
};

const applyMemberAdd = (store: CacheStore, member: Member) => {
  const guild = store.guilds.get(member.guild_id);
  if (!guild) return none();
  guild.members.set(member.user.id, member);
  guild.member_count = (guild.member_count ?? 0) + 1;
  store.users.set(member.user.id, member.user);
  checkMemberRoles(store, guild, member);
  return none();
};

const applyMemberUpdate = (
  store: CacheStore,
  update: GuildMemberUpdate
): CacheUpdateResult => {
  const guild = store.guilds.get(update.guild_id);
  if (!guild) return none();
  store.users.set(update.user.id, update.user);

  const existing = guild.members.get(update.user.id);
  if (existing) {
    const old = clone(existing);
    Object.assign(existing, update);
    checkMemberRoles(store, guild, existing);
    return {
      preImage: { kind: "member", member: old },
      current: { kind: "member", member: clone(existing) },
      milestones: [],
    };
  }

  const member: Member = { ...update };
  guild.members.set(member.user.id, member);
  checkMemberRoles(store, guild, member);
  return { current: { kind: "member", member: clone(member) }, milestones: [] };
};

const applyMemberRemove = (
  store: CacheStore,
  guildId: Snowflake,
  user: User
): CacheUpdateResult => {
  const guild = store.guilds.get(guildId);
  if (!guild) return none();
  const removed = guild.members.get(user.id);
  guild.members.delete(user.id);
  guild.member_count = Math.max((guild.member_count ?? 1) - 1, 0);
  return {
    preImage: removed ? { kind: "member", member: removed } : undefined,
    milestones: [],
  };
};

const setGuildPresence = (guild: CachedGuild, presence: Presence) => {
  const userId = presence.user.id;
  const previous = guild.presences.get(userId);
  if (presence.status === PresenceUpdateStatus.Offline) {
    guild.presences.delete(userId);
  } else {
    guild.presences.set(userId, presence);
  }
  return previous;
};

const applyMembersChunk = (store: CacheStore, chunk: GuildMembersChunk) => {
  const guild = store.guilds.get(chunk.guild_id);
  if (!guild) return none();
  for (const member of chunk.members) {
    guild.members.set(member.user.id, member);
    store.users.set(member.user.id, member.user);
    checkMemberRoles(store, guild, member);
  }
  for (const presence of chunk.presences) setGuildPresence(guild, presence);
  return none();
};

const upsertRole = (store: CacheStore, role: Role): CacheUpdateResult => {
  const guild = store.guilds.get(role.guild_id);
  if (!guild) return none();
  const displaced = guild.roles.get(role.id);
  guild.roles.set(role.id, role);
  return {
    preImage: displaced ? { kind: "role", role: displaced } : undefined,
    milestones: [],
  };
};

const applyRoleDelete = (
  store: CacheStore,
  guildId: Snowflake,
  roleId: Snowflake
): CacheUpdateResult => {
  const guild = store.guilds.get(guildId);
  if (!guild) return none();
  const removed = guild.roles.get(roleId);
  guild.roles.delete(roleId);
  for (const member of guild.members.values()) {
    member.roles = member.roles.filter((id) => id !== roleId);
  }
  return {
    preImage: removed ? { kind: "role", role: removed } : undefined,
    milestones: [],
  };
};

/** Whether `message` is more recent than the channel's last known message */
const isNewer = (message: Message, lastMessageId: Snowflake | null | undefined) => {
  if (!lastMessageId) return true;
  const created = Date.parse(message.timestamp);
  if (Number.isNaN(created)) return BigInt(message.id) > BigInt(lastMessageId);
  return created >= snowflakeTimestamp(lastMessageId);
};

const applyMessageCreate = (store: CacheStore, message: Message): CacheUpdateResult => {
  const channel = store.findChannel(message.channel_id);
  if (channel && isNewer(message, channel.last_message_id)) {
    channel.last_message_id = message.id;
  }

  let evicted: Message | undefined;
  const capacity = store.settings.maxMessages;
  if (capacity > 0) {
    const buffer = store.messages.ensure(message.channel_id, () => []);
    while (buffer.length >= capacity) {
      const dropped = buffer.shift();
      evicted = evicted ?? dropped;
    }
    buffer.push(message);
  }

  store.users.set(message.author.id, message.author);
  return {
    preImage: evicted ? { kind: "message", message: evicted } : undefined,
    milestones: [],
  };
};

const applyMessageUpdateEvent = (
  store: CacheStore,
  update: MessageUpdate
): CacheUpdateResult => {
  const message = store.messages
    .get(update.channel_id)
    ?.find((cached) => cached.id === update.id);
  if (!message) return none();

  const old = clone(message);
  applyMessageUpdate(message, update);
  return {
    preImage: { kind: "message", message: old },
    current: { kind: "message", message: clone(message) },
    milestones: [],
  };
};

const applyMessageDelete = (
  store: CacheStore,
  channelId: Snowflake,
  messageId: Snowflake
): CacheUpdateResult => {
  const buffer = store.messages.get(channelId);
  const index = buffer?.findIndex((message) => message.id === messageId) ?? -1;
  if (!buffer || index < 0) return none();
  const [removed] = buffer.splice(index, 1);
  return {
    preImage: removed ? { kind: "message", message: removed } : undefined,
    milestones: [],
  };
};

const applyMessageDeleteBulk = (
  store: CacheStore,
  channelId: Snowflake,
  messageIds: Snowflake[]
): CacheUpdateResult => {
  const buffer = store.messages.get(channelId);
  if (!buffer) return none();
  const ids = new Set(messageIds);
  const removed = buffer.filter((message) => ids.has(message.id));
  store.messages.set(
    channelId,
    buffer.filter((message) => !ids.has(message.id))
  );
  return {
    preImage: removed.length ? { kind: "messages", messages: removed } : undefined,
    milestones: [],
  };
};

const applyPresenceUpdate = (
  store: CacheStore,
  presence: Presence
): CacheUpdateResult => {
  const userId = presence.user.id;
  const fullUser = toUser(presence.user);
  if (fullUser) store.users.set(userId, fullUser);

  let previous: Presence | undefined;
  if (presence.guild_id === undefined) {
    previous = store.presences.get(userId);
    if (presence.status === PresenceUpdateStatus.Offline) {
      store.presences.delete(userId);
    } else {
      store.presences.set(userId, presence);
    }
  } else {
    const guild = store.guilds.get(presence.guild_id);
    if (!guild) return none();
    previous = setGuildPresence(guild, presence);

    const user = store.users.get(userId);
    if (!guild.members.has(userId) && user) {
      guild.members.set(userId, {
        user,
        roles: [],
        joined_at: null,
        deaf: false,
        mute: false,
        guild_id: guild.id,
      });
    }
  }

  return {
    preImage: previous ? { kind: "presence", presence: previous } : undefined,
    milestones: [],
  };
};

const applyVoiceState = (store: CacheStore, state: VoiceState): CacheUpdateResult => {
  if (state.guild_id === undefined) return none();
  const guild = store.guilds.get(state.guild_id);
  if (!guild) return none();

  if (state.member) {
    guild.members.set(state.member.user.id, state.member);
    store.users.set(state.member.user.id, state.member.user);
  }
  const previous = guild.voice_states.get(state.user_id);
  if (state.channel_id === null) {
    guild.voice_states.delete(state.user_id);
  } else {
    guild.voice_states.set(state.user_id, state);
  }
  return {
    preImage: previous ? { kind: "voiceState", state: previous } : undefined,
    milestones: [],
  };
};

const applyUserUpdate = (store: CacheStore, user: User): CacheUpdateResult => {
  const previous = store.currentUser;
  store.currentUser = user;
  store.users.set(user.id, user);
  return {
    preImage: previous ? { kind: "user", user: previous } : undefined,
    milestones: [],
  };
};

/** Applies one decoded event to the store. The event must not be shared with callers. */
export const applyEvent = (
  store: CacheStore,
  event: GatewayEvent,
  shard: ShardInfo
): CacheUpdateResult => {
  switch (event.type) {
    case "Ready":
      return applyReady(store, event.ready, shard);
    case "Resumed":
      return { milestones: connectShard(store, shard) };
    case "GuildCreate":
      return applyGuildCreate(store, event.guild);
    case "GuildUpdate":
      return applyGuildUpdate(store, event.guild);
    case "GuildDelete":
      return applyGuildDelete(store, event.guild);
    case "ChannelCreate":
    case "ChannelUpdate":
      return upsertChannel(store, event.channel);
    case "ChannelDelete":
      return applyChannelDelete(store, event.channel);
    case "ChannelPinsUpdate":
      return applyChannelPinsUpdate(store, event.pins);
    case "ThreadCreate":
    case "ThreadUpdate":
      return upsertThread(store, event.thread);
    case "ThreadDelete":
      return applyThreadDelete(store, event.thread);
    case "GuildEmojisUpdate":
      return applyEmojisUpdate(store, event.guildId, event.emojis);
    case "GuildMemberAdd":
      return applyMemberAdd(store, event.member);
    case "GuildMemberUpdate":
      return applyMemberUpdate(store, event.update);
    case "GuildMemberRemove":
      return applyMemberRemove(store, event.guildId, event.user);
    case "GuildMembersChunk":
      return applyMembersChunk(store, event.chunk);
    case "GuildRoleCreate":
    case "GuildRoleUpdate":
      return upsertRole(store, event.role);
    case "GuildRoleDelete":
      return applyRoleDelete(store, event.guildId, event.roleId);
    case "MessageCreate":
      return applyMessageCreate(store, event.message);
    case "MessageUpdate":
      return applyMessageUpdateEvent(store, event.update);
    case "MessageDelete":
      return applyMessageDelete(store, event.channelId, event.messageId);
    case "MessageDeleteBulk":
      return applyMessageDeleteBulk(store, event.channelId, event.messageIds);
    case "PresenceUpdate":
      return applyPresenceUpdate(store, event.presence);
    case "VoiceStateUpdate":
      return applyVoiceState(store, event.state);
    case "UserUpdate":
      return applyUserUpdate(store, event.user);
    default:
      return none();
  }
};
