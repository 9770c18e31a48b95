import { ActivityType, PresenceUpdateStatus } from "discord-api-types/v10";
import { Infer, v } from "../utils/validator";
import { snowflake } from "./snowflake";
import { partialUserSchema } from "./user";

export const activitySchema = v.object({
  name: v.string(),
  type: v.number(),
  url: v.string().nullable().optional(),
  state: v.string().nullable().optional(),
  details: v.string().nullable().optional(),
  created_at: v.number().optional(),
});

export const presenceSchema = v.object({
  user: partialUserSchema,
  guild_id: snowflake().optional(),
  status: v.string(),
  activities: v.array().of(activitySchema).optional(),
  client_status: v.unknown().optional(),
});

export type Presence = Infer<typeof presenceSchema>;

export type ActivityData = {
  name: string;
  type: ActivityType;
  url?: string;
  state?: string;
};

/** Presence sent by this client with Identify and op 3 */
export type PresenceData = {
  activities: ActivityData[];
  status: PresenceUpdateStatus;
  afk: boolean;
  since: number | null;
};

export const activity = {
  playing: (name: string): ActivityData => ({ name, type: ActivityType.Playing }),
  streaming: (name: string, url: string): ActivityData => ({
    name,
    type: ActivityType.Streaming,
    url,
  }),
  listening: (name: string): ActivityData => ({
    name,
    type: ActivityType.Listening,
  }),
  watching: (name: string): ActivityData => ({ name, type: ActivityType.Watching }),
  competing: (name: string): ActivityData => ({
    name,
    type: ActivityType.Competing,
  }),
  custom: (state: string): ActivityData => ({
    name: "Custom Status",
    type: ActivityType.Custom,
    state,
  }),
};

export const createPresence = (
  status: PresenceUpdateStatus = PresenceUpdateStatus.Online,
  current?: ActivityData | null
): PresenceData => ({
  activities: current ? [current] : [],
  status,
  afk: false,
  since: null,
});
