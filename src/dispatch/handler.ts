import { Cache } from "../cache/cache";
import { ShardMessenger } from "../gateway/shard-messenger";
import { RestClient } from "../rest/rest-client";
import { Awaitable } from "../utils/helpers";
import { FullEvent } from "./full-event";

/** What every handler receives alongside the event */
export type Context = {
  shardId: number;
  cache: Cache;
  rest: RestClient;
  messenger: ShardMessenger;
};

export type EventMap = { [E in FullEvent as E["type"]]: E };

/** One optional callback per event type, e.g. `{ MessageCreate: (ctx, event) => ... }` */
export type EventHandler = {
  [K in keyof EventMap]?: (ctx: Context, event: EventMap[K]) => Awaitable<void>;
};

/** A dispatch frame before decoding */
export type RawDispatch = {
  name: string;
  sequence: number;
  data: unknown;
};

export type RawEventHandler = (ctx: Context, dispatch: RawDispatch) => Awaitable<void>;

export const callHandler = <K extends keyof EventMap>(
  handler: EventHandler,
  type: K,
  ctx: Context,
  event: EventMap[K]
): Awaitable<void> => handler[type]?.(ctx, event);
