import { Cache } from "../src/cache/cache";
import { Collector } from "../src/collector/collector";
import { DiagnosticsEventsMap } from "../src/diagnostics";
import { Dispatcher } from "../src/dispatch/dispatcher";
import { EventHandler } from "../src/dispatch/handler";
import { decodeEvent } from "../src/events/decoder";
import { ShardStage } from "../src/gateway/protocol";
import { createContext } from "./helpers/context";
import {
  channelPayload,
  guildPayload,
  messagePayload,
  readyPayload,
  rolePayload,
} from "./helpers/fixtures";

const shard = { id: 0, total: 1 };

describe("Dispatcher", () => {
  test("runs the raw handler, collectors and milestones before the event", async () => {
    const calls: string[] = [];
    const cache = new Cache();
    const { ctx, diagnostics, collectors, messenger } = createContext({ cache });
    const handler: EventHandler = {
      Ready: () => {
        calls.push("Ready");
      },
      ShardsReady: (_ctx, event) => {
        calls.push(`ShardsReady:${event.totalShards}`);
      },
      CacheReady: (_ctx, event) => {
        calls.push(`CacheReady:${event.guilds.length}`);
      },
    };
    const dispatcher = new Dispatcher({
      handler,
      rawHandler: (_ctx, raw) => {
        calls.push(`raw:${raw.name}`);
      },
      diagnostics,
    });
    messenger.addCollector(
      new Collector({
        filter: (event) => {
          calls.push(`collector:${event.type}`);
          return undefined;
        },
      })
    );

    const data = readyPayload("sess");
    const event = decodeEvent("READY", data);
    dispatcher.spawn({
      ctx,
      event,
      result: cache.update(event, shard),
      ordinal: collectors.stamp(),
      collectors,
      raw: { name: "READY", sequence: 1, data },
    });
    await dispatcher.settled();

    expect(calls).toEqual([
      "raw:READY",
      "collector:Ready",
      "ShardsReady:1",
      "CacheReady:0",
      "Ready",
    ]);
    collectors.clear();
  });

  test("hands pre-images to the handler", async () => {
    const cache = new Cache({ maxMessages: 1 });
    const { ctx, diagnostics, collectors } = createContext({ cache });
    const evicted: (string | undefined)[] = [];
    const dispatcher = new Dispatcher({
      handler: {
        MessageCreate: (_ctx, event) => {
          evicted.push(event.evicted?.id);
        },
      },
      diagnostics,
    });

    for (const id of ["1", "2"]) {
      const event = decodeEvent("MESSAGE_CREATE", messagePayload(id, "20"));
      dispatcher.spawn({
        ctx,
        event,
        result: cache.update(event, shard),
        ordinal: collectors.stamp(),
        collectors,
      });
    }
    await dispatcher.settled();

    expect(evicted).toEqual([undefined, "1"]);
  });

  test("hands displaced channels and roles to create handlers", async () => {
    const cache = new Cache();
    const { ctx, diagnostics, collectors } = createContext({ cache });
    cache.update(
      decodeEvent("GUILD_CREATE", guildPayload("111", { channels: [channelPayload("30")] })),
      shard
    );
    const displaced: (string | undefined)[] = [];
    const dispatcher = new Dispatcher({
      handler: {
        ChannelCreate: (_ctx, event) => {
          displaced.push(event.old?.name ?? undefined);
        },
        GuildRoleCreate: (_ctx, event) => {
          displaced.push(event.old?.name);
        },
      },
      diagnostics,
    });

    const events = [
      decodeEvent("CHANNEL_CREATE", channelPayload("30", "111", "renamed")),
      decodeEvent("CHANNEL_CREATE", channelPayload("31", "111")),
      decodeEvent("GUILD_ROLE_CREATE", { guild_id: "111", role: rolePayload("111", "everyone") }),
    ];
    for (const event of events) {
      dispatcher.spawn({
        ctx,
        event,
        result: cache.update(event, shard),
        ordinal: collectors.stamp(),
        collectors,
      });
    }
    await dispatcher.settled();

    expect(displaced).toEqual(["channel-30", undefined, "@everyone"]);
  });

  test("reports handler failures without stopping dispatch", async () => {
    const cache = new Cache();
    const { ctx, diagnostics, collectors } = createContext({ cache });
    const failures: DiagnosticsEventsMap["handlerError"][0][] = [];
    diagnostics.on("handlerError", (failure) => failures.push(failure));
    const seen: string[] = [];
    const dispatcher = new Dispatcher({
      handler: {
        MessageCreate: async (_ctx, event) => {
          if (event.message.id === "1") throw new Error("boom");
          seen.push(event.message.id);
        },
      },
      diagnostics,
    });

    for (const id of ["1", "2"]) {
      const event = decodeEvent("MESSAGE_CREATE", messagePayload(id, "20"));
      dispatcher.spawn({
        ctx,
        event,
        result: cache.update(event, shard),
        ordinal: collectors.stamp(),
        collectors,
      });
    }
    await dispatcher.settled();

    expect(seen).toEqual(["2"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ shardId: 0, eventType: "MessageCreate" });
    expect(failures[0]?.error.message).toBe("Handler for MessageCreate on shard 0 failed: boom");
  });

  test("settled waits for slow handlers", async () => {
    const { ctx, diagnostics } = createContext();
    const done: string[] = [];
    const dispatcher = new Dispatcher({
      handler: {
        ShardStageUpdate: async (_ctx, event) => {
          await new Promise<void>((resolve) => setImmediate(resolve));
          await new Promise<void>((resolve) => setImmediate(resolve));
          done.push(`${event.old}->${event.new}`);
        },
      },
      diagnostics,
    });

    dispatcher.spawnPseudo(ctx, {
      type: "ShardStageUpdate",
      shardId: 0,
      old: ShardStage.Identifying,
      new: ShardStage.Ready,
    });
    expect(dispatcher.pending).toBe(1);

    await dispatcher.settled();
    expect(done).toEqual(["Identifying->Ready"]);
    expect(dispatcher.pending).toBe(0);
  });

  test("does nothing without a handler", async () => {
    const { ctx, diagnostics, collectors } = createContext();
    const dispatcher = new Dispatcher({ diagnostics });
    const event = decodeEvent("RESUMED", {});

    dispatcher.spawn({ ctx, event, result: { milestones: [] }, ordinal: collectors.stamp(), collectors });
    await expect(dispatcher.settled()).resolves.toBeUndefined();
  });
});
