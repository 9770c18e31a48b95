import { GatewayOpcodes, PresenceUpdateStatus } from "discord-api-types/v10";
import { Cache } from "../src/cache/cache";
import { Diagnostics, DiagnosticsEventsMap } from "../src/diagnostics";
import { Dispatcher } from "../src/dispatch/dispatcher";
import { SendResult } from "../src/gateway/shard-messenger";
import { ShardRunner, ShardRunnerOptions } from "../src/gateway/shard-runner";
import { createPresence } from "../src/model/presence";
import { RestClient } from "../src/rest/rest-client";
import { createTransports, FakeTransport, flush, useGatewayTimers } from "./helpers/fake-transport";
import { readyPayload } from "./helpers/fixtures";

const presenceUpdate = (status: PresenceUpdateStatus) => ({
  op: GatewayOpcodes.PresenceUpdate,
  d: { activities: [], status, afk: false, since: null },
});

const memberRequest = (guildId: string) => ({
  op: GatewayOpcodes.RequestGuildMembers,
  d: { guild_id: guildId, limit: 0, query: "" },
});

/** Guild ids "1000", "1001", ... */
const guildIds = (from: number, to: number) =>
  Array.from({ length: to - from }, (_, i) => String(1_000 + from + i));

describe("ShardRunner", () => {
  let transports: ReturnType<typeof createTransports>;
  let diagnostics: Diagnostics;
  let dropped: DiagnosticsEventsMap["dropped"][0][];
  let runner: ShardRunner;

  const createRunner = (overrides: Partial<ShardRunnerOptions> = {}) =>
    new ShardRunner({
      id: 0,
      total: 1,
      token: "test-secret",
      intents: 513,
      largeThreshold: 50,
      gatewayUrl: "wss://gateway.test",
      compression: "none",
      presence: createPresence(),
      maxReconnectAttempts: 5,
      mailboxCapacity: 200,
      identifyGate: async () => undefined,
      transportFactory: transports.factory,
      random: () => 0.5,
      cache: new Cache(),
      rest: new RestClient("test-secret"),
      dispatcher: new Dispatcher({ diagnostics }),
      diagnostics,
      ...overrides,
    });

  const startReady = async () => {
    runner.start();
    transports.latest().hello();
    await flush();
    transports.latest().dispatch("READY", 1, readyPayload("sess"));
    await flush();
  };

  /** Drops the connection and lets the shard resume on a new one */
  const resume = async (): Promise<FakeTransport> => {
    jest.advanceTimersByTime(1_500);
    const next = transports.latest();
    next.hello();
    await flush();
    expect(next.sentOp(GatewayOpcodes.Resume)).toHaveLength(1);
    next.dispatch("RESUMED", 2, {});
    await flush();
    return next;
  };

  beforeEach(() => {
    useGatewayTimers();
    transports = createTransports();
    diagnostics = new Diagnostics();
    dropped = [];
    diagnostics.on("dropped", (event) => dropped.push(event));
  });

  afterEach(async () => {
    await runner.shutdown();
    jest.useRealTimers();
  });

  test("drops commands that do not fit the mailbox while reconnecting", async () => {
    runner = createRunner({ mailboxCapacity: 4 });
    await startReady();
    transports.latest().serverClose(1_006);

    const statuses = [
      PresenceUpdateStatus.DoNotDisturb,
      PresenceUpdateStatus.Idle,
      PresenceUpdateStatus.Invisible,
      PresenceUpdateStatus.Online,
      PresenceUpdateStatus.DoNotDisturb,
      PresenceUpdateStatus.Idle,
    ];
    const results: Promise<SendResult>[] = [];
    for (const status of statuses) {
      results.push(runner.messenger.setStatus(status));
      await Promise.resolve();
    }

    await expect(Promise.all(results.slice(4))).resolves.toEqual(["dropped", "dropped"]);
    expect(dropped).toEqual([
      { shardId: 0, name: "SetStatus", reason: "overflow" },
      { shardId: 0, name: "SetStatus", reason: "overflow" },
    ]);

    const next = await resume();
    await expect(Promise.all(results.slice(0, 4))).resolves.toEqual([
      "sent",
      "sent",
      "sent",
      "sent",
    ]);
    expect(next.sentOp(GatewayOpcodes.PresenceUpdate)).toEqual(
      statuses.slice(0, 4).map(presenceUpdate)
    );

    // Sent commands give their slots back
    await expect(runner.messenger.setStatus(PresenceUpdateStatus.Online)).resolves.toBe("sent");
  });

  test("keeps commands in call order when a connection drops mid-send", async () => {
    runner = createRunner();
    await startReady();
    const first = transports.latest();

    const results = guildIds(0, 130).map((id) => runner.messenger.chunkGuild(id));
    await flush();

    // Identify used one of the 115 sends; the next command waits for the window to reset
    expect(first.sentOp(GatewayOpcodes.RequestGuildMembers)).toEqual(
      guildIds(0, 113).map(memberRequest)
    );

    first.serverClose(1_006);
    const next = await resume();

    expect(next.sentOp(GatewayOpcodes.RequestGuildMembers)).toEqual(
      guildIds(113, 130).map(memberRequest)
    );
    const settled = await Promise.all(results);
    expect(settled.every((result) => result === "sent")).toBe(true);
    expect(dropped).toEqual([]);
  });

  test("settles commands waiting on the rate limit when shutting down", async () => {
    runner = createRunner();
    await startReady();

    const settled: SendResult[] = [];
    const results = Array.from({ length: 130 }, () =>
      runner.messenger.setStatus(PresenceUpdateStatus.Online).then((result) => {
        settled.push(result);
        return result;
      })
    );
    await flush();
    expect(settled).toHaveLength(113);

    await runner.shutdown();

    const all = await Promise.all(results);
    expect(all.filter((result) => result === "sent")).toHaveLength(113);
    expect(all.filter((result) => result === "dropped")).toHaveLength(17);
    expect(dropped).toHaveLength(17);
    expect(dropped.every((event) => event.reason === "shutdown")).toBe(true);
    expect(transports.latest().sentOp(GatewayOpcodes.PresenceUpdate)).toHaveLength(113);
  });

  test("sends a close command while commands are still held", async () => {
    runner = createRunner();
    runner.start();
    const held = runner.messenger.setStatus(PresenceUpdateStatus.Idle);

    await expect(runner.messenger.shutdownClean(4_000, "Restarting")).resolves.toBe("sent");
    await expect(held).resolves.toBe("dropped");
    expect(transports.latest().closedWith).toEqual({ code: 4_000, reason: "Restarting" });
    expect(dropped).toEqual([{ shardId: 0, name: "SetStatus", reason: "shutdown" }]);
  });
});
