import { GatewayIntentBits, PresenceUpdateStatus } from "discord-api-types/v10";
import { resolveConfig } from "../src/config";
import { ValidationError } from "../src/utils/errors";

describe("resolveConfig", () => {
  test("applies defaults", () => {
    const config = resolveConfig({ token: "test-secret", intents: 1 });

    expect(config).toMatchObject({
      token: "test-secret",
      intents: 1,
      maxMessages: 0,
      largeThreshold: 50,
      compression: "none",
      maxReconnectAttempts: 10,
      mailboxCapacity: 1_024,
      initialPresence: {
        activities: [],
        status: PresenceUpdateStatus.Online,
        afk: false,
        since: null,
      },
    });
    expect(config.totalShards).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  test("folds a list of intents", () => {
    const config = resolveConfig({
      token: "test-secret",
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.MessageContent],
    });
    expect(config.intents).toBe(1 + 32_768);
  });

  test.each([
    ["token", { token: "" }],
    ["totalShards", { totalShards: 0 }],
    ["largeThreshold", { largeThreshold: 251 }],
    ["maxMessages", { maxMessages: -1 }],
    ["mailboxCapacity", { mailboxCapacity: 0 }],
  ])("rejects an invalid %s", (name, overrides) => {
    try {
      resolveConfig({ token: "test-secret", intents: 1, ...overrides });
      throw new Error("expected a validation error");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toHaveProperty("path", [name]);
    }
  });
});
