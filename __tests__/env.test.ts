import { configFromEnv, DEFAULT_INTENTS } from "../src/config";
import { envSchema, loadEnv } from "../src/utils/env";

describe("environment variable config validation", () => {
  test("requires a bot token", () => {
    expect(() => envSchema.parse({})).toThrow("BOT_TOKEN: `undefined` is not a string");
  });

  test("accepts a minimal environment", () => {
    expect(() => envSchema.parse({ BOT_TOKEN: "test-secret" })).not.toThrow();
  });

  test("rejects numbers that are not plain integers", () => {
    expect(() => envSchema.parse({ BOT_TOKEN: "test-secret", TOTAL_SHARDS: "two" })).toThrow(
      "TOTAL_SHARDS"
    );
  });

  test("rejects an unknown compression", () => {
    expect(() =>
      envSchema.parse({ BOT_TOKEN: "test-secret", GATEWAY_COMPRESSION: "zstd" })
    ).toThrow("GATEWAY_COMPRESSION");
  });

  test("loadEnv validates the given source", () => {
    expect(loadEnv({ BOT_TOKEN: "test-secret", LOG_LEVEL: "warn" })).toEqual({
      BOT_TOKEN: "test-secret",
      LOG_LEVEL: "warn",
    });
  });
});

describe("configFromEnv", () => {
  test("converts numeric variables", () => {
    const options = configFromEnv(
      {},
      {
        BOT_TOKEN: "test-secret",
        INTENTS: "513",
        TOTAL_SHARDS: "4",
        MAX_MESSAGES: "100",
        GATEWAY_COMPRESSION: "zlib-stream",
        AUDIT_LOG_CHANNEL: "123",
      }
    );

    expect(options).toMatchObject({
      token: "test-secret",
      intents: 513,
      totalShards: 4,
      maxMessages: 100,
      compression: "zlib-stream",
      auditLogChannelId: "123",
    });
    expect(options.largeThreshold).toBeUndefined();
  });

  test("falls back to the default intents", () => {
    expect(configFromEnv({}, { BOT_TOKEN: "test-secret" }).intents).toBe(DEFAULT_INTENTS);
  });

  test("lets overrides win", () => {
    const options = configFromEnv({ totalShards: 2 }, { BOT_TOKEN: "test-secret", TOTAL_SHARDS: "8" });
    expect(options.totalShards).toBe(2);
  });
});
