import { Logger } from "../src/utils/logger";

describe("Logger", () => {
  beforeEach(() => {
    process.env.DISABLE_LOGGING = "false";
  });

  afterEach(() => {
    process.env.DISABLE_LOGGING = "true";
    jest.restoreAllMocks();
  });

  test("scoped loggers follow the level of their parent", () => {
    const root = new Logger();
    root.setLevel("warn");
    const scoped = root.scope("Shard 0");
    expect(scoped.isEnabled("info")).toBe(false);

    root.setLevel("debug");
    expect(scoped.isEnabled("debug")).toBe(true);

    scoped.setLevel("error");
    expect(scoped.isEnabled("warn")).toBe(false);
    expect(root.isEnabled("warn")).toBe(true);
  });

  test("tags every line with the scope", () => {
    const print = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const root = new Logger();
    root.setLevel("info");

    root.scope("Gateway").scope("Shard 1").info("connected", { id: 1 });

    expect(print).toHaveBeenCalledWith(
      expect.stringContaining("\x1b[38;5;146mGateway > Shard 1\x1b[0m"),
      'connected {\n  "id": 1\n}'
    );
  });

  test("prints errors with their stack", () => {
    const print = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const error = new Error("boom");
    new Logger().error("Failed:", error);

    expect(print).toHaveBeenCalledWith(expect.any(String), `Failed: ${error.stack}`);
  });

  test("skips lines below the level", () => {
    const print = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const log = new Logger();
    log.setLevel("warn");

    log.info("hidden");
    log.debug("hidden");

    expect(print).not.toHaveBeenCalled();
  });

  test("prints nothing while logging is disabled", () => {
    process.env.DISABLE_LOGGING = "true";
    const print = jest.spyOn(console, "log").mockImplementation(() => undefined);

    new Logger().error("hidden");

    expect(print).not.toHaveBeenCalled();
  });
});
