import { ValidationError } from "../src/utils/errors";
import { v } from "../src/utils/validator";

describe("object validator", () => {
  const schema = v.object({
    id: v.string().isNotEmpty(),
    count: v.number().integer().min(0),
    tags: v.array().of(v.string()).optional(),
    parent: v.string().nullable().optional(),
  });

  test("accepts a payload with only the required fields", () => {
    expect(() => schema.parse({ id: "a", count: 0 })).not.toThrow();
  });

  test("passes unlisted keys through", () => {
    const parsed = schema.parse({ id: "a", count: 1, extra: { nested: true } });
    expect(parsed).toEqual({ id: "a", count: 1, extra: { nested: true } });
  });

  test("rejects a missing required field", () => {
    expect(() => schema.parse({ count: 1 })).toThrow("id: `undefined` is not a string");
  });

  test("accepts null only where the field is nullable", () => {
    expect(() => schema.parse({ id: "a", count: 1, parent: null })).not.toThrow();
    expect(() => schema.parse({ id: "a", count: null })).toThrow(ValidationError);
  });

  test("names the path of a nested failure", () => {
    const nested = v.object({ guild: v.object({ roles: v.array().of(v.object({ id: v.string() })) }) });
    try {
      nested.parse({ guild: { roles: [{ id: "1" }, { id: 2 }] } });
      throw new Error("expected a validation error");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toHaveProperty("path", ["guild", "roles", "[1]", "id"]);
      expect(err).toHaveProperty("message", "guild.roles.[1].id: `2` is not a string");
    }
  });

  test("rejects arrays and null in place of objects", () => {
    expect(() => schema.parse([])).toThrow("`array` is not a object");
    expect(() => schema.parse(null)).toThrow("`null` is not a object");
  });
});

describe("string validator", () => {
  test("rejects non-strings", () => {
    expect(() => v.string().parse(1)).toThrow("`1` is not a string");
  });

  test("rejects empty strings when required", () => {
    expect(() => v.string().isNotEmpty().parse("")).toThrow();
    expect(() => v.string().isNotEmpty().parse("token")).not.toThrow();
  });

  test("accepts http and websocket urls", () => {
    const url = v.string().url();
    expect(() => url.parse("https://discord.com/api")).not.toThrow();
    expect(() => url.parse("wss://gateway.test")).not.toThrow();
    expect(() => url.parse("not a url")).toThrow();
  });

  test("numeric only accepts decimal digits", () => {
    const numeric = v.string().numeric();
    expect(() => numeric.parse("513")).not.toThrow();
    expect(() => numeric.parse("-1")).toThrow();
    expect(() => numeric.parse("0x10")).toThrow();
  });

  test("applies length limits", () => {
    expect(() => v.string().minLength(5).parse("shor")).toThrow();
    expect(() => v.string().maxLength(5).parse("short")).not.toThrow();
  });

  test("runs custom checks", () => {
    const schema = v.string().custom((value) => value.startsWith("Bot "), "is not a bot token");
    expect(() => schema.parse("Bot test-secret")).not.toThrow();
    expect(() => schema.parse("test-secret")).toThrow("`test-secret` is not a bot token");
  });
});

describe("number validator", () => {
  test("rejects NaN", () => {
    expect(() => v.number().parse(Number.NaN)).toThrow();
  });

  test("applies bounds and integer checks", () => {
    const schema = v.number().integer().min(50).max(250);
    expect(() => schema.parse(50)).not.toThrow();
    expect(() => schema.parse(250)).not.toThrow();
    expect(() => schema.parse(49)).toThrow("`49` must be at least 50");
    expect(() => schema.parse(251)).toThrow("`251` must be at most 250");
    expect(() => schema.parse(60.5)).toThrow("`60.5` must be an integer");
  });
});

describe("enum validator", () => {
  const schema = v.enum(["none", "zlib-stream"] as const);

  test("accepts listed values only", () => {
    expect(schema.parse("zlib-stream")).toBe("zlib-stream");
    expect(() => schema.parse("zstd")).toThrow("`zstd` must be one of none, zlib-stream");
  });
});

describe("array validator", () => {
  test("validates each element", () => {
    const schema = v.array().of(v.number());
    expect(() => schema.parse([1, 2, 3])).not.toThrow();
    expect(() => schema.parse([1, "2"])).toThrow("[1]: `2` is not a number");
  });

  test("applies length checks after choosing an element type", () => {
    const schema = v.array().notEmpty().of(v.string());
    expect(() => schema.parse([])).toThrow("Array must not be empty");
    expect(() => v.array().minLength(2).maxLength(3).parse([1, 2, 3, 4])).toThrow(
      "Array must have at most 3 elements"
    );
  });
});

describe("safeParse", () => {
  test("returns undefined instead of throwing", () => {
    expect(v.boolean().safeParse("yes")).toBeUndefined();
    expect(v.boolean().safeParse(false)).toBe(false);
  });
});
