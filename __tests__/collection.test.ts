import { Collection } from "../src/utils/collection";

describe("Collection", () => {
  const create = () =>
    new Collection<string, number>([
      ["a", 1],
      ["b", 2],
      ["c", 3],
    ]);

  test("lists keys and values in insertion order", () => {
    const collection = create();
    expect(collection.keysArray).toEqual(["a", "b", "c"]);
    expect(collection.valuesArray).toEqual([1, 2, 3]);
  });

  test("finds, filters and maps entries", () => {
    const collection = create();
    expect(collection.find((value) => value > 1)).toBe(2);
    expect(collection.find((value) => value > 5)).toBeUndefined();
    expect(collection.filter((value, key) => key !== "b")).toEqual([1, 3]);
    expect(collection.map((value, key) => `${key}${value}`)).toEqual(["a1", "b2", "c3"]);
  });

  test("ensure only creates missing values", () => {
    const collection = create();
    const factory = jest.fn(() => 10);

    expect(collection.ensure("a", factory)).toBe(1);
    expect(factory).not.toHaveBeenCalled();
    expect(collection.ensure("d", factory)).toBe(10);
    expect(collection.get("d")).toBe(10);
  });

  test("sweep removes and returns matching values", () => {
    const collection = create();
    expect(collection.sweep((value) => value % 2 === 1)).toEqual([1, 3]);
    expect(collection.keysArray).toEqual(["b"]);
  });
});
