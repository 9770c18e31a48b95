/** Map keyed by snowflake-like strings, with array helpers used across the cache */
export class Collection<K extends string, V> extends Map<K, V> {
  constructor(entries?: readonly (readonly [K, V])[] | null) {
    super(entries);
  }

  get keysArray(): K[] {
    return Array.from(this.keys());
  }

  get valuesArray(): V[] {
    return Array.from(this.values());
  }

  find(fn: (value: V, key: K) => boolean): V | undefined {
    for (const [key, value] of this) {
      if (fn(value, key)) return value;
    }
    return undefined;
  }

  filter(fn: (value: V, key: K) => boolean): V[] {
    const matched: V[] = [];
    for (const [key, value] of this) {
      if (fn(value, key)) matched.push(value);
    }
    return matched;
  }

  map<R>(fn: (value: V, key: K) => R): R[] {
    const mapped: R[] = [];
    for (const [key, value] of this) {
      mapped.push(fn(value, key));
    }
    return mapped;
  }

  /** Returns the value at `key`, inserting `create()` first when absent */
  ensure(key: K, create: () => V): V {
    const existing = this.get(key);
    if (existing !== undefined) return existing;
    const value = create();
    this.set(key, value);
    return value;
  }

  /** Deletes every entry matching `fn` and returns the removed values */
  sweep(fn: (value: V, key: K) => boolean): V[] {
    const removed: V[] = [];
    for (const [key, value] of this) {
      if (fn(value, key)) {
        this.delete(key);
        removed.push(value);
      }
    }
    return removed;
  }
}
