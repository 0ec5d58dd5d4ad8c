import { describe, test, expect } from "vitest";
import { ChannelStore } from "../channel-store";
import { ConfigurationError } from "../errors";

function filled(capacity: number, timestamps: number[]) {
  const store = new ChannelStore<string>(capacity);
  timestamps.forEach((timestamp) => store.insert(`v${timestamp}`, timestamp));
  return store;
}

describe("ChannelStore", () => {
  test("rejects a capacity that is not a positive integer", () => {
    expect(() => new ChannelStore(0)).toThrow(ConfigurationError);
    expect(() => new ChannelStore(-3)).toThrow(ConfigurationError);
    expect(() => new ChannelStore(2.5)).toThrow(ConfigurationError);
  });

  test("starts empty", () => {
    const store = new ChannelStore<number>(3);
    expect(store.isEmpty).toBe(true);
    expect(store.size).toBe(0);
    expect(store.front()).toBeUndefined();
    expect(store.back()).toBeUndefined();
    expect(store.nearest(5)).toBeUndefined();
  });

  test("keeps insertion order until full", () => {
    const store = filled(3, [1, 2]);
    expect(store.size).toBe(2);
    expect(store.front()).toEqual({ value: "v1", timestamp: 1 });
    expect(store.back()).toEqual({ value: "v2", timestamp: 2 });
  });

  test("evicts the oldest entry when full", () => {
    const store = filled(3, [1, 2, 3]);
    const evicted = store.insert("v4", 4);

    expect(evicted).toEqual({ value: "v1", timestamp: 1 });
    expect(store.size).toBe(3);
    expect(store.isFull).toBe(true);
    expect([...store.entries()].map((entry) => entry.timestamp)).toEqual([
      2, 3, 4,
    ]);
  });

  test("evicts by insertion order, not by timestamp", () => {
    const store = filled(2, [50, 10]);
    store.insert("v30", 30);

    expect([...store.entries()].map((entry) => entry.timestamp)).toEqual([
      10, 30,
    ]);
  });

  test("wraps around repeatedly", () => {
    const store = filled(2, [1, 2, 3, 4, 5, 6, 7]);
    expect(store.front()?.timestamp).toBe(6);
    expect(store.back()?.timestamp).toBe(7);
    expect(store.at(0)?.timestamp).toBe(6);
    expect(store.at(1)?.timestamp).toBe(7);
    expect(store.at(2)).toBeUndefined();
    expect(store.at(-1)).toBeUndefined();
  });

  describe("nearest", () => {
    test("finds the entry with the smallest absolute distance", () => {
      const store = filled(5, [10, 50, 90]);
      expect(store.nearest(52)?.timestamp).toBe(50);
      expect(store.nearest(89)?.timestamp).toBe(90);
      expect(store.nearest(-100)?.timestamp).toBe(10);
    });

    test("tolerates out-of-order timestamps", () => {
      const store = filled(5, [90, 10, 50]);
      expect(store.nearest(48)?.timestamp).toBe(50);
      expect(store.nearest(80)?.timestamp).toBe(90);
    });

    test("prefers the older entry on a tie", () => {
      const store = filled(5, [60, 40]);
      expect(store.nearest(50)?.value).toBe("v60");
    });
  });

  test("clear releases every entry", () => {
    const store = filled(3, [1, 2, 3]);
    store.clear();

    expect(store.isEmpty).toBe(true);
    expect([...store.entries()]).toEqual([]);

    store.insert("v9", 9);
    expect(store.front()).toEqual({ value: "v9", timestamp: 9 });
  });
});
