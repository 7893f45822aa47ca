/**
 * Tests for the Bounded Recency Cache
 */
import { describe, expect, it } from "vitest";
import { RecencyCache } from "./recencyCache";

/** Clock returning the given times in order, then repeating the last one */
function sequenceClock(...times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)] ?? 0;
}

describe("RecencyCache", () => {
  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new RecencyCache(0)).toThrow(RangeError);
    expect(() => new RecencyCache(2.5)).toThrow(RangeError);
  });

  it("does not evict other entries while below capacity", () => {
    const cache = new RecencyCache(10, [["/my/path/1", 0]], sequenceClock(50));

    cache.registerAccess("/my/path/2");

    expect(cache.size).toBe(2);
    expect(cache.accessTimeOf("/my/path/1")).toBe(0);
    expect(cache.accessTimeOf("/my/path/2")).toBe(50);
  });

  it("updates an existing entry without changing the count", () => {
    const cache = new RecencyCache(
      3,
      [
        ["/my/path/1", 1],
        ["/my/path/2", 2],
        ["/my/path/3", 3],
      ],
      sequenceClock(99)
    );

    cache.registerAccess("/my/path/1");

    expect(cache.size).toBe(3);
    expect(cache.accessTimeOf("/my/path/1")).toBe(99);
    expect(cache.has("/my/path/2")).toBe(true);
    expect(cache.has("/my/path/3")).toBe(true);
  });

  it("evicts the oldest entry when inserting into a full cache", () => {
    const initial: Array<[string, number]> = [];
    for (let i = 0; i < 10; i++) {
      initial.push([`/my/path/${i}`, i + 1]);
    }
    const cache = new RecencyCache(10, initial, sequenceClock(100));

    cache.registerAccess("/a/different/path");

    expect(cache.size).toBe(10);
    expect(cache.has("/my/path/0")).toBe(false);
    expect(cache.has("/my/path/1")).toBe(true);
    expect(cache.accessTimeOf("/a/different/path")).toBe(100);
  });

  it("keeps the most recent paths after capacity + 1 insertions", () => {
    const cache = new RecencyCache(2, [], sequenceClock(1, 2, 3));

    cache.registerAccess("/p/1");
    cache.registerAccess("/p/2");
    cache.registerAccess("/p/3");

    expect(cache.toJSON()).toEqual({ "/p/2": 2, "/p/3": 3 });
  });

  it("never exceeds capacity across mixed inserts and updates", () => {
    const cache = new RecencyCache(3, [], sequenceClock(1, 2, 3, 4, 5, 6, 7, 8));
    const paths = ["/a", "/b", "/a", "/c", "/d", "/b", "/e", "/a"];

    for (const path of paths) {
      cache.registerAccess(path);
      expect(cache.size).toBeLessThanOrEqual(3);
    }

    // /a@8, /e@7, /b@6 remain
    expect(cache.toJSON()).toEqual({ "/a": 8, "/b": 6, "/e": 7 });
  });

  it("breaks eviction ties by path order", () => {
    const cache = new RecencyCache(
      2,
      [
        ["/z", 5],
        ["/m", 5],
      ],
      sequenceClock(10)
    );

    cache.registerAccess("/new");

    expect(cache.has("/m")).toBe(false);
    expect(cache.has("/z")).toBe(true);
  });

  it("trims initial entries to capacity, dropping the oldest", () => {
    const cache = new RecencyCache(2, [
      ["/old", 1],
      ["/newer", 3],
      ["/mid", 2],
    ]);

    expect(cache.toJSON()).toEqual({ "/mid": 2, "/newer": 3 });
  });

  it("reports 0 for paths never recorded", () => {
    const cache = new RecencyCache(5);
    expect(cache.accessTimeOf("/never")).toBe(0);
  });

  describe("compareByRecency", () => {
    const cache = new RecencyCache(5, [
      ["/a", 100],
      ["/b", 200],
    ]);

    it("orders the more recent path first", () => {
      expect(cache.compareByRecency("/b", "/a")).toBeLessThan(0);
      expect(cache.compareByRecency("/a", "/b")).toBeGreaterThan(0);
    });

    it("orders unseen paths after known ones", () => {
      expect(["/c", "/a", "/b"].sort(cache.compareByRecency)).toEqual(["/b", "/a", "/c"]);
    });

    it("treats two unseen paths as equal", () => {
      expect(cache.compareByRecency("/x", "/y")).toBe(0);
    });
  });
});
