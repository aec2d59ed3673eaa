import { describe, expect, it } from "vitest";
import { RecentIdCache } from "./dedup-cache";

describe("RecentIdCache", () => {
  it("reports repeats and evicts the oldest id past capacity", () => {
    const cache = new RecentIdCache(2);

    expect(cache.remember("a")).toBe(true);
    expect(cache.remember("a")).toBe(false);
    expect(cache.remember("b")).toBe(true);
    expect(cache.remember("c")).toBe(true);

    expect(cache.size).toBe(2);
    expect(cache.has("a")).toBe(false);
    expect(cache.remember("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
  });
});
