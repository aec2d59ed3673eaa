import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TokenBucket } from "./token-bucket";

describe("TokenBucket", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function recordGrants(bucket: TokenBucket, count: number): number[] {
    const start = Date.now();
    const grants: number[] = [];
    for (let i = 0; i < count; i++) {
      void bucket.acquire().then(() => {
        grants.push(Date.now() - start);
      });
    }
    return grants;
  }

  function maxInAnySecond(grants: number[]): number {
    return Math.max(...grants.map((t) => grants.filter((g) => g >= t && g < t + 1_000).length));
  }

  it("never grants more than the rate in any one-second window", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 5, burst: 5 });
    const grants = recordGrants(bucket, 20);

    await vi.advanceTimersByTimeAsync(2_999);
    expect(grants).toHaveLength(15);

    await vi.advanceTimersByTimeAsync(1);
    expect(grants).toEqual([
      0, 0, 0, 0, 0, 1_000, 1_000, 1_000, 1_000, 1_000, 2_000, 2_000, 2_000, 2_000, 2_000, 3_000,
      3_000, 3_000, 3_000, 3_000,
    ]);
    expect(maxInAnySecond(grants)).toBe(5);
    expect(bucket.queued).toBe(0);
  });

  it("caps a fractional rate at its whole part per second", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 2.5, burst: 2 });
    const grants = recordGrants(bucket, 4);

    await vi.advanceTimersByTimeAsync(1_000);

    expect(grants).toEqual([0, 0, 1_000, 1_000]);
    expect(maxInAnySecond(grants)).toBe(2);
  });

  it("serves waiters in arrival order", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 10, burst: 1 });
    const order: string[] = [];
    await bucket.acquire();

    void bucket.acquire().then(() => order.push("first"));
    void bucket.acquire().then(() => order.push("second"));
    expect(bucket.tryTake()).toBe(false);

    await vi.advanceTimersByTimeAsync(200);
    expect(order).toEqual(["first", "second"]);
  });

  it("holds every token while paused", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 5, burst: 5 });
    bucket.pause(1_000);
    let granted = false;
    void bucket.acquire().then(() => {
      granted = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(granted).toBe(true);
  });

  it("drops an aborted waiter without consuming a token", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 1, burst: 1 });
    await bucket.acquire();
    const controller = new AbortController();
    const waiting = bucket.acquire(controller.signal);

    controller.abort(new Error("caller gave up"));

    await expect(waiting).rejects.toThrow("caller gave up");
    expect(bucket.queued).toBe(0);
  });

  it("rejects queued and future acquires once closed", async () => {
    const bucket = new TokenBucket({ ratePerSecond: 1, burst: 1 });
    await bucket.acquire();
    const waiting = bucket.acquire();

    bucket.close(new Error("connection stopped"));

    await expect(waiting).rejects.toThrow("connection stopped");
    await expect(bucket.acquire()).rejects.toThrow("connection stopped");
  });

  it("rejects a non-positive rate", () => {
    expect(() => new TokenBucket({ ratePerSecond: 0, burst: 1 })).toThrow(RangeError);
  });
});
