import { describe, expect, it } from "vitest";
import { computeBackoffDelay } from "./backoff";

const settings = { baseMs: 1_000, capMs: 60_000, jitterRatio: 0.2 };

describe("computeBackoffDelay", () => {
  it("doubles per attempt without jitter", () => {
    const exact = { ...settings, jitterRatio: 0 };
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, exact))).toEqual([
      1_000, 2_000, 4_000, 8_000,
    ]);
  });

  it("caps the delay", () => {
    expect(computeBackoffDelay(10, { ...settings, jitterRatio: 0 })).toBe(60_000);
  });

  it("randomizes the configured share downwards", () => {
    expect(computeBackoffDelay(1, settings, () => 0)).toBe(800);
    expect(computeBackoffDelay(1, settings, () => 1)).toBe(1_000);
    expect(computeBackoffDelay(3, settings, () => 0.5)).toBe(3_600);
    expect(computeBackoffDelay(10, settings, () => 0.5)).toBe(54_000);
  });
});
