import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { raceTimeout, sleep, withDeadline } from "./async";

describe("withDeadline", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the result when run finishes in time", async () => {
    await expect(
      withDeadline(1_000, async () => "ok", { timeoutError: () => new Error("late") }),
    ).resolves.toBe("ok");
  });

  it("rejects with the timeout error even if run ignores its signal", async () => {
    const pending = withDeadline(1_000, () => new Promise<string>(() => undefined), {
      timeoutError: () => new Error("late"),
    });
    const assertion = expect(pending).rejects.toThrow("late");
    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
  });

  it("aborts the inner signal when the parent aborts", async () => {
    const parent = new AbortController();
    let innerAborted = false;
    const pending = withDeadline(
      5_000,
      (signal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener("abort", () => {
            innerAborted = true;
            resolve();
          });
        }),
      { parent: parent.signal, timeoutError: () => new Error("late") },
    );
    parent.abort(new Error("stopped"));
    await expect(pending).rejects.toThrow("stopped");
    expect(innerAborted).toBe(true);
  });
});

describe("sleep", () => {
  it("rejects when its signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("raceTimeout", () => {
  it("reports a timeout", async () => {
    vi.useFakeTimers();
    const pending = raceTimeout(new Promise<void>(() => undefined), 100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toEqual({ timedOut: true });
    vi.useRealTimers();
  });

  it("passes the value through", async () => {
    await expect(raceTimeout(Promise.resolve(7), 100)).resolves.toEqual({
      timedOut: false,
      value: 7,
    });
  });
});
