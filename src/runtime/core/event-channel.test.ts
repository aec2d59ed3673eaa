import { describe, expect, it } from "vitest";
import { EventChannel } from "./event-channel";

describe("EventChannel", () => {
  it("delivers buffered items then ends after close", async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    const seen: number[] = [];
    for await (const item of channel) {
      seen.push(item);
    }
    expect(seen).toEqual([1, 2]);
    expect(channel.push(3)).toBe(false);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new EventChannel<string>();
    const next = channel.next();
    channel.push("hello");
    await expect(next).resolves.toEqual({ value: "hello", done: false });
  });

  it("ends pending reads on close", async () => {
    const channel = new EventChannel<string>();
    const next = channel.next();
    channel.close();
    await expect(next).resolves.toEqual({ value: undefined, done: true });
  });

  it("rejects pushes beyond capacity", () => {
    const channel = new EventChannel<number>(1);
    expect(channel.push(1)).toBe(true);
    expect(channel.push(2)).toBe(false);
    expect(channel.size).toBe(1);
  });
});
