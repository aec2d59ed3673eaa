import { describe, expect, it } from "vitest";
import { PLATFORM_TEXT_LIMITS, chunkForPlatform, chunkText } from "./text-chunk";

describe("chunkText", () => {
  it("returns nothing for empty text", () => {
    expect(chunkText("", 100)).toEqual([]);
  });

  it("keeps text at the limit whole", () => {
    const text = "a".repeat(100);
    expect(chunkText(text, 100)).toEqual([text]);
  });

  it("hard-cuts text without break points", () => {
    const chunks = chunkText("a".repeat(250), 100);
    expect(chunks.map((chunk) => chunk.length)).toEqual([100, 100, 50]);
  });

  it("keeps astral characters whole at a hard cut", () => {
    expect(chunkText("😀😀😀", 5)).toEqual(["😀😀", "😀"]);
  });

  it("prefers line breaks", () => {
    const line1 = "a".repeat(80);
    const line2 = "b".repeat(80);
    expect(chunkText(`${line1}\n${line2}`, 100)).toEqual([line1, line2]);
  });

  it("prefers sentence endings over spaces", () => {
    const first = `${"x".repeat(40)}. `;
    const text = `${first}${"word ".repeat(20)}`;
    const chunks = chunkText(text, 60);
    expect(chunks[0]).toBe(`${"x".repeat(40)}.`);
  });

  it("breaks on spaces and never exceeds the limit", () => {
    const chunks = chunkText("word ".repeat(25).trim(), 50);
    expect(chunks.length).toBe(3);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(50);
    }
  });
});

describe("chunkForPlatform", () => {
  it("uses the platform limit", () => {
    expect(PLATFORM_TEXT_LIMITS).toEqual({ discord: 2000, telegram: 4096 });
    expect(chunkForPlatform("discord", "a".repeat(4001)).map((chunk) => chunk.length)).toEqual([
      2000, 2000, 1,
    ]);
    expect(chunkForPlatform("telegram", "a".repeat(4001))).toHaveLength(1);
  });

  it("splits a long emoji run between code points", () => {
    const chunks = chunkForPlatform("discord", `a${"😀".repeat(1500)}`);

    expect(chunks).toEqual([`a${"😀".repeat(999)}`, "😀".repeat(501)]);
    expect(chunks.map((chunk) => chunk.length)).toEqual([1_999, 1_002]);
  });
});
