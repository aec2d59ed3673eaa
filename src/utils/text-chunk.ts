import type { Platform } from "../runtime/types";

/** Hard per-message text limits of each platform's send API. */
export const PLATFORM_TEXT_LIMITS: Record<Platform, number> = {
  discord: 2000,
  telegram: 4096,
};

const SENTENCE_ENDINGS = [". ", "! ", "? ", "。", "！", "？"];

/**
 * Splits text into pieces of at most `limit` characters, breaking at the
 * most natural boundary available in each window: paragraph, line,
 * sentence, word, then a hard cut.
 */
export function chunkText(text: string, limit: number): string[] {
  if (!text) {
    return [];
  }
  if (limit <= 0 || text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = findBreak(rest.slice(0, limit), limit);
    // Never split a surrogate pair across two messages.
    if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
      cut -= 1;
    }
    const head = rest.slice(0, cut).trimEnd();
    if (head) {
      chunks.push(head);
    }
    rest = rest.slice(cut).trimStart();
  }
  if (rest) {
    chunks.push(rest);
  }
  return chunks;
}

export function chunkForPlatform(platform: Platform, text: string): string[] {
  return chunkText(text, PLATFORM_TEXT_LIMITS[platform]);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function findBreak(window: string, limit: number): number {
  const paragraph = window.lastIndexOf("\n\n");
  if (paragraph > limit * 0.5) {
    return paragraph + 2;
  }

  const line = window.lastIndexOf("\n");
  if (line > limit * 0.3) {
    return line + 1;
  }

  const sentence = Math.max(
    ...SENTENCE_ENDINGS.map((ending) => {
      const index = window.lastIndexOf(ending);
      return index < 0 ? -1 : index + ending.length;
    }),
  );
  if (sentence > limit * 0.3) {
    return sentence;
  }

  const space = window.lastIndexOf(" ");
  if (space > limit * 0.3) {
    return space + 1;
  }

  return limit;
}
