import type { BackoffSettings } from "../../config/settings";

/**
 * Exponential delay for the given 1-based attempt, capped, with the
 * configured share of it randomized downwards.
 */
export function computeBackoffDelay(
  attempt: number,
  settings: BackoffSettings,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = Math.min(settings.capMs, settings.baseMs * 2 ** exponent);
  const jitter = Math.min(1, Math.max(0, settings.jitterRatio));
  return Math.round(raw * (1 - jitter + jitter * random()));
}
