import os from "node:os";
import path from "node:path";
import type { RelayConfig } from "./schema";

export type BackoffSettings = {
  baseMs: number;
  capMs: number;
  /** Share of each delay that is randomized (0 disables jitter) */
  jitterRatio: number;
};

export type RateLimitSettings = {
  ratePerSecond: number;
  burst: number;
};

export type EffectiveRelaySettings = {
  paths: {
    baseDir: string;
    database: string;
  };
  server: {
    host: string;
    port: number;
    publicBaseUrl?: string;
    authToken?: string;
    maxBodyBytes: number;
  };
  reasoning: {
    baseUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    backoff: BackoffSettings;
    headers: Record<string, string>;
  };
  supervisor: {
    maxRetries: number;
    backoff: BackoffSettings;
    healthIntervalMs: number;
    shutdownGraceMs: number;
    timeouts: {
      connectMs: number;
      sendMs: number;
      disconnectMs: number;
      healthMs: number;
    };
  };
  inbound: {
    dedupCacheSize: number;
  };
  outbound: {
    routingWaitMs: number;
    rateLimits: {
      discord: RateLimitSettings;
      telegram: RateLimitSettings;
    };
  };
  registry: {
    pollIntervalMs: number;
  };
};

export const DEFAULT_SUPERVISOR_SETTINGS: EffectiveRelaySettings["supervisor"] = {
  maxRetries: 5,
  backoff: { baseMs: 1_000, capMs: 60_000, jitterRatio: 0.2 },
  healthIntervalMs: 30_000,
  shutdownGraceMs: 10_000,
  timeouts: {
    connectMs: 20_000,
    sendMs: 10_000,
    disconnectMs: 5_000,
    healthMs: 5_000,
  },
};

// Discord allows 50 requests/s per bot; Telegram about 30 messages/s per bot.
export const DEFAULT_RATE_LIMITS: EffectiveRelaySettings["outbound"]["rateLimits"] = {
  discord: { ratePerSecond: 50, burst: 50 },
  telegram: { ratePerSecond: 30, burst: 30 },
};

function resolveRateLimit(
  raw: { ratePerSecond: number; burst?: number } | undefined,
  fallback: RateLimitSettings,
): RateLimitSettings {
  if (!raw) {
    return fallback;
  }
  return {
    ratePerSecond: raw.ratePerSecond,
    burst: raw.burst ?? Math.max(1, Math.floor(raw.ratePerSecond)),
  };
}

export function resolveRelaySettings(config: RelayConfig): EffectiveRelaySettings {
  const baseDir = config.paths?.baseDir ?? path.join(os.homedir(), ".tenant-relay");
  const supervisor = config.supervisor;
  const reasoning = config.reasoning;

  return {
    paths: {
      baseDir,
      database: config.paths?.database ?? path.join(baseDir, "tenant-relay.db"),
    },
    server: {
      host: config.server?.host ?? "127.0.0.1",
      port: config.server?.port ?? 8787,
      publicBaseUrl: config.server?.publicBaseUrl?.replace(/\/+$/, ""),
      authToken: config.server?.authToken,
      maxBodyBytes: config.server?.maxBodyBytes ?? 1_048_576,
    },
    reasoning: {
      baseUrl: reasoning.baseUrl.replace(/\/+$/, ""),
      timeoutMs: reasoning.timeoutMs ?? 30_000,
      maxAttempts: reasoning.maxAttempts ?? 4,
      backoff: {
        baseMs: reasoning.backoff?.baseMs ?? 500,
        capMs: reasoning.backoff?.capMs ?? 10_000,
        jitterRatio: reasoning.backoff?.jitterRatio ?? 0.2,
      },
      headers: reasoning.headers ?? {},
    },
    supervisor: {
      maxRetries: supervisor?.maxRetries ?? DEFAULT_SUPERVISOR_SETTINGS.maxRetries,
      backoff: {
        baseMs: supervisor?.backoff?.baseMs ?? DEFAULT_SUPERVISOR_SETTINGS.backoff.baseMs,
        capMs: supervisor?.backoff?.capMs ?? DEFAULT_SUPERVISOR_SETTINGS.backoff.capMs,
        jitterRatio:
          supervisor?.backoff?.jitterRatio ?? DEFAULT_SUPERVISOR_SETTINGS.backoff.jitterRatio,
      },
      healthIntervalMs: supervisor?.healthIntervalMs ?? DEFAULT_SUPERVISOR_SETTINGS.healthIntervalMs,
      shutdownGraceMs: supervisor?.shutdownGraceMs ?? DEFAULT_SUPERVISOR_SETTINGS.shutdownGraceMs,
      timeouts: {
        ...DEFAULT_SUPERVISOR_SETTINGS.timeouts,
        ...supervisor?.timeouts,
      },
    },
    inbound: {
      dedupCacheSize: config.inbound?.dedupCacheSize ?? 1_000,
    },
    outbound: {
      routingWaitMs: config.outbound?.routingWaitMs ?? 5_000,
      rateLimits: {
        discord: resolveRateLimit(config.outbound?.rateLimits?.discord, DEFAULT_RATE_LIMITS.discord),
        telegram: resolveRateLimit(
          config.outbound?.rateLimits?.telegram,
          DEFAULT_RATE_LIMITS.telegram,
        ),
      },
    },
    registry: {
      pollIntervalMs: config.registry?.pollIntervalMs ?? 5_000,
    },
  };
}
