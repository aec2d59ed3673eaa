import { z } from "zod";
import { BackoffConfigSchema } from "./reasoning";

const TimeoutsSchema = z
  .object({
    connectMs: z.number().int().positive().optional(),
    sendMs: z.number().int().positive().optional(),
    disconnectMs: z.number().int().positive().optional(),
    healthMs: z.number().int().positive().optional(),
  })
  .strict();

export const SupervisorConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().optional(),
    backoff: BackoffConfigSchema.optional(),
    healthIntervalMs: z.number().int().positive().optional(),
    shutdownGraceMs: z.number().int().positive().optional(),
    timeouts: TimeoutsSchema.optional(),
  })
  .strict();

const RateLimitSchema = z
  .object({
    ratePerSecond: z.number().positive(),
    burst: z.number().int().positive().optional(),
  })
  .strict();

export const OutboundConfigSchema = z
  .object({
    routingWaitMs: z.number().int().nonnegative().optional(),
    rateLimits: z
      .object({
        discord: RateLimitSchema.optional(),
        telegram: RateLimitSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const InboundConfigSchema = z
  .object({
    dedupCacheSize: z.number().int().positive().optional(),
  })
  .strict();

export const RegistryConfigSchema = z
  .object({
    pollIntervalMs: z.number().int().positive().optional(),
  })
  .strict();
