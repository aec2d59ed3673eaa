import { z } from "zod";

export const BackoffConfigSchema = z
  .object({
    baseMs: z.number().int().positive().optional(),
    capMs: z.number().int().positive().optional(),
    jitterRatio: z.number().min(0).max(1).optional(),
  })
  .strict();

export const ReasoningConfigSchema = z
  .object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive().optional(),
    maxAttempts: z.number().int().positive().max(20).optional(),
    backoff: BackoffConfigSchema.optional(),
    headers: z.record(z.string(), z.string()).optional(),
  })
  .strict();
