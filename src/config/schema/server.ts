import { z } from "zod";

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().nonnegative().max(65535).optional(),
    // Externally reachable origin used to build Telegram webhook URLs.
    publicBaseUrl: z.string().url().optional(),
    authToken: z.string().min(1).optional(),
    maxBodyBytes: z.number().int().positive().optional(),
  })
  .strict();
