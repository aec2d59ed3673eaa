import { z } from "zod";

export const PlatformSchema = z.enum(["discord", "telegram"]);
export const DesiredStateSchema = z.enum(["enabled", "disabled"]);

export const CredentialsSchema = z.record(z.string(), z.string());

export const BindingSeedSchema = z
  .object({
    agentId: z.string().min(1),
    platform: PlatformSchema,
    credentials: CredentialsSchema,
    desiredState: DesiredStateSchema.optional(),
  })
  .strict();

export type BindingSeed = z.infer<typeof BindingSeedSchema>;
