import { z } from "zod";
import { BindingSeedSchema } from "./bindings";
import { LoggingSchema } from "./logging";
import { PathsSchema } from "./paths";
import { ReasoningConfigSchema } from "./reasoning";
import { ServerConfigSchema } from "./server";
import {
  InboundConfigSchema,
  OutboundConfigSchema,
  RegistryConfigSchema,
  SupervisorConfigSchema,
} from "./supervisor";

export const RelayConfigSchema = z
  .object({
    $schema: z.string().optional(),
    paths: PathsSchema.optional(),
    logging: LoggingSchema.optional(),
    server: ServerConfigSchema.optional(),
    reasoning: ReasoningConfigSchema,
    supervisor: SupervisorConfigSchema.optional(),
    inbound: InboundConfigSchema.optional(),
    outbound: OutboundConfigSchema.optional(),
    registry: RegistryConfigSchema.optional(),
    // Seeded into an empty registry at startup
    bindings: z.array(BindingSeedSchema).optional(),
  })
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export {
  BindingSeedSchema,
  CredentialsSchema,
  DesiredStateSchema,
  PlatformSchema,
  type BindingSeed,
} from "./bindings";
