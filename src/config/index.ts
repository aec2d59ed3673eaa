export { loadConfig, parseConfigText, resolveConfigPath, type ConfigLoadResult } from "./loader";
export { RelayConfigSchema, type RelayConfig } from "./schema";
export {
  resolveRelaySettings,
  type BackoffSettings,
  type EffectiveRelaySettings,
  type RateLimitSettings,
} from "./settings";
export {
  BindingSeedSchema,
  CredentialsSchema,
  DesiredStateSchema,
  PlatformSchema,
  type BindingSeed,
} from "./schema";
