import { type EffectiveRelaySettings, loadConfig, resolveRelaySettings } from "../../config";
import { SqliteTenantRegistry } from "../../runtime/registry/tenant-registry";
import { closeDb, initDb } from "../../storage/db";

export interface StoreContext {
  settings: EffectiveRelaySettings;
  registry: SqliteTenantRegistry;
}

/**
 * Opens the relay database named by the config, runs `fn` and closes it
 * again. A running server picks the writes up on its next registry poll.
 */
export async function withStore<T>(
  configPath: string | undefined,
  fn: (context: StoreContext) => T | Promise<T>,
): Promise<T> {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    throw new Error(`Invalid config ${result.path}: ${(result.errors ?? []).join("; ")}`);
  }
  const settings = resolveRelaySettings(result.config);
  initDb(settings.paths.database, 1);
  try {
    const registry = new SqliteTenantRegistry({ pollIntervalMs: settings.registry.pollIntervalMs });
    return await fn({ settings, registry });
  } finally {
    closeDb();
  }
}
