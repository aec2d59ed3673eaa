import {
  type AgentBotBinding,
  type BindingCredentials,
  type DesiredState,
  type Platform,
  isPlatform,
} from "../../runtime/types";
import { withStore } from "./store";

export interface BindingsPutOptions {
  config?: string;
  token?: string;
  credential?: string[];
  disabled?: boolean;
}

export function formatBinding(binding: AgentBotBinding): string {
  return [
    binding.platform.padEnd(9),
    binding.agentId.padEnd(24),
    binding.desiredState.padEnd(9),
    `v${binding.version}`,
  ].join(" ");
}

/** `--token` fills `botToken`; `--credential key=value` adds arbitrary fields. */
export function buildCredentials(options: BindingsPutOptions): BindingCredentials {
  const credentials: Record<string, string> = {};
  for (const pair of options.credential ?? []) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Credential must be key=value, got "${pair}"`);
    }
    credentials[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  if (options.token) {
    credentials.botToken = options.token;
  }
  if (Object.keys(credentials).length === 0) {
    throw new Error("Provide --token or at least one --credential key=value");
  }
  return credentials;
}

function requirePlatform(value: string): Platform {
  if (!isPlatform(value)) {
    throw new Error(`Unknown platform "${value}" (expected discord or telegram)`);
  }
  return value;
}

export async function bindingsPut(
  agentId: string,
  platformArg: string,
  options: BindingsPutOptions,
): Promise<AgentBotBinding> {
  const platform = requirePlatform(platformArg);
  const credentials = buildCredentials(options);
  const desiredState: DesiredState = options.disabled ? "disabled" : "enabled";
  const binding = await withStore(options.config, ({ registry }) =>
    registry.put({ agentId, platform, credentials, desiredState }),
  );
  console.log(`Stored ${formatBinding(binding)}`);
  return binding;
}

export async function bindingsRemove(
  agentId: string,
  platformArg: string,
  options: { config?: string },
): Promise<boolean> {
  const platform = requirePlatform(platformArg);
  const removed = await withStore(options.config, ({ registry }) =>
    registry.remove(agentId, platform),
  );
  if (!removed) {
    console.error(`No ${platform} binding for agent ${agentId}`);
    process.exitCode = 1;
    return false;
  }
  console.log(`Removed ${platform} binding for agent ${agentId} (v${removed.version})`);
  return true;
}

export async function bindingsList(options: { config?: string; json?: boolean }): Promise<void> {
  const list = await withStore(options.config, ({ registry }) => registry.list());
  if (options.json) {
    console.log(
      JSON.stringify(
        list.map((binding) => ({
          agentId: binding.agentId,
          platform: binding.platform,
          desiredState: binding.desiredState,
          version: binding.version,
        })),
        null,
        2,
      ),
    );
    return;
  }
  if (list.length === 0) {
    console.log("No bindings.");
    return;
  }
  for (const binding of list) {
    console.log(formatBinding(binding));
  }
}
