import type { EffectiveRelaySettings } from "../../config/settings";
import type { AgentBotBinding } from "../types";
import type { PlatformAdapter } from "./adapter";
import { DiscordAdapter } from "./discord/adapter";
import { TelegramAdapter } from "./telegram/adapter";

export type AdapterFactory = (binding: AgentBotBinding) => PlatformAdapter;

export function createAdapterFactory(settings: EffectiveRelaySettings): AdapterFactory {
  return (binding) => {
    const context = {
      agentId: binding.agentId,
      platform: binding.platform,
      sendTimeoutMs: settings.supervisor.timeouts.sendMs,
      disconnectTimeoutMs: settings.supervisor.timeouts.disconnectMs,
    };
    switch (binding.platform) {
      case "discord":
        return new DiscordAdapter(context);
      case "telegram":
        return new TelegramAdapter(context, { publicBaseUrl: settings.server.publicBaseUrl });
    }
  };
}
