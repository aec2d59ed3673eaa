#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command()
  .name("tenant-relay")
  .description("Multi-tenant Discord and Telegram connection manager for AI agents")
  .version(APP_VERSION);

program
  .command("serve")
  .description("Start the relay: connections, webhook ingress and management API")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { runServe } = await import("./commands/serve");
    await runServe(options);
  });

const bindingsCmd = program.command("bindings").description("Manage agent bot bindings");

bindingsCmd
  .command("put <agentId> <platform>")
  .description("Create or update a binding (bumps its version when something changed)")
  .option("-c, --config <path>", "Config file path")
  .option("-t, --token <token>", "Bot token")
  .option("--credential <key=value>", "Extra credential field (repeatable)", collect)
  .option("--disabled", "Store the binding as disabled")
  .action(
    async (
      agentId: string,
      platform: string,
      options: { config?: string; token?: string; credential?: string[]; disabled?: boolean },
    ) => {
      const { bindingsPut } = await import("./commands/bindings");
      await bindingsPut(agentId, platform, options);
    },
  );

bindingsCmd
  .command("remove <agentId> <platform>")
  .description("Remove a binding; a running relay stops its connection")
  .option("-c, --config <path>", "Config file path")
  .action(async (agentId: string, platform: string, options: { config?: string }) => {
    const { bindingsRemove } = await import("./commands/bindings");
    await bindingsRemove(agentId, platform, options);
  });

bindingsCmd
  .command("list")
  .description("List active bindings")
  .option("-c, --config <path>", "Config file path")
  .option("--json", "Output machine-readable JSON")
  .action(async (options: { config?: string; json?: boolean }) => {
    const { bindingsList } = await import("./commands/bindings");
    await bindingsList(options);
  });

const configCmd = program.command("config").description("Inspect configuration");

configCmd
  .command("validate")
  .description("Validate the config file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { validateConfig } = await import("./commands/config");
    validateConfig(options.config);
  });

const deadLettersCmd = program
  .command("dead-letters")
  .description("Inspect inbound messages the reasoning service never accepted");

deadLettersCmd
  .command("list")
  .description("List recent dead letters, newest first")
  .option("-c, --config <path>", "Config file path")
  .option("-a, --agent <agentId>", "Only this agent")
  .option("-n, --limit <count>", "Maximum entries", "50")
  .action(async (options: { config?: string; agent?: string; limit?: string }) => {
    const { listDeadLetters } = await import("./commands/dead-letters");
    await listDeadLetters(options);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
