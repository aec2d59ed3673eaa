import { logger } from "./logger";
import { runServe } from "./cli/commands/serve";

const args = process.argv.slice(2);
const configArgIndex = args.indexOf("--config");
const configPath = configArgIndex >= 0 ? args[configArgIndex + 1] : undefined;

runServe({ config: configPath }).catch((err: unknown) => {
  logger.error({ err }, "Fatal error during startup");
  process.exit(1);
});
