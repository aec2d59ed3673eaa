import { logger } from "../../logger";
import { RuntimeHost } from "../../runtime/host";
import { APP_VERSION } from "../../version";

/** Runs the relay in the foreground until SIGINT or SIGTERM. */
export async function runServe(options: { config?: string }): Promise<void> {
  const runtime = new RuntimeHost({ configPath: options.config });
  let stopping: Promise<void> | null = null;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    logger.info({ signal }, "Received signal, shutting down");
    stopping = runtime
      .stop()
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exitCode = 1;
      })
      .finally(() => {
        process.exit();
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await runtime.start();
  logger.info({ version: APP_VERSION }, "Tenant relay is running. Press Ctrl+C to stop.");
}
