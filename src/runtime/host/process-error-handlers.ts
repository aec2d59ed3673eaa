import { logger } from "../../logger";
import { formatError, isRecoverableNetworkError } from "../error-classify";
import { isRelayError } from "../errors";

declare global {
  // eslint-disable-next-line no-var
  var __tenantRelayProcessErrorHandlersRegistered: boolean | undefined;
}

// A relay error that escaped its connection belongs to one tenant only.
function isContainedError(err: unknown): boolean {
  return isRelayError(err) || isRecoverableNetworkError(err);
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__tenantRelayProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__tenantRelayProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    if (isContainedError(reason)) {
      logger.warn(
        { error: formatError(reason), recoverable: true },
        "Suppressed recoverable unhandled rejection",
      );
      return;
    }
    logger.error({ error: formatError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    if (isContainedError(error)) {
      logger.warn(
        { error: formatError(error), recoverable: true },
        "Suppressed recoverable uncaught exception",
      );
      return;
    }
    logger.fatal({ error: formatError(error) }, "Uncaught exception");
    process.exitCode = 1;
  });
}
