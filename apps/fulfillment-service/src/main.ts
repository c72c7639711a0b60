/**
 * Process entry point: load configuration, start the service and stop it
 * on SIGTERM / SIGINT. A shutdown that overruns `SHUTDOWN_TIMEOUT_MS` exits
 * with code 1.
 */

import { ConfigurationError, createScopedLogger, describeError } from "@orderflow/core";
import { loadConfig, type FulfillmentConfig } from "./config.js";
import { createFulfillmentService } from "./service.js";

const logger = createScopedLogger("Main");

async function main(): Promise<void> {
  let config: FulfillmentConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("Refusing to start with invalid configuration", { issues: [...error.issues] });
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const service = createFulfillmentService(config);
  await service.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const deadline = setTimeout(() => {
      logger.error("Shutdown timed out", { timeoutMs: config.shutdownTimeoutMs });
      process.exit(1);
    }, config.shutdownTimeoutMs);
    deadline.unref();

    service.stop().then(
      () => {
        clearTimeout(deadline);
        process.exitCode = 0;
      },
      (error: unknown) => {
        clearTimeout(deadline);
        logger.error("Shutdown failed", { error: describeError(error) });
        process.exit(1);
      }
    );
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((error: unknown) => {
  logger.error("Fulfillment service crashed", { error: describeError(error) });
  process.exit(1);
});
