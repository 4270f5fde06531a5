/**
 * Gateway API — main entry point.
 *
 * Loads .env, starts the gateway (a ConfigError ends the process before
 * anything listens) and installs the shutdown handlers.
 */

import { config as loadDotenv } from "dotenv";
import { createRootLogger } from "@speech-gateway/logging";
import { GatewayError } from "@speech-gateway/shared-types";
import { startGateway } from "./bootstrap.js";

loadDotenv();

const bootLog = createRootLogger().child({ component: "startup" });

async function main(): Promise<void> {
  bootLog.info("Loading configuration");
  const gateway = await startGateway(process.env);
  const log = gateway.logger.child({ component: "shutdown" });

  // Graceful shutdown with bounded timeout
  const shutdown = (): void => {
    log.info("Shutting down");
    gateway
      .close()
      .then(() => {
        log.info("Server closed");
        process.exit(0);
      })
      .catch((err: unknown) => {
        log.error("Server close failed", { error: String(err) });
        process.exit(1);
      });
    // Force exit after 10 seconds if connections hang
    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  bootLog.error("Fatal startup error", {
    error: err instanceof GatewayError ? err.toJSON() : String(err),
  });
  process.exit(1);
});
