/**
 * @relaymint/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadNetwork, parseAdminKeys } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const adminKeys = new Map(parseAdminKeys(config.ADMIN_KEYS).map((k) => [k.key, k.address]));
  if (adminKeys.size > 0) {
    logger.info({ adminKeyCount: adminKeys.size }, "Admin keys configured");
  } else {
    logger.warn("No admin keys configured; administration endpoints will refuse every request");
  }

  const network = loadNetwork(config);
  const { app, service } = createApp({ network, adminKeys, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, ledgers: service.ledgerIds() },
    "Relaymint node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
