/**
 * @quire/node — Entry point.
 *
 * Loads config, builds the engine and its background workers, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { BillingEngine } from "./services/billing-engine.js";
import { buildProviders } from "./services/providers.js";
import { TaskQueue } from "./services/task-queue.js";
import { registerBillingTasks } from "./services/billing-tasks.js";
import type { BillingTasks } from "./services/billing-tasks.js";
import { Scheduler } from "./services/scheduler.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const engine = new BillingEngine({
    dataDir: config.DATA_DIR,
    billingEntity: config.BILLING_ENTITY,
    invoiceNumberPrefix: config.INVOICE_NUMBER_PREFIX,
    providers: buildProviders(config, { logger }),
    logger,
  });

  if (config.DATA_DIR === undefined) {
    logger.warn("DATA_DIR not set, state is kept in memory only");
  }

  const queue = new TaskQueue<BillingTasks>({ logger });
  registerBillingTasks(queue, engine, logger);
  const scheduler = new Scheduler({ engine, queue, intervalMs: config.TICK_INTERVAL_MS, logger });

  const { app } = createApp({ engine, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });
  scheduler.start();

  logger.info(
    { port: config.PORT, host: config.HOST, tickIntervalMs: config.TICK_INTERVAL_MS },
    "Quire billing node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    scheduler.stop();
    server.close();
    await queue.stop();
    await engine.webhooks.drain();
    logger.info(queue.stats(), "Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
