/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around a BillingEngine.
 * Separated from main.ts for testability: tests create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { BillingEngine } from "./services/billing-engine.js";
import type { BillingEngineOptions } from "./services/billing-engine.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWebhookRoutes } from "./routes/webhooks.js";
import { createInvoiceRoutes } from "./routes/invoices.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";
import { createRoyaltyRoutes } from "./routes/royalties.js";
import { createConfigRoutes } from "./routes/config.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Use this engine; otherwise one is built from `engineOptions` */
  readonly engine?: BillingEngine;
  readonly engineOptions?: BillingEngineOptions;
  /** Root logger for request logs. Default: silent */
  readonly logger?: Logger;
  readonly requestIdFactory?: () => string;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly engine: BillingEngine;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const engine = options.engine ?? new BillingEngine({ logger, ...options.engineOptions });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware(options.requestIdFactory));
  app.use("*", loggerMiddleware(logger));
  app.use("*", async (c, next) => {
    c.set("engine", engine);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/webhooks", createWebhookRoutes());
  app.route("/api/v1/invoices", createInvoiceRoutes());
  app.route("/api/v1/subscriptions", createSubscriptionRoutes());
  app.route("/api/v1/royalties", createRoyaltyRoutes());
  app.route("/api/v1/config", createConfigRoutes());

  return { app, engine };
}
