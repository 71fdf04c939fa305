/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event store hash chains intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const health = c.get("engine").health();
    const ready = health.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        persistence: health.persistence,
        providers: health.providers,
        ledgerRows: health.ledgerRows,
        subsystems: {
          events: { valid: health.events.valid, errors: health.events.errors.length },
          config: { valid: health.config.valid, errors: health.config.errors.length },
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
