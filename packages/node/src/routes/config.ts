/**
 * Billing configuration routes.
 *
 * POST /api/v1/config — Record a value with its effective date
 * GET  /api/v1/config — Full history snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetConfigSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createConfigRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SetConfigSchema), (c) => {
    const body = c.get("validatedBody");
    const entry = c.get("engine").setConfig(body.configType, body.key, body.value, body.effectiveFrom);
    return c.json({ data: entry }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("engine").config.snapshot() });
  });

  return routes;
}
