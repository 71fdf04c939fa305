/**
 * Subscription routes.
 *
 * POST /api/v1/subscriptions             — Create a subscription
 * GET  /api/v1/subscriptions             — List (?userRef=)
 * GET  /api/v1/subscriptions/:id         — Get one
 * POST /api/v1/subscriptions/:id/pause   — Pause renewals
 * POST /api/v1/subscriptions/:id/resume  — Resume a paused subscription
 * POST /api/v1/subscriptions/:id/cancel  — Cancel (terminal)
 *
 * Renewal and dunning run in the background; these routes never charge.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CancelSubscriptionSchema, CreateSubscriptionSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createSubscriptionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateSubscriptionSchema), (c) => {
    const subscription = c.get("engine").createSubscription(c.get("validatedBody"));
    return c.json({ data: subscription }, 201);
  });

  routes.get("/", (c) => {
    const data = c.get("engine").listSubscriptions(c.req.query("userRef"));
    return c.json({ data, total: data.length });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("engine").getSubscription(c.req.param("id")) });
  });

  routes.post("/:id/pause", async (c) => {
    return c.json({ data: await c.get("engine").pauseSubscription(c.req.param("id")) });
  });

  routes.post("/:id/resume", async (c) => {
    return c.json({ data: await c.get("engine").resumeSubscription(c.req.param("id")) });
  });

  routes.post("/:id/cancel", validateBody(CancelSubscriptionSchema), async (c) => {
    const { reason } = c.get("validatedBody");
    return c.json({ data: await c.get("engine").cancelSubscription(c.req.param("id"), reason) });
  });

  return routes;
}
