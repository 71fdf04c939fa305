/**
 * Provider webhook ingress.
 *
 * POST /webhooks/:provider — record a provider notification
 *
 * The raw body is handed to the engine untouched; signatures are computed
 * over the exact bytes the provider sent. A redelivery answers 200 with
 * status "duplicate" so the provider stops retrying.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/** Header carrying each provider's signature or token. */
export const SIGNATURE_HEADERS: Readonly<Record<string, string>> = {
  card: "Signature",
  mobile_money_a: "X-Notification-Token",
  mobile_money_b: "X-Signature",
};

export function createWebhookRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:provider", async (c) => {
    const engine = c.get("engine");
    const provider = c.req.param("provider");

    if (!engine.providers.has(provider)) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Payment provider '${provider}' is not configured`),
        404,
      );
    }

    const header = SIGNATURE_HEADERS[provider];
    const signature = header !== undefined ? c.req.header(header) : undefined;
    const rawPayload = await c.req.text();

    const result = await engine.ingestWebhook(provider, rawPayload, signature);

    return c.json({
      status: result.status,
      ...(result.transaction !== undefined ? { transactionId: result.transaction.id } : {}),
    });
  });

  return routes;
}
