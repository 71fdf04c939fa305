/**
 * Royalty routes.
 *
 * GET  /api/v1/royalties/summary?authorRef=&start=&end=  — Per-currency totals
 * GET  /api/v1/royalties/authors/:authorRef              — Current records for an author
 * POST /api/v1/royalties/compute                         — Run a batch for a period
 * POST /api/v1/royalties/payouts                         — Mark payable records paid
 * POST /api/v1/royalties/:id/corrections                 — Record a correction
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ComputeRoyaltiesSchema,
  MarkRoyaltiesPaidSchema,
  RoyaltyCorrectionSchema,
  RoyaltySummaryQuerySchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createRoyaltyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/summary", validateQuery(RoyaltySummaryQuerySchema), (c) => {
    const { authorRef, start, end } = c.get("validatedQuery");
    const summary = c.get("engine").getRoyaltySummary(authorRef, { start, end });
    return c.json({ data: summary });
  });

  routes.get("/authors/:authorRef", (c) => {
    const data = c.get("engine").royalties.listRoyalties(c.req.param("authorRef"));
    return c.json({ data, total: data.length });
  });

  routes.post("/compute", validateBody(ComputeRoyaltiesSchema), async (c) => {
    const { period, authorRef } = c.get("validatedBody");
    const records = await c.get("engine").computeRoyalties(period, {
      authorRef,
      correlationId: c.get("requestId"),
    });
    return c.json({ data: records, total: records.length });
  });

  routes.post("/payouts", validateBody(MarkRoyaltiesPaidSchema), async (c) => {
    const { authorRef, period, payoutTransactionId } = c.get("validatedBody");
    const paid = await c.get("engine").markRoyaltiesPaid(authorRef, period, payoutTransactionId);
    return c.json({ data: paid });
  });

  routes.post("/:id/corrections", validateBody(RoyaltyCorrectionSchema), async (c) => {
    const { adjustment, reason } = c.get("validatedBody");
    const record = await c.get("engine").recordRoyaltyCorrection(c.req.param("id"), adjustment, reason);
    return c.json({ data: record }, 201);
  });

  return routes;
}
