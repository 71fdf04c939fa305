/**
 * Invoice routes.
 *
 * POST /api/v1/invoices              — Create and issue an invoice
 * GET  /api/v1/invoices              — List invoices (?userRef=&status=)
 * GET  /api/v1/invoices/statistics   — Totals per status and currency
 * GET  /api/v1/invoices/:id          — Get one invoice
 * POST /api/v1/invoices/:id/void     — Void an unpaid invoice
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateInvoiceSchema,
  ListInvoicesQuerySchema,
  VoidInvoiceSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createInvoiceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateInvoiceSchema), async (c) => {
    const body = c.get("validatedBody");
    const invoice = await c.get("engine").createInvoice(body.userRef, body.items, body.currency, {
      subscriptionId: body.subscriptionId,
      taxCountry: body.taxCountry,
      dueAt: body.dueAt,
      correlationId: c.get("requestId"),
    });
    return c.json({ data: invoice }, 201);
  });

  routes.get("/", validateQuery(ListInvoicesQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const invoices = c.get("engine").listInvoices(query.userRef);
    const data =
      query.status === undefined ? invoices : invoices.filter((i) => i.status === query.status);
    return c.json({ data, total: data.length });
  });

  routes.get("/statistics", (c) => {
    const userRef = c.req.query("userRef");
    return c.json({ data: c.get("engine").invoices.getStatistics(userRef) });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("engine").getInvoice(c.req.param("id")) });
  });

  routes.post("/:id/void", validateBody(VoidInvoiceSchema), (c) => {
    const { reason } = c.get("validatedBody");
    const invoice = c.get("engine").voidInvoice(c.req.param("id"), reason);
    return c.json({ data: invoice });
  });

  return routes;
}
