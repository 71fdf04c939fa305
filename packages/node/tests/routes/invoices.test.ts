/**
 * Tests for invoice routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, invoiceBody, jsonRequest } from "../setup.js";

interface InvoiceBody {
  data: {
    id: string;
    number: string;
    status: string;
    total: { amountMinor: string; currency: string };
    issuedAt: string;
    dueAt: string;
    voidReason?: string;
  };
}

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("POST /api/v1/invoices", () => {
  it("issues a numbered invoice", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("1250")));

    expect(res.status).toBe(201);
    const body = (await res.json()) as InvoiceBody;
    expect(body.data).toMatchObject({
      id: "inv-1",
      number: "QB-000001",
      status: "issued",
      total: { amountMinor: "1250", currency: "EUR" },
      issuedAt: "2026-03-01T09:00:00.000Z",
      dueAt: "2026-03-15T09:00:00.000Z",
    });
  });

  it("numbers consecutive invoices without gaps", async () => {
    const { app } = createTestApp();

    const numbers: string[] = [];
    for (let i = 0; i < 3; i++) {
      const res = await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody()));
      numbers.push(((await res.json()) as InvoiceBody).data.number);
    }

    expect(numbers).toEqual(["QB-000001", "QB-000002", "QB-000003"]);
  });

  it("returns 400 for an empty item list", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/invoices", "POST", { ...invoiceBody(), items: [] }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Request body validation failed");
  });

  it("returns 400 for invalid JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/invoices", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "Invalid JSON in request body" });
  });

  it("returns 400 CURRENCY_MISMATCH for a foreign-currency item", async () => {
    const { app, engine } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/invoices", "POST", { ...invoiceBody(), currency: "XOF" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("CURRENCY_MISMATCH");
    expect(engine.listInvoices()).toEqual([]);
  });
});

describe("GET /api/v1/invoices", () => {
  it("lists by user and status", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("100", "reader-1")));
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("200", "reader-2")));
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("300", "reader-1")));
    await app.request(jsonRequest("/api/v1/invoices/inv-3/void", "POST", { reason: "duplicate order" }));

    const mine = await app.request("/api/v1/invoices?userRef=reader-1");
    const mineBody = (await mine.json()) as { data: { id: string }[]; total: number };
    expect(mineBody.total).toBe(2);
    expect(mineBody.data.map((i) => i.id)).toEqual(["inv-1", "inv-3"]);

    const voided = await app.request("/api/v1/invoices?status=void");
    const voidedBody = (await voided.json()) as { data: { id: string }[]; total: number };
    expect(voidedBody.data.map((i) => i.id)).toEqual(["inv-3"]);
  });

  it("rejects an unknown status filter", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/invoices?status=lost");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid query parameters");
  });
});

describe("GET /api/v1/invoices/:id", () => {
  it("returns 404 with the resource in details", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/invoices/inv-404");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: 'Invoice "inv-404" not found',
      details: { resourceType: "Invoice", resourceId: "inv-404" },
    });
  });
});

describe("POST /api/v1/invoices/:id/void", () => {
  it("voids an issued invoice", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody()));

    const res = await app.request(
      jsonRequest("/api/v1/invoices/inv-1/void", "POST", { reason: "customer request" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as InvoiceBody;
    expect(body.data.status).toBe("void");
    expect(body.data.voidReason).toBe("customer request");
  });

  it("returns 409 when the invoice is already void", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody()));
    await app.request(jsonRequest("/api/v1/invoices/inv-1/void", "POST", { reason: "first" }));

    const res = await app.request(
      jsonRequest("/api/v1/invoices/inv-1/void", "POST", { reason: "second" }),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_TRANSITION");
  });

  it("requires a reason", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody()));

    const res = await app.request(jsonRequest("/api/v1/invoices/inv-1/void", "POST", { reason: "" }));

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/invoices/statistics", () => {
  it("counts by status and totals by currency", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("1000")));
    await app.request(jsonRequest("/api/v1/invoices", "POST", invoiceBody("2500")));
    await app.request(jsonRequest("/api/v1/invoices/inv-2/void", "POST", { reason: "duplicate order" }));

    const res = await app.request("/api/v1/invoices/statistics");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        count: 2,
        byStatus: { draft: 0, issued: 1, paid: 0, overdue: 0, void: 1 },
        byCurrency: {
          EUR: {
            invoiced: { amountMinor: "1000", currency: "EUR" },
            paid: { amountMinor: "0", currency: "EUR" },
            outstanding: { amountMinor: "1000", currency: "EUR" },
          },
        },
      },
    });
  });
});
