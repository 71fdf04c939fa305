/**
 * Tests for subscription routes, and a renewal settled by webhook.
 */

import { describe, it, expect } from "vitest";
import { cardEvent, cardWebhookRequest, createTestApp, jsonRequest } from "../setup.js";

interface SubscriptionBody {
  data: {
    id: string;
    status: string;
    currentPeriodStart: string;
    currentPeriodEnd: string;
    cancelReason?: string;
    pendingChargeReference?: string;
  };
}

interface ErrorBody {
  error: { code: string; message: string };
}

const premium = {
  userRef: "reader-1",
  planRef: "premium",
  amount: { amountMinor: "999", currency: "EUR" },
  frequency: "monthly",
  paymentMethod: { provider: "card", accountRef: "pm_test" },
};

async function create(app: ReturnType<typeof createTestApp>["app"], body: unknown = premium) {
  return app.request(jsonRequest("/api/v1/subscriptions", "POST", body));
}

describe("POST /api/v1/subscriptions", () => {
  it("starts an active subscription with a one-month period", async () => {
    const { app, fetchFn } = createTestApp();

    const res = await create(app);

    expect(res.status).toBe(201);
    const body = (await res.json()) as SubscriptionBody;
    expect(body.data).toMatchObject({
      id: "sub-1",
      status: "active",
      currentPeriodStart: "2026-03-01T09:00:00.000Z",
      currentPeriodEnd: "2026-04-01T09:00:00.000Z",
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("rejects an unknown frequency", async () => {
    const { app } = createTestApp();

    const res = await create(app, { ...premium, frequency: "weekly" });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/subscriptions", () => {
  it("lists by user", async () => {
    const { app } = createTestApp();
    await create(app);
    await create(app, { ...premium, userRef: "reader-2" });

    const res = await app.request("/api/v1/subscriptions?userRef=reader-2");

    const body = (await res.json()) as { data: { id: string }[]; total: number };
    expect(body.total).toBe(1);
    expect(body.data[0]?.id).toBe("sub-2");
  });

  it("returns 404 for an unknown id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/subscriptions/sub-404");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe('Subscription "sub-404" not found');
  });
});

describe("lifecycle routes", () => {
  it("pauses and resumes", async () => {
    const { app } = createTestApp();
    await create(app);

    const paused = await app.request(jsonRequest("/api/v1/subscriptions/sub-1/pause", "POST"));
    expect(((await paused.json()) as SubscriptionBody).data.status).toBe("paused");

    const resumed = await app.request(jsonRequest("/api/v1/subscriptions/sub-1/resume", "POST"));
    expect(((await resumed.json()) as SubscriptionBody).data.status).toBe("active");
  });

  it("returns 409 when resuming an active subscription", async () => {
    const { app } = createTestApp();
    await create(app);

    const res = await app.request(jsonRequest("/api/v1/subscriptions/sub-1/resume", "POST"));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toMatchObject({
      code: "INVALID_TRANSITION",
      message: 'Cannot transition Subscription from "active" to "active"',
    });
  });

  it("cancels with a reason", async () => {
    const { app } = createTestApp();
    await create(app);

    const res = await app.request(
      jsonRequest("/api/v1/subscriptions/sub-1/cancel", "POST", { reason: "moving to annual" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as SubscriptionBody;
    expect(body.data.status).toBe("cancelled");
    expect(body.data.cancelReason).toBe("moving to annual");
  });
});

describe("renewal settled by webhook", () => {
  it("renews once the card webhook reports the pending charge settled", async () => {
    const { app, engine, clock, fetchFn } = createTestApp();
    await create(app);

    clock.set("2026-04-01T09:00:00.000Z");
    fetchFn.mockResolvedValueOnce(
      new Response(JSON.stringify({ id: "ch_9", status: "pending" }), { status: 200 }),
    );
    const pending = await engine.tickSubscription("sub-1");
    expect(pending.status).toBe("renewal_pending");
    expect(pending.pendingChargeReference).toBe("inv-1:1");

    const raw = cardEvent("charge.succeeded", clock, { id: "ch_9", amount: 999 });
    const res = await app.request(cardWebhookRequest(raw, clock));
    expect(res.status).toBe(200);
    await engine.webhooks.drain();

    const sub = await app.request("/api/v1/subscriptions/sub-1");
    expect(((await sub.json()) as SubscriptionBody).data).toMatchObject({
      status: "active",
      currentPeriodStart: "2026-04-01T09:00:00.000Z",
      currentPeriodEnd: "2026-05-01T09:00:00.000Z",
    });
    expect(engine.getInvoice("inv-1").status).toBe("paid");
  });
});
