/**
 * Tests for the card processor adapter.
 *
 * Verifies:
 * - HMAC signature header checks and the timestamp window
 * - Webhook normalization for succeeded / failed / refunded events
 * - Charge initiation: success, decline, transport failures
 */

import { describe, it, expect } from "vitest";
import { ProviderError, UnauthenticatedWebhookError, ValidationError } from "@quire/types";
import { CardProvider } from "../src/providers/card.js";
import type { FetchFn } from "../src/http.js";
import type { ChargeRequest } from "../src/types.js";
import {
  CARD_SECRET,
  cardSignature,
  cardWebhook,
  createMockFetch,
  hangingFetch,
  testClock,
} from "./helpers.js";

function provider(fetchFn?: FetchFn, clock = testClock()): CardProvider {
  return new CardProvider({
    apiUrl: "https://card.test/",
    apiKey: "test-key",
    webhookSecret: CARD_SECRET,
    clock,
    timeoutMs: 10,
    ...(fetchFn !== undefined ? { fetchFn } : {}),
  });
}

const request: ChargeRequest = {
  reference: "inv-7:1",
  amount: { amountMinor: "1000", currency: "EUR" },
  paymentMethod: { provider: "card", accountRef: "pm_test" },
  subjectRef: { type: "invoice", id: "inv-7" },
};

// =============================================================================
// Signature
// =============================================================================

describe("verifyWebhookSignature", () => {
  it("accepts a correctly signed payload", () => {
    const clock = testClock();
    const raw = cardWebhook("charge.succeeded");
    expect(() => provider(undefined, clock).verifyWebhookSignature(raw, cardSignature(raw, clock))).not.toThrow();
  });

  it("rejects a payload signed with another secret", () => {
    const clock = testClock();
    const raw = cardWebhook("charge.succeeded");
    expect(() =>
      provider(undefined, clock).verifyWebhookSignature(raw, cardSignature(raw, clock, "other-secret")),
    ).toThrow(/signature mismatch/);
  });

  it("rejects a tampered body", () => {
    const clock = testClock();
    const raw = cardWebhook("charge.succeeded");
    const header = cardSignature(raw, clock);
    expect(() =>
      provider(undefined, clock).verifyWebhookSignature(raw.replace("1000", "9000"), header),
    ).toThrow(UnauthenticatedWebhookError);
  });

  it("rejects timestamps outside the tolerance window", () => {
    const clock = testClock();
    const raw = cardWebhook("charge.succeeded");
    const header = cardSignature(raw, clock);
    clock.advance(301_000);
    expect(() => provider(undefined, clock).verifyWebhookSignature(raw, header)).toThrow(
      /outside tolerance window/,
    );
  });

  it("rejects missing and malformed headers", () => {
    const p = provider();
    expect(() => p.verifyWebhookSignature("{}", undefined)).toThrow(/missing signature header/);
    expect(() => p.verifyWebhookSignature("{}", "v1=abc")).toThrow(/malformed signature header/);
  });
});

// =============================================================================
// Normalization
// =============================================================================

describe("normalizeWebhookPayload", () => {
  it("maps charge.succeeded to a settled charge in minor units", () => {
    expect(provider().normalizeWebhookPayload(cardWebhook("charge.succeeded"))).toEqual({
      provider: "card",
      providerTransactionId: "ch_1",
      kind: "charge",
      status: "settled",
      amount: { amountMinor: "1000", currency: "EUR" },
      reference: "inv-1:1",
      occurredAt: "2026-01-10T11:59:00.000Z",
      metadata: { authorRef: "author-1", providerEventId: "evt_1" },
    });
  });

  it("maps charge.failed with its failure code", () => {
    const event = provider().normalizeWebhookPayload(
      cardWebhook("charge.failed", { failure_code: "insufficient_funds" }),
    );
    expect(event?.status).toBe("failed");
    expect(event?.failureReason).toBe("insufficient_funds");
  });

  it("records a refund under the refund id", () => {
    const event = provider().normalizeWebhookPayload(
      cardWebhook("charge.refunded", { refund: { id: "re_1", amount: 400 } }),
    );
    expect(event).toMatchObject({
      providerTransactionId: "re_1",
      kind: "refund",
      status: "settled",
      amount: { amountMinor: "400", currency: "EUR" },
      metadata: { refundedChargeId: "ch_1" },
    });
  });

  it("ignores event types the engine does not act on", () => {
    expect(provider().normalizeWebhookPayload(cardWebhook("customer.updated"))).toBeNull();
  });

  it("rejects malformed bodies and unsupported currencies", () => {
    expect(() => provider().normalizeWebhookPayload("not json")).toThrow(ValidationError);
    expect(() =>
      provider().normalizeWebhookPayload(cardWebhook("charge.succeeded", { currency: "gbp" })),
    ).toThrow(/unsupported currency "gbp"/);
  });
});

// =============================================================================
// Charges
// =============================================================================

describe("initiateCharge", () => {
  it("posts minor units with the reference as idempotency key", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { id: "ch_9", status: "succeeded" } }]);

    const outcome = await provider(fetchFn).initiateCharge(request);

    expect(outcome).toEqual({ status: "settled", providerTransactionId: "ch_9" });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://card.test/v1/charges");
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer test-key",
      "Idempotency-Key": "inv-7:1",
    });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      amount: 1000,
      currency: "eur",
      source: "pm_test",
      reference: "inv-7:1",
    });
  });

  it("returns a decline as a failed outcome", async () => {
    const fetchFn = createMockFetch([
      {
        status: 402,
        body: { error: { code: "card_declined", decline_code: "insufficient_funds", charge: "ch_10" } },
      },
    ]);
    expect(await provider(fetchFn).initiateCharge(request)).toEqual({
      status: "failed",
      failureReason: "insufficient_funds",
      providerTransactionId: "ch_10",
    });
  });

  it("classifies 5xx as transient", async () => {
    const fetchFn = createMockFetch([{ status: 503 }]);
    await expect(provider(fetchFn).initiateCharge(request)).rejects.toMatchObject({
      code: "PROVIDER_TRANSIENT",
    });
  });

  it("classifies other 4xx as permanent", async () => {
    const fetchFn = createMockFetch([{ status: 401, body: { error: { code: "bad_key" } } }]);
    await expect(provider(fetchFn).initiateCharge(request)).rejects.toMatchObject({
      code: "PROVIDER_PERMANENT",
    });
  });

  it("turns a timeout into a transient error", async () => {
    const err = await provider(hangingFetch).initiateCharge(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect((err as ProviderError).reason).toBe("timed out after 10ms");
  });

  it("turns network errors into transient errors", async () => {
    const fetchFn = createMockFetch([{ status: 0, error: new Error("ECONNREFUSED") }]);
    await expect(provider(fetchFn).initiateCharge(request)).rejects.toThrow(
      'Provider "card" transient failure: network error: ECONNREFUSED',
    );
  });
});

describe("getChargeStatus", () => {
  it("returns null when the provider has no such charge", async () => {
    const fetchFn = createMockFetch([{ status: 404, body: {} }]);
    expect(await provider(fetchFn).getChargeStatus("inv-7:1")).toBeNull();
    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://card.test/v1/charges/by-reference/inv-7%3A1");
  });

  it("maps a pending charge", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { id: "ch_11", status: "pending" } }]);
    expect(await provider(fetchFn).getChargeStatus("inv-7:1")).toEqual({
      status: "pending",
      providerTransactionId: "ch_11",
    });
  });
});
