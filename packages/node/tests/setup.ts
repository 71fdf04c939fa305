/**
 * Test helpers for the node package.
 *
 * Builds an app around an in-memory BillingEngine with a manual clock,
 * predictable ids and a card provider whose API is a mock fetch.
 */

import { vi } from "vitest";
import { ManualClock } from "@quire/types";
import type { FetchFn } from "@quire/gateway";
import { CardProvider, signCardPayload } from "@quire/gateway";
import { createApp } from "../src/app.js";
import type { BillingEngineOptions, IdKind } from "../src/services/billing-engine.js";

export const CARD_SECRET = "test-secret";
export const NOW = "2026-03-01T09:00:00.000Z";

const ID_PREFIX: Readonly<Record<IdKind, string>> = {
  transaction: "tx",
  invoice: "inv",
  subscription: "sub",
  royalty: "roy",
};

/** `tx-1`, `inv-1`, `sub-1`, `roy-1`, counted per kind. */
export function sequentialIds(): (kind: IdKind) => string {
  const counters: Record<IdKind, number> = { transaction: 0, invoice: 0, subscription: 0, royalty: 0 };
  return (kind) => `${ID_PREFIX[kind]}-${++counters[kind]}`;
}

export function createTestEngineOptions(overrides: Partial<BillingEngineOptions> = {}) {
  const clock = new ManualClock(NOW);
  const fetchFn = vi.fn<FetchFn>(async () => new Response("", { status: 503 }));
  const card = new CardProvider({
    apiUrl: "https://api.card.invalid",
    apiKey: "test-key",
    webhookSecret: CARD_SECRET,
    clock,
    fetchFn,
  });
  const options: BillingEngineOptions = {
    clock,
    providers: [card],
    idFactory: sequentialIds(),
    invoiceNumberPrefix: "QB",
    chargeRetry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
    sleepFn: async () => {},
    ...overrides,
  };
  return { clock, fetchFn, options };
}

export function createTestApp(overrides: Partial<BillingEngineOptions> = {}) {
  const { clock, fetchFn, options } = createTestEngineOptions(overrides);
  let requestN = 0;
  const { app, engine } = createApp({
    engineOptions: options,
    requestIdFactory: () => `req-${++requestN}`,
  });
  return { app, engine, clock, fetchFn };
}

export function jsonRequest(
  path: string,
  method = "GET",
  body?: unknown,
  headers: Record<string, string> = {},
): Request {
  const init: RequestInit = {
    method,
    headers: { "Content-Type": "application/json", ...headers },
  };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }
  return new Request(`http://localhost${path}`, init);
}

// ─── Card webhooks ───────────────────────────────────────────────────────

export function cardEvent(
  type: string,
  clock: ManualClock,
  object: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    id: "evt_1",
    type,
    created: Math.floor(clock.now().getTime() / 1000),
    data: {
      object: {
        id: "ch_1",
        amount: 1000,
        currency: "eur",
        reference: "inv-1:1",
        metadata: { authorRef: "author-1" },
        ...object,
      },
    },
  });
}

/** `Signature` header value for `raw`, timestamped now. */
export function cardSignature(raw: string, clock: ManualClock, secret = CARD_SECRET): string {
  const t = String(Math.floor(clock.now().getTime() / 1000));
  return `t=${t},v1=${signCardPayload(secret, t, raw)}`;
}

export function cardWebhookRequest(raw: string, clock: ManualClock, secret = CARD_SECRET): Request {
  return new Request("http://localhost/webhooks/card", {
    method: "POST",
    headers: { "Content-Type": "application/json", Signature: cardSignature(raw, clock, secret) },
    body: raw,
  });
}

/** An invoice body worth `amountMinor` EUR. */
export function invoiceBody(amountMinor = "1000", userRef = "reader-1") {
  return {
    userRef,
    currency: "EUR",
    items: [
      {
        description: "Novel, ebook edition",
        quantity: 1,
        unitPrice: { amountMinor, currency: "EUR" },
        itemType: "book_purchase",
      },
    ],
  };
}
