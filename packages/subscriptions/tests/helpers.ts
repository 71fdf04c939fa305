import { vi } from "vitest";
import { ManualClock } from "@quire/types";
import type { PaymentTransaction } from "@quire/types";
import { EventCatalog, InMemoryEventStore } from "@quire/event-store";
import type { EventStore } from "@quire/event-store";
import { InMemoryLedgerStore } from "@quire/ledger";
import { BillingConfigStore, applyDefaults } from "@quire/config";
import { INVOICE_EVENT_SCHEMAS, InvoiceManager } from "@quire/invoicing";
import { ChargeExecutor, ProviderRegistry } from "@quire/gateway";
import type { ChargeOutcome, ChargeRequest, PaymentProvider } from "@quire/gateway";
import { SubscriptionOrchestrator } from "../src/orchestrator.js";
import type { CreateSubscriptionInput } from "../src/orchestrator.js";
import { SUBSCRIPTION_EVENT_SCHEMAS } from "../src/events.js";

export const START = "2026-01-15T08:00:00.000Z";
export const FIRST_RENEWAL = "2026-02-15T08:00:00.000Z";

export function fakeProvider() {
  return {
    id: "card" as const,
    initiateCharge: vi.fn<(r: ChargeRequest) => Promise<ChargeOutcome>>(),
    getChargeStatus: vi.fn<(ref: string) => Promise<ChargeOutcome | null>>(),
    verifyWebhookSignature: vi.fn(),
    normalizeWebhookPayload: vi.fn().mockReturnValue(null),
  } satisfies PaymentProvider;
}

export function setup() {
  const clock = new ManualClock(START);
  const catalog = new EventCatalog();
  catalog.registerAll(INVOICE_EVENT_SCHEMAS);
  catalog.registerAll(SUBSCRIPTION_EVENT_SCHEMAS);
  const eventStore = new InMemoryEventStore({ catalog });
  const ledger = new InMemoryLedgerStore();
  const config = new BillingConfigStore({ clock });
  applyDefaults(config, "2026-01-01T00:00:00.000Z");

  let invoiceN = 0;
  const invoices = new InvoiceManager({
    eventStore,
    ledger,
    config,
    clock,
    numberPrefix: "QB",
    idFactory: () => `inv-${++invoiceN}`,
  });

  const provider = fakeProvider();
  let txN = 0;
  const charges = new ChargeExecutor({
    providers: new ProviderRegistry([provider]),
    ledger,
    retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
    sleepFn: async () => {},
    clock,
    idFactory: () => `tx-${++txN}`,
  });

  let subN = 0;
  const orchestrator = new SubscriptionOrchestrator({
    eventStore,
    invoices,
    charges,
    config,
    clock,
    idFactory: () => `sub-${++subN}`,
  });

  return { clock, eventStore, ledger, config, invoices, provider, charges, orchestrator };
}

export function premium(overrides: Partial<CreateSubscriptionInput> = {}): CreateSubscriptionInput {
  return {
    userRef: "reader-1",
    planRef: "premium",
    amount: { amountMinor: "999", currency: "EUR" },
    frequency: "monthly",
    paymentMethod: { provider: "card", accountRef: "pm_test" },
    ...overrides,
  };
}

/** A webhook-recorded card charge for a renewal attempt. */
export function webhookCharge(
  reference: string,
  overrides: Partial<PaymentTransaction> = {},
): PaymentTransaction {
  const invoiceId = reference.split(":")[0] ?? reference;
  return {
    id: `wh-${reference}`,
    externalRef: { provider: "card", providerTransactionId: `ch_${reference}` },
    amount: { amountMinor: "999", currency: "EUR" },
    kind: "charge",
    status: "settled",
    subjectRef: { type: "invoice", id: invoiceId },
    createdAt: FIRST_RENEWAL,
    settledAt: FIRST_RENEWAL,
    metadata: { chargeReference: reference },
    ...overrides,
  };
}

export function eventTypes(store: EventStore, subscriptionId: string): string[] {
  return store.read(`subscription-${subscriptionId}`).map((e) => e.event.type);
}
