import { ManualClock } from "@quire/types";
import type { Money, PaymentTransaction, Period } from "@quire/types";
import { EventCatalog, InMemoryEventStore } from "@quire/event-store";
import { InMemoryLedgerStore } from "@quire/ledger";
import { BillingConfigStore, applyDefaults } from "@quire/config";
import { RoyaltyCalculator } from "../src/calculator.js";
import type { RoyaltyCalculatorOptions } from "../src/calculator.js";
import { ROYALTY_EVENT_SCHEMAS } from "../src/events.js";

export const FEBRUARY: Period = { start: "2026-02-01T00:00:00.000Z", end: "2026-03-01T00:00:00.000Z" };
export const MARCH: Period = { start: "2026-03-01T00:00:00.000Z", end: "2026-04-01T00:00:00.000Z" };

export function eur(amountMinor: string): Money {
  return { amountMinor, currency: "EUR" };
}

export function setup(overrides: Partial<RoyaltyCalculatorOptions> = {}) {
  const clock = new ManualClock("2026-04-02T06:00:00.000Z");
  const catalog = new EventCatalog();
  catalog.registerAll(ROYALTY_EVENT_SCHEMAS);
  const eventStore = new InMemoryEventStore({ catalog });
  const ledger = new InMemoryLedgerStore();
  const config = new BillingConfigStore({ clock });
  applyDefaults(config, "2026-01-01T00:00:00.000Z");

  let txN = 0;
  /** Record a settled row attributed to author-1 (a direct sale) by default. */
  function record(
    kind: "charge" | "refund",
    amountMinor: string,
    at: string,
    overrides: Partial<PaymentTransaction> = {},
  ): PaymentTransaction {
    txN++;
    return ledger.ingest({
      id: `tx-${txN}`,
      externalRef: { provider: "card", providerTransactionId: `ch_${txN}` },
      amount: eur(amountMinor),
      kind,
      status: "settled",
      subjectRef: { type: "invoice", id: `inv-${txN}` },
      createdAt: at,
      settledAt: at,
      metadata: { authorRef: "author-1", revenueType: "direct_sale" },
      ...overrides,
    }).transaction;
  }

  function payout(id: string, amount: Money): PaymentTransaction {
    return ledger.ingest({
      id,
      externalRef: { provider: "manual", providerTransactionId: `bank-${id}` },
      amount,
      kind: "payout",
      status: "settled",
      subjectRef: { type: "royalty", id: "author-1" },
      createdAt: "2026-04-02T06:00:00.000Z",
      settledAt: "2026-04-02T06:00:00.000Z",
      metadata: {},
    }).transaction;
  }

  let royaltyN = 0;
  const options: RoyaltyCalculatorOptions = {
    eventStore,
    ledger,
    config,
    clock,
    idFactory: () => `roy-${++royaltyN}`,
    ...overrides,
  };

  return { clock, eventStore, ledger, config, options, record, payout, calculator: new RoyaltyCalculator(options) };
}
