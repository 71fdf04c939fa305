import { ManualClock } from "@quire/types";
import type { InvoiceItem, Money, PaymentTransaction } from "@quire/types";
import { EventCatalog, InMemoryEventStore } from "@quire/event-store";
import { InMemoryLedgerStore } from "@quire/ledger";
import { BillingConfigStore, applyDefaults } from "@quire/config";
import { InvoiceManager } from "../src/invoice-manager.js";
import type { InvoiceManagerOptions } from "../src/invoice-manager.js";
import { INVOICE_EVENT_SCHEMAS } from "../src/events.js";

export function setup(overrides: Partial<InvoiceManagerOptions> = {}) {
  const clock = new ManualClock("2026-03-01T09:00:00.000Z");
  const catalog = new EventCatalog();
  catalog.registerAll(INVOICE_EVENT_SCHEMAS);
  const eventStore = new InMemoryEventStore({ catalog });
  const ledger = new InMemoryLedgerStore();
  const config = new BillingConfigStore({ clock });
  applyDefaults(config, "2026-01-01T00:00:00.000Z");

  let n = 0;
  const options: InvoiceManagerOptions = {
    eventStore,
    ledger,
    config,
    clock,
    numberPrefix: "QB",
    idFactory: () => `inv-${++n}`,
    ...overrides,
  };
  return { clock, eventStore, ledger, config, options, manager: new InvoiceManager(options) };
}

export function eur(amountMinor: string): Money {
  return { amountMinor, currency: "EUR" };
}

export function item(unitPrice: Money, overrides: Partial<InvoiceItem> = {}): InvoiceItem {
  return { description: "Novel, ebook edition", quantity: 1, unitPrice, itemType: "book_purchase", ...overrides };
}

let txCounter = 0;

/** A settled card charge against an invoice. */
export function payment(invoiceId: string, amount: Money, overrides: Partial<PaymentTransaction> = {}): PaymentTransaction {
  txCounter++;
  return {
    id: `tx-${txCounter}`,
    externalRef: { provider: "card", providerTransactionId: `ch_${txCounter}` },
    amount,
    kind: "charge",
    status: "settled",
    subjectRef: { type: "invoice", id: invoiceId },
    createdAt: "2026-03-02T10:00:00.000Z",
    settledAt: "2026-03-02T10:00:00.000Z",
    metadata: {},
    ...overrides,
  };
}
