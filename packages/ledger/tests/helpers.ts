import type { PaymentTransaction } from "@quire/types";

let counter = 0;

/**
 * Build a settled EUR charge with overridable fields.
 */
export function makeTx(overrides: Partial<PaymentTransaction> = {}): PaymentTransaction {
  counter++;
  return {
    id: `tx-${counter}`,
    externalRef: { provider: "card", providerTransactionId: `ch_${counter}` },
    amount: { amountMinor: "1000", currency: "EUR" },
    kind: "charge",
    status: "settled",
    subjectRef: { type: "invoice", id: "inv-1" },
    createdAt: "2026-01-10T12:00:00.000Z",
    settledAt: "2026-01-10T12:00:00.000Z",
    metadata: {},
    ...overrides,
  };
}
