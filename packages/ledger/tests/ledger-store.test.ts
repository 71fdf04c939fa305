/**
 * Tests for InMemoryLedgerStore.
 *
 * Verifies:
 * - Ingest: insert, duplicate detection, malformed rows
 * - Concurrency: racing ingests of the same external reference
 * - Query: subject, kind, status, currency, date window, metadata
 * - Net settled computation across charges and refunds
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@quire/types";
import { InMemoryLedgerStore } from "../src/in-memory-ledger.js";
import { netSettled } from "../src/transactions.js";
import { makeTx } from "./helpers.js";

// =============================================================================
// Ingest
// =============================================================================

describe("ingest", () => {
  it("inserts a new transaction", () => {
    const store = new InMemoryLedgerStore();
    const tx = makeTx();

    const result = store.ingest(tx);

    expect(result.outcome).toBe("inserted");
    expect(result.transaction).toEqual(tx);
    expect(store.size).toBe(1);
    expect(store.get(tx.id)).toEqual(tx);
  });

  it("returns duplicate with the stored row on redelivery", () => {
    const store = new InMemoryLedgerStore();
    const first = makeTx({ externalRef: { provider: "card", providerTransactionId: "ch_dup" } });
    const redelivered = { ...first, id: "tx-other" };

    store.ingest(first);
    const result = store.ingest(redelivered);

    expect(result.outcome).toBe("duplicate");
    expect(result.transaction.id).toBe(first.id);
    expect(store.size).toBe(1);
  });

  it("treats the same provider id on different providers as distinct", () => {
    const store = new InMemoryLedgerStore();
    store.ingest(makeTx({ externalRef: { provider: "card", providerTransactionId: "X1" } }));
    const result = store.ingest(
      makeTx({ externalRef: { provider: "mobile_money_a", providerTransactionId: "X1" } }),
    );

    expect(result.outcome).toBe("inserted");
    expect(store.size).toBe(2);
  });

  it("stores rows immutably", () => {
    const store = new InMemoryLedgerStore();
    const { transaction } = store.ingest(makeTx());
    expect(Object.isFrozen(transaction)).toBe(true);
    expect(Object.isFrozen(transaction.amount)).toBe(true);
  });

  it("rejects negative amounts", () => {
    const store = new InMemoryLedgerStore();
    expect(() => store.ingest(makeTx({ amount: { amountMinor: "-1", currency: "EUR" } }))).toThrow(
      ValidationError,
    );
    expect(store.size).toBe(0);
  });

  it("rejects a reused id under a different external reference", () => {
    const store = new InMemoryLedgerStore();
    store.ingest(makeTx({ id: "fixed" }));
    expect(() => store.ingest(makeTx({ id: "fixed" }))).toThrow(ValidationError);
  });

  it("keeps exactly one row when deliveries race", async () => {
    const store = new InMemoryLedgerStore();
    const deliveries = Array.from({ length: 20 }, (_, i) =>
      makeTx({
        id: `race-${i}`,
        externalRef: { provider: "mobile_money_b", providerTransactionId: "mmb-777" },
      }),
    );

    const results = await Promise.all(
      deliveries.map(async (tx) => {
        await Promise.resolve();
        return store.ingest(tx);
      }),
    );

    expect(results.filter((r) => r.outcome === "inserted")).toHaveLength(1);
    expect(results.filter((r) => r.outcome === "duplicate")).toHaveLength(19);
    expect(store.size).toBe(1);
    expect(new Set(results.map((r) => r.transaction.id)).size).toBe(1);
  });
});

// =============================================================================
// Query
// =============================================================================

describe("query", () => {
  function seeded(): InMemoryLedgerStore {
    const store = new InMemoryLedgerStore();
    store.ingest(makeTx({ id: "a", subjectRef: { type: "invoice", id: "inv-A" } }));
    store.ingest(
      makeTx({
        id: "b",
        kind: "refund",
        subjectRef: { type: "invoice", id: "inv-A" },
        settledAt: "2026-02-01T00:00:00.000Z",
      }),
    );
    store.ingest(
      makeTx({
        id: "c",
        status: "failed",
        amount: { amountMinor: "5000", currency: "XOF" },
        subjectRef: { type: "subscription", id: "sub-1" },
        metadata: { authorRef: "author-9" },
      }),
    );
    return store;
  }

  it("returns all rows in commit order without a filter", () => {
    expect([...seeded().query()].map((t) => t.id)).toEqual(["a", "b", "c"]);
  });

  it("filters by subject", () => {
    const ids = [...seeded().query({ subject: { type: "invoice", id: "inv-A" } })].map((t) => t.id);
    expect(ids).toEqual(["a", "b"]);
  });

  it("filters by kind, status and currency", () => {
    const store = seeded();
    expect([...store.query({ kinds: ["refund"] })].map((t) => t.id)).toEqual(["b"]);
    expect([...store.query({ statuses: ["failed"] })].map((t) => t.id)).toEqual(["c"]);
    expect([...store.query({ currency: "XOF" })].map((t) => t.id)).toEqual(["c"]);
  });

  it("uses a half-open window on the effective date", () => {
    const ids = [
      ...seeded().query({ from: "2026-01-01T00:00:00.000Z", to: "2026-02-01T00:00:00.000Z" }),
    ].map((t) => t.id);
    expect(ids).toEqual(["a", "c"]);
  });

  it("matches metadata values", () => {
    const ids = [...seeded().query({ metadata: { authorRef: "author-9" } })].map((t) => t.id);
    expect(ids).toEqual(["c"]);
  });

  it("finds by external reference", () => {
    const store = new InMemoryLedgerStore();
    const tx = makeTx({ externalRef: { provider: "card", providerTransactionId: "ch_find" } });
    store.ingest(tx);
    expect(store.findByExternalRef("card", "ch_find")?.id).toBe(tx.id);
    expect(store.findByExternalRef("card", "missing")).toBeUndefined();
  });
});

// =============================================================================
// netSettled
// =============================================================================

describe("netSettled", () => {
  it("nets settled charges against refunds and ignores failures", () => {
    const rows = [
      makeTx({ amount: { amountMinor: "1000", currency: "EUR" } }),
      makeTx({ amount: { amountMinor: "500", currency: "EUR" } }),
      makeTx({ kind: "refund", amount: { amountMinor: "200", currency: "EUR" } }),
      makeTx({ status: "failed", amount: { amountMinor: "9999", currency: "EUR" } }),
      makeTx({ status: "pending", amount: { amountMinor: "9999", currency: "EUR" } }),
    ];
    expect(netSettled(rows, "EUR")).toEqual({ amountMinor: "1300", currency: "EUR" });
  });

  it("counts provider reversals as money returned", () => {
    const rows = [
      makeTx({ amount: { amountMinor: "1000", currency: "XAF" } }),
      makeTx({ kind: "refund", status: "reversed", amount: { amountMinor: "1000", currency: "XAF" } }),
    ];
    expect(netSettled(rows, "XAF").amountMinor).toBe("0");
  });

  it("refuses rows in another currency", () => {
    expect(() => netSettled([makeTx()], "XOF")).toThrow(ValidationError);
  });
});
