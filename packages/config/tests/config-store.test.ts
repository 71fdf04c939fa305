import { describe, it, expect } from "vitest";
import { ConfigMissingError, ManualClock, ValidationError } from "@quire/types";
import { EventCatalog, InMemoryEventStore } from "@quire/event-store";
import {
  BillingConfigStore,
  CONFIG_EVENT_SCHEMAS,
  CONFIG_STREAM,
  applyDefaults,
  DEFAULT_CONFIGURATION,
} from "../src/index.js";

function newStore(): BillingConfigStore {
  return new BillingConfigStore({ clock: new ManualClock("2026-01-01T00:00:00.000Z") });
}

// =============================================================================
// Resolution
// =============================================================================

describe("resolve", () => {
  it("returns the entry in force at the given instant", () => {
    const store = newStore();
    store.setConfig("royalty_rate", "direct_sale", "0.70", "2026-01-01T00:00:00.000Z");
    store.setConfig("royalty_rate", "direct_sale", "0.65", "2026-04-01T00:00:00.000Z");
    store.setConfig("royalty_rate", "direct_sale", "0.60", "2026-07-01T00:00:00.000Z");

    expect(store.resolve("royalty_rate", "direct_sale", "2026-01-01T00:00:00.000Z")).toBe("0.70");
    expect(store.resolve("royalty_rate", "direct_sale", "2026-03-31T23:59:59.999Z")).toBe("0.70");
    expect(store.resolve("royalty_rate", "direct_sale", "2026-04-01T00:00:00.000Z")).toBe("0.65");
    expect(store.resolve("royalty_rate", "direct_sale", new Date("2026-12-01T00:00:00.000Z"))).toBe(
      "0.60",
    );
  });

  it("orders backdated entries by effective date", () => {
    const store = newStore();
    store.setConfig("tax_rate", "SN", "0.18", "2026-06-01T00:00:00.000Z");
    store.setConfig("tax_rate", "SN", "0.20", "2026-01-01T00:00:00.000Z");

    expect(store.resolve("tax_rate", "SN", "2026-03-01T00:00:00.000Z")).toBe("0.20");
    expect(store.history("tax_rate", "SN").map((e) => e.value)).toEqual(["0.20", "0.18"]);
  });

  it("throws ConfigMissingError before the first entry", () => {
    const store = newStore();
    store.setConfig("royalty_rate", "tip", "0.90", "2026-02-01T00:00:00.000Z");

    expect(() => store.resolve("royalty_rate", "tip", "2026-01-15T00:00:00.000Z")).toThrow(
      ConfigMissingError,
    );
    expect(store.has("royalty_rate", "tip", "2026-01-15T00:00:00.000Z")).toBe(false);
  });

  it("throws ConfigMissingError for an unknown key", () => {
    try {
      newStore().resolveRate("royalty_rate", "direct_sale", "2026-01-01T00:00:00.000Z");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigMissingError);
      expect((err as ConfigMissingError).message).toBe(
        'No "royalty_rate" configuration for key "direct_sale" effective at 2026-01-01T00:00:00.000Z',
      );
    }
  });

  it("rejects an unparseable instant with ValidationError", () => {
    const store = newStore();
    store.setConfig("royalty_rate", "tip", "0.90", "2026-02-01T00:00:00.000Z");

    expect(() => store.resolve("royalty_rate", "tip", "not-a-date")).toThrow(ValidationError);
    expect(() => store.resolve("royalty_rate", "tip", "not-a-date")).toThrow('Invalid asOf: "not-a-date"');
    expect(() => store.has("royalty_rate", "tip", new Date(Number.NaN))).toThrow(ValidationError);
  });

  it("resolves thresholds by currency", () => {
    const store = newStore();
    store.setConfig("payout_threshold", "XOF", { amountMinor: "25000", currency: "XOF" }, "2026-01-01T00:00:00.000Z");
    expect(store.resolveThreshold("XOF", "2026-05-01T00:00:00.000Z")).toEqual({
      amountMinor: "25000",
      currency: "XOF",
    });
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("setConfig validation", () => {
  it("rejects a second entry with the same effective instant", () => {
    const store = newStore();
    store.setConfig("royalty_rate", "tip", "0.90", "2026-01-01T00:00:00.000Z");
    expect(() => store.setConfig("royalty_rate", "tip", "0.85", "2026-01-01T00:00:00.000Z")).toThrow(
      ValidationError,
    );
    expect(store.history("royalty_rate", "tip")).toHaveLength(1);
  });

  it("rejects rates outside [0, 1]", () => {
    expect(() =>
      newStore().setConfig("royalty_rate", "tip", "1.5", "2026-01-01T00:00:00.000Z"),
    ).toThrow(ValidationError);
  });

  it("rejects keys that do not fit the kind", () => {
    expect(() =>
      newStore().setConfig("royalty_rate", "audiobook", "0.5", "2026-01-01T00:00:00.000Z"),
    ).toThrow(/Invalid key "audiobook"/);
  });

  it("requires a threshold to be denominated in its key currency", () => {
    try {
      newStore().setConfig(
        "payout_threshold",
        "EUR",
        { amountMinor: "5000", currency: "USD" },
        "2026-01-01T00:00:00.000Z",
      );
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).code).toBe("CURRENCY_MISMATCH");
    }
  });

  it("rejects an empty retry schedule", () => {
    expect(() =>
      newStore().setConfig(
        "retry_policy",
        "default",
        { retryDelaysDays: [], maxRetries: 3 },
        "2026-01-01T00:00:00.000Z",
      ),
    ).toThrow(ValidationError);
  });

  it("stamps entries with the clock time", () => {
    const entry = newStore().setConfig(
      "payment_terms",
      "default",
      { dueDays: 30 },
      "2025-12-01T00:00:00.000Z",
    );
    expect(entry.recordedAt).toBe("2026-01-01T00:00:00.000Z");
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("event-backed persistence", () => {
  it("rebuilds history from the config stream", () => {
    const catalog = new EventCatalog();
    catalog.registerAll(CONFIG_EVENT_SCHEMAS);
    const events = new InMemoryEventStore({ catalog });

    const first = new BillingConfigStore({ eventStore: events });
    first.setConfig("rounding_mode", "royalty", "half_even", "2026-01-01T00:00:00.000Z");
    first.setConfig("rounding_mode", "royalty", "half_up", "2026-03-01T00:00:00.000Z");

    const second = new BillingConfigStore({ eventStore: events });
    expect(events.streamVersion(CONFIG_STREAM)).toBe(2);
    expect(second.resolve("rounding_mode", "royalty", "2026-02-01T00:00:00.000Z")).toBe("half_even");
    expect(second.resolve("rounding_mode", "royalty", "2026-03-01T00:00:00.000Z")).toBe("half_up");
  });

  it("writes nothing when validation fails", () => {
    const events = new InMemoryEventStore();
    const store = new BillingConfigStore({ eventStore: events });
    store.setConfig("royalty_rate", "tip", "0.90", "2026-01-01T00:00:00.000Z");
    expect(() => store.setConfig("royalty_rate", "tip", "0.80", "2026-01-01T00:00:00.000Z")).toThrow();
    expect(events.streamVersion(CONFIG_STREAM)).toBe(1);
  });

  it("round-trips through a snapshot", () => {
    const store = newStore();
    store.setConfig("currencies", "supported", ["EUR", "XOF"], "2026-01-01T00:00:00.000Z");
    store.setConfig("royalty_rate", "tip", "0.90", "2026-01-01T00:00:00.000Z");

    const restored = BillingConfigStore.fromSnapshot(JSON.parse(JSON.stringify(store.snapshot())));
    expect(restored.resolve("currencies", "supported", "2026-06-01T00:00:00.000Z")).toEqual([
      "EUR",
      "XOF",
    ]);
    expect(restored.snapshot()).toEqual(store.snapshot());
  });

  it("rejects a malformed snapshot", () => {
    expect(() => BillingConfigStore.fromSnapshot({ version: 2, entries: [] })).toThrow(
      ValidationError,
    );
  });
});

// =============================================================================
// Defaults
// =============================================================================

describe("applyDefaults", () => {
  it("writes every default once", () => {
    const store = newStore();
    expect(applyDefaults(store, "2026-01-01T00:00:00.000Z")).toBe(DEFAULT_CONFIGURATION.length);
    expect(applyDefaults(store, "2026-02-01T00:00:00.000Z")).toBe(0);
    expect(store.resolve("retry_policy", "default", "2026-01-02T00:00:00.000Z")).toEqual({
      retryDelaysDays: [1, 3, 7],
      maxRetries: 3,
    });
  });

  it("keeps keys that already have history", () => {
    const store = newStore();
    store.setConfig("royalty_rate", "direct_sale", "0.75", "2025-01-01T00:00:00.000Z");
    applyDefaults(store, "2026-01-01T00:00:00.000Z");
    expect(store.resolve("royalty_rate", "direct_sale", "2026-06-01T00:00:00.000Z")).toBe("0.75");
  });
});
