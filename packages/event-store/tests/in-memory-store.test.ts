/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - Catalog validation on append
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventCatalog } from "../src/catalog.js";
import { EventStoreError } from "../src/types.js";
import { makeEvent, makeEvents } from "./helpers.js";

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("invoice-1", [makeEvent("invoice.issued")]);

    expect(result).toEqual({ streamId: "invoice-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();

    store.append("s", makeEvents(2));
    store.append("s", makeEvents(3));

    expect(store.read("s").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["a", 1],
      ["a", 2],
      ["b", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("rejects empty appends and empty stream ids", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
    expect(() => store.append("", makeEvents(1))).toThrow(EventStoreError);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts a matching version", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));
    expect(store.append("s", makeEvents(1), { expectedVersion: 2 }).toVersion).toBe(3);
  });

  it("rejects a stale version without writing", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));

    try {
      store.append("s", makeEvents(1), { expectedVersion: 1 });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("CONCURRENCY_CONFLICT");
    }
    expect(store.streamVersion("s")).toBe(2);
  });

  it("enforces no_stream", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1), { expectedVersion: "no_stream" });
    expect(() => store.append("s", makeEvents(1), { expectedVersion: "no_stream" })).toThrow(
      EventStoreError,
    );
  });

  it("skips the check for any", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1));
    expect(store.append("s", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty array for unknown streams", () => {
    expect(new InMemoryEventStore().read("missing")).toEqual([]);
  });

  it("reads forward from a version with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(5));
    expect(store.read("s", { fromVersion: 2, maxCount: 2 }).map((e) => e.version)).toEqual([2, 3]);
  });

  it("reads backward", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(3));
    expect(store.read("s", { fromVersion: 3, direction: "backward" }).map((e) => e.version)).toEqual(
      [3, 2, 1],
    );
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1));
    expect(() => store.read("s", { fromVersion: 0 })).toThrow(EventStoreError);
  });
});

// =============================================================================
// Catalog validation
// =============================================================================

describe("catalog validation", () => {
  function catalog(): EventCatalog {
    const c = new EventCatalog();
    c.register({
      type: "invoice.voided",
      version: 1,
      description: "An invoice was voided",
      source: "invoicing",
      validate: (p) => typeof p === "object" && p !== null && "reason" in p,
    });
    return c;
  }

  it("accepts payloads matching their schema", () => {
    const store = new InMemoryEventStore({ catalog: catalog() });
    expect(store.append("s", [makeEvent("invoice.voided", { reason: "duplicate" })]).count).toBe(1);
  });

  it("rejects payloads that do not match", () => {
    const store = new InMemoryEventStore({ catalog: catalog() });
    expect(() => store.append("s", [makeEvent("invoice.voided", {})])).toThrow(
      /does not match its schema/,
    );
    expect(store.streamExists("s")).toBe(false);
  });

  it("rejects unregistered event types", () => {
    const store = new InMemoryEventStore({ catalog: catalog() });
    expect(() => store.append("s", [makeEvent("invoice.unknown")])).toThrow(/is not registered/);
  });
});
