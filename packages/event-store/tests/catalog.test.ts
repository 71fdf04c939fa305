import { describe, it, expect } from "vitest";
import { CatalogError, EventCatalog } from "../src/catalog.js";
import type { EventSchema } from "../src/catalog.js";

function schema(type: string, version: number, source: EventSchema["source"] = "invoicing"): EventSchema {
  return {
    type,
    version,
    description: `${type} v${version}`,
    source,
    validate: (p) => typeof p === "object" && p !== null,
  };
}

describe("EventCatalog", () => {
  it("registers and lists schemas sorted by type", () => {
    const catalog = new EventCatalog();
    catalog.registerAll([schema("invoice.voided", 1), schema("invoice.issued", 1)]);

    expect(catalog.listTypes()).toEqual(["invoice.issued", "invoice.voided"]);
    expect(catalog.size).toBe(2);
  });

  it("is idempotent for the same version and upgrades to higher versions", () => {
    const catalog = new EventCatalog();
    catalog.register(schema("invoice.issued", 1));
    catalog.register(schema("invoice.issued", 1));
    catalog.register(schema("invoice.issued", 2));

    expect(catalog.getSchema("invoice.issued")?.version).toBe(2);
  });

  it("refuses to downgrade", () => {
    const catalog = new EventCatalog();
    catalog.register(schema("invoice.issued", 2));
    expect(() => catalog.register(schema("invoice.issued", 1))).toThrow(CatalogError);
  });

  it("filters by source", () => {
    const catalog = new EventCatalog();
    catalog.registerAll([
      schema("invoice.issued", 1),
      schema("subscription.created", 1, "subscriptions"),
    ]);
    expect(catalog.listBySource("subscriptions").map((s) => s.type)).toEqual([
      "subscription.created",
    ]);
  });

  it("validates payloads and rejects unknown types", () => {
    const catalog = new EventCatalog();
    catalog.register(schema("invoice.issued", 1));

    expect(catalog.validate("invoice.issued", {})).toBe(true);
    expect(catalog.validate("invoice.issued", null)).toBe(false);
    expect(catalog.validate("invoice.unknown", {})).toBe(false);
  });
});
