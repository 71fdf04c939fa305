import type { DomainEvent } from "@quire/types";
import { createDomainEvent } from "../src/events.js";

export function makeEvent(type: string, payload: Record<string, unknown> = { type }): DomainEvent {
  return createDomainEvent(type, "invoicing", payload, {
    timestamp: "2026-01-01T00:00:00.000Z",
    actor: "test",
  });
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
