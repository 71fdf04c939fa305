/**
 * @quire/event-store — Domain event construction.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@quire/types";

export interface CreateEventOptions {
  /** Domain time of the event (ISO 8601) */
  readonly timestamp: string;
  readonly actor?: string;
  readonly correlationId?: string;
  readonly causationId?: string;
}

/**
 * Build a DomainEvent with fresh metadata.
 *
 * The correlation id defaults to the event id, starting a new causal chain.
 */
export function createDomainEvent(
  type: string,
  source: EventSource,
  payload: Readonly<Record<string, unknown>>,
  options: CreateEventOptions,
): DomainEvent {
  const eventId = randomUUID();
  return {
    type,
    metadata: {
      eventId,
      timestamp: options.timestamp,
      actor: options.actor ?? "system",
      correlationId: options.correlationId ?? eventId,
      ...(options.causationId !== undefined ? { causationId: options.causationId } : {}),
      source,
    },
    payload,
  };
}
