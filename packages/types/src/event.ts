/**
 * Event Types
 *
 * Append-only event architecture.
 * Every invoice, subscription and royalty state change is captured as a
 * DomainEvent; current state is a fold over the stream.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Component that emitted an event.
 */
export type EventSource =
  | "ledger"
  | "gateway"
  | "invoicing"
  | "subscriptions"
  | "royalties"
  | "config";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across components */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "invoice.issued", "subscription.renewed") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
