/**
 * @quire/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - Hash chain for tamper evidence
 * - EventCatalog for write-time payload validation
 * - KeyedLock for per-key serialization of async sections
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { UnhashedEvent } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { EventStoreOptions } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

export { createDomainEvent } from "./events.js";
export type { CreateEventOptions } from "./events.js";

export { KeyedLock } from "./keyed-lock.js";
