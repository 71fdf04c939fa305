/**
 * @quire/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - The in-memory tier under JsonlEventStore
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream)
 * - Synchronous append, so version check and write are one step
 */

import type { DomainEvent } from "@quire/types";
import type {
  AppendOptions,
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface EventStoreOptions {
  /** When set, appends are validated against registered schemas */
  readonly catalog?: EventCatalog;
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _catalog: EventCatalog | undefined;

  private _nextGlobalPosition = 1;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options: EventStoreOptions = {}) {
    this._catalog = options.catalog;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);
    this._validatePayloads(streamId, events);

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition + i,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Durable tier writes first; memory changes only after it succeeds
    this.persist(stored);
    for (const event of stored) {
      this.restore(event);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /** Durable write hook; a throw aborts the append with no state change. */
  protected persist(_events: readonly StoredEvent[]): void {
    // in-memory: nothing to write
  }

  /** Index an already-persisted event (append path and file replay). */
  protected restore(event: StoredEvent): void {
    let stream = this._streams.get(event.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.streamId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);
    this._nextGlobalPosition = Math.max(this._nextGlobalPosition, event.globalPosition + 1);
    this._lastHash = event.hash;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }

    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }

    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _validatePayloads(streamId: string, events: readonly DomainEvent[]): void {
    if (this._catalog === undefined) {
      return;
    }
    for (const event of events) {
      if (!this._catalog.validate(event.type, event.payload)) {
        throw new EventStoreError(
          "INVALID_PAYLOAD",
          this._catalog.has(event.type)
            ? `Payload of "${event.type}" does not match its schema`
            : `Event type "${event.type}" is not registered`,
          streamId,
        );
      }
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
