/**
 * @quire/config — Versioned billing configuration store.
 *
 * Append-only history of business parameters. A value never changes in
 * place: a new entry with a later `effectiveFrom` supersedes it from that
 * instant on, and historical computations keep resolving the value that
 * was in force at their own date.
 *
 * Rules:
 * - Entries are validated against their kind's schema before recording
 * - Two entries for the same (configType, key, effectiveFrom) are rejected
 * - Resolution never falls back to a default: a missing entry is a
 *   ConfigMissingError
 * - When backed by an EventStore, every entry is a `config.set` event in
 *   the `config` stream and the history is rebuilt from it on start
 */

import { z } from "zod";
import pino from "pino";
import type { Logger } from "pino";
import type { Clock, Currency, Money } from "@quire/types";
import { ConfigMissingError, ValidationError, systemClock } from "@quire/types";
import type { EventSchema, EventStore } from "@quire/event-store";
import { createDomainEvent } from "@quire/event-store";
import type { ConfigType, ConfigValues } from "./kinds.js";
import { KEY_SCHEMAS, VALUE_SCHEMAS, isConfigType } from "./kinds.js";

// =============================================================================
// Types
// =============================================================================

export interface ConfigEntry<T extends ConfigType = ConfigType> {
  readonly configType: T;
  readonly key: string;
  readonly value: ConfigValues[T];
  readonly effectiveFrom: string;
  readonly recordedAt: string;
}

interface StoredEntry {
  readonly configType: ConfigType;
  readonly key: string;
  readonly value: unknown;
  readonly effectiveFrom: string;
  readonly effectiveAtMs: number;
  readonly recordedAt: string;
}

export interface BillingConfigStoreOptions {
  readonly eventStore?: EventStore;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export const CONFIG_STREAM = "config";
export const CONFIG_SET = "config.set";

const ConfigEntrySchema = z.object({
  configType: z.string().refine(isConfigType, "unknown configuration type"),
  key: z.string(),
  value: z.unknown(),
  effectiveFrom: z.string(),
  recordedAt: z.string(),
});

const ConfigSetPayloadSchema = ConfigEntrySchema;

const ConfigSnapshotSchema = z.object({
  version: z.literal(1),
  entries: z.array(ConfigEntrySchema),
});

/** Serializable form of the whole store, for the config collection on disk. */
export type ConfigSnapshot = z.infer<typeof ConfigSnapshotSchema>;

/** Catalog entries for events written by this store. */
export const CONFIG_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: CONFIG_SET,
    version: 1,
    description: "A configuration value was recorded with its effective date",
    source: "config",
    validate: (p) => ConfigSetPayloadSchema.safeParse(p).success,
  },
];

// =============================================================================
// Store
// =============================================================================

export class BillingConfigStore {
  /** Entries per `${configType}:${key}`, sorted by effectiveFrom */
  private readonly _entries = new Map<string, StoredEntry[]>();
  private readonly _eventStore: EventStore | undefined;
  private readonly _clock: Clock;
  private readonly _logger: Logger;

  constructor(options: BillingConfigStoreOptions = {}) {
    this._eventStore = options.eventStore;
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "config" });

    if (this._eventStore !== undefined) {
      this._replay(this._eventStore);
    }
  }

  // ─── Write ──────────────────────────────────────────────────────────

  /**
   * Record a configuration value effective from a given instant.
   *
   * @throws ValidationError for malformed keys/values or a duplicate effectiveFrom
   */
  setConfig<T extends ConfigType>(
    configType: T,
    key: string,
    value: ConfigValues[T],
    effectiveFrom: string | Date,
  ): ConfigEntry<T> {
    const entry = this._validate(
      configType,
      key,
      value,
      typeof effectiveFrom === "string" ? effectiveFrom : effectiveFrom.toISOString(),
      this._clock.now().toISOString(),
    );

    // Reject before persisting so the stream never holds a duplicate
    this._assertInsertable(entry);

    this._eventStore?.append(CONFIG_STREAM, [
      createDomainEvent(
        CONFIG_SET,
        "config",
        {
          configType: entry.configType,
          key: entry.key,
          value: entry.value,
          effectiveFrom: entry.effectiveFrom,
          recordedAt: entry.recordedAt,
        },
        { timestamp: entry.recordedAt },
      ),
    ]);
    this._insert(entry);

    this._logger.info(
      { configType, key, effectiveFrom: entry.effectiveFrom },
      "Configuration value recorded",
    );

    return { configType, key, value, effectiveFrom: entry.effectiveFrom, recordedAt: entry.recordedAt };
  }

  // ─── Resolve ────────────────────────────────────────────────────────

  /**
   * The value in force at `asOf`: the most recent entry whose
   * effectiveFrom ≤ asOf, found by binary search.
   *
   * @throws ConfigMissingError if no entry is in force
   * @throws ValidationError if `asOf` is not a valid instant
   */
  resolve<T extends ConfigType>(configType: T, key: string, asOf: string | Date): ConfigValues[T] {
    const at = instantOf(asOf);
    const asOfIso = new Date(at).toISOString();
    const list = this._entries.get(entryKey(configType, key));

    const index = list === undefined ? -1 : lastAtOrBefore(list, at);
    const entry = index >= 0 ? list?.[index] : undefined;
    if (entry === undefined) {
      throw new ConfigMissingError(configType, key, asOfIso);
    }
    return VALUE_SCHEMAS[configType].parse(entry.value);
  }

  /** True when `resolve` would return a value. */
  has(configType: ConfigType, key: string, asOf: string | Date): boolean {
    const at = instantOf(asOf);
    const list = this._entries.get(entryKey(configType, key));
    return list !== undefined && lastAtOrBefore(list, at) >= 0;
  }

  resolveRate(configType: "royalty_rate" | "tax_rate", key: string, asOf: string | Date): string {
    return this.resolve(configType, key, asOf);
  }

  resolveThreshold(currency: Currency, asOf: string | Date): Money {
    return this.resolve("payout_threshold", currency, asOf);
  }

  // ─── History ────────────────────────────────────────────────────────

  /** All entries for a key, oldest effectiveFrom first. */
  history<T extends ConfigType>(configType: T, key: string): readonly ConfigEntry<T>[] {
    const list = this._entries.get(entryKey(configType, key)) ?? [];
    return list.map((e) => ({
      configType,
      key,
      value: VALUE_SCHEMAS[configType].parse(e.value),
      effectiveFrom: e.effectiveFrom,
      recordedAt: e.recordedAt,
    }));
  }

  /** Every entry, ordered by kind, key and effectiveFrom. */
  snapshot(): ConfigSnapshot {
    const keys = [...this._entries.keys()].sort();
    const entries = keys.flatMap((k) =>
      (this._entries.get(k) ?? []).map((e) => ({
        configType: e.configType,
        key: e.key,
        value: e.value,
        effectiveFrom: e.effectiveFrom,
        recordedAt: e.recordedAt,
      })),
    );
    return { version: 1, entries };
  }

  /**
   * Rebuild a store from a snapshot. Entries are re-validated; the
   * resulting store is not backed by an event stream.
   */
  static fromSnapshot(
    snapshot: unknown,
    options: Omit<BillingConfigStoreOptions, "eventStore"> = {},
  ): BillingConfigStore {
    const parsed = ConfigSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new ValidationError("Malformed configuration snapshot", "VALIDATION_FAILED", {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    const store = new BillingConfigStore(options);
    for (const e of parsed.data.entries) {
      store._load(e.configType, e.key, e.value, e.effectiveFrom, e.recordedAt);
    }
    return store;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validate(
    configType: ConfigType,
    key: string,
    value: unknown,
    effectiveFrom: string,
    recordedAt: string,
  ): StoredEntry {
    const keySchema = KEY_SCHEMAS[configType];
    if (!keySchema.safeParse(key).success) {
      throw new ValidationError(`Invalid key "${key}" for configuration "${configType}"`);
    }

    const parsed = VALUE_SCHEMAS[configType].safeParse(value);
    if (!parsed.success) {
      throw new ValidationError(`Invalid value for configuration "${configType}"`, "VALIDATION_FAILED", {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }

    const threshold = VALUE_SCHEMAS.payout_threshold.safeParse(value);
    if (configType === "payout_threshold" && threshold.success && threshold.data.currency !== key) {
      throw new ValidationError(
        `Payout threshold keyed "${key}" must be denominated in ${key}`,
        "CURRENCY_MISMATCH",
      );
    }

    const effectiveAtMs = Date.parse(effectiveFrom);
    if (Number.isNaN(effectiveAtMs)) {
      throw new ValidationError(`Invalid effectiveFrom: "${effectiveFrom}"`);
    }

    return {
      configType,
      key,
      value: parsed.data,
      effectiveFrom: new Date(effectiveAtMs).toISOString(),
      effectiveAtMs,
      recordedAt,
    };
  }

  private _assertInsertable(entry: StoredEntry): void {
    const list = this._entries.get(entryKey(entry.configType, entry.key));
    if (list?.some((e) => e.effectiveAtMs === entry.effectiveAtMs) === true) {
      throw new ValidationError(
        `"${entry.configType}" for key "${entry.key}" already has an entry effective ${entry.effectiveFrom}`,
      );
    }
  }

  private _insert(entry: StoredEntry): void {
    const k = entryKey(entry.configType, entry.key);
    let list = this._entries.get(k);
    if (list === undefined) {
      list = [];
      this._entries.set(k, list);
    }
    // Entries may be recorded out of effective order (backdated corrections)
    const at = lastAtOrBefore(list, entry.effectiveAtMs) + 1;
    list.splice(at, 0, entry);
  }

  private _load(
    configType: ConfigType,
    key: string,
    value: unknown,
    effectiveFrom: string,
    recordedAt: string,
  ): void {
    const entry = this._validate(configType, key, value, effectiveFrom, recordedAt);
    this._assertInsertable(entry);
    this._insert(entry);
  }

  private _replay(store: EventStore): void {
    let skipped = 0;
    for (const stored of store.read(CONFIG_STREAM)) {
      const payload = ConfigSetPayloadSchema.safeParse(stored.event.payload);
      if (stored.event.type !== CONFIG_SET || !payload.success) {
        skipped++;
        continue;
      }
      const { configType, key, value, effectiveFrom, recordedAt } = payload.data;
      this._load(configType, key, value, effectiveFrom, recordedAt);
    }
    if (skipped > 0) {
      this._logger.warn({ skipped }, "Ignored unreadable configuration events");
    }
  }
}

function entryKey(configType: ConfigType, key: string): string {
  return `${configType}:${key}`;
}

/**
 * Index of the last entry with effectiveAtMs ≤ at, or -1.
 */
function instantOf(asOf: string | Date): number {
  const at = typeof asOf === "string" ? Date.parse(asOf) : asOf.getTime();
  if (Number.isNaN(at)) {
    throw new ValidationError(`Invalid asOf: "${String(asOf)}"`);
  }
  return at;
}

function lastAtOrBefore(list: readonly StoredEntry[], at: number): number {
  let lo = 0;
  let hi = list.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const entry = list[mid];
    if (entry !== undefined && entry.effectiveAtMs <= at) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}
