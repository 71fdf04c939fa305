/**
 * @quire/royalties — Royalty Calculator.
 *
 * Turns settled revenue in the ledger into per-author royalty records.
 *
 * Rules:
 * - grossBase = Σ settled charges − Σ refunds attributed to the author,
 *   grouped by currency, revenue type and the rate in force on each
 *   transaction's own date
 * - payableAmount = grossBase × rate, rounded to the minor unit with the
 *   `rounding_mode` (royalty) configuration
 * - Below the payout threshold records stay `accrued` and carry forward;
 *   once this period plus the carried accruals reach it, all of them
 *   become `payable`
 * - An (author, period) with a paid record is immutable: recomputing it
 *   throws before anything is written; corrections are new records
 * - Batches for one (author, period) are serialized by a keyed lock
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  AuthorRoyalty,
  Clock,
  Currency,
  DomainEvent,
  Money,
  PaymentTransaction,
  Period,
  RevenueType,
} from "@quire/types";
import {
  ImmutablePeriodError,
  NotFoundError,
  PeriodSchema,
  ValidationError,
  systemClock,
} from "@quire/types";
import type { EventStore } from "@quire/event-store";
import { KeyedLock, createDomainEvent } from "@quire/event-store";
import type { LedgerStore } from "@quire/ledger";
import {
  addMoney,
  applyRate,
  compareMoney,
  effectiveAt,
  isMoneyReturned,
  isZero,
  money,
  parseMinor,
  sumMoney,
  validateMoney,
  zeroMoney,
} from "@quire/ledger";
import type { BillingConfigStore } from "@quire/config";
import type { AttributionResolver } from "./attribution.js";
import { metadataAttribution } from "./attribution.js";
import {
  ROYALTY_COMPUTED,
  ROYALTY_CORRECTED,
  ROYALTY_PAID,
  RoyaltyComputedPayloadSchema,
  RoyaltyCorrectedPayloadSchema,
  RoyaltyPaidPayloadSchema,
  authorStream,
} from "./events.js";
import type { RoyaltyComputedPayload, RoyaltyCorrectedPayload, RoyaltyPaidPayload } from "./events.js";

// =============================================================================
// Types
// =============================================================================

export interface RoyaltyCalculatorOptions {
  readonly eventStore: EventStore;
  readonly ledger: LedgerStore;
  readonly config: BillingConfigStore;
  readonly attribution?: AttributionResolver;
  readonly lock?: KeyedLock;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export interface ComputeRoyaltiesOptions {
  /** Limit the batch to one author */
  readonly authorRef?: string;
  readonly correlationId?: string;
}

export interface CurrencySummary {
  readonly accrued: Money;
  readonly payable: Money;
  readonly paid: Money;
  readonly total: Money;
}

export interface RoyaltySummary {
  readonly authorRef: string;
  readonly period: Period;
  readonly byCurrency: Readonly<Partial<Record<Currency, CurrencySummary>>>;
  readonly records: readonly AuthorRoyalty[];
}

interface Group {
  readonly currency: Currency;
  readonly revenueType: RevenueType;
  readonly rate: string;
  net: bigint;
  readonly refs: string[];
}

const ROYALTY_EVENT_TYPES: ReadonlySet<string> = new Set([ROYALTY_COMPUTED, ROYALTY_CORRECTED, ROYALTY_PAID]);

// =============================================================================
// Calculator
// =============================================================================

export class RoyaltyCalculator {
  /** Current records by id; superseded records are dropped */
  private readonly _records = new Map<string, AuthorRoyalty>();
  private readonly _events: EventStore;
  private readonly _ledger: LedgerStore;
  private readonly _config: BillingConfigStore;
  private readonly _attribution: AttributionResolver;
  private readonly _lock: KeyedLock;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _idFactory: () => string;

  constructor(options: RoyaltyCalculatorOptions) {
    this._events = options.eventStore;
    this._ledger = options.ledger;
    this._config = options.config;
    this._attribution = options.attribution ?? metadataAttribution;
    this._lock = options.lock ?? new KeyedLock();
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "royalties" });
    this._idFactory = options.idFactory ?? randomUUID;

    for (const stored of this._events.readAll()) {
      if (ROYALTY_EVENT_TYPES.has(stored.event.type)) {
        this._apply(stored.event);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Computation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Compute royalties for every attributed author (or one) over
   * `[period.start, period.end)`.
   *
   * @returns the records written for the period, with their final status
   * @throws ImmutablePeriodError if any author in the batch has a paid
   *         record for the period; nothing is written
   * @throws ConfigMissingError if a rate, threshold or rounding mode is missing
   */
  async computeRoyalties(period: Period, options: ComputeRoyaltiesOptions = {}): Promise<readonly AuthorRoyalty[]> {
    const normalized = normalizePeriod(period);
    const byAuthor = this._attributedRows(normalized, options.authorRef);

    for (const authorRef of byAuthor.keys()) {
      this._assertMutable(authorRef, normalized);
    }

    const written: AuthorRoyalty[] = [];
    for (const [authorRef, rows] of byAuthor) {
      const records = await this._lock.run(lockKey(authorRef, normalized), async () => {
        this._assertMutable(authorRef, normalized);
        return this._computeAuthor(authorRef, normalized, rows, options.correlationId);
      });
      written.push(...records);
    }

    this._logger.info(
      { period: normalized, authors: byAuthor.size, records: written.length },
      "Royalty batch computed",
    );
    return written;
  }

  /**
   * Append a correction record against an existing royalty. Allowed on
   * paid periods; the original is never modified.
   *
   * @throws NotFoundError for an unknown royalty
   * @throws ValidationError for a zero or foreign-currency adjustment
   */
  async recordCorrection(royaltyId: string, adjustment: Money, reason: string): Promise<AuthorRoyalty> {
    const original = this.getRoyalty(royaltyId);
    validateMoney(adjustment);
    if (adjustment.currency !== original.payableAmount.currency) {
      throw new ValidationError(
        `Correction in ${adjustment.currency} for a ${original.payableAmount.currency} royalty`,
        "CURRENCY_MISMATCH",
      );
    }
    if (isZero(adjustment)) {
      throw new ValidationError("A correction must change the amount", "INVALID_AMOUNT");
    }
    if (reason.trim().length === 0) {
      throw new ValidationError("A correction reason is required");
    }

    return this._lock.run(lockKey(original.authorRef, original.period), async () => {
      const record: AuthorRoyalty = {
        id: this._idFactory(),
        authorRef: original.authorRef,
        period: original.period,
        revenueType: original.revenueType,
        grossBase: zeroMoney(adjustment.currency),
        rateApplied: original.rateApplied,
        payableAmount: { ...adjustment },
        status: original.status === "accrued" ? "accrued" : "payable",
        sourceTransactionRefs: [],
        correctsRoyaltyId: original.id,
        correctionReason: reason,
        computedAt: this._clock.now().toISOString(),
      };
      const payload: RoyaltyCorrectedPayload = {
        authorRef: original.authorRef,
        record: { ...record, sourceTransactionRefs: [] },
      };
      this._append(original.authorRef, ROYALTY_CORRECTED, payload);
      this._logger.info(
        { royaltyId: record.id, correctsRoyaltyId: original.id, adjustment },
        "Royalty correction recorded",
      );
      return record;
    });
  }

  /**
   * Mark payable records up to the end of `period` paid by a payout.
   * The payout must be a settled ledger `payout` whose amount equals the
   * payable total in its currency.
   */
  async markPaid(authorRef: string, period: Period, payoutTransactionId: string): Promise<readonly AuthorRoyalty[]> {
    const normalized = normalizePeriod(period);
    const payout = this._ledger.get(payoutTransactionId);
    if (payout === undefined) {
      throw new NotFoundError("Transaction", payoutTransactionId);
    }
    if (payout.kind !== "payout" || payout.status !== "settled") {
      throw new ValidationError(`Transaction "${payoutTransactionId}" is not a settled payout`);
    }

    return this._lock.run(lockKey(authorRef, normalized), async () => {
      const currency = payout.amount.currency;
      const due = this.listRoyalties(authorRef).filter(
        (r) =>
          r.status === "payable" &&
          r.payableAmount.currency === currency &&
          Date.parse(r.period.end) <= Date.parse(normalized.end),
      );
      if (due.length === 0) {
        throw new ValidationError(`No payable ${currency} royalties for author "${authorRef}"`);
      }

      const total = sumMoney(
        due.map((r) => r.payableAmount),
        currency,
      );
      if (compareMoney(total, payout.amount) !== 0) {
        throw new ValidationError(
          `Payout of ${payout.amount.amountMinor} does not match payable total ${total.amountMinor}`,
          "INVALID_AMOUNT",
          { payable: total, payout: payout.amount },
        );
      }

      const payload: RoyaltyPaidPayload = {
        authorRef,
        royaltyIds: due.map((r) => r.id),
        payoutTransactionId,
        paidAt: this._clock.now().toISOString(),
      };
      this._append(authorRef, ROYALTY_PAID, payload);
      this._logger.info({ authorRef, count: due.length, total, payoutTransactionId }, "Royalties paid");
      return due.map((r) => this.getRoyalty(r.id));
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** @throws NotFoundError */
  getRoyalty(id: string): AuthorRoyalty {
    const record = this._records.get(id);
    if (record === undefined) {
      throw new NotFoundError("Royalty", id);
    }
    return record;
  }

  /** Current records of an author, oldest period first. */
  listRoyalties(authorRef: string): readonly AuthorRoyalty[] {
    return [...this._records.values()]
      .filter((r) => r.authorRef === authorRef)
      .sort((a, b) => Date.parse(a.period.start) - Date.parse(b.period.start));
  }

  /** Totals per currency and status of the records inside `period`. */
  getRoyaltySummary(authorRef: string, period: Period): RoyaltySummary {
    const normalized = normalizePeriod(period);
    const records = this.listRoyalties(authorRef).filter(
      (r) =>
        Date.parse(r.period.start) >= Date.parse(normalized.start) &&
        Date.parse(r.period.end) <= Date.parse(normalized.end),
    );

    const byCurrency: Partial<Record<Currency, CurrencySummary>> = {};
    for (const r of records) {
      const currency = r.payableAmount.currency;
      const zero = zeroMoney(currency);
      const s = byCurrency[currency] ?? { accrued: zero, payable: zero, paid: zero, total: zero };
      byCurrency[currency] = {
        accrued: r.status === "accrued" ? addMoney(s.accrued, r.payableAmount) : s.accrued,
        payable: r.status === "payable" ? addMoney(s.payable, r.payableAmount) : s.payable,
        paid: r.status === "paid" ? addMoney(s.paid, r.payableAmount) : s.paid,
        total: addMoney(s.total, r.payableAmount),
      };
    }

    return { authorRef, period: normalized, byCurrency, records };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /** Settled revenue rows in the period, by attributed author. */
  private _attributedRows(
    period: Period,
    onlyAuthor: string | undefined,
  ): Map<string, { tx: PaymentTransaction; revenueType: RevenueType }[]> {
    const byAuthor = new Map<string, { tx: PaymentTransaction; revenueType: RevenueType }[]>();
    const rows = this._ledger.query({ kinds: ["charge", "refund"], from: period.start, to: period.end });

    for (const tx of rows) {
      const counts = (tx.kind === "charge" && tx.status === "settled") || isMoneyReturned(tx);
      if (!counts) continue;
      const attribution = this._attribution(tx);
      if (attribution === null) continue;
      if (onlyAuthor !== undefined && attribution.authorRef !== onlyAuthor) continue;

      const list = byAuthor.get(attribution.authorRef) ?? [];
      list.push({ tx, revenueType: attribution.revenueType });
      byAuthor.set(attribution.authorRef, list);
    }

    // An author whose revenue was all reversed still gets a recompute
    if (onlyAuthor !== undefined && !byAuthor.has(onlyAuthor)) {
      byAuthor.set(onlyAuthor, []);
    }
    return byAuthor;
  }

  private _assertMutable(authorRef: string, period: Period): void {
    const paid = this.listRoyalties(authorRef).some((r) => samePeriod(r.period, period) && r.status === "paid");
    if (paid) {
      throw new ImmutablePeriodError(authorRef, period);
    }
  }

  /** Runs under the (author, period) lock. */
  private _computeAuthor(
    authorRef: string,
    period: Period,
    rows: readonly { tx: PaymentTransaction; revenueType: RevenueType }[],
    correlationId: string | undefined,
  ): readonly AuthorRoyalty[] {
    const now = this._clock.now().toISOString();
    const mode = this._config.resolve("rounding_mode", "royalty", period.end);

    const groups = new Map<string, Group>();
    for (const { tx, revenueType } of rows) {
      const rate = this._config.resolveRate("royalty_rate", revenueType, effectiveAt(tx));
      const currency = tx.amount.currency;
      const key = `${currency}|${revenueType}|${rate}`;
      const group = groups.get(key) ?? { currency, revenueType, rate, net: 0n, refs: [] };
      const amount = parseMinor(tx.amount.amountMinor);
      group.net += tx.kind === "charge" ? amount : -amount;
      group.refs.push(tx.id);
      groups.set(key, group);
    }

    const drafts: AuthorRoyalty[] = [...groups.values()].map((g) => {
      const grossBase = money(g.net, g.currency);
      return {
        id: this._idFactory(),
        authorRef,
        period,
        revenueType: g.revenueType,
        grossBase,
        rateApplied: g.rate,
        payableAmount: applyRate(grossBase, g.rate, mode),
        status: "accrued",
        sourceTransactionRefs: g.refs,
        computedAt: now,
      };
    });

    const previous = this.listRoyalties(authorRef).filter((r) => samePeriod(r.period, period));
    const superseded = previous.filter((r) => r.correctsRoyaltyId === undefined);
    const supersededIds = superseded.map((r) => r.id);
    // Status only moves forward: a currency already payable here stays payable
    const alreadyPayable = new Set(
      superseded.filter((r) => r.status === "payable").map((r) => r.payableAmount.currency),
    );
    const carried = this.listRoyalties(authorRef).filter(
      (r) => r.status === "accrued" && !supersededIds.includes(r.id) && !samePeriod(r.period, period),
    );

    // Threshold per currency: this period plus carried accruals
    const promotedIds: string[] = [];
    const payableCurrencies = new Set<Currency>();
    for (const currency of new Set(drafts.map((d) => d.payableAmount.currency))) {
      const inPeriod = drafts.filter((d) => d.payableAmount.currency === currency);
      const carriedHere = carried.filter((r) => r.payableAmount.currency === currency);
      const total = sumMoney(
        [...inPeriod, ...carriedHere].map((r) => r.payableAmount),
        currency,
      );
      const threshold = this._config.resolveThreshold(currency, period.end);
      if (alreadyPayable.has(currency) || compareMoney(total, threshold) >= 0) {
        payableCurrencies.add(currency);
        promotedIds.push(...carriedHere.map((r) => r.id));
      }
    }

    const records = drafts.map((d) =>
      payableCurrencies.has(d.payableAmount.currency) ? { ...d, status: "payable" as const } : d,
    );

    if (records.length === 0 && supersededIds.length === 0) {
      return [];
    }

    const payload: RoyaltyComputedPayload = {
      authorRef,
      period,
      records: records.map((r) => ({ ...r, sourceTransactionRefs: [...r.sourceTransactionRefs] })),
      supersededIds,
      promotedIds,
      computedAt: now,
    };
    this._append(authorRef, ROYALTY_COMPUTED, payload, correlationId);

    this._logger.info(
      {
        authorRef,
        period,
        records: records.length,
        payable: [...payableCurrencies],
        superseded: supersededIds.length,
        promoted: promotedIds.length,
      },
      "Royalties computed",
    );
    return records;
  }

  private _append(
    authorRef: string,
    type: string,
    payload: Readonly<Record<string, unknown>>,
    correlationId?: string,
  ): void {
    const stream = authorStream(authorRef);
    const event = createDomainEvent(type, "royalties", payload, {
      timestamp: this._clock.now().toISOString(),
      ...(correlationId !== undefined ? { correlationId } : {}),
    });
    const version = this._events.streamVersion(stream);
    this._events.append(stream, [event], { expectedVersion: version === 0 ? "no_stream" : version });
    this._apply(event);
  }

  private _apply(event: DomainEvent): void {
    switch (event.type) {
      case ROYALTY_COMPUTED: {
        const p = RoyaltyComputedPayloadSchema.parse(event.payload);
        for (const id of p.supersededIds) {
          this._records.delete(id);
        }
        for (const id of p.promotedIds) {
          const r = this._records.get(id);
          if (r !== undefined && r.status === "accrued") {
            this._records.set(id, { ...r, status: "payable" });
          }
        }
        for (const r of p.records) {
          this._records.set(r.id, r);
        }
        return;
      }
      case ROYALTY_CORRECTED: {
        const p = RoyaltyCorrectedPayloadSchema.parse(event.payload);
        this._records.set(p.record.id, p.record);
        return;
      }
      case ROYALTY_PAID: {
        const p = RoyaltyPaidPayloadSchema.parse(event.payload);
        for (const id of p.royaltyIds) {
          const r = this._records.get(id);
          if (r !== undefined) {
            this._records.set(id, {
              ...r,
              status: "paid",
              paidAt: p.paidAt,
              payoutTransactionId: p.payoutTransactionId,
            });
          }
        }
        return;
      }
      default:
        throw new ValidationError(`Unknown royalty event "${event.type}"`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function normalizePeriod(period: Period): Period {
  const parsed = PeriodSchema.safeParse(period);
  if (!parsed.success) {
    throw new ValidationError("Invalid period: start must precede end and both must be ISO dates");
  }
  return {
    start: new Date(parsed.data.start).toISOString(),
    end: new Date(parsed.data.end).toISOString(),
  };
}

function samePeriod(a: Period, b: Period): boolean {
  return a.start === b.start && a.end === b.end;
}

function lockKey(authorRef: string, period: Period): string {
  return `${authorRef}|${period.start}|${period.end}`;
}
