/**
 * @quire/ledger — Ledger store contract.
 *
 * The ledger is the single source of truth for money that moved. It is the
 * only idempotency boundary in the engine: every provider notification,
 * however often it is delivered, becomes at most one row.
 *
 * Rules:
 * - Rows are immutable once committed; corrections are new rows
 * - `(provider, providerTransactionId)` is unique across the store
 * - Insert-or-detect-conflict is one synchronous step inside the store
 */

import type {
  Currency,
  PaymentTransaction,
  ProviderId,
  SubjectRef,
  TransactionKind,
  TransactionStatus,
} from "@quire/types";

// ─── Ingest ──────────────────────────────────────────────────────────────

/**
 * Outcome of an ingest call.
 *
 * `duplicate` carries the row that was stored first, so callers can act on
 * the committed state instead of their own (possibly different) copy.
 */
export interface IngestResult {
  readonly outcome: "inserted" | "duplicate";
  readonly transaction: PaymentTransaction;
}

// ─── Query ───────────────────────────────────────────────────────────────

export interface TransactionFilter {
  readonly subject?: SubjectRef;
  readonly kinds?: readonly TransactionKind[];
  readonly statuses?: readonly TransactionStatus[];
  readonly provider?: ProviderId;
  readonly currency?: Currency;

  /** Effective date (settledAt ?? createdAt) at or after this instant */
  readonly from?: string;

  /** Effective date strictly before this instant */
  readonly to?: string;

  /** Every listed metadata key must equal the given value */
  readonly metadata?: Readonly<Record<string, string>>;
}

// ─── Store ───────────────────────────────────────────────────────────────

export interface LedgerStore {
  /**
   * Record a transaction exactly once.
   *
   * A second ingest with the same external reference, sequential or
   * concurrent, returns `duplicate` with the stored row. Never throws for
   * duplicates; throws ValidationError for malformed rows.
   */
  ingest(transaction: PaymentTransaction): IngestResult;

  /** Matching rows in commit order. */
  query(filter?: TransactionFilter): Iterable<PaymentTransaction>;

  get(id: string): PaymentTransaction | undefined;

  findByExternalRef(
    provider: ProviderId,
    providerTransactionId: string,
  ): PaymentTransaction | undefined;

  /** Number of committed rows */
  readonly size: number;
}
