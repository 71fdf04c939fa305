/**
 * @quire/ledger — In-memory LedgerStore implementation.
 *
 * Rows live in a commit-ordered array with three indexes:
 * - by id
 * - by external reference (the uniqueness constraint)
 * - by subject (invoice / subscription / royalty lookups)
 *
 * Ingest is fully synchronous, so check-and-insert cannot interleave with
 * another ingest even when callers race through Promise.all.
 */

import type { PaymentTransaction, ProviderId } from "@quire/types";
import { ValidationError } from "@quire/types";
import type { IngestResult, LedgerStore, TransactionFilter } from "./types.js";
import { externalKey, matchesFilter, validateTransaction } from "./transactions.js";

export class InMemoryLedgerStore implements LedgerStore {
  private readonly _rows: PaymentTransaction[] = [];
  private readonly _byId = new Map<string, PaymentTransaction>();
  private readonly _byExternalRef = new Map<string, PaymentTransaction>();
  private readonly _bySubject = new Map<string, PaymentTransaction[]>();

  // ─── Ingest ─────────────────────────────────────────────────────────

  ingest(transaction: PaymentTransaction): IngestResult {
    validateTransaction(transaction);

    const existing = this._byExternalRef.get(externalKey(transaction.externalRef));
    if (existing !== undefined) {
      return { outcome: "duplicate", transaction: existing };
    }

    if (this._byId.has(transaction.id)) {
      throw new ValidationError(
        `Transaction id "${transaction.id}" is already used by another external reference`,
      );
    }

    const row = freeze(transaction);
    this.persist(row);
    this.index(row);
    return { outcome: "inserted", transaction: row };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  *query(filter: TransactionFilter = {}): Iterable<PaymentTransaction> {
    const source =
      filter.subject !== undefined
        ? (this._bySubject.get(subjectKey(filter.subject.type, filter.subject.id)) ?? [])
        : this._rows;

    for (const row of source) {
      if (matchesFilter(row, filter)) {
        yield row;
      }
    }
  }

  get(id: string): PaymentTransaction | undefined {
    return this._byId.get(id);
  }

  findByExternalRef(
    provider: ProviderId,
    providerTransactionId: string,
  ): PaymentTransaction | undefined {
    return this._byExternalRef.get(externalKey({ provider, providerTransactionId }));
  }

  get size(): number {
    return this._rows.length;
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Durable write hook. Runs before the row becomes visible; a throw here
   * leaves the store unchanged.
   */
  protected persist(_row: PaymentTransaction): void {
    // in-memory: nothing to write
  }

  /**
   * Add a committed row to the indexes. Returns false when the external
   * reference is already indexed (used when replaying a file).
   */
  protected index(row: PaymentTransaction): boolean {
    const key = externalKey(row.externalRef);
    if (this._byExternalRef.has(key)) {
      return false;
    }

    this._rows.push(row);
    this._byId.set(row.id, row);
    this._byExternalRef.set(key, row);

    const sKey = subjectKey(row.subjectRef.type, row.subjectRef.id);
    let bucket = this._bySubject.get(sKey);
    if (bucket === undefined) {
      bucket = [];
      this._bySubject.set(sKey, bucket);
    }
    bucket.push(row);
    return true;
  }
}

function subjectKey(type: string, id: string): string {
  return `${type}:${id}`;
}

function freeze(tx: PaymentTransaction): PaymentTransaction {
  return Object.freeze({
    ...tx,
    externalRef: Object.freeze({ ...tx.externalRef }),
    amount: Object.freeze({ ...tx.amount }),
    subjectRef: Object.freeze({ ...tx.subjectRef }),
    metadata: Object.freeze({ ...tx.metadata }),
  });
}
