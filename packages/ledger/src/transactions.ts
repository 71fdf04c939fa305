/**
 * @quire/ledger — Transaction helpers.
 *
 * Validation on ingest, filtering, and the settled-net computation that
 * invoices and royalties both read.
 */

import type { Currency, ExternalRef, Money, PaymentTransaction } from "@quire/types";
import { ValidationError, isPaymentTransaction } from "@quire/types";
import { isNegative, money, parseMinor, validateMoney } from "./money-math.js";
import type { TransactionFilter } from "./types.js";

/**
 * Unique index key for an external reference.
 */
export function externalKey(ref: ExternalRef): string {
  return `${ref.provider}:${ref.providerTransactionId}`;
}

/**
 * The instant a transaction counts at: settlement if known, else creation.
 */
export function effectiveAt(tx: PaymentTransaction): string {
  return tx.settledAt ?? tx.createdAt;
}

/**
 * Reject malformed rows before they touch the store.
 */
export function validateTransaction(tx: PaymentTransaction): void {
  if (!isPaymentTransaction(tx)) {
    throw new ValidationError("Malformed payment transaction");
  }
  if (tx.id.trim() === "") {
    throw new ValidationError("Transaction id must be non-empty");
  }
  if (tx.externalRef.providerTransactionId.trim() === "") {
    throw new ValidationError("providerTransactionId must be non-empty");
  }
  validateMoney(tx.amount);
  if (isNegative(tx.amount)) {
    throw new ValidationError(
      `Transaction amounts are unsigned; kind carries direction (got ${tx.amount.amountMinor})`,
      "INVALID_AMOUNT",
    );
  }
  if (Number.isNaN(Date.parse(tx.createdAt))) {
    throw new ValidationError(`Invalid createdAt: "${tx.createdAt}"`);
  }
  if (tx.settledAt !== undefined && Number.isNaN(Date.parse(tx.settledAt))) {
    throw new ValidationError(`Invalid settledAt: "${tx.settledAt}"`);
  }
}

export function matchesFilter(tx: PaymentTransaction, filter: TransactionFilter): boolean {
  if (
    filter.subject !== undefined &&
    (tx.subjectRef.type !== filter.subject.type || tx.subjectRef.id !== filter.subject.id)
  ) {
    return false;
  }
  if (filter.kinds !== undefined && !filter.kinds.includes(tx.kind)) return false;
  if (filter.statuses !== undefined && !filter.statuses.includes(tx.status)) return false;
  if (filter.provider !== undefined && tx.externalRef.provider !== filter.provider) return false;
  if (filter.currency !== undefined && tx.amount.currency !== filter.currency) return false;

  if (filter.from !== undefined || filter.to !== undefined) {
    const at = Date.parse(effectiveAt(tx));
    if (filter.from !== undefined && at < Date.parse(filter.from)) return false;
    if (filter.to !== undefined && at >= Date.parse(filter.to)) return false;
  }

  if (filter.metadata !== undefined) {
    for (const [key, value] of Object.entries(filter.metadata)) {
      if (tx.metadata[key] !== value) return false;
    }
  }
  return true;
}

/**
 * True when a row moved money back to the payer (settled refund or a
 * provider-side reversal).
 */
export function isMoneyReturned(tx: PaymentTransaction): boolean {
  return tx.kind === "refund" && (tx.status === "settled" || tx.status === "reversed");
}

/**
 * Σ settled charges − Σ returned money, for rows in one currency.
 * Rows in other currencies are a ValidationError.
 */
export function netSettled(transactions: Iterable<PaymentTransaction>, currency: Currency): Money {
  let net = 0n;
  for (const tx of transactions) {
    const counts = (tx.kind === "charge" && tx.status === "settled") || isMoneyReturned(tx);
    if (!counts) continue;
    if (tx.amount.currency !== currency) {
      throw new ValidationError(
        `Transaction ${tx.id} is in ${tx.amount.currency}, expected ${currency}`,
        "CURRENCY_MISMATCH",
      );
    }
    const amount = parseMinor(tx.amount.amountMinor);
    net += tx.kind === "charge" ? amount : -amount;
  }
  return money(net, currency);
}
