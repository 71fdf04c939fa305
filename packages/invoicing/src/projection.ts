/**
 * Invoice state as a fold over its events.
 */

import type { DomainEvent, Invoice } from "@quire/types";
import { ValidationError } from "@quire/types";
import {
  INVOICE_ISSUED,
  INVOICE_OVERDUE,
  INVOICE_PAID,
  INVOICE_VOIDED,
  InvoiceIssuedPayloadSchema,
  InvoiceOverduePayloadSchema,
  InvoicePaidPayloadSchema,
  InvoiceVoidedPayloadSchema,
} from "./events.js";

export const INVOICE_EVENT_TYPES: ReadonlySet<string> = new Set([
  INVOICE_ISSUED,
  INVOICE_PAID,
  INVOICE_OVERDUE,
  INVOICE_VOIDED,
]);

/**
 * Apply one invoice event. `current` is undefined only for `invoice.issued`.
 *
 * @throws ValidationError when the event does not fit the current state
 */
export function applyInvoiceEvent(current: Invoice | undefined, event: DomainEvent): Invoice {
  if (event.type === INVOICE_ISSUED) {
    const p = InvoiceIssuedPayloadSchema.parse(event.payload);
    return { ...p, status: "issued", paymentTransactionIds: [] };
  }

  if (current === undefined) {
    throw new ValidationError(`"${event.type}" event for an invoice that was never issued`);
  }

  switch (event.type) {
    case INVOICE_PAID: {
      const p = InvoicePaidPayloadSchema.parse(event.payload);
      return { ...current, status: "paid", paidAt: p.paidAt, paymentTransactionIds: p.transactionIds };
    }
    case INVOICE_OVERDUE:
      InvoiceOverduePayloadSchema.parse(event.payload);
      return { ...current, status: "overdue" };
    case INVOICE_VOIDED: {
      const p = InvoiceVoidedPayloadSchema.parse(event.payload);
      return { ...current, status: "void", voidedAt: p.voidedAt, voidReason: p.reason };
    }
    default:
      throw new ValidationError(`Unknown invoice event "${event.type}"`);
  }
}

/** The invoice id an invoice event belongs to. */
export function invoiceIdOf(event: DomainEvent): string {
  if (event.type === INVOICE_ISSUED) {
    return InvoiceIssuedPayloadSchema.parse(event.payload).id;
  }
  const id = event.payload["invoiceId"];
  if (typeof id !== "string") {
    throw new ValidationError(`"${event.type}" event carries no invoiceId`);
  }
  return id;
}
