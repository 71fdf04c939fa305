/**
 * @quire/invoicing — Invoice Manager.
 *
 * Gapless invoice numbering per billing entity, currency-isolated line
 * items, payment application from the ledger, void and overdue
 * transitions. State is event-sourced.
 *
 * @packageDocumentation
 */

export { InvoiceManager } from "./invoice-manager.js";
export type {
  InvoiceManagerOptions,
  CreateInvoiceOptions,
  InvoiceStatistics,
  CurrencyTotals,
} from "./invoice-manager.js";

export {
  INVOICE_ISSUED,
  INVOICE_PAID,
  INVOICE_OVERDUE,
  INVOICE_VOIDED,
  INVOICE_EVENT_SCHEMAS,
  entityStream,
  invoiceStream,
} from "./events.js";
export type {
  InvoiceIssuedPayload,
  InvoicePaidPayload,
  InvoiceOverduePayload,
  InvoiceVoidedPayload,
} from "./events.js";

export { computeTotal, validateItems, taxItem } from "./items.js";
export { applyInvoiceEvent } from "./projection.js";
